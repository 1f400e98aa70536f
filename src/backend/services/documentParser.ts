/**
 * Document Parser Service
 *
 * Extracts plain text from uploaded documents so they can be chunked and
 * embedded. Each format has its own parser behind the same interface
 * (strategy pattern); selection happens on the declared document type.
 *
 * Failures are reported as UnsupportedFormatError (type we don't handle)
 * or CorruptDocumentError (the bytes could not be read, or hold no text).
 */

import * as mammoth from 'mammoth';
import { DocumentType } from '../../shared/types';
import { CorruptDocumentError, UnsupportedFormatError } from '../errors';

export interface DocumentParser {
  parse(data: Buffer): Promise<string>;
}

/**
 * Line endings are normalized so chunk offsets don't depend on the
 * platform that wrote the file.
 */
function normalizeText(text: string): string {
  return text.replace(/\r\n?/g, '\n').trim();
}

export class PlainTextParser implements DocumentParser {
  async parse(data: Buffer): Promise<string> {
    // A NUL byte never appears in UTF-8 text
    if (data.includes(0)) {
      throw new CorruptDocumentError('Text file contains binary data');
    }
    return normalizeText(data.toString('utf-8'));
  }
}

/**
 * Parses PDF documents using pdf-parse.
 * Scanned PDFs (images only) yield no text, which is reported as corrupt.
 */
export class PdfParser implements DocumentParser {
  async parse(data: Buffer): Promise<string> {
    try {
      // Loaded lazily: pdf-parse is only needed for PDF uploads
      const pdfParse = await import('pdf-parse');
      const pdf = await pdfParse.default(data);
      return normalizeText(pdf.text);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new CorruptDocumentError(
        `Failed to parse PDF: ${message}. The file may be corrupted or password-protected.`,
        error instanceof Error ? error : undefined
      );
    }
  }
}

/**
 * Parses Word documents using mammoth's raw text extraction.
 */
export class DocxParser implements DocumentParser {
  async parse(data: Buffer): Promise<string> {
    try {
      const result = await mammoth.extractRawText({ buffer: data });
      return normalizeText(result.value);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new CorruptDocumentError(
        `Failed to parse DOCX: ${message}`,
        error instanceof Error ? error : undefined
      );
    }
  }
}

const parsers: Record<DocumentType, DocumentParser> = {
  pdf: new PdfParser(),
  docx: new DocxParser(),
  txt: new PlainTextParser(),
};

export function isDocumentType(value: string): value is DocumentType {
  return Object.prototype.hasOwnProperty.call(parsers, value);
}

export function getParser(type: string): DocumentParser {
  if (!isDocumentType(type)) {
    throw new UnsupportedFormatError(
      `Unsupported document type: ${type}. Supported formats: .pdf, .docx, .txt`
    );
  }
  return parsers[type];
}

/**
 * Extract the text of a document. A document that parses but has no text
 * cannot be indexed and is rejected as corrupt.
 */
export async function extractText(data: Buffer, type: string): Promise<string> {
  const text = await getParser(type).parse(data);
  if (text.length === 0) {
    throw new CorruptDocumentError(`Document contains no extractable text (${type})`);
  }
  return text;
}

/**
 * Detects document type from filename extension.
 * Returns undefined if the extension is not supported.
 */
export function detectDocumentType(filename: string): DocumentType | undefined {
  const parts = filename.toLowerCase().split('.');
  if (parts.length < 2) {
    return undefined;
  }
  const ext = parts.pop();

  switch (ext) {
    case 'pdf':
      return 'pdf';
    case 'docx':
      return 'docx';
    case 'txt':
      return 'txt';
    default:
      return undefined;
  }
}
