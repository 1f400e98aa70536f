/**
 * Extraction Service
 *
 * Structured extraction over an indexed document: the request retrieves the
 * most relevant chunks, the model is asked for a single JSON object in the
 * invoice shape, and the reply is validated before anything is returned.
 * Fields the request does not mention, or the document does not hold, stay
 * absent.
 */

import { z } from 'zod';
import { Chunk, Invoice, LanguageModelCapability } from '../../shared/types';
import { ModelOutputError } from '../errors';
import { formatContext } from './answerSynthesizer';
import { Embedder } from './embeddingClient';
import { defaultRetriever, IRetriever } from './retriever';
import { IVectorIndex } from './vectorStore';

/** Chunks retrieved per extraction request */
export const EXTRACTION_K = 5;

export const EXTRACTION_INSTRUCTIONS =
  'You are an expert extraction agent. Your task is to extract relevant information ' +
  'from the provided context and format it according to the specified JSON schema. ' +
  "Only extract data for the fields mentioned in the user's request.\n\n" +
  'Reply with one JSON object and nothing else. Allowed fields:\n' +
  '- invoiceId (string): the invoice number or identifier\n' +
  '- vendorName (string): the company that issued the invoice\n' +
  '- invoiceDate (string): the date the invoice was issued\n' +
  '- totalAmount (number): the total amount due\n' +
  'Leave out any field you cannot find.';

export const NO_EXTRACTION_CONTEXT = 'The document has no passages for this request.';

const FIELD_ALIASES: Readonly<Record<string, keyof Invoice>> = {
  invoice_id: 'invoiceId',
  vendor_name: 'vendorName',
  invoice_date: 'invoiceDate',
  total_amount: 'totalAmount',
};

const optionalText = z.preprocess((value) => {
  if (typeof value === 'number') {
    return String(value);
  }
  if (typeof value === 'string') {
    return value.trim() || undefined;
  }
  return value ?? undefined;
}, z.string().optional());

// "$1,234.50" and "1234.5" both read as 1234.5
const optionalAmount = z.preprocess((value) => {
  if (typeof value === 'string') {
    if (value.trim() === '') {
      return undefined;
    }
    const cleaned = value.replace(/[^0-9.-]/g, '');
    return cleaned === '' ? value : Number(cleaned);
  }
  return value ?? undefined;
}, z.number().finite().optional());

function normalizeKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  const normalized: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    normalized[FIELD_ALIASES[key] ?? key] = field;
  }
  return normalized;
}

export const invoiceSchema = z.preprocess(
  normalizeKeys,
  z.object({
    invoiceId: optionalText,
    vendorName: optionalText,
    invoiceDate: optionalText,
    totalAmount: optionalAmount,
  })
);

export function buildExtractionPrompt(chunks: readonly Chunk[]): string {
  return [EXTRACTION_INSTRUCTIONS, '', formatContext(chunks, NO_EXTRACTION_CONTEXT)].join('\n');
}

/**
 * Read the invoice out of a model reply. Text around the outermost braces
 * (a code fence, a sentence of preamble) is ignored.
 *
 * @throws ModelOutputError when no valid invoice object can be read
 */
export function parseInvoiceReply(reply: string): Invoice {
  const start = reply.indexOf('{');
  const end = reply.lastIndexOf('}');
  if (start === -1 || end < start) {
    throw new ModelOutputError('Extraction reply contained no JSON object');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(reply.slice(start, end + 1));
  } catch (error) {
    throw new ModelOutputError(
      'Extraction reply is not valid JSON',
      error instanceof Error ? error : undefined
    );
  }

  const result = invoiceSchema.safeParse(parsed);
  if (!result.success) {
    const { formErrors, fieldErrors }: z.inferFlattenedErrors<typeof invoiceSchema> =
      result.error.flatten();
    const details = [
      ...formErrors,
      ...Object.entries(fieldErrors).map(
        ([field, messages]) => `${field}: ${(messages ?? []).join(', ')}`
      ),
    ].join('; ');
    throw new ModelOutputError(`Extraction reply does not match the invoice fields: ${details}`);
  }

  return result.data;
}

export interface ExtractionResult {
  invoice: Invoice;
  sources: Chunk[];
}

export interface IExtractionService {
  extract(index: IVectorIndex, embedder: Embedder, request: string): Promise<ExtractionResult>;
}

export class ExtractionService implements IExtractionService {
  constructor(
    private readonly capability: LanguageModelCapability,
    private readonly retriever: IRetriever = defaultRetriever,
    private readonly k: number = EXTRACTION_K
  ) {}

  /**
   * Capability errors propagate unchanged; an unreadable reply raises
   * ModelOutputError.
   */
  async extract(
    index: IVectorIndex,
    embedder: Embedder,
    request: string
  ): Promise<ExtractionResult> {
    const sources = await this.retriever.retrieve(index, request, embedder, this.k);
    const reply = await this.capability.complete(
      buildExtractionPrompt(sources),
      { history: [], input: request },
      { format: 'json' }
    );

    return { invoice: parseInvoiceReply(reply), sources };
  }
}

export function createExtractionService(
  capability: LanguageModelCapability,
  retriever?: IRetriever
): ExtractionService {
  return new ExtractionService(capability, retriever);
}
