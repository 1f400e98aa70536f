/**
 * Unit tests for Extraction Service
 *
 * parseInvoiceReply is checked against the reply shapes models produce in
 * practice; extract() runs over a real index with an in-process capability.
 */

import { ModelOutputError } from '../../errors';
import { splitIntoChunks } from '../documentChunker';
import { EmbeddingClient } from '../embeddingClient';
import {
    buildExtractionPrompt,
    EXTRACTION_INSTRUCTIONS,
    ExtractionService,
    NO_EXTRACTION_CONTEXT,
    parseInvoiceReply,
} from '../extractionService';
import { retrieve } from '../retriever';
import { createVectorIndex } from '../vectorStore';
import { createStubCapability } from './fixtures';

const INVOICE_TEXT =
    'Invoice INV-1042 from Acme Supplies. Issued on 2024-03-01. Total due: $1,250.50.';

describe('parseInvoiceReply', () => {
    it('should read a plain JSON reply', () => {
        expect(
            parseInvoiceReply(
                '{"invoiceId":"INV-1042","vendorName":"Acme Supplies",' +
                    '"invoiceDate":"2024-03-01","totalAmount":1250.5}'
            )
        ).toEqual({
            invoiceId: 'INV-1042',
            vendorName: 'Acme Supplies',
            invoiceDate: '2024-03-01',
            totalAmount: 1250.5,
        });
    });

    it('should read snake_case fields inside a code fence', () => {
        expect(
            parseInvoiceReply(
                'Here you go:\n```json\n{"invoice_id": "INV-7", "total_amount": "$1,234.50"}\n```'
            )
        ).toEqual({ invoiceId: 'INV-7', totalAmount: 1234.5 });
    });

    it('should treat null and blank fields as missing', () => {
        const invoice = parseInvoiceReply(
            '{"invoiceId": null, "vendorName": "Acme Supplies", "invoiceDate": "  "}'
        );

        expect(invoice).toEqual({ vendorName: 'Acme Supplies' });
        expect(invoice.invoiceId).toBeUndefined();
        expect(invoice.invoiceDate).toBeUndefined();
    });

    it('should read a numeric invoice id as text', () => {
        expect(parseInvoiceReply('{"invoiceId": 1042}')).toEqual({ invoiceId: '1042' });
    });

    it('should drop fields outside the invoice shape', () => {
        expect(parseInvoiceReply('{"vendorName": "Acme Supplies", "notes": "paid"}')).toEqual({
            vendorName: 'Acme Supplies',
        });
    });

    it('should reject a reply without a JSON object', () => {
        expect(() => parseInvoiceReply('I could not find an invoice.')).toThrow(
            new ModelOutputError('Extraction reply contained no JSON object')
        );
    });

    it('should reject malformed JSON', () => {
        expect(() => parseInvoiceReply('{invoiceId: INV-1042}')).toThrow(
            new ModelOutputError('Extraction reply is not valid JSON')
        );
    });

    it('should reject an amount that is not a number', () => {
        expect(() => parseInvoiceReply('{"totalAmount": "about twelve"}')).toThrow(
            /^Extraction reply does not match the invoice fields: totalAmount: /
        );
        expect(() => parseInvoiceReply('{"totalAmount": "about twelve"}')).toThrow(
            ModelOutputError
        );
    });
});

describe('buildExtractionPrompt', () => {
    it('should append the chunks as context', () => {
        const chunks = splitIntoChunks('Invoice INV-1042', { chunkSize: 50, chunkOverlap: 0 });

        expect(buildExtractionPrompt(chunks)).toBe(
            `${EXTRACTION_INSTRUCTIONS}\n\nContext:\n[Chunk 0]\nInvoice INV-1042`
        );
    });

    it('should say so when there is no context', () => {
        expect(buildExtractionPrompt([])).toBe(
            `${EXTRACTION_INSTRUCTIONS}\n\nContext: ${NO_EXTRACTION_CONTEXT}`
        );
    });
});

describe('ExtractionService', () => {
    async function buildInvoiceIndex(reply: string) {
        const capability = createStubCapability({ answer: async () => reply });
        const embedder = new EmbeddingClient(capability);
        const index = createVectorIndex('cosine');
        await index.build(
            splitIntoChunks(INVOICE_TEXT, { chunkSize: 30, chunkOverlap: 5 }),
            embedder
        );
        return { capability, embedder, index };
    }

    it('should retrieve five chunks and ask for JSON', async () => {
        const { capability, embedder, index } = await buildInvoiceIndex(
            '{"invoiceId": "INV-1042", "totalAmount": 1250.5}'
        );
        const retriever = { retrieve: jest.fn(retrieve) };
        const service = new ExtractionService(capability, retriever);

        const result = await service.extract(index, embedder, 'Get the invoice id and total');

        expect(result.invoice).toEqual({ invoiceId: 'INV-1042', totalAmount: 1250.5 });
        expect(retriever.retrieve).toHaveBeenCalledWith(
            index,
            'Get the invoice id and total',
            embedder,
            5
        );
        expect(result.sources.map((c) => c.id)).toEqual([0, 1, 2]);
        expect(capability.complete).toHaveBeenCalledWith(
            buildExtractionPrompt(result.sources),
            { history: [], input: 'Get the invoice id and total' },
            { format: 'json' }
        );
    });

    it('should raise ModelOutputError for an unreadable reply', async () => {
        const { capability, embedder, index } = await buildInvoiceIndex('No invoice here.');
        const service = new ExtractionService(capability);

        await expect(service.extract(index, embedder, 'Get the vendor')).rejects.toThrow(
            ModelOutputError
        );
    });
});
