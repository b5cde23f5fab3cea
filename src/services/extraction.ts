import { z } from "zod";
import type { RawInvoiceRecord, SourceDocument } from "../models/invoiceModel";

/** Turns one source document into invoice records, or a single `{ error }` record. */
export interface InvoiceExtractor {
    readonly name: string;
    extract(document: SourceDocument): Promise<RawInvoiceRecord[]>;
}

export const NO_INVOICE_FOUND = "no invoice found in document";

const rawRecordSchema = z
    .object({
        source_page: z.unknown(),
        provider_id: z.unknown(),
        document_type: z.unknown(),
        document_number: z.unknown(),
        total_amount: z.unknown(),
        error: z.unknown(),
    })
    .partial()
    .refine((record) => Object.keys(record).length > 0, { message: "record has none of the expected fields" });

/** A single object is accepted and wrapped into a one-element list. */
export const modelResponseSchema = z
    .union([z.array(rawRecordSchema), rawRecordSchema])
    .transform((value): RawInvoiceRecord[] => (Array.isArray(value) ? value : [value]));

export function sizeInMegabytes(content: Buffer): number {
    return content.length / (1024 * 1024);
}

/** Returns an error record when the document exceeds the configured limit. */
export function checkDocumentSize(content: Buffer, limitMb: number): RawInvoiceRecord | undefined {
    const sizeMb = sizeInMegabytes(content);
    if (sizeMb > limitMb) {
        return { error: `document too large for analysis (${sizeMb.toFixed(2)} MB - limit: ${limitMb} MB)` };
    }
    return undefined;
}

export function stripMarkdownFences(text: string): string {
    let body = text.trim();
    if (body.startsWith("```json")) {
        body = body.replace(/^```json\s*/, "").replace(/\s*```$/, "");
    } else if (body.startsWith("```")) {
        body = body.replace(/^```\s*/, "").replace(/\s*```$/, "");
    }
    return body.trim();
}

export type ParsedModelResponse =
    | { ok: true; records: RawInvoiceRecord[] }
    | { ok: false; error: string };

export function parseModelResponse(text: string): ParsedModelResponse {
    let json: unknown;
    try {
        json = JSON.parse(stripMarkdownFences(text));
    } catch {
        return { ok: false, error: "could not parse model response as JSON" };
    }
    const parsed = modelResponseSchema.safeParse(json);
    if (!parsed.success) {
        return { ok: false, error: "model response has an unexpected shape" };
    }
    return { ok: true, records: parsed.data };
}
