import {
    absent,
    present,
    type ExtractionRecord,
    type Maybe,
    type RawInvoiceRecord,
} from "../models/invoiceModel";

const MISSING_MARKERS = new Set(["unavailable", "n/a", ""]);

/**
 * Strips leading zeros so "00123" and "123" compare equal.
 * A value made only of zeros collapses to "0". Idempotent.
 */
export function stripLeadingZeros(documentNumber: string): string {
    return documentNumber.trim().replace(/^0+/, "") || "0";
}

export function normalizeDocumentNumber(raw: unknown): Maybe<string> {
    const text = normalizeText(raw);
    return text.kind === "present" ? present(stripLeadingZeros(text.value)) : absent;
}

/**
 * Coerces a monetary value into a finite number.
 * Sentinels, blanks and anything non-numeric become absent; this never throws.
 */
export function normalizeAmount(raw: unknown): Maybe<number> {
    if (typeof raw === "number") {
        return Number.isFinite(raw) ? present(raw) : absent;
    }
    if (typeof raw !== "string") {
        return absent;
    }
    const text = raw.trim();
    if (MISSING_MARKERS.has(text.toLowerCase())) {
        return absent;
    }
    const value = Number(text);
    return Number.isFinite(value) ? present(value) : absent;
}

/** Integers past the safe range are absent: their decimal text is no longer exact. */
export function normalizeText(raw: unknown): Maybe<string> {
    if (typeof raw === "number") {
        if (!Number.isFinite(raw) || (Number.isInteger(raw) && !Number.isSafeInteger(raw))) {
            return absent;
        }
        return present(String(raw));
    }
    if (typeof raw !== "string") {
        return absent;
    }
    const text = raw.trim();
    return MISSING_MARKERS.has(text.toLowerCase()) ? absent : present(text);
}

export function normalizePage(raw: unknown): Maybe<number> {
    const page = normalizeAmount(raw);
    return page.kind === "present" && Number.isInteger(page.value) && page.value > 0 ? page : absent;
}

export function normalizeExtractedRecord(raw: RawInvoiceRecord): ExtractionRecord {
    if (raw.error !== undefined && raw.error !== null) {
        const message = normalizeText(raw.error);
        return { kind: "error", error: message.kind === "present" ? message.value : "unknown extraction error" };
    }
    return {
        kind: "invoice",
        sourcePage: normalizePage(raw.source_page),
        providerId: normalizeText(raw.provider_id),
        documentType: normalizeText(raw.document_type),
        documentNumber: normalizeDocumentNumber(raw.document_number),
        totalAmount: normalizeAmount(raw.total_amount),
    };
}
