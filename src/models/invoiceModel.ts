/** A value that may be missing. Rendered as "unavailable" at the export surface. */
export type Maybe<T> = { kind: "present"; value: T } | { kind: "absent" };

export const absent: Maybe<never> = { kind: "absent" };

export function present<T>(value: T): Maybe<T> {
    return { kind: "present", value };
}

export function valueOr<T, F>(maybe: Maybe<T>, fallback: F): T | F {
    return maybe.kind === "present" ? maybe.value : fallback;
}

export const UNAVAILABLE = "unavailable";

/**
 * One record as returned by an extraction provider, before normalization.
 * Providers may send anything in these fields; the normalizer decides.
 */
export interface RawInvoiceRecord {
    source_page?: unknown;
    provider_id?: unknown;
    document_type?: unknown;
    document_number?: unknown;
    total_amount?: unknown;
    error?: unknown;
}

export interface ExtractedInvoice {
    kind: "invoice";
    sourcePage: Maybe<number>;
    providerId: Maybe<string>;
    documentType: Maybe<string>;
    documentNumber: Maybe<string>;
    totalAmount: Maybe<number>;
}

export interface ErrorInvoice {
    kind: "error";
    error: string;
}

export type ExtractionRecord = ExtractedInvoice | ErrorInvoice;

export interface LedgerRow {
    documentNumber: Maybe<string>;
    declaredAmount: Maybe<number>;
    paidTotal: Maybe<number>;
}

export type LedgerMatch = "exact" | "fallback" | "none";

export type Verdict = "YES" | "NO" | "unavailable";

export type Classification = "Discarded" | "Suspect" | "Unable to analyze";

export const CLASSIFICATIONS: readonly Classification[] = ["Discarded", "Suspect", "Unable to analyze"];

export interface Verdicts {
    inLedger: Verdict;
    paidWithinDeclared: Verdict;
    totalMatchesDeclared: Verdict;
}

export interface ValidationOutcome extends Verdicts {
    classification: Classification;
}

export type ResultKind = "invoice" | "error" | "orphan";

/** Input to the validator: an extracted record (or nothing, for orphans) with its ledger fields attached. */
export interface ReconciliationCandidate {
    kind: ResultKind;
    invoice?: ExtractedInvoice;
    error?: string;
    ledger: LedgerRow;
    ledgerMatch: LedgerMatch;
}

export interface ReconciledResult extends ReconciliationCandidate, ValidationOutcome {
    sourceDocument: string;
    totalPages: Maybe<number>;
}

export interface SourceDocument {
    name: string;
    content: Buffer;
    totalPages: Maybe<number>;
}

/** A batch entry that could not be read; it still takes its place in the output. */
export interface UnreadableDocument {
    name: string;
    error: string;
}

export type BatchDocument = SourceDocument | UnreadableDocument;

export const EMPTY_LEDGER_ROW: LedgerRow = {
    documentNumber: absent,
    declaredAmount: absent,
    paidTotal: absent,
};
