import type { Classification } from "./invoiceModel";

export type ProcessingStage = "preprocessing" | "extraction" | "ledger" | "export";

export interface ReconciliationSummary {
    documents: number;
    rows: number;
    byClassification: Record<Classification, number>;
}

/** Flat, export-ready view of one reconciled result. Every column is always set. */
export interface ResultRow {
    source_document: string;
    total_pages: number | "unavailable";
    row_kind: "invoice" | "error" | "orphan";
    source_page: number | string;
    provider_id: string;
    document_type: string;
    document_number: string;
    total_amount: number | string;
    error: string;
    ledger_document_number: string;
    ledger_declared_amount: number | "unavailable";
    ledger_paid_total: number | "unavailable";
    ledger_match: "exact" | "fallback" | "none";
    verdict_in_ledger: string;
    verdict_paid_within_declared: string;
    verdict_total_matches_declared: string;
    classification: Classification;
}

export type ReconciliationRun = {
    id: string;
    sourceDocuments: string[];
    processedAt: string;
    exportBlob?: string;
    summary: ReconciliationSummary;
    rows: ResultRow[];
};

export type ProcessingError = {
    id?: string;
    documentId: string;
    errorMessage: string;
    stage: ProcessingStage;
    timestamp: Date;
};
