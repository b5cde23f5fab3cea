import * as XLSX from "xlsx";
import type { ReconciliationSummary, ResultRow } from "../models/documentModel";
import {
    UNAVAILABLE,
    valueOr,
    type Classification,
    type ReconciledResult,
} from "../models/invoiceModel";

export const SHEET_NAME = "Reconciliation";

const COLUMNS: ReadonlyArray<readonly [keyof ResultRow, string]> = [
    ["source_document", "File Name"],
    ["total_pages", "PDF Pages"],
    ["row_kind", "Row Type"],
    ["source_page", "Invoice Page"],
    ["provider_id", "Provider Tax ID"],
    ["document_type", "Document Type"],
    ["document_number", "Invoice Number"],
    ["total_amount", "Invoice Total"],
    ["error", "Note"],
    ["ledger_document_number", "Ledger Document Number"],
    ["ledger_declared_amount", "Ledger Declared Amount"],
    ["ledger_paid_total", "Ledger Paid Total"],
    ["ledger_match", "Ledger Match"],
    ["verdict_in_ledger", "Invoice Declared In Ledger"],
    ["verdict_paid_within_declared", "Paid Total <= Declared"],
    ["verdict_total_matches_declared", "Invoice Total = Declared"],
    ["classification", "Classification"],
];

export const COLUMN_TITLES: readonly string[] = COLUMNS.map(([, title]) => title);

const AMOUNT_COLUMNS = new Set<keyof ResultRow>(["total_amount", "ledger_declared_amount", "ledger_paid_total"]);

export function toResultRow(result: ReconciledResult): ResultRow {
    // Orphans carry ledger data only; their invoice cells stay blank.
    const blank = result.kind === "orphan" ? "" : UNAVAILABLE;
    const invoice = result.invoice;
    return {
        source_document: result.sourceDocument,
        total_pages: valueOr(result.totalPages, UNAVAILABLE),
        row_kind: result.kind,
        source_page: invoice ? valueOr(invoice.sourcePage, blank) : blank,
        provider_id: invoice ? valueOr(invoice.providerId, blank) : blank,
        document_type: invoice ? valueOr(invoice.documentType, blank) : blank,
        document_number: invoice ? valueOr(invoice.documentNumber, blank) : blank,
        total_amount: invoice ? valueOr(invoice.totalAmount, blank) : blank,
        error: result.error ?? "",
        ledger_document_number: valueOr(result.ledger.documentNumber, UNAVAILABLE),
        ledger_declared_amount: valueOr(result.ledger.declaredAmount, UNAVAILABLE),
        ledger_paid_total: valueOr(result.ledger.paidTotal, UNAVAILABLE),
        ledger_match: result.ledgerMatch,
        verdict_in_ledger: result.inLedger,
        verdict_paid_within_declared: result.paidWithinDeclared,
        verdict_total_matches_declared: result.totalMatchesDeclared,
        classification: result.classification,
    };
}

export function toResultRows(results: readonly ReconciledResult[]): ResultRow[] {
    return results.map(toResultRow);
}

export function summarize(results: readonly ReconciledResult[]): ReconciliationSummary {
    const byClassification: Record<Classification, number> = { Discarded: 0, Suspect: 0, "Unable to analyze": 0 };
    for (const result of results) {
        byClassification[result.classification]++;
    }
    return {
        documents: new Set(results.map((result) => result.sourceDocument)).size,
        rows: results.length,
        byClassification,
    };
}

/** Two decimals with a comma separator, e.g. 1500 -> "1500,00". Non-numbers pass through. */
export function formatAmount(value: number | string): string {
    return typeof value === "number" ? value.toFixed(2).replace(".", ",") : value;
}

function toSheetRow(row: ResultRow): Record<string, string | number> {
    const cells: Record<string, string | number> = {};
    for (const [key, title] of COLUMNS) {
        cells[title] = AMOUNT_COLUMNS.has(key) ? formatAmount(row[key]) : row[key];
    }
    return cells;
}

export function buildWorkbook(rows: readonly ResultRow[]): Buffer {
    const sheet = XLSX.utils.json_to_sheet(rows.map(toSheetRow), { header: [...COLUMN_TITLES] });
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, SHEET_NAME);
    return XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
}

export function exportFileName(prefix: string, at: Date = new Date()): string {
    const stamp = at.toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
    return `${prefix}_${stamp}.xlsx`;
}
