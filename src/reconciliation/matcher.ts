import {
    EMPTY_LEDGER_ROW,
    type ExtractedInvoice,
    type LedgerMatch,
    type LedgerRow,
} from "../models/invoiceModel";
import { stripLeadingZeros } from "./normalize";

export interface InvoiceMatch {
    invoice: ExtractedInvoice;
    ledger: LedgerRow;
    ledgerMatch: LedgerMatch;
}

export interface MatchOutcome {
    matches: InvoiceMatch[];
    orphans: LedgerRow[];
}

export interface MatchOptions {
    /** Attach an unclaimed ledger row to invoices that have no exact match. */
    allowFallbackMatch?: boolean;
}

function ledgerKey(row: LedgerRow): string | undefined {
    return row.documentNumber.kind === "present" ? stripLeadingZeros(row.documentNumber.value) : undefined;
}

/** Index of the first ledger row whose document number equals the invoice's, or -1. */
export function findExactMatch(invoice: ExtractedInvoice, rows: readonly LedgerRow[]): number {
    if (invoice.documentNumber.kind === "absent") {
        return -1;
    }
    const key = stripLeadingZeros(invoice.documentNumber.value);
    return rows.findIndex((row) => ledgerKey(row) === key);
}

/**
 * Pairs every invoice of one source document with at most one ledger row.
 *
 * Exact matches are resolved for all invoices first. When fallback is enabled,
 * invoices still unmatched then take the first row nobody claimed, in ledger
 * order. Rows claimed by no invoice are returned as orphans.
 */
export function matchInvoices(
    invoices: readonly ExtractedInvoice[],
    rows: readonly LedgerRow[],
    options: MatchOptions = {}
): MatchOutcome {
    const claimed = new Set<number>();
    const exact = invoices.map((invoice) => {
        const index = findExactMatch(invoice, rows);
        if (index >= 0) {
            claimed.add(index);
        }
        return index;
    });

    const matches = invoices.map((invoice, position): InvoiceMatch => {
        const index = exact[position];
        if (index >= 0) {
            return { invoice, ledger: rows[index], ledgerMatch: "exact" };
        }
        if (options.allowFallbackMatch) {
            const fallback = rows.findIndex((_row, candidate) => !claimed.has(candidate));
            if (fallback >= 0) {
                claimed.add(fallback);
                return { invoice, ledger: rows[fallback], ledgerMatch: "fallback" };
            }
        }
        return { invoice, ledger: EMPTY_LEDGER_ROW, ledgerMatch: "none" };
    });

    const orphans = rows.filter((_row, index) => !claimed.has(index));
    return { matches, orphans };
}
