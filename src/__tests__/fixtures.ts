import { vi } from "vitest";
import {
    absent,
    present,
    type ExtractedInvoice,
    type LedgerRow,
    type RawInvoiceRecord,
    type SourceDocument,
} from "../models/invoiceModel";
import type { InvoiceExtractor } from "../services/extraction";
import type { LedgerClient } from "../services/ledger";
import type { Logger } from "../utils/logger";

export const createMockLogger = () => ({
    log: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
}) satisfies Logger;

export function invoice(overrides: Partial<Omit<ExtractedInvoice, "kind">> = {}): ExtractedInvoice {
    return {
        kind: "invoice",
        sourcePage: present(1),
        providerId: present("12345678000190"),
        documentType: present("DANFE"),
        documentNumber: present("123"),
        totalAmount: present(1500),
        ...overrides,
    };
}

export function ledgerRow(documentNumber: string | undefined, declared?: number, paid?: number): LedgerRow {
    return {
        documentNumber: documentNumber === undefined ? absent : present(documentNumber),
        declaredAmount: declared === undefined ? absent : present(declared),
        paidTotal: paid === undefined ? absent : present(paid),
    };
}

export function sourceDocument(name = "report-001.pdf", pages = 3): SourceDocument {
    return { name, content: Buffer.from("%PDF-1.7 test"), totalPages: present(pages) };
}

export function fakeExtractor(records: RawInvoiceRecord[] | Error) {
    const extract = vi.fn(async (_document: SourceDocument): Promise<RawInvoiceRecord[]> => {
        if (records instanceof Error) {
            throw records;
        }
        return records;
    });
    return { name: "fake", extract } satisfies InvoiceExtractor;
}

export function fakeLedger(rows: LedgerRow[] | Error) {
    const findBySourceDocument = vi.fn(async (_sourceDocument: string): Promise<LedgerRow[]> => {
        if (rows instanceof Error) {
            throw rows;
        }
        return rows;
    });
    return { findBySourceDocument } satisfies LedgerClient;
}
