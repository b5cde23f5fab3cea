import {
    absent,
    EMPTY_LEDGER_ROW,
    type ErrorInvoice,
    type ExtractedInvoice,
    type BatchDocument,
    type ExtractionRecord,
    type LedgerRow,
    type ReconciledResult,
    type ReconciliationCandidate,
    type SourceDocument,
} from "../models/invoiceModel";
import { NO_INVOICE_FOUND, type InvoiceExtractor } from "../services/extraction";
import type { LedgerClient } from "../services/ledger";
import { describeError, type Logger } from "../utils/logger";
import { matchInvoices, type MatchOptions } from "./matcher";
import { normalizeExtractedRecord } from "./normalize";
import { DEFAULT_VALIDATION_SETTINGS, validateCandidate, type ValidationSettings } from "./validator";

export interface ReconciliationDeps {
    extractor: InvoiceExtractor;
    ledger: LedgerClient;
    logger: Logger;
}

export interface ReconciliationOptions extends MatchOptions {
    validation?: ValidationSettings;
}

async function extractRecords(document: SourceDocument, deps: ReconciliationDeps): Promise<ExtractionRecord[]> {
    try {
        const raw = await deps.extractor.extract(document);
        if (raw.length === 0) {
            return [{ kind: "error", error: NO_INVOICE_FOUND }];
        }
        return raw.map(normalizeExtractedRecord);
    } catch (error) {
        deps.logger.error(`❌ Extraction failed for ${document.name}: ${describeError(error)}`);
        return [{ kind: "error", error: `extraction failed: ${describeError(error)}` }];
    }
}

function errorCandidate(record: ErrorInvoice): ReconciliationCandidate {
    return { kind: "error", error: record.error, ledger: EMPTY_LEDGER_ROW, ledgerMatch: "none" };
}

/**
 * Runs the whole pipeline for one source document and never throws:
 * extraction and ledger failures come back as "Unable to analyze" rows.
 *
 * Rows follow extraction order; orphan ledger rows are appended last.
 */
export async function reconcileDocument(
    document: SourceDocument,
    deps: ReconciliationDeps,
    options: ReconciliationOptions = {}
): Promise<ReconciledResult[]> {
    const settings = options.validation ?? DEFAULT_VALIDATION_SETTINGS;
    const finish = (candidate: ReconciliationCandidate): ReconciledResult => ({
        ...candidate,
        ...validateCandidate(candidate, settings),
        sourceDocument: document.name,
        totalPages: document.totalPages,
    });

    const records = await extractRecords(document, deps);
    const invoices = records.filter((record): record is ExtractedInvoice => record.kind === "invoice");
    if (invoices.length === 0) {
        deps.logger.warn(`No invoice extracted from ${document.name}`);
        return records
            .filter((record): record is ErrorInvoice => record.kind === "error")
            .map((record) => finish(errorCandidate(record)));
    }

    let ledgerRows: LedgerRow[];
    try {
        ledgerRows = await deps.ledger.findBySourceDocument(document.name);
    } catch (error) {
        const message = `ledger lookup failed: ${describeError(error)}`;
        deps.logger.error(`❌ ${message} (${document.name})`);
        return records.map((record) =>
            finish(
                record.kind === "error"
                    ? errorCandidate(record)
                    : { kind: "error", invoice: record, error: message, ledger: EMPTY_LEDGER_ROW, ledgerMatch: "none" }
            )
        );
    }

    const { matches, orphans } = matchInvoices(invoices, ledgerRows, options);
    const results: ReconciledResult[] = [];
    let next = 0;
    for (const record of records) {
        if (record.kind === "error") {
            results.push(finish(errorCandidate(record)));
            continue;
        }
        const match = matches[next++];
        results.push(finish({ kind: "invoice", invoice: match.invoice, ledger: match.ledger, ledgerMatch: match.ledgerMatch }));
    }
    for (const orphan of orphans) {
        results.push(finish({ kind: "orphan", ledger: orphan, ledgerMatch: "none" }));
    }

    deps.logger.log(
        `✅ ${document.name}: ${invoices.length} invoice(s), ${ledgerRows.length} ledger row(s), ${orphans.length} orphan(s)`
    );
    return results;
}

/**
 * Documents are independent; they run one after another and their rows are concatenated.
 * Unreadable entries become a single error row at their position.
 */
export async function reconcileBatch(
    documents: Iterable<BatchDocument> | AsyncIterable<BatchDocument>,
    deps: ReconciliationDeps,
    options: ReconciliationOptions = {}
): Promise<ReconciledResult[]> {
    const results: ReconciledResult[] = [];
    let index = 0;
    for await (const document of documents) {
        index++;
        if ("error" in document) {
            deps.logger.warn(`[${index}] Skipping unreadable document ${document.name}: ${document.error}`);
            results.push(unreadableDocumentResult(document.name, document.error));
            continue;
        }
        deps.logger.log(`[${index}] Processing: ${document.name}`);
        results.push(...(await reconcileDocument(document, deps, options)));
    }
    return results;
}

/** Result for a document that never reached extraction, e.g. a blob that is not a PDF. */
export function unreadableDocumentResult(name: string, error: string): ReconciledResult {
    const candidate: ReconciliationCandidate = { kind: "error", error, ledger: EMPTY_LEDGER_ROW, ledgerMatch: "none" };
    return { ...candidate, ...validateCandidate(candidate), sourceDocument: name, totalPages: absent };
}
