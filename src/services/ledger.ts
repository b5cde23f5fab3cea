import type { Container, Database, SqlQuerySpec } from "@azure/cosmos";
import { present, type LedgerRow, type Maybe } from "../models/invoiceModel";
import { normalizeAmount, normalizeText, stripLeadingZeros } from "../reconciliation/normalize";
import type { Logger } from "../utils/logger";

/** Looks up the expense ledger rows declared against one source document. */
export interface LedgerClient {
    findBySourceDocument(sourceDocument: string): Promise<LedgerRow[]>;
}

/** One expense entry as stored in the ledger container. */
export interface ExpenseEntry {
    sourceDocument?: string;
    documentTypeId?: string;
    documentNumber?: string | number | null;
    declaredAmount?: number | string | null;
    paidAmount?: number | string | null;
}

export interface LedgerSettings {
    enabled: boolean;
    containerId: string;
    documentTypeId: string;
}

/** The part of a Cosmos container the ledger reads from. */
export interface ExpenseQuerySource {
    query(spec: SqlQuerySpec): Promise<ExpenseEntry[]>;
}

export function withoutPdfExtension(fileName: string): string {
    return fileName.replace(/\.pdf$/i, "");
}

export function buildLedgerQuery(sourceDocument: string, documentTypeId: string): SqlQuerySpec {
    const bare = withoutPdfExtension(sourceDocument);
    return {
        query: `SELECT c.documentNumber, c.declaredAmount, c.paidAmount FROM c
            WHERE c.documentTypeId = @documentTypeId
            AND (UPPER(c.sourceDocument) = @bareName OR UPPER(c.sourceDocument) = @fileName)`,
        parameters: [
            { name: "@documentTypeId", value: documentTypeId },
            { name: "@bareName", value: bare.toUpperCase() },
            { name: "@fileName", value: sourceDocument.toUpperCase() },
        ],
    };
}

function groupKey(documentNumber: Maybe<string>, declaredAmount: Maybe<number>): string {
    return JSON.stringify([
        documentNumber.kind === "present" ? stripLeadingZeros(documentNumber.value) : null,
        declaredAmount.kind === "present" ? declaredAmount.value : null,
    ]);
}

/**
 * Collapses payment entries into one row per (document number, declared amount),
 * summing the paid amounts. Numbers differing only in leading zeros share a row.
 * Groups keep the order and the document number of their first entry.
 */
export function aggregateExpenses(entries: readonly ExpenseEntry[]): LedgerRow[] {
    const groups = new Map<string, LedgerRow>();
    for (const entry of entries) {
        const documentNumber = normalizeText(entry.documentNumber);
        const declaredAmount = normalizeAmount(entry.declaredAmount);
        const paid = normalizeAmount(entry.paidAmount);
        const key = groupKey(documentNumber, declaredAmount);
        const current = groups.get(key);
        if (!current) {
            groups.set(key, { documentNumber, declaredAmount, paidTotal: paid });
            continue;
        }
        if (paid.kind === "present") {
            const total = current.paidTotal.kind === "present" ? current.paidTotal.value + paid.value : paid.value;
            groups.set(key, { ...current, paidTotal: present(total) });
        }
    }
    return [...groups.values()];
}

export class CosmosLedgerClient implements LedgerClient {
    constructor(
        private readonly source: ExpenseQuerySource,
        private readonly documentTypeId: string,
        private readonly logger: Logger
    ) {}

    async findBySourceDocument(sourceDocument: string): Promise<LedgerRow[]> {
        this.logger.log(`🗄️ Querying ledger for ${sourceDocument}`);
        const entries = await this.source.query(buildLedgerQuery(sourceDocument, this.documentTypeId));
        const rows = aggregateExpenses(entries);
        if (rows.length > 0) {
            this.logger.log(`Found ${rows.length} ledger row(s) for ${sourceDocument}`);
        } else {
            this.logger.warn(`⚠️ ${sourceDocument} not found in ledger`);
        }
        return rows;
    }
}

/** Stands in when the ledger is disabled: every document is reported as absent from it. */
export const emptyLedger: LedgerClient = {
    async findBySourceDocument() {
        return [];
    },
};

export function containerQuerySource(container: Container): ExpenseQuerySource {
    return {
        async query(spec) {
            const { resources } = await container.items.query<ExpenseEntry>(spec).fetchAll();
            return resources;
        },
    };
}

export function createCosmosLedger(database: Database, settings: LedgerSettings, logger: Logger): CosmosLedgerClient {
    const container = database.container(settings.containerId);
    return new CosmosLedgerClient(containerQuerySource(container), settings.documentTypeId, logger);
}
