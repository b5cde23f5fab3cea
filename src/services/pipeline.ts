import { CosmosClient } from "@azure/cosmos";
import type { BlobServiceClient } from "@azure/storage-blob";
import type { AppConfig } from "../config";
import type { ReconciliationRun } from "../models/documentModel";
import type { ReconciledResult } from "../models/invoiceModel";
import type { ReconciliationDeps, ReconciliationOptions } from "../reconciliation/orchestrator";
import { buildWorkbook, exportFileName, summarize, toResultRows } from "../utils/export";
import type { Logger } from "../utils/logger";
import { createBlobServiceClient, uploadToBlob } from "../utils/storage";
import { createDocumentIntelligenceExtractor } from "./documentIntelligenceExtractor";
import type { InvoiceExtractor } from "./extraction";
import { createGeminiExtractor } from "./geminiExtractor";
import { createCosmosLedger, emptyLedger, type LedgerClient } from "./ledger";
import { createResultStore, runId, type ResultStore } from "./resultStore";

export interface Pipeline {
    deps: ReconciliationDeps;
    store: ResultStore;
    blobService: BlobServiceClient;
    /** Releases the Cosmos connection. The invocation that opened the pipeline calls this. */
    close(): void;
}

export function createExtractor(config: AppConfig["extraction"], logger: Logger): InvoiceExtractor {
    return config.provider === "gemini"
        ? createGeminiExtractor(config, logger)
        : createDocumentIntelligenceExtractor(config, logger);
}

export function openPipeline(config: AppConfig, logger: Logger): Pipeline {
    const cosmosClient = new CosmosClient({ endpoint: config.cosmos.endpoint, key: config.cosmos.key });
    const database = cosmosClient.database(config.cosmos.databaseId);
    const ledger: LedgerClient = config.ledger.enabled ? createCosmosLedger(database, config.ledger, logger) : emptyLedger;
    if (!config.ledger.enabled) {
        logger.warn("Ledger lookup disabled: every invoice will be reported as absent from the ledger");
    }
    return {
        deps: { extractor: createExtractor(config.extraction, logger), ledger, logger },
        store: createResultStore(database, config.cosmos, logger),
        blobService: createBlobServiceClient(config.storage.connectionString),
        close: () => cosmosClient.dispose(),
    };
}

export function reconciliationOptions(config: AppConfig, batch: boolean): ReconciliationOptions {
    return {
        // Fallback attachment is a batch-only display aid.
        allowFallbackMatch: batch && config.reconciliation.allowFallbackMatch,
        validation: {
            amountTolerance: config.reconciliation.amountTolerance,
            recognizedDocumentTypes: config.reconciliation.recognizedDocumentTypes,
        },
    };
}

/** Uploads the workbook, stores the run record and returns it. */
export async function publishRun(
    pipeline: Pick<Pipeline, "store" | "blobService">,
    exportContainer: string,
    label: string,
    results: readonly ReconciledResult[],
    logger: Logger
): Promise<ReconciliationRun> {
    const rows = toResultRows(results);
    const now = new Date();
    const exportBlob = await uploadToBlob(
        pipeline.blobService,
        exportContainer,
        exportFileName(label, now),
        buildWorkbook(rows),
        logger
    );
    const run: ReconciliationRun = {
        id: runId(label, now),
        sourceDocuments: [...new Set(results.map((result) => result.sourceDocument))],
        processedAt: now.toISOString(),
        exportBlob,
        summary: summarize(results),
        rows,
    };
    await pipeline.store.saveRun(run);
    return run;
}
