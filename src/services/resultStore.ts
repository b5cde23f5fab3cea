import type { Database } from "@azure/cosmos";
import type { ProcessingError, ProcessingStage, ReconciliationRun } from "../models/documentModel";
import { describeError, type Logger } from "../utils/logger";

/** Where finished runs and processing failures are recorded. */
export interface ResultStore {
    saveRun(run: ReconciliationRun): Promise<void>;
    recordError(documentId: string, stage: ProcessingStage, error: unknown): Promise<void>;
}

/** The part of a Cosmos container's items API the store writes through. */
export interface ItemWriter {
    create(item: ReconciliationRun | ProcessingError): Promise<unknown>;
}

export class CosmosResultStore implements ResultStore {
    constructor(
        private readonly runs: ItemWriter,
        private readonly errors: ItemWriter,
        private readonly logger: Logger
    ) {}

    async saveRun(run: ReconciliationRun): Promise<void> {
        await this.runs.create(run);
        this.logger.log(`✅ Reconciliation run saved to Cosmos DB: ${run.id}`);
    }

    /** Best effort: a failure to record is logged, never rethrown. */
    async recordError(documentId: string, stage: ProcessingStage, error: unknown): Promise<void> {
        const entry: ProcessingError = {
            documentId,
            errorMessage: describeError(error),
            stage,
            timestamp: new Date(),
        };
        try {
            await this.errors.create(entry);
        } catch (loggingError) {
            this.logger.error(`Error logging to Cosmos DB: ${describeError(loggingError)}`);
        }
    }
}

export function createResultStore(
    database: Database,
    containers: { resultsContainerId: string; errorsContainerId: string },
    logger: Logger
): CosmosResultStore {
    return new CosmosResultStore(
        database.container(containers.resultsContainerId).items,
        database.container(containers.errorsContainerId).items,
        logger
    );
}

/** Cosmos ids may not contain `/`, `\`, `?` or `#`, so a blob path in the label is flattened. */
export function runId(label: string, at: Date = new Date()): string {
    return `${label.replace(/[\/\\?#]/g, "_")}-${at.getTime()}`;
}
