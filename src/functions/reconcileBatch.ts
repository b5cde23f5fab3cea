import { app, HttpRequest, HttpResponseInit, InvocationContext } from "@azure/functions";
import { z } from "zod";
import { getConfig } from "../config";
import { reconcileBatch } from "../reconciliation/orchestrator";
import { openPipeline, publishRun, reconciliationOptions } from "../services/pipeline";
import { describeError } from "../utils/logger";
import { listSourceDocuments } from "../utils/storage";

export const batchRequestSchema = z.object({
    container: z.string().min(3).max(63),
    prefix: z.string().default(""),
});

/** Reconciles every PDF under a blob prefix into one workbook. */
export async function reconcileBatchHandler(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
    let body: unknown;
    try {
        body = await request.json();
    } catch {
        return { status: 400, jsonBody: { error: "request body must be JSON" } };
    }
    const parsed = batchRequestSchema.safeParse(body);
    if (!parsed.success) {
        return { status: 400, jsonBody: { error: "invalid request", issues: parsed.error.issues } };
    }
    const { container, prefix } = parsed.data;

    const config = getConfig();
    const pipeline = openPipeline(config, context);
    try {
        context.log(`🚀 Batch reconciliation of ${container}/${prefix}`);
        const documents = listSourceDocuments(
            pipeline.blobService.getContainerClient(container),
            prefix,
            context,
            async (name, reason) => {
                await pipeline.store.recordError(name, "preprocessing", new Error(reason));
            }
        );
        const results = await reconcileBatch(documents, pipeline.deps, reconciliationOptions(config, true));
        const run = await publishRun(
            pipeline,
            config.storage.exportContainer,
            "reconciliation",
            results,
            context
        );
        context.log(`✅ Batch completed: ${run.summary.documents} document(s), ${run.summary.rows} row(s)`);
        return { status: 200, jsonBody: { runId: run.id, exportBlob: run.exportBlob, summary: run.summary } };
    } catch (error) {
        context.error(`❌ Batch reconciliation failed: ${describeError(error)}`);
        await pipeline.store.recordError(`${container}/${prefix}`, "export", error);
        return { status: 500, jsonBody: { error: "batch reconciliation failed" } };
    } finally {
        pipeline.close();
    }
}

app.http("reconcileBatch", {
    methods: ["POST"],
    authLevel: "function",
    handler: reconcileBatchHandler,
});
