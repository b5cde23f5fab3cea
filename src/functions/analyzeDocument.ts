import { app, HttpRequest, HttpResponseInit, InvocationContext } from "@azure/functions";
import { getConfig } from "../config";
import { reconcileDocument } from "../reconciliation/orchestrator";
import { openPipeline, reconciliationOptions } from "../services/pipeline";
import { summarize, toResultRows } from "../utils/export";
import { describeError } from "../utils/logger";
import { isPDFValid } from "../utils/pdf";
import { toSourceDocument } from "../utils/storage";

/** Single-document analysis: the PDF is the request body, `?name=` names it for the ledger lookup. */
export async function analyzeDocumentHandler(request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> {
    const fileName = request.query.get("name")?.trim();
    if (!fileName) {
        return { status: 400, jsonBody: { error: "query parameter 'name' is required" } };
    }

    const fileData = Buffer.from(await request.arrayBuffer());
    if (!isPDFValid(fileData)) {
        return { status: 400, jsonBody: { error: "request body is not a valid PDF" } };
    }

    const config = getConfig();
    const pipeline = openPipeline(config, context);
    try {
        context.log(`📄 Analysing uploaded file ${fileName} (${(fileData.length / (1024 * 1024)).toFixed(2)} MB)`);
        const document = await toSourceDocument(fileName, fileData, context);
        const results = await reconcileDocument(document, pipeline.deps, reconciliationOptions(config, false));
        return {
            status: 200,
            jsonBody: { summary: summarize(results), rows: toResultRows(results) },
        };
    } catch (error) {
        context.error(`❌ Error analysing ${fileName}: ${describeError(error)}`);
        await pipeline.store.recordError(fileName, "preprocessing", error);
        return { status: 500, jsonBody: { error: "analysis failed" } };
    } finally {
        pipeline.close();
    }
}

app.http("analyzeDocument", {
    methods: ["POST"],
    authLevel: "function",
    handler: analyzeDocumentHandler,
});
