import { app, InvocationContext } from "@azure/functions";
import { getConfig } from "../config";
import { reconcileDocument } from "../reconciliation/orchestrator";
import { openPipeline, publishRun, reconciliationOptions } from "../services/pipeline";
import { describeError } from "../utils/logger";
import { isPDFValid } from "../utils/pdf";
import { deleteFromBlob, toSourceDocument, uploadToBlob } from "../utils/storage";

export const INPUT_CONTAINER = "invoices";
export const INVALID_FILES_CONTAINER = "invalid-files";

export function toBuffer(blob: unknown): Buffer | undefined {
    if (Buffer.isBuffer(blob)) {
        return blob;
    }
    if (blob instanceof ArrayBuffer) {
        return Buffer.from(blob);
    }
    if (ArrayBuffer.isView(blob)) {
        return Buffer.from(blob.buffer, blob.byteOffset, blob.byteLength);
    }
    if (typeof blob === "string") {
        return Buffer.from(blob, "utf-8");
    }
    return undefined;
}

export async function reconcileInvoicesHandler(blob: unknown, context: InvocationContext): Promise<void> {
    const fileName = context.triggerMetadata?.name;
    if (typeof fileName !== "string" || fileName === "") {
        context.error("Trigger metadata is missing the file name.");
        return;
    }

    const fileData = toBuffer(blob);
    if (!fileData) {
        context.error(`Cannot convert blob ${fileName} to Buffer`);
        return;
    }

    const config = getConfig();
    const pipeline = openPipeline(config, context);
    try {
        context.log(`📂 Processing file: ${fileName}`);

        if (!isPDFValid(fileData)) {
            context.error(`File is not a valid PDF: ${fileName}`);
            await pipeline.store.recordError(fileName, "preprocessing", new Error("file is not a valid PDF"));
            try {
                await uploadToBlob(pipeline.blobService, INVALID_FILES_CONTAINER, fileName, fileData, context);
                await deleteFromBlob(pipeline.blobService, INPUT_CONTAINER, fileName, context);
                context.log(`Moved invalid file to ${INVALID_FILES_CONTAINER} container: ${fileName}`);
            } catch (uploadError) {
                context.error(`Failed to move invalid file: ${describeError(uploadError)}`);
            }
            return;
        }

        const document = await toSourceDocument(fileName, fileData, context);
        const results = await reconcileDocument(document, pipeline.deps, reconciliationOptions(config, false));

        try {
            const run = await publishRun(pipeline, config.storage.exportContainer, fileName, results, context);
            context.log(`✅ Processing completed for ${fileName}: ${JSON.stringify(run.summary.byClassification)}`);
        } catch (exportError) {
            context.error(`❌ Error exporting results for ${fileName}: ${describeError(exportError)}`);
            await pipeline.store.recordError(fileName, "export", exportError);
        }
    } catch (error) {
        context.error(`❌ Error processing file: ${describeError(error)}`);
        await pipeline.store.recordError(fileName, "preprocessing", error);
    } finally {
        pipeline.close();
    }
}

app.storageBlob("reconcileInvoices", {
    path: `${INPUT_CONTAINER}/{name}`,
    connection: "AzureWebJobsStorage",
    handler: reconcileInvoicesHandler,
});
