import { BlobServiceClient, type ContainerClient } from "@azure/storage-blob";
import type { BatchDocument, Maybe, SourceDocument } from "../models/invoiceModel";
import { describeError, type Logger } from "./logger";
import { countPages, isPDFValid } from "./pdf";

export function createBlobServiceClient(connectionString: string): BlobServiceClient {
    return BlobServiceClient.fromConnectionString(connectionString);
}

export async function ensureContainerExists(
    blobServiceClient: BlobServiceClient,
    containerName: string,
    logger: Logger
): Promise<ContainerClient> {
    const containerClient = blobServiceClient.getContainerClient(containerName);
    const { succeeded } = await containerClient.createIfNotExists();
    if (succeeded) {
        logger.log(`Created container: ${containerName}`);
    }
    return containerClient;
}

export async function uploadToBlob(
    blobServiceClient: BlobServiceClient,
    containerName: string,
    fileName: string,
    fileBuffer: Buffer,
    logger: Logger
): Promise<string> {
    try {
        const containerClient = await ensureContainerExists(blobServiceClient, containerName, logger);
        const blockBlobClient = containerClient.getBlockBlobClient(fileName);
        logger.log(`Uploading blob: ${fileName} to container: ${containerName}`);

        const result = await blockBlobClient.uploadData(fileBuffer, {
            blobHTTPHeaders: { blobContentType: contentTypeFor(fileName) },
        });
        logger.log(`Upload of ${fileName} completed. ETag: ${result.etag}`);
        return `${containerName}/${fileName}`;
    } catch (error) {
        logger.error(`Error uploading ${fileName} to blob storage: ${describeError(error)}`);
        throw error;
    }
}

export async function deleteFromBlob(
    blobServiceClient: BlobServiceClient,
    containerName: string,
    fileName: string,
    logger: Logger
): Promise<boolean> {
    const blockBlobClient = blobServiceClient.getContainerClient(containerName).getBlockBlobClient(fileName);
    const { succeeded } = await blockBlobClient.deleteIfExists();
    logger.log(succeeded ? `Deleted ${containerName}/${fileName}` : `File ${fileName} not found in container ${containerName}`);
    return succeeded;
}

export function contentTypeFor(fileName: string): string {
    const lower = fileName.toLowerCase();
    if (lower.endsWith(".pdf")) {
        return "application/pdf";
    }
    if (lower.endsWith(".xlsx")) {
        return "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";
    }
    return "application/octet-stream";
}

export async function toSourceDocument(name: string, content: Buffer, logger: Logger): Promise<SourceDocument> {
    const totalPages: Maybe<number> = await countPages(content, name, logger);
    return { name, content, totalPages };
}

/**
 * Yields every PDF under the prefix, sorted by name, downloading one at a time.
 * A blob that cannot be downloaded or is not a PDF is reported through `onSkipped`
 * and yielded in place as an unreadable entry.
 */
export async function* listSourceDocuments(
    containerClient: ContainerClient,
    prefix: string,
    logger: Logger,
    onSkipped: (name: string, reason: string) => Promise<void>
): AsyncGenerator<BatchDocument> {
    const names: string[] = [];
    for await (const blob of containerClient.listBlobsFlat({ prefix })) {
        if (blob.name.toLowerCase().endsWith(".pdf")) {
            names.push(blob.name);
        }
    }
    names.sort();
    logger.log(`Found ${names.length} PDF file(s) under ${containerClient.containerName}/${prefix}`);

    for (const name of names) {
        let content: Buffer;
        try {
            content = await containerClient.getBlobClient(name).downloadToBuffer();
        } catch (error) {
            const reason = `download failed: ${describeError(error)}`;
            await onSkipped(name, reason);
            yield { name: baseName(name), error: reason };
            continue;
        }
        if (!isPDFValid(content)) {
            const reason = "file is not a valid PDF";
            await onSkipped(name, reason);
            yield { name: baseName(name), error: reason };
            continue;
        }
        yield await toSourceDocument(baseName(name), content, logger);
    }
}

export function baseName(blobName: string): string {
    return blobName.slice(blobName.lastIndexOf("/") + 1);
}
