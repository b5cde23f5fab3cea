import {
    AzureKeyCredential,
    DocumentAnalysisClient,
    type AnalyzedDocument,
    type DocumentField,
} from "@azure/ai-form-recognizer";
import type { RawInvoiceRecord, SourceDocument } from "../models/invoiceModel";
import { describeError, type Logger } from "../utils/logger";
import { checkDocumentSize, NO_INVOICE_FOUND, type InvoiceExtractor } from "./extraction";

export const INVOICE_MODEL_ID = "prebuilt-invoice";

export interface DocumentIntelligenceSettings {
    endpoint: string;
    key: string;
    maxDocumentSizeMb: number;
}

/** The part of DocumentAnalysisClient the extractor calls. */
export interface InvoiceAnalyzer {
    analyze(content: Buffer): Promise<AnalyzedDocument[]>;
}

function fieldText(field: DocumentField | undefined): string | undefined {
    if (!field) {
        return undefined;
    }
    if (field.kind === "string" && field.value !== undefined) {
        return field.value;
    }
    return field.content;
}

function fieldAmount(field: DocumentField | undefined): number | string | undefined {
    if (!field) {
        return undefined;
    }
    if (field.kind === "currency" && field.value !== undefined) {
        return field.value.amount;
    }
    if (field.kind === "number" && field.value !== undefined) {
        return field.value;
    }
    return field.content;
}

export function toRawInvoiceRecord(document: AnalyzedDocument): RawInvoiceRecord {
    return {
        source_page: document.boundingRegions?.[0]?.pageNumber,
        provider_id: fieldText(document.fields["VendorTaxId"]),
        document_type: "invoice",
        document_number: fieldText(document.fields["InvoiceId"]),
        total_amount: fieldAmount(document.fields["InvoiceTotal"]),
    };
}

/** Invoice extraction through the Document Intelligence prebuilt invoice model. */
export class DocumentIntelligenceInvoiceExtractor implements InvoiceExtractor {
    readonly name = "document-intelligence";

    constructor(
        private readonly analyzer: InvoiceAnalyzer,
        private readonly maxDocumentSizeMb: number,
        private readonly logger: Logger
    ) {}

    async extract(document: SourceDocument): Promise<RawInvoiceRecord[]> {
        const tooLarge = checkDocumentSize(document.content, this.maxDocumentSizeMb);
        if (tooLarge) {
            return [tooLarge];
        }
        try {
            this.logger.log(`🔍 Analysing ${document.name} with ${INVOICE_MODEL_ID}`);
            const documents = await this.analyzer.analyze(document.content);
            if (documents.length === 0) {
                return [{ error: NO_INVOICE_FOUND }];
            }
            this.logger.log(`Found ${documents.length} invoice(s) in ${document.name}`);
            return documents.map(toRawInvoiceRecord);
        } catch (error) {
            this.logger.error(`Document Intelligence analysis failed for ${document.name}: ${describeError(error)}`);
            return [{ error: `extraction failed: ${describeError(error)}` }];
        }
    }
}

export function createDocumentIntelligenceExtractor(
    settings: DocumentIntelligenceSettings,
    logger: Logger
): DocumentIntelligenceInvoiceExtractor {
    const client = new DocumentAnalysisClient(settings.endpoint, new AzureKeyCredential(settings.key));
    const analyzer: InvoiceAnalyzer = {
        async analyze(content) {
            const poller = await client.beginAnalyzeDocument(INVOICE_MODEL_ID, content);
            const result = await poller.pollUntilDone();
            return result.documents ?? [];
        },
    };
    return new DocumentIntelligenceInvoiceExtractor(analyzer, settings.maxDocumentSizeMb, logger);
}
