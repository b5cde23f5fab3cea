import { ApiError, GoogleGenAI, type GenerateContentParameters } from "@google/genai";
import type { RawInvoiceRecord, SourceDocument } from "../models/invoiceModel";
import { describeError, type Logger } from "../utils/logger";
import { checkDocumentSize, NO_INVOICE_FOUND, parseModelResponse, type InvoiceExtractor } from "./extraction";

export const EXTRACTION_PROMPT = `Analyse this PDF and extract the data of EVERY invoice it contains.

The following documents count as invoices:
- Nota Fiscal (any kind) and DANFE (auxiliary document of an electronic invoice)
- Telecom operator bills
- Utility bills (power, gas, water)

For EACH invoice found, extract:
1. "source_page": page number where the invoice appears
2. "provider_id": tax ID (CNPJ) of the service provider, digits only
3. "document_type": document type (Nota Fiscal, DANFE, Telecom Bill, Utility Bill, ...)
4. "document_number": the invoice number
5. "total_amount": invoice total as a number, e.g. 1234.56

If the document holds several invoices, return all of them.
If it holds none, return exactly: [{"error": "${NO_INVOICE_FOUND}"}]

Return ONLY a JSON array, no markdown and no explanations:
[{"source_page": 1, "provider_id": "12345678000190", "document_type": "DANFE", "document_number": "12345", "total_amount": 1500.00}]`;

export interface GeminiSettings {
    apiKey: string;
    model: string;
    temperature: number;
    topP: number;
    topK: number;
    maxOutputTokens: number;
    timeoutSeconds: number;
    maxDocumentSizeMb: number;
}

/** The part of the Gemini models API the extractor calls. */
export interface ContentGenerator {
    generateContent(params: GenerateContentParameters): Promise<{ text?: string | undefined }>;
}

function isTimeout(error: unknown): boolean {
    if (!(error instanceof Error)) {
        return false;
    }
    return error.name === "AbortError" || error.name === "TimeoutError" || /timed? ?out/i.test(error.message);
}

export class GeminiInvoiceExtractor implements InvoiceExtractor {
    readonly name = "gemini";

    constructor(
        private readonly models: ContentGenerator,
        private readonly settings: GeminiSettings,
        private readonly logger: Logger
    ) {}

    async extract(document: SourceDocument): Promise<RawInvoiceRecord[]> {
        const tooLarge = checkDocumentSize(document.content, this.settings.maxDocumentSizeMb);
        if (tooLarge) {
            this.logger.warn(`Skipping ${document.name}: ${String(tooLarge.error)}`);
            return [tooLarge];
        }

        try {
            this.logger.log(`🤖 Sending ${document.name} to ${this.settings.model}`);
            const response = await this.models.generateContent({
                model: this.settings.model,
                contents: [
                    {
                        role: "user",
                        parts: [
                            { text: EXTRACTION_PROMPT },
                            { inlineData: { mimeType: "application/pdf", data: document.content.toString("base64") } },
                        ],
                    },
                ],
                config: {
                    temperature: this.settings.temperature,
                    topP: this.settings.topP,
                    topK: this.settings.topK,
                    maxOutputTokens: this.settings.maxOutputTokens,
                    responseMimeType: "application/json",
                },
            });

            if (!response.text) {
                return [{ error: "invalid model response" }];
            }

            const parsed = parseModelResponse(response.text);
            if (!parsed.ok) {
                this.logger.error(`${parsed.error}: ${response.text.slice(0, 200)}`);
                return [{ error: parsed.error }];
            }
            return parsed.records;
        } catch (error) {
            if (error instanceof ApiError) {
                this.logger.error(`Model API returned status ${error.status} for ${document.name}`);
                return [{ error: `model API error: status ${error.status}` }];
            }
            if (isTimeout(error)) {
                this.logger.error(`Timed out extracting ${document.name}`);
                return [{ error: "timeout while processing document" }];
            }
            this.logger.error(`Extraction failed for ${document.name}: ${describeError(error)}`);
            return [{ error: `extraction failed: ${describeError(error)}` }];
        }
    }
}

export function createGeminiExtractor(settings: GeminiSettings, logger: Logger): GeminiInvoiceExtractor {
    const ai = new GoogleGenAI({
        apiKey: settings.apiKey,
        httpOptions: { timeout: settings.timeoutSeconds * 1000 },
    });
    return new GeminiInvoiceExtractor(ai.models, settings, logger);
}
