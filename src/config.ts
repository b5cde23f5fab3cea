import * as dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "./models/errors";
import { DEFAULT_AMOUNT_TOLERANCE, DEFAULT_RECOGNIZED_DOCUMENT_TYPES } from "./reconciliation/validator";

dotenv.config();

const flag = (fallback: "true" | "false") =>
    z
        .enum(["true", "false", "1", "0"])
        .default(fallback)
        .transform((value) => value === "true" || value === "1");

const list = z
    .string()
    .transform((value) => value.split(",").map((item) => item.trim()).filter((item) => item !== ""));

const envSchema = z
    .object({
        EXTRACTION_PROVIDER: z.enum(["gemini", "document-intelligence"]).default("gemini"),
        GEMINI_API_KEY: z.string().min(1).optional(),
        GEMINI_MODEL: z.string().min(1).default("gemini-2.5-flash"),
        GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
        GEMINI_TOP_P: z.coerce.number().min(0).max(1).default(0.95),
        GEMINI_TOP_K: z.coerce.number().int().positive().default(64),
        GEMINI_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(8192),
        EXTRACTION_TIMEOUT_SECONDS: z.coerce.number().positive().default(120),
        MAX_DOCUMENT_SIZE_MB: z.coerce.number().positive().default(100),
        DOCUMENT_INTELLIGENCE_ENDPOINT: z.string().url().optional(),
        DOCUMENT_INTELLIGENCE_KEY: z.string().min(1).optional(),

        LEDGER_ENABLED: flag("true"),
        COSMOS_ENDPOINT: z.string().url(),
        COSMOS_KEY: z.string().min(1),
        COSMOS_DATABASE_ID: z.string().min(1),
        LEDGER_CONTAINER_ID: z.string().min(1).default("expenses"),
        LEDGER_DOCUMENT_TYPE_ID: z.string().min(1).default("1"),
        RESULTS_CONTAINER_ID: z.string().min(1).default("reconciliation-results"),
        ERRORS_CONTAINER_ID: z.string().min(1).default("processing-errors"),

        AZURE_STORAGE_CONNECTION_STRING: z.string().min(1),
        EXPORT_CONTAINER: z.string().min(1).default("results"),

        AMOUNT_TOLERANCE: z.coerce.number().nonnegative().default(DEFAULT_AMOUNT_TOLERANCE),
        RECOGNIZED_DOCUMENT_TYPES: list.optional(),
        ALLOW_FALLBACK_MATCH: flag("false"),
    })
    .superRefine((env, ctx) => {
        if (env.EXTRACTION_PROVIDER === "gemini" && !env.GEMINI_API_KEY) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["GEMINI_API_KEY"], message: "required for gemini" });
        }
        if (env.EXTRACTION_PROVIDER === "document-intelligence") {
            for (const name of ["DOCUMENT_INTELLIGENCE_ENDPOINT", "DOCUMENT_INTELLIGENCE_KEY"] as const) {
                if (!env[name]) {
                    ctx.addIssue({ code: z.ZodIssueCode.custom, path: [name], message: "required for document-intelligence" });
                }
            }
        }
    });

export type ExtractionConfig =
    | {
          provider: "gemini";
          apiKey: string;
          model: string;
          temperature: number;
          topP: number;
          topK: number;
          maxOutputTokens: number;
          timeoutSeconds: number;
          maxDocumentSizeMb: number;
      }
    | { provider: "document-intelligence"; endpoint: string; key: string; maxDocumentSizeMb: number };

export interface AppConfig {
    extraction: ExtractionConfig;
    cosmos: {
        endpoint: string;
        key: string;
        databaseId: string;
        resultsContainerId: string;
        errorsContainerId: string;
    };
    ledger: { enabled: boolean; containerId: string; documentTypeId: string };
    storage: { connectionString: string; exportContainer: string };
    reconciliation: {
        amountTolerance: number;
        recognizedDocumentTypes: readonly string[];
        allowFallbackMatch: boolean;
    };
}

/** Reads and validates the environment. Throws ConfigurationError naming every bad variable. */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(source);
    if (!parsed.success) {
        const variables = [...new Set(parsed.error.issues.map((issue) => issue.path.join(".")))];
        const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
        throw new ConfigurationError(`Invalid configuration: ${details}`, variables);
    }
    const env = parsed.data;

    const extraction: ExtractionConfig =
        env.EXTRACTION_PROVIDER === "gemini"
            ? {
                  provider: "gemini",
                  apiKey: env.GEMINI_API_KEY ?? "",
                  model: env.GEMINI_MODEL,
                  temperature: env.GEMINI_TEMPERATURE,
                  topP: env.GEMINI_TOP_P,
                  topK: env.GEMINI_TOP_K,
                  maxOutputTokens: env.GEMINI_MAX_OUTPUT_TOKENS,
                  timeoutSeconds: env.EXTRACTION_TIMEOUT_SECONDS,
                  maxDocumentSizeMb: env.MAX_DOCUMENT_SIZE_MB,
              }
            : {
                  provider: "document-intelligence",
                  endpoint: env.DOCUMENT_INTELLIGENCE_ENDPOINT ?? "",
                  key: env.DOCUMENT_INTELLIGENCE_KEY ?? "",
                  maxDocumentSizeMb: env.MAX_DOCUMENT_SIZE_MB,
              };

    return {
        extraction,
        cosmos: {
            endpoint: env.COSMOS_ENDPOINT,
            key: env.COSMOS_KEY,
            databaseId: env.COSMOS_DATABASE_ID,
            resultsContainerId: env.RESULTS_CONTAINER_ID,
            errorsContainerId: env.ERRORS_CONTAINER_ID,
        },
        ledger: {
            enabled: env.LEDGER_ENABLED,
            containerId: env.LEDGER_CONTAINER_ID,
            documentTypeId: env.LEDGER_DOCUMENT_TYPE_ID,
        },
        storage: {
            connectionString: env.AZURE_STORAGE_CONNECTION_STRING,
            exportContainer: env.EXPORT_CONTAINER,
        },
        reconciliation: {
            amountTolerance: env.AMOUNT_TOLERANCE,
            recognizedDocumentTypes: env.RECOGNIZED_DOCUMENT_TYPES ?? DEFAULT_RECOGNIZED_DOCUMENT_TYPES,
            allowFallbackMatch: env.ALLOW_FALLBACK_MATCH,
        },
    };
}

let cached: AppConfig | undefined;

export function getConfig(): AppConfig {
    cached ??= loadConfig();
    return cached;
}
