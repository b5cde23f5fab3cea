import type {
    Classification,
    Maybe,
    ReconciliationCandidate,
    ValidationOutcome,
    Verdict,
    Verdicts,
} from "../models/invoiceModel";

export const DEFAULT_AMOUNT_TOLERANCE = 0.01;

export const DEFAULT_RECOGNIZED_DOCUMENT_TYPES: readonly string[] = [
    "nota fiscal",
    "danfe",
    "fatura telefonia",
    "fatura concessionária",
    "fatura",
    "nf",
    "nfe",
    "nf-e",
    "invoice",
    "tax-invoice-aux-doc",
    "utility bill",
    "telecom bill",
];

export interface ValidationSettings {
    amountTolerance: number;
    recognizedDocumentTypes: readonly string[];
}

export const DEFAULT_VALIDATION_SETTINGS: ValidationSettings = {
    amountTolerance: DEFAULT_AMOUNT_TOLERANCE,
    recognizedDocumentTypes: DEFAULT_RECOGNIZED_DOCUMENT_TYPES,
};

const UNABLE_TO_ANALYZE: ValidationOutcome = {
    inLedger: "unavailable",
    paidWithinDeclared: "unavailable",
    totalMatchesDeclared: "unavailable",
    classification: "Unable to analyze",
};

export function isRecognizedDocumentType(documentType: string, recognized: readonly string[]): boolean {
    const label = documentType.trim().toLowerCase();
    if (label === "") {
        return false;
    }
    return recognized.some((type) => {
        const needle = type.trim().toLowerCase();
        return needle !== "" && label.includes(needle);
    });
}

/** Only a clean pass on all three rules clears an invoice; any NO or unknown keeps it suspect. */
export function classify(verdicts: Verdicts): Classification {
    const all = [verdicts.inLedger, verdicts.paidWithinDeclared, verdicts.totalMatchesDeclared];
    return all.every((verdict) => verdict === "YES") ? "Discarded" : "Suspect";
}

function compare(left: number | undefined, right: number | undefined, test: (l: number, r: number) => boolean): Verdict {
    if (left === undefined || right === undefined) {
        return "unavailable";
    }
    return test(left, right) ? "YES" : "NO";
}

function amount(value: Maybe<number>): number | undefined {
    return value.kind === "present" ? value.value : undefined;
}

/**
 * Applies the three validation rules to one candidate. Pure and idempotent.
 *
 * 1. the document number exists in the ledger (exact match only);
 * 2. paid total does not exceed the declared amount;
 * 3. the invoice total equals the declared amount within the tolerance.
 */
export function validateCandidate(
    candidate: ReconciliationCandidate,
    settings: ValidationSettings = DEFAULT_VALIDATION_SETTINGS
): ValidationOutcome {
    const invoice = candidate.invoice;
    if (candidate.kind !== "invoice" || candidate.error !== undefined || invoice === undefined) {
        return UNABLE_TO_ANALYZE;
    }
    if (
        invoice.documentType.kind === "absent" ||
        !isRecognizedDocumentType(invoice.documentType.value, settings.recognizedDocumentTypes)
    ) {
        return UNABLE_TO_ANALYZE;
    }

    const inLedger: Verdict =
        candidate.ledgerMatch === "exact" && candidate.ledger.documentNumber.kind === "present" ? "YES" : "NO";
    if (inLedger === "NO") {
        return {
            inLedger,
            paidWithinDeclared: "unavailable",
            totalMatchesDeclared: "unavailable",
            classification: "Suspect",
        };
    }

    const declared = amount(candidate.ledger.declaredAmount);
    const verdicts: Verdicts = {
        inLedger,
        paidWithinDeclared: compare(amount(candidate.ledger.paidTotal), declared, (paid, limit) => paid <= limit),
        totalMatchesDeclared: compare(
            amount(invoice.totalAmount),
            declared,
            (total, expected) => Math.abs(total - expected) < settings.amountTolerance
        ),
    };
    return { ...verdicts, classification: classify(verdicts) };
}
