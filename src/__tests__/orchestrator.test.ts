import { describe, it, expect } from "vitest";
import { absent, EMPTY_LEDGER_ROW, present } from "../models/invoiceModel";
import { reconcileBatch, reconcileDocument, unreadableDocumentResult } from "../reconciliation/orchestrator";
import { NO_INVOICE_FOUND } from "../services/extraction";
import { aggregateExpenses } from "../services/ledger";
import { createMockLogger, fakeExtractor, fakeLedger, ledgerRow, sourceDocument } from "./fixtures";

const danfe = (document_number: string, total_amount: number, source_page = 1) => ({
    source_page,
    provider_id: "12345678000190",
    document_type: "DANFE",
    document_number,
    total_amount,
});

describe("reconcileDocument", () => {
    it("scenario A: classifies a consistent invoice as discarded", async () => {
        const deps = {
            extractor: fakeExtractor([danfe("123", 1500)]),
            ledger: fakeLedger([ledgerRow("123", 1500, 1500)]),
            logger: createMockLogger(),
        };

        const results = await reconcileDocument(sourceDocument(), deps);

        expect(results).toHaveLength(1);
        expect(results[0]).toMatchObject({
            kind: "invoice",
            sourceDocument: "report-001.pdf",
            totalPages: present(3),
            ledgerMatch: "exact",
            inLedger: "YES",
            paidWithinDeclared: "YES",
            totalMatchesDeclared: "YES",
            classification: "Discarded",
        });
    });

    it("scenario B: flags an invoice missing from the ledger as suspect", async () => {
        const deps = {
            extractor: fakeExtractor([danfe("999", 500)]),
            ledger: fakeLedger([]),
            logger: createMockLogger(),
        };

        const [result] = await reconcileDocument(sourceDocument(), deps);

        expect(result.ledger).toEqual(EMPTY_LEDGER_ROW);
        expect(result).toMatchObject({ inLedger: "NO", classification: "Suspect", ledgerMatch: "none" });
    });

    it("scenario C: cannot analyze an unrecognized document type", async () => {
        const deps = {
            extractor: fakeExtractor([{ document_type: "Receipt", document_number: "1", total_amount: 10 }]),
            ledger: fakeLedger([ledgerRow("1", 10, 10)]),
            logger: createMockLogger(),
        };

        const [result] = await reconcileDocument(sourceDocument(), deps);

        expect(result).toMatchObject({
            inLedger: "unavailable",
            paidWithinDeclared: "unavailable",
            totalMatchesDeclared: "unavailable",
            classification: "Unable to analyze",
        });
    });

    it("scenario D: an extraction error yields a single unanalyzable row without a ledger lookup", async () => {
        const ledger = fakeLedger([ledgerRow("1", 10, 10)]);
        const deps = { extractor: fakeExtractor([{ error: "no invoice found" }]), ledger, logger: createMockLogger() };

        const results = await reconcileDocument(sourceDocument(), deps);

        expect(results).toHaveLength(1);
        expect(results[0]).toMatchObject({
            kind: "error",
            error: "no invoice found",
            ledger: EMPTY_LEDGER_ROW,
            classification: "Unable to analyze",
            inLedger: "unavailable",
        });
        expect(ledger.findBySourceDocument).not.toHaveBeenCalled();
    });

    it("scenario E: emits unmatched ledger rows as orphans after the invoices", async () => {
        const deps = {
            extractor: fakeExtractor([danfe("123", 1500)]),
            ledger: fakeLedger([ledgerRow("777", 80, 80), ledgerRow("123", 1500, 1500)]),
            logger: createMockLogger(),
        };

        const results = await reconcileDocument(sourceDocument(), deps);

        expect(results.map((r) => r.kind)).toEqual(["invoice", "orphan"]);
        expect(results[1].invoice).toBeUndefined();
        expect(results[1]).toMatchObject({
            ledger: ledgerRow("777", 80, 80),
            classification: "Unable to analyze",
        });
    });

    it("queries the ledger once per document with the file name", async () => {
        const ledger = fakeLedger([ledgerRow("1", 10, 10), ledgerRow("2", 20, 20)]);
        const deps = {
            extractor: fakeExtractor([danfe("1", 10, 1), danfe("2", 20, 2)]),
            ledger,
            logger: createMockLogger(),
        };

        const results = await reconcileDocument(sourceDocument("CONTAS-07.pdf"), deps);

        expect(ledger.findBySourceDocument).toHaveBeenCalledTimes(1);
        expect(ledger.findBySourceDocument).toHaveBeenCalledWith("CONTAS-07.pdf");
        expect(results.map((r) => r.classification)).toEqual(["Discarded", "Discarded"]);
    });

    it("keeps error records in place next to valid invoices", async () => {
        const deps = {
            extractor: fakeExtractor([danfe("1", 10), { error: "page 2 unreadable" }, danfe("2", 25)]),
            ledger: fakeLedger([ledgerRow("1", 10, 10), ledgerRow("2", 20, 20)]),
            logger: createMockLogger(),
        };

        const results = await reconcileDocument(sourceDocument(), deps);

        expect(results.map((r) => [r.kind, r.classification])).toEqual([
            ["invoice", "Discarded"],
            ["error", "Unable to analyze"],
            ["invoice", "Suspect"],
        ]);
        expect(results[2].totalMatchesDeclared).toBe("NO");
    });

    it("sums payments recorded under zero-padded and bare numbers before validating", async () => {
        const rows = aggregateExpenses([
            { documentNumber: "0123", declaredAmount: 1500, paidAmount: 1000 },
            { documentNumber: "123", declaredAmount: 1500, paidAmount: 1000 },
        ]);
        const deps = {
            extractor: fakeExtractor([danfe("123", 1500)]),
            ledger: fakeLedger(rows),
            logger: createMockLogger(),
        };

        const results = await reconcileDocument(sourceDocument(), deps);

        expect(results).toHaveLength(1);
        expect(results[0]).toMatchObject({
            kind: "invoice",
            ledger: ledgerRow("0123", 1500, 2000),
            ledgerMatch: "exact",
            inLedger: "YES",
            paidWithinDeclared: "NO",
            totalMatchesDeclared: "YES",
            classification: "Suspect",
        });
    });

    it("matches zero-padded invoice numbers", async () => {
        const deps = {
            extractor: fakeExtractor([danfe("000123", 1500)]),
            ledger: fakeLedger([ledgerRow("123", 1500, 1500)]),
            logger: createMockLogger(),
        };

        const [result] = await reconcileDocument(sourceDocument(), deps);

        expect(result.invoice?.documentNumber).toEqual(present("123"));
        expect(result.classification).toBe("Discarded");
    });

    it("reports an empty extraction as no invoice found", async () => {
        const deps = { extractor: fakeExtractor([]), ledger: fakeLedger([]), logger: createMockLogger() };

        const results = await reconcileDocument(sourceDocument(), deps);

        expect(results).toHaveLength(1);
        expect(results[0]).toMatchObject({ kind: "error", error: NO_INVOICE_FOUND, classification: "Unable to analyze" });
    });

    it("turns a throwing extractor into an error row", async () => {
        const logger = createMockLogger();
        const deps = { extractor: fakeExtractor(new Error("socket hang up")), ledger: fakeLedger([]), logger };

        const results = await reconcileDocument(sourceDocument(), deps);

        expect(results).toHaveLength(1);
        expect(results[0]).toMatchObject({ error: "extraction failed: socket hang up", classification: "Unable to analyze" });
        expect(logger.error).toHaveBeenCalledWith("❌ Extraction failed for report-001.pdf: socket hang up");
    });

    it("keeps extracted invoices but cannot analyze them when the ledger lookup fails", async () => {
        const deps = {
            extractor: fakeExtractor([danfe("1", 10), danfe("2", 20)]),
            ledger: fakeLedger(new Error("connection refused")),
            logger: createMockLogger(),
        };

        const results = await reconcileDocument(sourceDocument(), deps);

        expect(results).toHaveLength(2);
        for (const result of results) {
            expect(result).toMatchObject({
                kind: "error",
                error: "ledger lookup failed: connection refused",
                ledger: EMPTY_LEDGER_ROW,
                classification: "Unable to analyze",
            });
        }
        expect(results[1].invoice?.documentNumber).toEqual(present("2"));
    });

    it("tags fallback rows and keeps them suspect", async () => {
        const deps = {
            extractor: fakeExtractor([danfe("999", 1500)]),
            ledger: fakeLedger([ledgerRow("555", 1500, 1500)]),
            logger: createMockLogger(),
        };

        const results = await reconcileDocument(sourceDocument(), deps, { allowFallbackMatch: true });

        expect(results).toHaveLength(1);
        expect(results[0]).toMatchObject({
            ledgerMatch: "fallback",
            ledger: ledgerRow("555", 1500, 1500),
            inLedger: "NO",
            classification: "Suspect",
        });
    });

    it("applies the configured recognized document types", async () => {
        const deps = {
            extractor: fakeExtractor([{ document_type: "Receipt", document_number: "1", total_amount: 10 }]),
            ledger: fakeLedger([ledgerRow("1", 10, 10)]),
            logger: createMockLogger(),
        };

        const [result] = await reconcileDocument(sourceDocument(), deps, {
            validation: { amountTolerance: 0.01, recognizedDocumentTypes: ["receipt"] },
        });

        expect(result.classification).toBe("Discarded");
    });
});

describe("reconcileBatch", () => {
    it("processes documents in order and concatenates their rows", async () => {
        const extractor = fakeExtractor([danfe("1", 10)]);
        const ledger = fakeLedger([ledgerRow("1", 10, 10)]);
        const deps = { extractor, ledger, logger: createMockLogger() };

        const results = await reconcileBatch([sourceDocument("a.pdf"), sourceDocument("b.pdf")], deps);

        expect(results.map((r) => r.sourceDocument)).toEqual(["a.pdf", "b.pdf"]);
        expect(ledger.findBySourceDocument.mock.calls).toEqual([["a.pdf"], ["b.pdf"]]);
    });

    it("does not let one failing document abort its siblings", async () => {
        const deps = {
            extractor: fakeExtractor([danfe("1", 10)]),
            ledger: fakeLedger([ledgerRow("1", 10, 10)]),
            logger: createMockLogger(),
        };
        deps.ledger.findBySourceDocument.mockRejectedValueOnce(new Error("timeout"));

        const results = await reconcileBatch([sourceDocument("a.pdf"), sourceDocument("b.pdf")], deps);

        expect(results.map((r) => [r.sourceDocument, r.classification])).toEqual([
            ["a.pdf", "Unable to analyze"],
            ["b.pdf", "Discarded"],
        ]);
    });

    it("keeps unreadable entries at their position without extracting them", async () => {
        const extractor = fakeExtractor([danfe("1", 10)]);
        const deps = { extractor, ledger: fakeLedger([ledgerRow("1", 10, 10)]), logger: createMockLogger() };

        const results = await reconcileBatch(
            [sourceDocument("a.pdf"), { name: "b.pdf", error: "file is not a valid PDF" }, sourceDocument("c.pdf")],
            deps
        );

        expect(results.map((r) => [r.sourceDocument, r.kind, r.classification])).toEqual([
            ["a.pdf", "invoice", "Discarded"],
            ["b.pdf", "error", "Unable to analyze"],
            ["c.pdf", "invoice", "Discarded"],
        ]);
        expect(results[1].error).toBe("file is not a valid PDF");
        expect(extractor.extract).toHaveBeenCalledTimes(2);
        expect(deps.logger.warn).toHaveBeenCalledWith("[2] Skipping unreadable document b.pdf: file is not a valid PDF");
    });

    it("accepts an async stream of documents", async () => {
        async function* documents() {
            yield sourceDocument("x.pdf");
        }
        const deps = { extractor: fakeExtractor([danfe("1", 10)]), ledger: fakeLedger([]), logger: createMockLogger() };

        const results = await reconcileBatch(documents(), deps);

        expect(results).toHaveLength(1);
        expect(results[0].classification).toBe("Suspect");
    });
});

describe("unreadableDocumentResult", () => {
    it("builds an unanalyzable row for a document that never reached extraction", () => {
        expect(unreadableDocumentResult("broken.pdf", "file is not a valid PDF")).toEqual({
            kind: "error",
            error: "file is not a valid PDF",
            ledger: EMPTY_LEDGER_ROW,
            ledgerMatch: "none",
            inLedger: "unavailable",
            paidWithinDeclared: "unavailable",
            totalMatchesDeclared: "unavailable",
            classification: "Unable to analyze",
            sourceDocument: "broken.pdf",
            totalPages: absent,
        });
    });
});
