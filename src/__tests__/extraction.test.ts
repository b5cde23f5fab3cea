import { describe, it, expect } from "vitest";
import { checkDocumentSize, parseModelResponse, sizeInMegabytes, stripMarkdownFences } from "../services/extraction";

describe("stripMarkdownFences", () => {
    it("removes a json fence", () => {
        expect(stripMarkdownFences('```json\n[{"a": 1}]\n```')).toBe('[{"a": 1}]');
    });

    it("removes a bare fence", () => {
        expect(stripMarkdownFences('  ```\n{"a": 1}\n```  ')).toBe('{"a": 1}');
    });

    it("leaves unfenced text alone", () => {
        expect(stripMarkdownFences(" [] ")).toBe("[]");
    });
});

describe("parseModelResponse", () => {
    it("parses a fenced array of records", () => {
        const text = '```json\n[{"source_page": 2, "document_number": "00045", "total_amount": 99.9}]\n```';

        expect(parseModelResponse(text)).toEqual({
            ok: true,
            records: [{ source_page: 2, document_number: "00045", total_amount: 99.9 }],
        });
    });

    it("wraps a single object in a list", () => {
        expect(parseModelResponse('{"error": "no invoice found"}')).toEqual({
            ok: true,
            records: [{ error: "no invoice found" }],
        });
    });

    it("drops keys it does not know", () => {
        expect(parseModelResponse('[{"document_number": "1", "currency": "BRL"}]')).toEqual({
            ok: true,
            records: [{ document_number: "1" }],
        });
    });

    it("reports text that is not JSON", () => {
        expect(parseModelResponse("Here are the invoices: none")).toEqual({
            ok: false,
            error: "could not parse model response as JSON",
        });
    });

    it("reports JSON of the wrong shape", () => {
        expect(parseModelResponse('"just a string"')).toEqual({
            ok: false,
            error: "model response has an unexpected shape",
        });
        expect(parseModelResponse("[1, 2]")).toEqual({
            ok: false,
            error: "model response has an unexpected shape",
        });
    });

    it("rejects objects without any invoice field", () => {
        expect(parseModelResponse('{"invoices": [{"document_number": "1"}]}')).toEqual({
            ok: false,
            error: "model response has an unexpected shape",
        });
        expect(parseModelResponse('[{"document_number": "1"}, {}]')).toEqual({
            ok: false,
            error: "model response has an unexpected shape",
        });
    });

    it("accepts a record whose fields are null", () => {
        expect(parseModelResponse('[{"document_number": null}]')).toEqual({
            ok: true,
            records: [{ document_number: null }],
        });
    });
});

describe("checkDocumentSize", () => {
    it("measures size in binary megabytes", () => {
        expect(sizeInMegabytes(Buffer.alloc(512 * 1024))).toBe(0.5);
    });

    it("accepts a document at the limit", () => {
        expect(checkDocumentSize(Buffer.alloc(1024 * 1024), 1)).toBeUndefined();
    });

    it("rejects a document over the limit", () => {
        expect(checkDocumentSize(Buffer.alloc(2 * 1024 * 1024), 1)).toEqual({
            error: "document too large for analysis (2.00 MB - limit: 1 MB)",
        });
    });
});
