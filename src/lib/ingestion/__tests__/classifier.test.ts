import { describe, expect, it } from "vitest";
import { classify, contentTypeOf, supportedContentTypes } from "../classifier";

describe("classify", () => {
    it("maps extensions case-insensitively", () => {
        expect(classify("report.PDF")).toBe("pdf");
        expect(classify("scan.JPEG")).toBe("image");
        expect(classify("/tmp/notes/readme.md")).toBe("text");
        expect(classify("page.tiff")).toBe("image");
    });

    it("marks unknown or missing extensions unsupported", () => {
        expect(classify("sheet.csv")).toBe("unsupported");
        expect(classify("Makefile")).toBe("unsupported");
    });
});

describe("contentTypeOf", () => {
    it("returns the MIME type for known extensions", () => {
        expect(contentTypeOf("a.tif")).toBe("image/tiff");
        expect(contentTypeOf("a.md")).toBe("text/plain");
        expect(contentTypeOf("a.webp")).toBe("image/webp");
    });

    it("falls back to application/octet-stream", () => {
        expect(contentTypeOf("letter.docx")).toBe("application/octet-stream");
    });
});

describe("supportedContentTypes", () => {
    it("lists each type once", () => {
        expect(supportedContentTypes()).toEqual([
            "application/pdf",
            "text/plain",
            "image/png",
            "image/jpeg",
            "image/gif",
            "image/webp",
            "image/tiff",
        ]);
    });
});
