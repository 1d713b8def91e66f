// pdf-parse ships no types. The package index runs a debug read of a test
// fixture when loaded as an ES module, so the library entry is imported.
declare module "pdf-parse/lib/pdf-parse.js" {
    export interface PdfParseOptions {
        /** Receives a pdf.js page proxy; the returned string becomes that page's text */
        pagerender?: (pageData: unknown) => Promise<string> | string;
        max?: number;
    }

    export interface PdfParseResult {
        numpages: number;
        numrender: number;
        info: Record<string, unknown>;
        metadata: unknown;
        text: string;
        version: string;
    }

    export default function pdfParse(
        dataBuffer: Buffer | Uint8Array,
        options?: PdfParseOptions
    ): Promise<PdfParseResult>;
}
