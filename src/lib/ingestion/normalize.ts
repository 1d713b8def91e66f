/**
 * Docloom Ingestion — Normalization
 *
 * Cleans text read from PDF text layers and assembles per-page output
 * with page-boundary markers so callers can trace provenance.
 */

// ---------------------------------------------------------------------------
// Text-level normalization
// ---------------------------------------------------------------------------

/**
 * Normalize one page of raw text-layer output:
 * 1. Remove extraction artifacts (null bytes, form-feeds)
 * 2. Replace non-breaking spaces / zero-width chars with regular space
 * 3. Drop trailing whitespace before line breaks, collapse space runs
 * 4. Collapse three or more newlines into a paragraph break
 * 5. Trim
 *
 * Line breaks are kept: page text is returned as-is, not reflowed.
 */
export function normalizePageText(raw: string): string {
    return raw
        .replace(/[\x00\x0C]/g, "")
        .replace(/[\u00A0\u200B\u200C\u200D\uFEFF]/g, " ")
        .replace(/[ \t]+\n/g, "\n")
        .replace(/[ \t]+/g, " ")
        .replace(/\n{3,}/g, "\n\n")
        .trim();
}

// ---------------------------------------------------------------------------
// Page assembly
// ---------------------------------------------------------------------------

export type PageSource = "text" | "ocr";

export interface PageText {
    pageNumber: number;
    source: PageSource;
    text: string;
}

export function pageMarker(pageNumber: number, source: PageSource): string {
    return source === "ocr" ? `--- Page ${pageNumber} (OCR) ---` : `--- Page ${pageNumber} ---`;
}

/** Join pages in page order, each under its marker, separated by a blank line */
export function joinPages(pages: readonly PageText[]): string {
    return [...pages]
        .sort((a, b) => a.pageNumber - b.pageNumber)
        .map((page) => `${pageMarker(page.pageNumber, page.source)}\n${page.text}`)
        .join("\n\n");
}
