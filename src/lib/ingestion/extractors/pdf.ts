/**
 * Docloom Ingestion — PDF Extractor
 *
 * Each page is planned into one of three explicit states before any work
 * happens:
 *
 *   direct_text  the page has a text layer; use it
 *   needs_ocr    no text layer, OCR available; rasterize and OCR the page
 *   skipped      no text layer and no OCR
 *
 * Pages are resolved one at a time and joined strictly in page order
 * under `--- Page N ---` / `--- Page N (OCR) ---` markers.
 */

import { CapabilityMissingError, ExtractionError, toErrorMessage } from "../../errors";
import { joinPages, type PageText } from "../normalize";
import type { PdfBackend, PdfPageContent } from "../pdf-backend";
import { scopedLogger } from "../../telemetry/logger";
import type { ExtractionSuccess, Extractor } from "../types";

const log = scopedLogger("PdfExtractor");

const PDF_CONFIDENCE = 0.9;

/** The slice of `ImageOcrExtractor` the PDF extractor needs */
export interface PageOcr {
    readonly available: boolean;
    recognize(image: Buffer, label: string): Promise<string>;
}

export type PagePlan =
    | { state: "direct_text"; page: PdfPageContent }
    | { state: "needs_ocr"; page: PdfPageContent }
    | { state: "skipped"; page: PdfPageContent };

export type PageOutcome =
    | { status: "extracted"; result: PageText }
    | { status: "empty"; pageNumber: number; reason: "no_image" | "no_text" }
    | { status: "ocr_failed"; pageNumber: number; error: string };

export function planPage(page: PdfPageContent, ocrAvailable: boolean): PagePlan {
    if (page.text.trim().length > 0) {
        return { state: "direct_text", page };
    }
    return ocrAvailable ? { state: "needs_ocr", page } : { state: "skipped", page };
}

export interface PdfExtractorOptions {
    /** Result of the PDF backend capability probe */
    available: boolean;
    ocr: PageOcr;
    /** Defaults to the pdf-lib / pdf-parse backend, loaded on first use */
    backend?: PdfBackend;
}

export class PdfExtractor implements Extractor {
    readonly name = "PdfExtractor";
    readonly kind = "pdf";

    private readonly available: boolean;
    private readonly ocr: PageOcr;
    private backend: PdfBackend | null;

    constructor(options: PdfExtractorOptions) {
        this.available = options.available;
        this.ocr = options.ocr;
        this.backend = options.backend ?? null;
    }

    async extract(buffer: Buffer, fileName: string): Promise<ExtractionSuccess> {
        if (!this.available) {
            throw new CapabilityMissingError(
                "pdf",
                "PDF processing requires the pdf-lib and pdf-parse packages"
            );
        }

        let pages: PdfPageContent[];
        try {
            const backend = await this.getOrCreateBackend();
            pages = await backend.readPages(buffer);
        } catch (error) {
            throw new ExtractionError(`PDF processing failed: ${toErrorMessage(error)}`, { cause: error });
        }

        const extracted: PageText[] = [];
        const ocrFailures: number[] = [];
        const withoutImage: number[] = [];
        const withoutText: number[] = [];
        let skipped = 0;

        // One page at a time, so at most one page's temp files exist
        for (const page of pages) {
            const plan = planPage(page, this.ocr.available);
            if (plan.state === "skipped") {
                skipped += 1;
                continue;
            }

            const outcome = await this.resolvePage(plan, fileName);
            switch (outcome.status) {
                case "extracted":
                    extracted.push(outcome.result);
                    break;
                case "ocr_failed":
                    ocrFailures.push(outcome.pageNumber);
                    log.warn(`OCR failed for ${fileName} page ${outcome.pageNumber}: ${outcome.error}`);
                    break;
                case "empty":
                    (outcome.reason === "no_image" ? withoutImage : withoutText).push(outcome.pageNumber);
                    break;
            }
        }

        const warning = buildWarning({ ocrFailures, withoutImage, withoutText, skipped });

        if (extracted.length === 0) {
            const hint = skipped > 0 ? "pages have no text layer and OCR is unavailable" : warning;
            throw new ExtractionError(`No extractable text found in PDF${hint ? ` (${hint})` : ""}`);
        }

        const text = joinPages(extracted);
        const usedOcr = extracted.some((page) => page.source === "ocr");

        return {
            success: true,
            text,
            textLength: text.length,
            confidence: PDF_CONFIDENCE,
            method: usedOcr ? "pdf_text+ocr" : "pdf_text",
            pages: pages.length,
            ...(warning ? { warning } : {}),
        };
    }

    /** Resolve one planned page to its text, or to why it has none */
    async resolvePage(
        plan: Exclude<PagePlan, { state: "skipped" }>,
        fileName: string
    ): Promise<PageOutcome> {
        const { page } = plan;

        if (plan.state === "direct_text") {
            return {
                status: "extracted",
                result: { pageNumber: page.pageNumber, source: "text", text: page.text.trim() },
            };
        }

        try {
            const images = await page.renderImages();
            if (images.length === 0) {
                return { status: "empty", pageNumber: page.pageNumber, reason: "no_image" };
            }

            const parts: string[] = [];
            for (const [index, image] of images.entries()) {
                const text = await this.ocr.recognize(image, `${fileName} page ${page.pageNumber} image ${index + 1}`);
                if (text) {
                    parts.push(text);
                }
            }

            if (parts.length === 0) {
                return { status: "empty", pageNumber: page.pageNumber, reason: "no_text" };
            }
            return {
                status: "extracted",
                result: { pageNumber: page.pageNumber, source: "ocr", text: parts.join("\n") },
            };
        } catch (error) {
            return { status: "ocr_failed", pageNumber: page.pageNumber, error: toErrorMessage(error) };
        }
    }

    private async getOrCreateBackend(): Promise<PdfBackend> {
        if (!this.backend) {
            const { PdfLibBackend } = await import("../pdf-backend");
            this.backend = new PdfLibBackend();
        }
        return this.backend;
    }
}

function buildWarning(pages: {
    ocrFailures: number[];
    withoutImage: number[];
    withoutText: number[];
    skipped: number;
}): string | undefined {
    const { ocrFailures, withoutImage, withoutText, skipped } = pages;
    const notes: string[] = [];
    if (ocrFailures.length > 0) {
        notes.push(`OCR failed on page(s) ${ocrFailures.join(", ")}`);
    }
    if (withoutImage.length > 0) {
        notes.push(`No OCR-able image on page(s) ${withoutImage.join(", ")}`);
    }
    if (withoutText.length > 0) {
        notes.push(`OCR found no text on page(s) ${withoutText.join(", ")}`);
    }
    if (skipped > 0) {
        notes.push(`${skipped} page(s) without a text layer skipped (OCR unavailable)`);
    }
    return notes.length > 0 ? notes.join("; ") : undefined;
}
