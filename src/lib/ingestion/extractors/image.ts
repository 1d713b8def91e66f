/**
 * Docloom Ingestion — Image OCR Extractor
 *
 * Preprocesses the image with `sharp` (greyscale, normalized PNG), writes
 * it to a temporary file and hands that file to the OCR provider. The
 * temporary directory is removed on every exit path.
 *
 * Also used by the PDF extractor for pages without a text layer.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { CapabilityMissingError, ExtractionError, toErrorMessage } from "../../errors";
import type { ExtractionSuccess, Extractor, ImagePreprocessor, OcrProvider } from "../types";

const OCR_CONFIDENCE = 0.8;

/** Greyscale + normalize improves Tesseract accuracy on photos and scans */
export const sharpPreprocessor: ImagePreprocessor = async (image) => {
    const { default: sharp } = await import("sharp");
    return sharp(image).greyscale().normalize().png().toBuffer();
};

export class ImageOcrExtractor implements Extractor {
    readonly name = "ImageOcrExtractor";
    readonly kind = "image";

    /** `null` when the OCR capability probe failed */
    private readonly ocrProvider: OcrProvider | null;
    private readonly preprocess: ImagePreprocessor;

    constructor(options: { ocrProvider: OcrProvider | null; preprocess?: ImagePreprocessor }) {
        this.ocrProvider = options.ocrProvider;
        this.preprocess = options.preprocess ?? sharpPreprocessor;
    }

    get available(): boolean {
        return this.ocrProvider !== null;
    }

    async extract(buffer: Buffer, fileName: string): Promise<ExtractionSuccess> {
        const text = await this.recognize(buffer, fileName);
        if (!text) {
            throw new ExtractionError(`OCR produced no text for ${fileName}`);
        }

        return {
            success: true,
            text,
            textLength: text.length,
            confidence: OCR_CONFIDENCE,
            method: "tesseract_ocr",
        };
    }

    /**
     * Run OCR on raw image bytes and return the trimmed text, which may be
     * empty. Throws `CapabilityMissingError` without an OCR provider and
     * `ExtractionError` when preprocessing or the OCR tool fails.
     */
    async recognize(buffer: Buffer, label: string): Promise<string> {
        if (!this.ocrProvider) {
            throw new CapabilityMissingError("ocr", "OCR requires Tesseract (install tesseract-ocr)");
        }

        let png: Buffer;
        try {
            png = await this.preprocess(buffer);
        } catch (error) {
            throw new ExtractionError(`Unable to read image ${label}: ${toErrorMessage(error)}`, { cause: error });
        }

        const workDir = await mkdtemp(path.join(os.tmpdir(), "docloom-ocr-"));
        try {
            const imagePath = path.join(workDir, "image.png");
            await writeFile(imagePath, png);
            return (await this.ocrProvider.recognize(imagePath)).trim();
        } catch (error) {
            if (error instanceof ExtractionError) {
                throw error;
            }
            throw new ExtractionError(`OCR processing failed: ${toErrorMessage(error)}`, { cause: error });
        } finally {
            await rm(workDir, { recursive: true, force: true });
        }
    }
}
