/**
 * Docloom Ingestion — Tesseract OCR Provider
 *
 * Implements the `OcrProvider` interface by running the Tesseract CLI as
 * a subprocess. Every invocation carries its own timeout so a single bad
 * image cannot stall the pipeline.
 */

import { execa } from "execa";
import { ExtractionError } from "../../errors";
import type { OcrProvider } from "../types";

export interface TesseractCliOptions {
    /** Executable name or path */
    command?: string;
    /** Tesseract language code(s), e.g. "eng", "eng+fra" */
    lang?: string;
    timeoutMs?: number;
    probeTimeoutMs?: number;
}

export class TesseractCliOcrProvider implements OcrProvider {
    readonly name = "tesseract";

    private readonly command: string;
    private readonly lang: string;
    private readonly timeoutMs: number;
    private readonly probeTimeoutMs: number;

    constructor(options: TesseractCliOptions = {}) {
        this.command = options.command ?? "tesseract";
        this.lang = options.lang ?? "eng";
        this.timeoutMs = options.timeoutMs ?? 60_000;
        this.probeTimeoutMs = options.probeTimeoutMs ?? 5_000;
    }

    async probe(): Promise<boolean> {
        const result = await execa(this.command, ["--version"], {
            timeout: this.probeTimeoutMs,
            reject: false,
        });
        return result.exitCode === 0;
    }

    async recognize(imagePath: string): Promise<string> {
        // --psm 3: fully automatic page segmentation; --oem 3: default engine
        const result = await execa(
            this.command,
            [imagePath, "stdout", "--psm", "3", "--oem", "3", "-l", this.lang],
            { timeout: this.timeoutMs, reject: false }
        );

        if (result.timedOut) {
            throw new ExtractionError(`OCR timed out after ${this.timeoutMs}ms`);
        }
        if (result.failed || result.exitCode !== 0) {
            const detail = String(result.stderr ?? "").trim() || `exit code ${result.exitCode ?? "unknown"}`;
            throw new ExtractionError(`Tesseract OCR failed: ${detail}`);
        }

        return String(result.stdout ?? "").trim();
    }
}
