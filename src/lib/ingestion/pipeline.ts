/**
 * Docloom Ingestion — Pipeline
 *
 * End-to-end: validate → route → extract → annotate.
 *
 * `process` never throws. Invalid input fails fast with a descriptive
 * reason and never reaches an extractor; extractor errors are converted
 * into failed results, so a batch keeps going past a bad document.
 */

import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { performance } from "node:perf_hooks";
import { v4 as uuidv4 } from "uuid";
import type { IngestionConfig } from "../config";
import { ingestionErrorKindOf, toErrorMessage, type IngestionErrorKind } from "../errors";
import { scopedLogger } from "../telemetry/logger";
import { probeCapabilities } from "./capabilities";
import { classify, contentTypeOf, kindOfContentType, supportedContentTypes } from "./classifier";
import { ImageOcrExtractor } from "./extractors/image";
import { TesseractCliOcrProvider } from "./extractors/ocr-provider";
import { PdfExtractor } from "./extractors/pdf";
import { PlainTextExtractor } from "./extractors/text";
import type { PdfBackend } from "./pdf-backend";
import { ExtractorRouter } from "./router";
import type {
    Capabilities,
    DocumentSource,
    Extractor,
    ImagePreprocessor,
    OcrProvider,
    ProcessedDocument,
    ValidationResult,
} from "./types";

const log = scopedLogger("IngestionPipeline");

const MB = 1024 * 1024;

export interface IngestionPipelineDeps {
    /** Defaults to the Tesseract CLI configured from `IngestionConfig` */
    ocrProvider?: OcrProvider;
    preprocess?: ImagePreprocessor;
    pdfBackend?: PdfBackend;
    probePdf?: () => Promise<boolean>;
    /** Replace the built-in extractor for a kind */
    extractors?: Extractor[];
    /** Monotonic clock in milliseconds */
    now?: () => number;
}

export class IngestionPipeline {
    readonly capabilities: Readonly<Capabilities>;

    private readonly config: IngestionConfig;
    private readonly router: ExtractorRouter;
    private readonly now: () => number;

    /**
     * Probe the environment once and build a pipeline around the result.
     */
    static async create(config: IngestionConfig, deps: IngestionPipelineDeps = {}): Promise<IngestionPipeline> {
        const ocrProvider = deps.ocrProvider ?? createOcrProvider(config);
        const capabilities = await probeCapabilities({ ocrProvider, probePdf: deps.probePdf });
        return new IngestionPipeline(config, capabilities, { ...deps, ocrProvider });
    }

    /** Use `create` unless the capabilities are already known */
    constructor(config: IngestionConfig, capabilities: Capabilities, deps: IngestionPipelineDeps = {}) {
        this.config = config;
        this.capabilities = Object.freeze({ ...capabilities });
        this.now = deps.now ?? (() => performance.now());

        const ocrProvider = deps.ocrProvider ?? createOcrProvider(config);
        const image = new ImageOcrExtractor({
            ocrProvider: capabilities.ocrAvailable ? ocrProvider : null,
            preprocess: deps.preprocess,
        });

        this.router = new ExtractorRouter([
            new PlainTextExtractor({ encodings: config.textEncodings }),
            image,
            new PdfExtractor({
                available: capabilities.pdfBackendAvailable,
                ocr: image,
                backend: deps.pdfBackend,
            }),
            ...(deps.extractors ?? []),
        ]);
    }

    // ---------------------------------------------------------------------------
    // Public API
    // ---------------------------------------------------------------------------

    getSupportedTypes(): string[] {
        const kinds = this.router.kinds();
        return supportedContentTypes().filter((type) => {
            const kind = kindOfContentType(type);
            return kind !== "unsupported" && kinds.includes(kind);
        });
    }

    /**
     * Check existence, file type, supported kind and size, in that order.
     */
    async validate(source: DocumentSource): Promise<ValidationResult> {
        let size: number;
        if ("bytes" in source) {
            size = source.bytes.length;
        } else {
            const info = await stat(source.path).catch(() => null);
            if (!info) {
                return { valid: false, reason: "File does not exist", errorKind: "validation" };
            }
            if (!info.isFile()) {
                return { valid: false, reason: "Path is not a file", errorKind: "validation" };
            }
            size = info.size;
        }

        const fileName = fileNameOf(source);
        const contentType = contentTypeOf(fileName);
        const kind = classify(fileName);
        if (kind === "unsupported" || !this.router.kinds().includes(kind)) {
            return {
                valid: false,
                reason: `Unsupported file type: ${contentType}`,
                errorKind: "validation",
                supportedTypes: this.getSupportedTypes(),
            };
        }

        if (size > this.config.maxFileBytes) {
            return {
                valid: false,
                reason: `File too large: ${(size / MB).toFixed(1)}MB (max: ${formatMegabytes(this.config.maxFileBytes)}MB)`,
                errorKind: "validation",
            };
        }

        if (size === 0) {
            return { valid: false, reason: "File is empty", errorKind: "validation" };
        }

        return { valid: true, kind, contentType, size };
    }

    async process(source: DocumentSource): Promise<ProcessedDocument> {
        const started = this.now();
        const documentId = uuidv4();
        const fileName = fileNameOf(source);
        let known: { fileSize?: number; contentType?: string } = {};

        const failure = (error: string, errorKind: IngestionErrorKind): ProcessedDocument => {
            const processingTimeMs = this.now() - started;
            log.warn(`Document failed: ${fileName} (${errorKind}: ${error})`);
            return {
                success: false,
                text: "",
                textLength: 0,
                confidence: 0,
                error,
                errorKind,
                documentId,
                fileName,
                processingTimeMs,
                ...known,
            };
        };

        try {
            const validation = await this.validate(source);
            if (!validation.valid) {
                return failure(validation.reason, validation.errorKind);
            }
            known = { fileSize: validation.size, contentType: validation.contentType };

            const extractor = this.router.route(validation.kind);
            const buffer = "bytes" in source ? source.bytes : await readFile(source.path);
            const result = await extractor.extract(buffer, fileName);

            const processingTimeMs = this.now() - started;
            log.info(
                `Document processed: ${fileName} (${result.textLength} chars, ${processingTimeMs.toFixed(0)}ms)`
            );

            return { ...result, documentId, fileName, processingTimeMs, ...known };
        } catch (error) {
            return failure(toErrorMessage(error), ingestionErrorKindOf(error));
        }
    }

    /**
     * Process documents concurrently. Results keep input order and one
     * failure never aborts the batch.
     */
    async processBatch(sources: DocumentSource[]): Promise<ProcessedDocument[]> {
        const settled = await Promise.allSettled(sources.map((source) => this.process(source)));

        return settled.map((outcome, index): ProcessedDocument => {
            if (outcome.status === "fulfilled") {
                return outcome.value;
            }
            return {
                success: false,
                text: "",
                textLength: 0,
                confidence: 0,
                error: toErrorMessage(outcome.reason),
                errorKind: "extraction",
                documentId: uuidv4(),
                fileName: fileNameOf(sources[index]),
                processingTimeMs: 0,
            };
        });
    }
}

function createOcrProvider(config: IngestionConfig): OcrProvider {
    return new TesseractCliOcrProvider({
        command: config.ocrCommand,
        lang: config.ocrLanguage,
        timeoutMs: config.ocrTimeoutMs,
        probeTimeoutMs: config.probeTimeoutMs,
    });
}

function fileNameOf(source: DocumentSource): string {
    return "bytes" in source ? source.fileName : path.basename(source.path);
}

function formatMegabytes(bytes: number): string {
    return String(Math.round((bytes / MB) * 10) / 10);
}
