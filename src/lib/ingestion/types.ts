/**
 * Docloom Ingestion — Type Definitions
 *
 * Shared types and interfaces for the document ingestion pipeline.
 * Every extractor must conform to the `Extractor` interface and return an
 * `ExtractionSuccess`; failures are thrown as typed errors and converted
 * into `ExtractionFailure` values by the pipeline.
 */

import type { IngestionErrorKind } from "../errors";

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

/** Logical document kind derived from the file extension */
export type DocumentKind = "pdf" | "image" | "text" | "unsupported";

/** A document on disk, or bytes already in memory (e.g. an upload) */
export type DocumentSource =
    | { path: string }
    | { bytes: Buffer; fileName: string };

// ---------------------------------------------------------------------------
// Extraction results
// ---------------------------------------------------------------------------

export type ExtractionMethod =
    | "direct_text"
    | `text_${string}`
    | "tesseract_ocr"
    | "pdf_text"
    | "pdf_text+ocr";

export interface ExtractionSuccess {
    success: true;
    text: string;
    /** Always `text.length` */
    textLength: number;
    /** Fixed per method, in [0, 1] */
    confidence: number;
    method: ExtractionMethod;
    warning?: string;
    /** Page count, for paged documents */
    pages?: number;
}

export interface ExtractionFailure {
    success: false;
    text: "";
    textLength: 0;
    confidence: 0;
    error: string;
    errorKind: IngestionErrorKind;
}

/** Per-document result wrapper — either success or error */
export type ExtractionResult = ExtractionSuccess | ExtractionFailure;

/** Annotations the pipeline adds after the extractor returns */
export interface ProcessingMetadata {
    documentId: string;
    fileName: string;
    /** Total wall-clock processing time, validation included */
    processingTimeMs: number;
    fileSize?: number;
    contentType?: string;
}

export type ProcessedDocument = ExtractionResult & ProcessingMetadata;

export type ValidationResult =
    | { valid: true; kind: Exclude<DocumentKind, "unsupported">; contentType: string; size: number }
    | { valid: false; reason: string; errorKind: "validation"; supportedTypes?: string[] };

// ---------------------------------------------------------------------------
// Extractor interface
// ---------------------------------------------------------------------------

/**
 * Contract that every document extractor must implement.
 *
 * There is exactly one extractor per document kind; any fallback (text
 * encodings, PDF page OCR) happens inside the extractor.
 */
export interface Extractor {
    /** Human-readable name of the extractor (for logging / debugging) */
    readonly name: string;

    /** The document kind this extractor handles */
    readonly kind: Exclude<DocumentKind, "unsupported">;

    /**
     * Turn the raw file buffer into text.
     *
     * @throws ValidationError | CapabilityMissingError | ExtractionError | EncodingError
     */
    extract(buffer: Buffer, fileName: string): Promise<ExtractionSuccess>;
}

// ---------------------------------------------------------------------------
// Capabilities and OCR
// ---------------------------------------------------------------------------

/** Probed once per pipeline and cached for its lifetime */
export interface Capabilities {
    ocrAvailable: boolean;
    pdfBackendAvailable: boolean;
}

/** Pluggable OCR backend operating on an image file on disk */
export interface OcrProvider {
    readonly name: string;

    /** Pass/fail check that the engine can run at all */
    probe(): Promise<boolean>;

    /** Recognize text from an image file */
    recognize(imagePath: string): Promise<string>;
}

/** Turns arbitrary image bytes into an OCR-friendly PNG */
export type ImagePreprocessor = (image: Buffer) => Promise<Buffer>;
