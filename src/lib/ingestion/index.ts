/**
 * Docloom Ingestion — Public API
 *
 * Barrel export — import everything from `./lib/ingestion`.
 */

export { IngestionPipeline } from "./pipeline";
export type { IngestionPipelineDeps } from "./pipeline";
export { ExtractorRouter } from "./router";
export { classify, contentTypeOf, supportedContentTypes } from "./classifier";
export { probeCapabilities, probePdfBackend } from "./capabilities";
export { PlainTextExtractor } from "./extractors/text";
export { ImageOcrExtractor, sharpPreprocessor } from "./extractors/image";
export { PdfExtractor, planPage } from "./extractors/pdf";
export type { PageOcr, PageOutcome, PagePlan } from "./extractors/pdf";
export { TesseractCliOcrProvider } from "./extractors/ocr-provider";
export { joinPages, normalizePageText, pageMarker } from "./normalize";
export type { PdfBackend, PdfPageContent } from "./pdf-backend";
export type {
    Capabilities,
    DocumentKind,
    DocumentSource,
    ExtractionFailure,
    ExtractionMethod,
    ExtractionResult,
    ExtractionSuccess,
    Extractor,
    ImagePreprocessor,
    OcrProvider,
    ProcessingMetadata,
    ProcessedDocument,
    ValidationResult,
} from "./types";
