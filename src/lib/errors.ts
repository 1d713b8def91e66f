/**
 * Docloom — Error Taxonomy
 *
 * Ingestion errors are thrown by extractors and converted into structured
 * results by the pipeline. Generation errors are thrown per attempt inside
 * the retry loop; only `GenerationError` (and input `ValidationError`)
 * leaves the generation client.
 */

export type ErrorKind =
    | "validation"
    | "capability_missing"
    | "extraction"
    | "encoding"
    | "transient_backend"
    | "malformed_response"
    | "generation";

export class DocloomError extends Error {
    readonly code: ErrorKind;

    constructor(code: ErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "DocloomError";
        this.code = code;
    }
}

/** Caller-supplied input is malformed, oversized or unsupported. Never retried. */
export class ValidationError extends DocloomError {
    constructor(message: string) {
        super("validation", message);
        this.name = "ValidationError";
    }
}

/** A required external tool or library is not installed. */
export class CapabilityMissingError extends DocloomError {
    readonly capability: string;

    constructor(capability: string, message: string) {
        super("capability_missing", message);
        this.name = "CapabilityMissingError";
        this.capability = capability;
    }
}

/** The tool ran but failed, timed out, or produced no usable text. */
export class ExtractionError extends DocloomError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("extraction", message, options);
        this.name = "ExtractionError";
    }
}

/** Every configured text encoding failed to decode the input. */
export class EncodingError extends DocloomError {
    readonly attempted: readonly string[];

    constructor(attempted: readonly string[]) {
        super(
            "encoding",
            `Unable to decode text file with any supported encoding (tried ${attempted.join(", ")})`
        );
        this.name = "EncodingError";
        this.attempted = attempted;
    }
}

/** Network failure, timeout or non-2xx status from the generation backend. */
export class TransientBackendError extends DocloomError {
    readonly status?: number;

    constructor(message: string, options?: { status?: number; cause?: unknown }) {
        super("transient_backend", message, { cause: options?.cause });
        this.name = "TransientBackendError";
        this.status = options?.status;
    }
}

/** The backend answered 2xx but the body is not the expected shape. */
export class MalformedResponseError extends DocloomError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("malformed_response", message, options);
        this.name = "MalformedResponseError";
    }
}

export type GenerationFailureKind = "connection" | "validation" | "cancelled";

/** Terminal failure of one `generate` call after its retry budget. */
export class GenerationError extends DocloomError {
    readonly kind: GenerationFailureKind;
    readonly attempts: number;

    constructor(
        kind: GenerationFailureKind,
        message: string,
        options: { attempts: number; cause?: unknown }
    ) {
        super("generation", message, { cause: options.cause });
        this.name = "GenerationError";
        this.kind = kind;
        this.attempts = options.attempts;
    }
}

export function toErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Ingestion error kinds reported on failed results. Anything that is not
 * one of the typed ingestion errors counts as an extraction failure.
 */
export type IngestionErrorKind = "validation" | "capability_missing" | "extraction" | "encoding";

export function ingestionErrorKindOf(error: unknown): IngestionErrorKind {
    if (error instanceof DocloomError) {
        switch (error.code) {
            case "validation":
            case "capability_missing":
            case "encoding":
                return error.code;
            default:
                return "extraction";
        }
    }
    return "extraction";
}
