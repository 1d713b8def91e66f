/**
 * Docloom Ingestion — Content Type Classifier
 *
 * Maps a file name or path to its logical document kind and MIME type.
 * Pure function of the extension: no I/O, unknown extensions are
 * "unsupported".
 */

import path from "node:path";
import type { DocumentKind } from "./types";

const OCTET_STREAM = "application/octet-stream";

const EXTENSION_MIME_MAP: Record<string, string> = {
    ".pdf": "application/pdf",
    ".txt": "text/plain",
    ".md": "text/plain",
    ".png": "image/png",
    ".jpg": "image/jpeg",
    ".jpeg": "image/jpeg",
    ".gif": "image/gif",
    ".webp": "image/webp",
    ".tif": "image/tiff",
    ".tiff": "image/tiff",
};

/** Resolve the MIME type for a file name, `application/octet-stream` if unknown */
export function contentTypeOf(fileNameOrPath: string): string {
    const ext = path.extname(fileNameOrPath).toLowerCase();
    return EXTENSION_MIME_MAP[ext] ?? OCTET_STREAM;
}

export function kindOfContentType(contentType: string): DocumentKind {
    if (contentType === "application/pdf") {
        return "pdf";
    }
    if (contentType === "text/plain") {
        return "text";
    }
    if (contentType.startsWith("image/")) {
        return "image";
    }
    return "unsupported";
}

export function classify(fileNameOrPath: string): DocumentKind {
    return kindOfContentType(contentTypeOf(fileNameOrPath));
}

/** Every content type the classifier can produce, deduplicated */
export function supportedContentTypes(): string[] {
    return Object.values(EXTENSION_MIME_MAP).filter((v, i, a) => a.indexOf(v) === i);
}
