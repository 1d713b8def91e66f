/**
 * Docloom Ingestion — Extractor Router
 *
 * Registry holding exactly one extractor per document kind. Registering a
 * second extractor for a kind replaces the first.
 */

import { ValidationError } from "../errors";
import type { DocumentKind, Extractor } from "./types";

type SupportedKind = Exclude<DocumentKind, "unsupported">;

export class ExtractorRouter {
    private readonly extractors = new Map<SupportedKind, Extractor>();

    constructor(extractors: Extractor[] = []) {
        for (const extractor of extractors) {
            this.register(extractor);
        }
    }

    // ---------------------------------------------------------------------------
    // Public API
    // ---------------------------------------------------------------------------

    register(extractor: Extractor): void {
        this.extractors.set(extractor.kind, extractor);
    }

    /**
     * The extractor registered for a kind.
     * @throws ValidationError if no extractor handles the kind
     */
    route(kind: DocumentKind): Extractor {
        const extractor = kind === "unsupported" ? undefined : this.extractors.get(kind);
        if (!extractor) {
            throw new ValidationError(`No extractor registered for document kind: ${kind}`);
        }
        return extractor;
    }

    kinds(): SupportedKind[] {
        return [...this.extractors.keys()];
    }
}
