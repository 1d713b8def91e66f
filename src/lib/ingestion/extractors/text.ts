/**
 * Docloom Ingestion — Plain Text Extractor
 *
 * Strict UTF-8 first; on failure, walks the configured fallback encodings
 * in order and reports which one was used.
 */

import iconv from "iconv-lite";
import type { TextEncodingName } from "../../config";
import { EncodingError } from "../../errors";
import type { ExtractionSuccess, Extractor } from "../types";

const UTF8_CONFIDENCE = 1.0;
const FALLBACK_CONFIDENCE = 0.9;

const DEFAULT_ENCODINGS: readonly TextEncodingName[] = ["utf-8", "latin-1", "cp1252"];

/** Decode or throw; `latin-1` maps every byte, so it never throws */
const DECODERS: Record<TextEncodingName, (buffer: Buffer) => string> = {
    "utf-8": (buffer) => new TextDecoder("utf-8", { fatal: true }).decode(buffer),
    "latin-1": (buffer) => buffer.toString("latin1"),
    cp1252: decodeWindows1252,
};

/** iconv-lite maps 0x81, 0x8D, 0x8F, 0x90 and 0x9D to U+FFFD; cp1252 leaves them undefined */
function decodeWindows1252(buffer: Buffer): string {
    const text = iconv.decode(buffer, "win1252");
    if (text.includes("\uFFFD")) {
        throw new RangeError("Byte sequence is not valid cp1252");
    }
    return text;
}

export class PlainTextExtractor implements Extractor {
    readonly name = "PlainTextExtractor";
    readonly kind = "text";

    private readonly encodings: readonly TextEncodingName[];

    constructor(options?: { encodings?: readonly TextEncodingName[] }) {
        this.encodings = options?.encodings ?? DEFAULT_ENCODINGS;
    }

    async extract(buffer: Buffer): Promise<ExtractionSuccess> {
        for (const encoding of this.encodings) {
            let text: string;
            try {
                text = DECODERS[encoding](buffer);
            } catch {
                continue;
            }

            if (encoding === "utf-8") {
                return {
                    success: true,
                    text,
                    textLength: text.length,
                    confidence: UTF8_CONFIDENCE,
                    method: "direct_text",
                };
            }

            return {
                success: true,
                text,
                textLength: text.length,
                confidence: FALLBACK_CONFIDENCE,
                method: `text_${encoding}`,
                warning: `Used ${encoding} encoding`,
            };
        }

        throw new EncodingError(this.encodings);
    }
}
