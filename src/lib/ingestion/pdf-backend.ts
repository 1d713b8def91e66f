/**
 * Docloom Ingestion — PDF Backend
 *
 * Reads the per-page text layer with `pdf-parse` and exposes each page's
 * embedded images (via `pdf-lib` + `sharp`) so that scanned pages can be
 * rasterized for OCR. Loaded lazily: the PDF extractor only imports this
 * module once a PDF actually arrives.
 */

import pdfParse from "pdf-parse/lib/pdf-parse.js";
import {
    PDFArray,
    PDFDict,
    PDFDocument,
    PDFName,
    PDFNumber,
    PDFObject,
    PDFPage,
    PDFRawStream,
    PDFStream,
    decodePDFRawStream,
} from "pdf-lib";
import sharp from "sharp";
import { toErrorMessage } from "../errors";
import { normalizePageText } from "./normalize";
import { scopedLogger } from "../telemetry/logger";

const log = scopedLogger("PdfBackend");

export interface PdfPageContent {
    /** 1-indexed */
    pageNumber: number;
    /** Normalized text layer, "" when the page has none */
    text: string;
    /** Page images as PNG buffers, in resource order; unconvertible images are left out */
    renderImages(): Promise<Buffer[]>;
}

export interface PdfBackend {
    readPages(buffer: Buffer): Promise<PdfPageContent[]>;
}

// ----------------------------------------------------------------------------
// Text layer
// ----------------------------------------------------------------------------

interface PdfJsTextItem {
    str?: string;
    hasEOL?: boolean;
}

interface PdfJsPage {
    /** 0-indexed */
    pageIndex: number;
    getTextContent(): Promise<{ items: PdfJsTextItem[] }>;
}

function isPdfJsPage(value: unknown): value is PdfJsPage {
    return (
        typeof value === "object" &&
        value !== null &&
        typeof Reflect.get(value, "pageIndex") === "number" &&
        typeof Reflect.get(value, "getTextContent") === "function"
    );
}

function joinTextItems(items: PdfJsTextItem[]): string {
    return items.map((item) => (item.str ? `${item.str}${item.hasEOL ? "\n" : ""}` : "")).join(" ");
}

/**
 * Text layer of every page, indexed by page. A page pdf.js cannot open or
 * read keeps "" at its own index.
 */
export async function readTextLayers(buffer: Buffer, pageCount: number): Promise<string[]> {
    const texts = Array.from({ length: pageCount }, () => "");

    try {
        // pdf.js rejects a Node Buffer as "Invalid PDF structure"; it wants a plain Uint8Array
        await pdfParse(new Uint8Array(buffer), {
            pagerender: async (pageData: unknown) => {
                if (!isPdfJsPage(pageData)) {
                    return "";
                }

                const { pageIndex } = pageData;
                try {
                    const content = await pageData.getTextContent();
                    const text = normalizePageText(joinTextItems(content.items));
                    if (pageIndex >= 0 && pageIndex < pageCount) {
                        texts[pageIndex] = text;
                    }
                    return text;
                } catch (error) {
                    log.warn(`No text layer for page ${pageIndex + 1}: ${toErrorMessage(error)}`);
                    return "";
                }
            },
            max: 0,
        });
    } catch (error) {
        // Every text layer stays empty; scanned-page OCR can still recover text
        log.warn(`pdf-parse text extraction failed: ${toErrorMessage(error)}`);
    }

    return texts;
}

// ----------------------------------------------------------------------------
// Page images
// ----------------------------------------------------------------------------

type ColorSpaceKind = "DeviceRGB" | "DeviceGray" | "DeviceCMYK";

const CHANNELS: Record<ColorSpaceKind, 1 | 3 | 4> = { DeviceGray: 1, DeviceRGB: 3, DeviceCMYK: 4 };

/** How an image XObject can be turned into a PNG, or why it cannot */
type ImageDecoding =
    | { kind: "encoded" }
    | { kind: "raw"; stream: PDFRawStream; width: number; height: number; channels: 1 | 3 | 4 }
    | { kind: "unsupported"; reason: string };

function planImageDecoding(stream: PDFStream, resources: PDFDict): ImageDecoding {
    const filters = filterNames(nameOrArray(stream.dict.lookup(PDFName.of("Filter"))));
    if (filters.some((name) => name === "DCTDecode" || name === "JPXDecode")) {
        // JPEG / JPEG 2000 payloads are complete image files already
        return { kind: "encoded" };
    }

    const unsupportedFilter = filters.find((name) => name !== "FlateDecode");
    if (unsupportedFilter) {
        return { kind: "unsupported", reason: `${unsupportedFilter} filter` };
    }
    if (!(stream instanceof PDFRawStream)) {
        return { kind: "unsupported", reason: "stream is not raw" };
    }

    const bits = stream.dict.lookupMaybe(PDFName.of("BitsPerComponent"), PDFNumber)?.asNumber() ?? 8;
    if (bits !== 8) {
        return { kind: "unsupported", reason: `${bits}-bit components` };
    }

    const colorSpace = resolveColorSpace(nameOrArray(stream.dict.lookup(PDFName.of("ColorSpace"))), resources);
    if (!colorSpace) {
        return { kind: "unsupported", reason: "colour space" };
    }

    const width = stream.dict.lookupMaybe(PDFName.of("Width"), PDFNumber)?.asNumber();
    const height = stream.dict.lookupMaybe(PDFName.of("Height"), PDFNumber)?.asNumber();
    if (!width || !height) {
        return { kind: "unsupported", reason: "missing dimensions" };
    }

    return { kind: "raw", stream, width, height, channels: CHANNELS[colorSpace] };
}

async function toPng(stream: PDFStream, decoding: Exclude<ImageDecoding, { kind: "unsupported" }>): Promise<Buffer> {
    if (decoding.kind === "encoded") {
        return sharp(Buffer.from(stream.getContents())).png().toBuffer();
    }

    const pixels = decodePDFRawStream(decoding.stream).decode();
    return sharp(Buffer.from(pixels), {
        raw: { width: decoding.width, height: decoding.height, channels: decoding.channels },
    })
        .toColourspace("srgb")
        .png()
        .toBuffer();
}

async function renderPageImages(page: PDFPage, pageNumber: number): Promise<Buffer[]> {
    const resources = page.node.Resources();
    const xObjects = resources?.lookupMaybe(PDFName.of("XObject"), PDFDict);
    if (!resources || !xObjects) {
        return [];
    }

    const images: Buffer[] = [];
    for (const [key] of xObjects.entries()) {
        const stream = xObjects.lookupMaybe(key, PDFStream);
        const subtype = stream?.dict.lookupMaybe(PDFName.of("Subtype"), PDFName);
        if (!stream || !subtype || bareName(subtype) !== "Image") {
            continue;
        }

        const label = `page ${pageNumber} image ${bareName(key)}`;
        const decoding = planImageDecoding(stream, resources);
        if (decoding.kind === "unsupported") {
            log.warn(`Skipping ${label}: ${decoding.reason} not supported`);
            continue;
        }

        try {
            images.push(await toPng(stream, decoding));
        } catch (error) {
            log.warn(`Skipping ${label}: ${toErrorMessage(error)}`);
        }
    }
    return images;
}

// ----------------------------------------------------------------------------
// Backend
// ----------------------------------------------------------------------------

export class PdfLibBackend implements PdfBackend {
    async readPages(buffer: Buffer): Promise<PdfPageContent[]> {
        const pdf = await PDFDocument.load(buffer, { ignoreEncryption: true });
        const pages = pdf.getPages();
        const texts = await readTextLayers(buffer, pages.length);

        return pages.map((page, index) => ({
            pageNumber: index + 1,
            text: texts[index] ?? "",
            renderImages: () => renderPageImages(page, index + 1),
        }));
    }
}

// ----------------------------------------------------------------------------
// PDF name helpers
// ----------------------------------------------------------------------------

function nameOrArray(value: PDFObject | undefined): PDFName | PDFArray | undefined {
    return value instanceof PDFName || value instanceof PDFArray ? value : undefined;
}

function filterNames(filter: PDFName | PDFArray | undefined): string[] {
    if (filter instanceof PDFName) {
        return [bareName(filter)];
    }
    if (!filter) {
        return [];
    }
    return filter
        .asArray()
        .filter((value): value is PDFName => value instanceof PDFName)
        .map(bareName);
}

/** Device colour space of an image, following named and array colour spaces */
function resolveColorSpace(value: PDFName | PDFArray | undefined, resources: PDFDict): ColorSpaceKind | null {
    if (!value) {
        return "DeviceRGB";
    }
    if (value instanceof PDFArray) {
        const base = value.lookupMaybe(0, PDFName);
        return base ? resolveColorSpace(base, resources) : null;
    }

    const name = bareName(value);
    if (name === "DeviceRGB" || name === "DeviceGray" || name === "DeviceCMYK") {
        return name;
    }

    // Named colour spaces live in the page's /ColorSpace resource dict
    const named = resources.lookupMaybe(PDFName.of("ColorSpace"), PDFDict)?.lookupMaybe(value, PDFArray);
    return named ? resolveColorSpace(named.lookupMaybe(0, PDFName), resources) : null;
}

function bareName(name: PDFName): string {
    return name.asString().replace(/^\//, "");
}
