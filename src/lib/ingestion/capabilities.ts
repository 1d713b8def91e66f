/**
 * Docloom Ingestion — Capability Probes
 *
 * Run once when a pipeline is created; the result is cached on the
 * pipeline. A failed probe never throws: it only turns the matching
 * document kind into an explicit `CapabilityMissingError` later.
 */

import { toErrorMessage } from "../errors";
import { scopedLogger } from "../telemetry/logger";
import type { Capabilities, OcrProvider } from "./types";

const log = scopedLogger("Capabilities");

export async function probeOcr(provider: OcrProvider): Promise<boolean> {
    try {
        return await provider.probe();
    } catch (error) {
        log.debug(`OCR probe for ${provider.name} threw: ${toErrorMessage(error)}`);
        return false;
    }
}

/** The PDF backend is usable when both of its libraries load */
export async function probePdfBackend(): Promise<boolean> {
    try {
        await Promise.all([import("pdf-lib"), import("pdf-parse/lib/pdf-parse.js")]);
        return true;
    } catch (error) {
        log.debug(`PDF backend probe failed: ${toErrorMessage(error)}`);
        return false;
    }
}

export async function probeCapabilities(deps: {
    ocrProvider: OcrProvider;
    probePdf?: () => Promise<boolean>;
}): Promise<Capabilities> {
    const [ocrAvailable, pdfBackendAvailable] = await Promise.all([
        probeOcr(deps.ocrProvider),
        (deps.probePdf ?? probePdfBackend)(),
    ]);

    if (!ocrAvailable) {
        log.warn("Tesseract not found - OCR functionality will be limited");
    }
    if (!pdfBackendAvailable) {
        log.warn("PDF libraries not found - PDF processing will be limited");
    }

    return { ocrAvailable, pdfBackendAvailable };
}
