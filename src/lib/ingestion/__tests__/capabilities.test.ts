import { describe, expect, it, vi } from "vitest";
import { probeCapabilities, probeOcr } from "../capabilities";
import type { OcrProvider } from "../types";

function provider(probe: () => Promise<boolean>): OcrProvider {
    return { name: "fake-ocr", probe, recognize: async () => "" };
}

describe("capability probes", () => {
    it("treats a throwing OCR probe as unavailable", async () => {
        await expect(
            probeOcr(
                provider(async () => {
                    throw new Error("spawn tesseract ENOENT");
                })
            )
        ).resolves.toBe(false);
    });

    it("combines the OCR and PDF probes and warns about missing tools", async () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

        const capabilities = await probeCapabilities({
            ocrProvider: provider(async () => false),
            probePdf: async () => true,
        });

        expect(capabilities).toEqual({ ocrAvailable: false, pdfBackendAvailable: true });
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn).toHaveBeenCalledWith("[Capabilities] Tesseract not found - OCR functionality will be limited");
    });

    it("loads the real PDF libraries", async () => {
        const capabilities = await probeCapabilities({ ocrProvider: provider(async () => true) });

        expect(capabilities).toEqual({ ocrAvailable: true, pdfBackendAvailable: true });
    });
});
