import { describe, expect, it, vi } from "vitest";
import { logInfo, scopedLogger } from "../telemetry/logger";

describe("logger", () => {
    it("writes info to stderr and omits empty context", () => {
        const error = vi.spyOn(console, "error").mockImplementation(() => {});

        logInfo("started", {});

        expect(error).toHaveBeenCalledWith("started");
    });

    it("prefixes scoped messages with the component", () => {
        const error = vi.spyOn(console, "error").mockImplementation(() => {});
        const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
        const log = scopedLogger("IngestionPipeline");

        log.info("Document processed");
        log.warn("Document failed", { fileName: "a.txt" });

        expect(error).toHaveBeenCalledWith("[IngestionPipeline] Document processed");
        expect(warn).toHaveBeenCalledWith("[IngestionPipeline] Document failed", { fileName: "a.txt" });
    });
});
