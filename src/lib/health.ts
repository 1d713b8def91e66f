/**
 * Docloom — System Health
 *
 * Aggregates backend reachability, model availability, ingestion
 * capabilities and note storage into one status report. Checks never
 * throw; every problem becomes an entry in `issues`.
 */

import { toErrorMessage } from "./errors";
import type { Capabilities } from "./ingestion/types";
import type { VaultValidation } from "./notes/types";
import { scopedLogger } from "./telemetry/logger";

const log = scopedLogger("Health");

export interface SystemStatus {
    generationConnected: boolean;
    modelsAvailable: string[];
    defaultModelAvailable: boolean;
    curatorModelAvailable: boolean;
    ocrAvailable: boolean;
    pdfBackendAvailable: boolean;
    notesConfigured: boolean;
    issues: string[];
    lastCheck: Date;
}

export interface HealthDeps {
    generation: {
        testConnection(): Promise<boolean>;
        listModels(): Promise<Set<string>>;
    };
    defaultModel: string;
    curatorModel: string;
    capabilities: Capabilities;
    /** Omit when no vault is configured */
    vault?: { validate(): Promise<VaultValidation> };
    now?: () => Date;
}

export async function checkSystemHealth(deps: HealthDeps): Promise<SystemStatus> {
    const issues: string[] = [];

    let generationConnected = false;
    let models = new Set<string>();
    try {
        generationConnected = await deps.generation.testConnection();
        if (generationConnected) {
            models = await deps.generation.listModels();
        } else {
            issues.push("Generation backend not reachable");
        }
    } catch (error) {
        issues.push(`Generation backend check failed: ${toErrorMessage(error)}`);
    }

    const defaultModelAvailable = models.has(deps.defaultModel);
    const curatorModelAvailable = models.has(deps.curatorModel);
    if (generationConnected && !defaultModelAvailable) {
        issues.push(`Model not available: ${deps.defaultModel}`);
    }
    if (generationConnected && !curatorModelAvailable && deps.curatorModel !== deps.defaultModel) {
        issues.push(`Curator model not available: ${deps.curatorModel}`);
    }

    if (!deps.capabilities.ocrAvailable) {
        issues.push("Tesseract not found - image and scanned PDF OCR disabled");
    }
    if (!deps.capabilities.pdfBackendAvailable) {
        issues.push("PDF libraries not found - PDF processing disabled");
    }

    let notesConfigured = false;
    if (deps.vault) {
        try {
            const validation = await deps.vault.validate();
            notesConfigured = validation.valid;
            issues.push(...validation.issues);
        } catch (error) {
            issues.push(`Note vault issue: ${toErrorMessage(error)}`);
        }
    } else {
        issues.push("Note vault not configured (set NOTES_VAULT_PATH)");
    }

    if (issues.length > 0) {
        log.debug(`${issues.length} issue(s) found`, { issues });
    }

    return {
        generationConnected,
        modelsAvailable: [...models].sort(),
        defaultModelAvailable,
        curatorModelAvailable,
        ocrAvailable: deps.capabilities.ocrAvailable,
        pdfBackendAvailable: deps.capabilities.pdfBackendAvailable,
        notesConfigured,
        issues,
        lastCheck: (deps.now ?? (() => new Date()))(),
    };
}

/**
 * Memoize `checkSystemHealth` for `ttlMs` (default 30 s). Concurrent
 * callers during a refresh share the same pending check.
 */
export function cachedHealthCheck(deps: HealthDeps, ttlMs = 30_000): () => Promise<SystemStatus> {
    const clock = deps.now ?? (() => new Date());
    let cached: { status: SystemStatus; at: number } | null = null;
    let pending: Promise<SystemStatus> | null = null;

    return async () => {
        if (cached && clock().getTime() - cached.at < ttlMs) {
            return cached.status;
        }
        if (!pending) {
            pending = checkSystemHealth(deps).finally(() => {
                pending = null;
            });
        }
        const status = await pending;
        cached = { status, at: status.lastCheck.getTime() };
        return status;
    };
}
