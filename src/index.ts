/**
 * Docloom — Public API
 *
 * `createDocloom` wires every component from one config object. The
 * individual modules are exported too for callers that compose their own.
 */

import { loadConfig, type DocloomConfig } from "./lib/config";
import { CurationClient } from "./lib/generation/curation";
import { GenerationClient, type GenerationClientDeps } from "./lib/generation/client";
import { cachedHealthCheck, type SystemStatus } from "./lib/health";
import { IngestionPipeline, type IngestionPipelineDeps } from "./lib/ingestion/pipeline";
import { MarkdownVault } from "./lib/notes/vault";
import { GenerateAndExtract } from "./lib/workflow";

export interface Docloom {
    config: DocloomConfig;
    ingestion: IngestionPipeline;
    generation: GenerationClient;
    curation: CurationClient;
    /** Present only when `notes.vaultPath` is configured */
    vault?: MarkdownVault;
    workflow: GenerateAndExtract;
    health(): Promise<SystemStatus>;
}

export async function createDocloom(
    config: DocloomConfig = loadConfig(),
    deps: { ingestion?: IngestionPipelineDeps; generation?: GenerationClientDeps } = {}
): Promise<Docloom> {
    const ingestion = await IngestionPipeline.create(config.ingestion, deps.ingestion);
    const generation = new GenerationClient(config.generation, deps.generation);
    const curation = new CurationClient(generation, config.curation);
    const vault = config.notes.vaultPath
        ? new MarkdownVault({ vaultPath: config.notes.vaultPath, rootFolder: config.notes.rootFolder })
        : undefined;

    return {
        config,
        ingestion,
        generation,
        curation,
        vault,
        workflow: new GenerateAndExtract({ generator: generation, curator: curation, pipeline: ingestion, sink: vault }),
        health: cachedHealthCheck({
            generation,
            defaultModel: config.generation.model,
            curatorModel: config.curation.model,
            capabilities: ingestion.capabilities,
            vault,
        }),
    };
}

export * from "./lib/errors";
export * from "./lib/ingestion";
export * from "./lib/generation";
export * from "./lib/notes";
export { loadConfig, parseConfig, configSchema } from "./lib/config";
export type {
    CurationConfig,
    DocloomConfig,
    DocloomConfigInput,
    GenerationConfig,
    IngestionConfig,
    NotesConfig,
} from "./lib/config";
export { checkSystemHealth, cachedHealthCheck } from "./lib/health";
export type { HealthDeps, SystemStatus } from "./lib/health";
export { GenerateAndExtract } from "./lib/workflow";
export type { ExtractedDocument, WorkflowDeps, WorkflowOptions, WorkflowOutcome } from "./lib/workflow";
export { logDebug, logError, logInfo, logWarning, scopedLogger } from "./lib/telemetry/logger";
