export { GenerationClient, isRetryableGenerationError } from "./client";
export type { GenerationClientDeps } from "./client";
export { CurationClient, buildCurationPrompt, extractRefinedPrompt } from "./curation";
export type { CurationResult } from "./curation";
export { createRetryPolicy, exponentialBackoff, realSleep, runWithRetry } from "./retry";
export type { RetryHooks, RetryOutcome, RetryPolicy, Sleep } from "./retry";
export type { GenerateOptions, GenerationResult, TextGenerator } from "./types";
