/**
 * Docloom Generation — Shared Types
 */

export interface GenerateOptions {
    /** Maximum tokens to generate (default 1024) */
    maxTokens?: number;
    /** Sampling temperature in [0, 1] (default 0.7) */
    temperature?: number;
    /** Overrides the configured model */
    model?: string;
    /** Aborting stops the current attempt and any further retries */
    signal?: AbortSignal;
}

export interface GenerationResult {
    text: string;
    model: string;
    promptTokens: number;
    completionTokens: number;
    done: boolean;
    /** Wall-clock time of the call, retries and waits included */
    durationMs: number;
    attempts: number;
}

/** Anything that turns a prompt into text. Curation depends only on this. */
export interface TextGenerator {
    generate(prompt: string, options?: GenerateOptions): Promise<GenerationResult>;
}
