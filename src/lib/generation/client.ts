/**
 * Docloom Generation — Ollama Client
 *
 * Single-shot (non-streaming) completions against a local Ollama server.
 * Each attempt gets its own timeout; transient failures and malformed
 * bodies are retried with exponential backoff, then surfaced as one
 * `GenerationError`.
 */

import { performance } from "node:perf_hooks";
import { z } from "zod";
import type { GenerationConfig } from "../config";
import {
    GenerationError,
    MalformedResponseError,
    TransientBackendError,
    ValidationError,
    toErrorMessage,
} from "../errors";
import { scopedLogger } from "../telemetry/logger";
import { createRetryPolicy, runWithRetry, type RetryPolicy, type Sleep } from "./retry";
import type { GenerateOptions, GenerationResult, TextGenerator } from "./types";

const log = scopedLogger("GenerationClient");

const DEFAULT_MAX_TOKENS = 1024;
const DEFAULT_TEMPERATURE = 0.7;

// Token counts and `done` are optional on the wire; only `response` is required.
const generateResponseSchema = z.object({
    response: z.string(),
    model: z.string().optional(),
    prompt_eval_count: z.number().int().nonnegative().catch(0),
    eval_count: z.number().int().nonnegative().catch(0),
    done: z.boolean().catch(true),
});

const tagsResponseSchema = z.object({
    models: z.array(z.object({ name: z.string() })).default([]),
});

type AttemptResult = Omit<GenerationResult, "durationMs" | "attempts">;

interface GeneratePayload {
    model: string;
    prompt: string;
    options: { num_predict: number; temperature: number };
    stream: false;
}

export interface GenerationClientDeps {
    fetch?: typeof fetch;
    sleep?: Sleep;
    /** Monotonic clock in milliseconds */
    now?: () => number;
    retryPolicy?: RetryPolicy;
}

export function isRetryableGenerationError(error: unknown): boolean {
    return error instanceof TransientBackendError || error instanceof MalformedResponseError;
}

export class GenerationClient implements TextGenerator {
    private readonly config: GenerationConfig;
    private readonly baseUrl: string;
    private readonly fetchImpl: typeof fetch;
    private readonly sleep?: Sleep;
    private readonly now: () => number;
    private readonly policy: RetryPolicy;

    constructor(config: GenerationConfig, deps: GenerationClientDeps = {}) {
        this.config = config;
        this.baseUrl = config.baseUrl.replace(/\/+$/, "");
        this.fetchImpl = deps.fetch ?? globalThis.fetch;
        this.sleep = deps.sleep;
        this.now = deps.now ?? (() => performance.now());
        this.policy =
            deps.retryPolicy ??
            createRetryPolicy({
                maxAttempts: config.maxAttempts,
                maxBackoffMs: config.maxBackoffMs,
                isRetryable: isRetryableGenerationError,
            });
    }

    get model(): string {
        return this.config.model;
    }

    // ---------------------------------------------------------------------------
    // Public API
    // ---------------------------------------------------------------------------

    /**
     * @throws ValidationError for bad input, before any request is sent
     * @throws GenerationError once the retry budget is spent or the caller aborts
     */
    async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerationResult> {
        const payload = this.buildPayload(prompt, options);
        const { signal } = options;
        const started = this.now();

        const outcome = await runWithRetry((attempt) => this.attempt(payload, attempt, signal), this.policy, {
            sleep: this.sleep,
            signal,
            onRetry: ({ attempt, delayMs, error }) =>
                log.warn(
                    `Attempt ${attempt + 1}/${this.policy.maxAttempts} failed: ${toErrorMessage(error)}; retrying in ${delayMs}ms`
                ),
        });

        if (outcome.ok) {
            return { ...outcome.value, durationMs: this.now() - started, attempts: outcome.attempts };
        }

        const { error, attempts } = outcome;
        if (signal?.aborted) {
            throw new GenerationError("cancelled", "Generation cancelled by caller", { attempts, cause: error });
        }
        if (error instanceof MalformedResponseError) {
            log.error(`Giving up after ${attempts} attempt(s): ${error.message}`);
            throw new GenerationError(
                "validation",
                `Invalid response from generation backend after ${attempts} attempt(s): ${error.message}`,
                { attempts, cause: error }
            );
        }
        log.error(`Giving up after ${attempts} attempt(s): ${toErrorMessage(error)}`);
        throw new GenerationError(
            "connection",
            `Generation backend unavailable after ${attempts} attempt(s): ${toErrorMessage(error)}`,
            { attempts, cause: error }
        );
    }

    /** One GET to `/api/tags` with the probe timeout. Never retried, never throws. */
    async testConnection(): Promise<boolean> {
        try {
            const response = await this.fetchImpl(`${this.baseUrl}/api/tags`, {
                signal: AbortSignal.timeout(this.config.probeTimeoutMs),
            });
            return response.ok;
        } catch (error) {
            log.debug(`Connection test failed: ${toErrorMessage(error)}`);
            return false;
        }
    }

    /** Names of the locally available models; empty on any error. */
    async listModels(): Promise<Set<string>> {
        try {
            const response = await this.fetchImpl(`${this.baseUrl}/api/tags`, {
                signal: AbortSignal.timeout(this.config.probeTimeoutMs),
            });
            if (!response.ok) {
                log.warn(`Listing models failed: HTTP ${response.status}`);
                return new Set();
            }
            const parsed = tagsResponseSchema.safeParse(await response.json());
            if (!parsed.success) {
                log.warn("Listing models failed: unexpected response format");
                return new Set();
            }
            return new Set(parsed.data.models.map((m) => m.name));
        } catch (error) {
            log.warn(`Listing models failed: ${toErrorMessage(error)}`);
            return new Set();
        }
    }

    // ---------------------------------------------------------------------------
    // Internals
    // ---------------------------------------------------------------------------

    private buildPayload(prompt: string, options: GenerateOptions): GeneratePayload {
        const maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
        const temperature = options.temperature ?? DEFAULT_TEMPERATURE;
        const model = options.model ?? this.config.model;

        if (!prompt.trim()) {
            throw new ValidationError("Prompt cannot be empty");
        }
        if (this.config.maxPromptChars !== undefined && prompt.length > this.config.maxPromptChars) {
            throw new ValidationError(
                `Prompt too long: ${prompt.length} characters (max: ${this.config.maxPromptChars})`
            );
        }
        if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
            throw new ValidationError(`maxTokens must be a positive integer, got ${maxTokens}`);
        }
        if (!Number.isFinite(temperature) || temperature < 0 || temperature > 1) {
            throw new ValidationError(`temperature must be between 0 and 1, got ${temperature}`);
        }
        if (!model.trim()) {
            throw new ValidationError("Model name cannot be empty");
        }

        return {
            model,
            prompt,
            options: { num_predict: maxTokens, temperature },
            stream: false,
        };
    }

    private async attempt(payload: GeneratePayload, attempt: number, signal?: AbortSignal): Promise<AttemptResult> {
        const timeout = AbortSignal.timeout(this.config.requestTimeoutMs);
        const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;
        log.debug(`Attempt ${attempt + 1}: POST ${this.baseUrl}/api/generate (model ${payload.model})`);

        let response: Response;
        try {
            response = await this.fetchImpl(`${this.baseUrl}/api/generate`, {
                method: "POST",
                headers: { "Content-Type": "application/json" },
                body: JSON.stringify(payload),
                signal: combined,
            });
        } catch (error) {
            throw this.transportError(error, signal, timeout);
        }

        if (!response.ok) {
            // Release the pooled connection before the next attempt
            await response.body?.cancel();
            throw new TransientBackendError(`Generation backend returned HTTP ${response.status}`, {
                status: response.status,
            });
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (error) {
            if (combined.aborted) {
                throw this.transportError(error, signal, timeout);
            }
            throw new MalformedResponseError("Response body is not valid JSON", { cause: error });
        }

        const parsed = generateResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new MalformedResponseError('Invalid response format: missing "response" field');
        }

        return {
            text: parsed.data.response,
            model: parsed.data.model ?? payload.model,
            promptTokens: parsed.data.prompt_eval_count,
            completionTokens: parsed.data.eval_count,
            done: parsed.data.done,
        };
    }

    private transportError(error: unknown, signal: AbortSignal | undefined, timeout: AbortSignal): unknown {
        // A caller abort is returned untouched so the retry loop stops on it.
        if (signal?.aborted) {
            return error;
        }
        if (timeout.aborted) {
            return new TransientBackendError(`Request timed out after ${this.config.requestTimeoutMs}ms`, {
                cause: error,
            });
        }
        return new TransientBackendError(
            `Could not connect to generation backend at ${this.baseUrl}: ${toErrorMessage(error)}`,
            { cause: error }
        );
    }
}
