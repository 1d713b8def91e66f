/**
 * Docloom Generation — Prompt Curation
 *
 * Rewrites a prompt through a curator model before the main generation
 * call. Curation is best-effort: any failure falls back to the original
 * prompt and nothing propagates to the caller.
 */

import type { CurationConfig } from "../config";
import { toErrorMessage } from "../errors";
import { scopedLogger } from "../telemetry/logger";
import type { TextGenerator } from "./types";

const log = scopedLogger("CurationClient");

const REFINED_LABEL = "REFINED PROMPT:";

export interface CurationResult {
    refined: string;
    originalLength: number;
    refinedLength: number;
    curatorModel: string;
    success: boolean;
    /** True when `refined` is the original prompt returned unchanged */
    fallback: boolean;
    error?: string;
}

export function buildCurationPrompt(prompt: string, instruction = ""): string {
    if (instruction.trim()) {
        return [
            "You are a prompt curator. Your task is to refine and improve prompts for better clarity and effectiveness.",
            "",
            `INSTRUCTION: ${instruction.trim()}`,
            "",
            "ORIGINAL PROMPT:",
            prompt,
            "",
            REFINED_LABEL,
        ].join("\n");
    }

    return [
        "You are a prompt curator. Your task is to refine and improve prompts for better clarity, specificity, and effectiveness while keeping the original intent.",
        "",
        "ORIGINAL PROMPT:",
        prompt,
        "",
        "Provide a refined version that is:",
        "1. More specific and clear",
        "2. Better structured",
        "3. More actionable",
        "",
        REFINED_LABEL,
    ].join("\n");
}

/** Text after the last `REFINED PROMPT:` label, or the whole reply trimmed. */
export function extractRefinedPrompt(reply: string): string {
    const trimmed = reply.trim();
    const index = trimmed.lastIndexOf(REFINED_LABEL);
    return index === -1 ? trimmed : trimmed.slice(index + REFINED_LABEL.length).trim();
}

export class CurationClient {
    private readonly generator: TextGenerator;
    private readonly config: CurationConfig;

    constructor(generator: TextGenerator, config: CurationConfig) {
        this.generator = generator;
        this.config = config;
    }

    async curate(prompt: string, instruction = ""): Promise<string> {
        const result = await this.curateDetailed(prompt, instruction);
        return result.refined;
    }

    async curateDetailed(prompt: string, instruction = ""): Promise<CurationResult> {
        const fallback = (error: string): CurationResult => {
            log.warn(`Curation failed, using original prompt: ${error}`);
            return {
                refined: prompt,
                originalLength: prompt.length,
                refinedLength: prompt.length,
                curatorModel: this.config.model,
                success: false,
                fallback: true,
                error,
            };
        };

        try {
            log.info(`Curating prompt with model ${this.config.model}`);
            const result = await this.generator.generate(buildCurationPrompt(prompt, instruction), {
                model: this.config.model,
                maxTokens: this.config.maxTokens,
                temperature: this.config.temperature,
                signal: AbortSignal.timeout(this.config.timeoutMs),
            });

            const refined = extractRefinedPrompt(result.text);
            if (!refined) {
                return fallback("Curator returned an empty prompt");
            }

            return {
                refined,
                originalLength: prompt.length,
                refinedLength: refined.length,
                curatorModel: this.config.model,
                success: true,
                fallback: false,
            };
        } catch (error) {
            return fallback(toErrorMessage(error));
        }
    }
}
