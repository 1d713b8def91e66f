import { describe, expect, it, vi } from "vitest";
import { parseConfig } from "../../config";
import { GenerationError } from "../../errors";
import { CurationClient, buildCurationPrompt, extractRefinedPrompt } from "../curation";
import type { GenerateOptions, GenerationResult, TextGenerator } from "../types";

const config = parseConfig().curation;

function generatorReplying(reply: () => Promise<string>) {
    const generate = vi.fn(async (_prompt: string, options?: GenerateOptions): Promise<GenerationResult> => ({
        text: await reply(),
        model: options?.model ?? "unknown",
        promptTokens: 10,
        completionTokens: 5,
        done: true,
        durationMs: 1,
        attempts: 1,
    }));
    const generator: TextGenerator = { generate };
    return { generator, generate };
}

describe("buildCurationPrompt", () => {
    it("embeds the instruction when given", () => {
        expect(buildCurationPrompt("List three facts", "Target a general audience")).toBe(
            [
                "You are a prompt curator. Your task is to refine and improve prompts for better clarity and effectiveness.",
                "",
                "INSTRUCTION: Target a general audience",
                "",
                "ORIGINAL PROMPT:",
                "List three facts",
                "",
                "REFINED PROMPT:",
            ].join("\n")
        );
    });

    it("ends with the refined label without an instruction", () => {
        const prompt = buildCurationPrompt("List three facts");
        expect(prompt).toContain("ORIGINAL PROMPT:\nList three facts\n");
        expect(prompt.endsWith("\nREFINED PROMPT:")).toBe(true);
    });
});

describe("extractRefinedPrompt", () => {
    it("takes the text after the last label", () => {
        expect(extractRefinedPrompt("Sure.\nREFINED PROMPT: first\nREFINED PROMPT:  second  ")).toBe("second");
    });

    it("keeps an unlabelled reply whole", () => {
        expect(extractRefinedPrompt("  Better prompt \n")).toBe("Better prompt");
    });
});

describe("CurationClient", () => {
    it("returns the refined prompt with curation settings applied", async () => {
        const { generator, generate } = generatorReplying(
            async () => "Here you go.\nREFINED PROMPT: Write a 200-word summary of photosynthesis."
        );
        const curator = new CurationClient(generator, config);

        const result = await curator.curateDetailed("explain photosynthesis");

        expect(result).toEqual({
            refined: "Write a 200-word summary of photosynthesis.",
            originalLength: 22,
            refinedLength: 43,
            curatorModel: "mistral:7b",
            success: true,
            fallback: false,
        });
        expect(generate).toHaveBeenCalledWith(buildCurationPrompt("explain photosynthesis"), {
            model: "mistral:7b",
            maxTokens: 2048,
            temperature: 0.3,
            signal: expect.any(AbortSignal),
        });
    });

    it("falls back to the original prompt when generation fails", async () => {
        const { generator } = generatorReplying(async () => {
            throw new GenerationError("connection", "Generation backend unavailable after 3 attempt(s)", {
                attempts: 3,
            });
        });
        const curator = new CurationClient(generator, config);

        await expect(curator.curate("explain photosynthesis")).resolves.toBe("explain photosynthesis");

        const detailed = await curator.curateDetailed("explain photosynthesis");
        expect(detailed).toEqual({
            refined: "explain photosynthesis",
            originalLength: 22,
            refinedLength: 22,
            curatorModel: "mistral:7b",
            success: false,
            fallback: true,
            error: "Generation backend unavailable after 3 attempt(s)",
        });
    });

    it("falls back when the rewrite is empty", async () => {
        const { generator } = generatorReplying(async () => "REFINED PROMPT:   \n");
        const curator = new CurationClient(generator, config);

        const result = await curator.curateDetailed("keep me");

        expect(result.refined).toBe("keep me");
        expect(result.fallback).toBe(true);
        expect(result.error).toBe("Curator returned an empty prompt");
    });
});
