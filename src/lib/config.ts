/**
 * Docloom — Configuration
 *
 * One explicit config object, split into a section per component. Each
 * component receives its own section through its constructor; this module
 * is the only place that reads environment variables.
 */

import { z } from "zod";
import { ValidationError } from "./errors";

const MB = 1024 * 1024;

const generationSchema = z.object({
    baseUrl: z.string().url().default("http://localhost:11434"),
    model: z.string().min(1).default("mistral:7b"),
    requestTimeoutMs: z.number().int().positive().default(120_000),
    probeTimeoutMs: z.number().int().positive().default(10_000),
    maxAttempts: z.number().int().min(1).max(10).default(3),
    maxBackoffMs: z.number().int().nonnegative().default(30_000),
    maxPromptChars: z.number().int().positive().optional(),
});

const curationSchema = z.object({
    model: z.string().min(1).default("mistral:7b"),
    maxTokens: z.number().int().positive().default(2048),
    temperature: z.number().min(0).max(1).default(0.3),
    timeoutMs: z.number().int().positive().default(30_000),
});

const ingestionSchema = z.object({
    maxFileBytes: z.number().int().positive().default(50 * MB),
    ocrCommand: z.string().min(1).default("tesseract"),
    ocrLanguage: z.string().min(1).default("eng"),
    ocrTimeoutMs: z.number().int().positive().default(60_000),
    probeTimeoutMs: z.number().int().positive().default(5_000),
    textEncodings: z
        .array(z.enum(["utf-8", "latin-1", "cp1252"]))
        .min(1)
        .default(["utf-8", "latin-1", "cp1252"]),
});

const notesSchema = z.object({
    vaultPath: z.string().min(1).optional(),
    rootFolder: z.string().min(1).default("Docloom"),
});

export const configSchema = z.object({
    generation: generationSchema.default({}),
    curation: curationSchema.default({}),
    ingestion: ingestionSchema.default({}),
    notes: notesSchema.default({}),
});

export type DocloomConfig = z.infer<typeof configSchema>;
export type GenerationConfig = DocloomConfig["generation"];
export type CurationConfig = DocloomConfig["curation"];
export type IngestionConfig = DocloomConfig["ingestion"];
export type NotesConfig = DocloomConfig["notes"];
export type TextEncodingName = IngestionConfig["textEncodings"][number];

/** Shape accepted by `parseConfig` before defaults are applied. */
export type DocloomConfigInput = z.input<typeof configSchema>;

type Env = Record<string, string | undefined>;

export function parseConfig(input: DocloomConfigInput = {}): DocloomConfig {
    const parsed = configSchema.safeParse(input);
    if (!parsed.success) {
        const details = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`);
        throw new ValidationError(`Invalid configuration: ${details.join("; ")}`);
    }
    return parsed.data;
}

/**
 * Build a config from environment variables, with `overrides` applied
 * section by section on top. Unset variables stay `undefined` so the
 * schema defaults apply.
 */
export function loadConfig(env: Env = process.env, overrides: DocloomConfigInput = {}): DocloomConfig {
    const fromEnv: DocloomConfigInput = {
        generation: {
            baseUrl: text(env.OLLAMA_HOST),
            model: text(env.DEFAULT_MODEL),
            requestTimeoutMs: integer(env.GENERATION_TIMEOUT_MS),
        },
        curation: {
            model: text(env.CURATOR_MODEL),
        },
        ingestion: {
            ocrCommand: text(env.OCR_COMMAND),
            ocrLanguage: text(env.OCR_LANGUAGE),
            ocrTimeoutMs: integer(env.OCR_TIMEOUT_MS),
            maxFileBytes: megabytes(env.MAX_FILE_SIZE_MB),
        },
        notes: {
            vaultPath: text(env.NOTES_VAULT_PATH),
        },
    };

    return parseConfig({
        generation: { ...fromEnv.generation, ...overrides.generation },
        curation: { ...fromEnv.curation, ...overrides.curation },
        ingestion: { ...fromEnv.ingestion, ...overrides.ingestion },
        notes: { ...fromEnv.notes, ...overrides.notes },
    });
}

function text(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

// Non-numeric values pass through as NaN so the schema reports them.
function integer(value: string | undefined): number | undefined {
    const raw = text(value);
    return raw === undefined ? undefined : Number(raw);
}

function megabytes(value: string | undefined): number | undefined {
    const parsed = integer(value);
    return parsed === undefined ? undefined : parsed * MB;
}
