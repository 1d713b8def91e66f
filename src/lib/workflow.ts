/**
 * Docloom — Generate-and-Extract Workflow
 *
 * Composes the pieces end to end:
 *
 *   [document → ingestion →] prompt → [curation →] generation → [note sink]
 *
 * Every run resolves to a tagged outcome. A model that answered with only
 * whitespace is `generated` with `empty: true`; a backend that could not
 * be reached is `generation_failed`. The two are never conflated.
 */

import { GenerationError, ValidationError, type GenerationFailureKind } from "./errors";
import type { CurationResult } from "./generation/curation";
import type { GenerateOptions, GenerationResult, TextGenerator } from "./generation/types";
import type { DocumentSource, ExtractionSuccess, ProcessedDocument, ProcessingMetadata } from "./ingestion/types";
import type { NoteSink, SaveNoteResult } from "./notes/types";
import { scopedLogger } from "./telemetry/logger";

const log = scopedLogger("Workflow");

export interface WorkflowDeps {
    generator: TextGenerator;
    curator?: { curateDetailed(prompt: string, instruction?: string): Promise<CurationResult> };
    pipeline?: { process(source: DocumentSource): Promise<ProcessedDocument> };
    sink?: NoteSink;
}

export interface WorkflowOptions {
    /** Run the prompt through the curator first; a string is the curation instruction */
    curate?: boolean | string;
    generation?: GenerateOptions;
    /** Save a non-empty answer to the sink under this title */
    note?: { title: string; category?: string };
}

export type ExtractedDocument = ExtractionSuccess & ProcessingMetadata;

export type WorkflowOutcome =
    | {
          status: "generated";
          text: string;
          /** The model answered with nothing but whitespace */
          empty: boolean;
          prompt: string;
          generation: GenerationResult;
          curation?: CurationResult;
          document?: ExtractedDocument;
          note?: SaveNoteResult;
      }
    | {
          status: "extraction_failed";
          document: ProcessedDocument;
          error: string;
      }
    | {
          status: "generation_failed";
          prompt: string;
          error: string;
          /** `invalid_request` when the request was rejected before sending */
          failure: GenerationFailureKind | "invalid_request";
          attempts: number;
          curation?: CurationResult;
          document?: ExtractedDocument;
      };

export class GenerateAndExtract {
    private readonly deps: WorkflowDeps;

    constructor(deps: WorkflowDeps) {
        this.deps = deps;
    }

    async fromPrompt(prompt: string, options: WorkflowOptions = {}): Promise<WorkflowOutcome> {
        return this.run(prompt, options);
    }

    /**
     * Extract the document, build a prompt from its text, then generate.
     * A failed extraction stops the run before any generation request.
     */
    async fromDocument(
        source: DocumentSource,
        buildPrompt: (text: string, document: ExtractedDocument) => string,
        options: WorkflowOptions = {}
    ): Promise<WorkflowOutcome> {
        if (!this.deps.pipeline) {
            throw new ValidationError("fromDocument requires an ingestion pipeline");
        }

        const document = await this.deps.pipeline.process(source);
        if (!document.success) {
            log.warn(`Extraction failed for ${document.fileName}: ${document.error}`);
            return { status: "extraction_failed", document, error: document.error };
        }

        return this.run(buildPrompt(document.text, document), options, document);
    }

    private async run(
        original: string,
        options: WorkflowOptions,
        document?: ExtractedDocument
    ): Promise<WorkflowOutcome> {
        let prompt = original;
        let curation: CurationResult | undefined;

        if (options.curate && this.deps.curator) {
            const instruction = typeof options.curate === "string" ? options.curate : "";
            curation = await this.deps.curator.curateDetailed(prompt, instruction);
            prompt = curation.refined;
        }

        let generation: GenerationResult;
        try {
            generation = await this.deps.generator.generate(prompt, options.generation);
        } catch (error) {
            if (error instanceof GenerationError) {
                return {
                    status: "generation_failed",
                    prompt,
                    error: error.message,
                    failure: error.kind,
                    attempts: error.attempts,
                    curation,
                    document,
                };
            }
            if (error instanceof ValidationError) {
                return {
                    status: "generation_failed",
                    prompt,
                    error: error.message,
                    failure: "invalid_request",
                    attempts: 0,
                    curation,
                    document,
                };
            }
            throw error;
        }

        const empty = generation.text.trim().length === 0;
        if (empty) {
            log.warn(`Model ${generation.model} returned an empty answer`);
        }

        let note: SaveNoteResult | undefined;
        if (options.note && this.deps.sink && !empty) {
            note = await this.deps.sink.saveNote(options.note.title, generation.text, options.note.category);
            if (!note.success) {
                log.warn(`Answer generated but not saved: ${note.error}`);
            }
        }

        return {
            status: "generated",
            text: generation.text,
            empty,
            prompt,
            generation,
            curation,
            document,
            note,
        };
    }
}
