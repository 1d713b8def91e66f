/**
 * Docloom Notes — Markdown Vault
 *
 * Writes notes as Markdown files with YAML frontmatter into a folder tree
 * that Obsidian-style vaults can open directly:
 *
 *   <vault>/<rootFolder>/<category>/Note_<title>_<YYYYMMDD_HHMMSS>.md
 */

import { access, mkdir, readdir, stat, unlink, writeFile } from "node:fs/promises";
import { constants, type Dirent } from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { toErrorMessage } from "../errors";
import { scopedLogger } from "../telemetry/logger";
import type { NoteEntry, NoteSink, SaveNoteResult, VaultValidation } from "./types";

const log = scopedLogger("MarkdownVault");

const MAX_TITLE_LENGTH = 50;
const DEFAULT_CATEGORY = "general";

export interface MarkdownVaultOptions {
    vaultPath: string;
    rootFolder: string;
}

/** Letters, digits, space, `-` and `_`; spaces become `_`; at most 50 chars. */
export function sanitizeTitle(title: string): string {
    const kept = Array.from(title)
        .filter((c) => /[\p{L}\p{N} _-]/u.test(c))
        .join("")
        .trim();
    return kept.replace(/ /g, "_").slice(0, MAX_TITLE_LENGTH);
}

const pad = (n: number): string => String(n).padStart(2, "0");

/** Local-time `YYYYMMDD_HHMMSS` */
export function fileTimestamp(date: Date): string {
    return (
        `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
        `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    );
}

function displayTimestamp(date: Date): string {
    return (
        `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
    );
}

export function renderNote(title: string, bodyMarkdown: string, category: string, created: Date): string {
    const frontmatter = YAML.stringify({
        title,
        category,
        created: created.toISOString(),
        type: "note",
        tags: ["docloom", category, "ai-generated"],
    });

    return [
        `---\n${frontmatter}---`,
        `# ${title}`,
        `Created: ${displayTimestamp(created)}\nCategory: ${category}`,
        "---",
        bodyMarkdown,
    ].join("\n\n");
}

export class MarkdownVault implements NoteSink {
    readonly vaultPath: string;
    readonly rootPath: string;
    private readonly now: () => Date;

    constructor(options: MarkdownVaultOptions, deps: { now?: () => Date } = {}) {
        this.vaultPath = path.resolve(options.vaultPath);
        this.rootPath = path.join(this.vaultPath, options.rootFolder);
        this.now = deps.now ?? (() => new Date());
    }

    async saveNote(title: string, bodyMarkdown: string, category = DEFAULT_CATEGORY): Promise<SaveNoteResult> {
        try {
            const created = this.now();
            const folder = sanitizeTitle(category) || DEFAULT_CATEGORY;
            const fileName = `Note_${sanitizeTitle(title) || "Untitled"}_${fileTimestamp(created)}.md`;
            const directory = path.join(this.rootPath, folder);
            const location = path.join(directory, fileName);
            const content = renderNote(title, bodyMarkdown, folder, created);

            await mkdir(directory, { recursive: true });
            await writeFile(location, content, "utf-8");
            log.info(`Note created: ${location}`);

            return {
                success: true,
                location,
                fileName,
                size: Buffer.byteLength(content, "utf-8"),
                created: created.toISOString(),
            };
        } catch (error) {
            const message = toErrorMessage(error);
            log.error(`Failed to create note "${title}": ${message}`);
            return { success: false, error: message };
        }
    }

    /**
     * Every `.md` note under the root folder, newest first. Notes directly
     * in the root belong to the "general" category.
     */
    async listNotes(category?: string): Promise<NoteEntry[]> {
        const files = await collectMarkdown(this.rootPath);
        const entries: NoteEntry[] = [];

        for (const file of files) {
            const info = await stat(file).catch((error: unknown) => {
                log.warn(`Could not read metadata for ${file}: ${toErrorMessage(error)}`);
                return null;
            });
            if (!info) {
                continue;
            }
            const parent = path.dirname(file);
            const entry: NoteEntry = {
                fileName: path.basename(file),
                path: file,
                size: info.size,
                modified: info.mtime,
                category: parent === this.rootPath ? DEFAULT_CATEGORY : path.basename(parent),
            };
            if (category === undefined || entry.category === category) {
                entries.push(entry);
            }
        }

        return entries.sort((a, b) => b.modified.getTime() - a.modified.getTime());
    }

    async validate(): Promise<VaultValidation> {
        const issues: string[] = [];

        const vaultInfo = await stat(this.vaultPath).catch(() => null);
        if (!vaultInfo) {
            issues.push(`Vault path does not exist: ${this.vaultPath}`);
        } else if (!vaultInfo.isDirectory()) {
            issues.push(`Vault path is not a directory: ${this.vaultPath}`);
        }

        const rootExists = await access(this.rootPath, constants.F_OK).then(
            () => true,
            () => false
        );
        if (!rootExists) {
            issues.push(`Notes folder missing: ${this.rootPath}`);
        } else {
            const probe = path.join(this.rootPath, ".write_test");
            try {
                await writeFile(probe, "test");
                await unlink(probe);
            } catch (error) {
                issues.push(`Write permission test failed: ${toErrorMessage(error)}`);
            }
        }

        return { valid: issues.length === 0, issues, vaultPath: this.vaultPath, rootPath: this.rootPath };
    }
}

async function collectMarkdown(directory: string): Promise<string[]> {
    let entries: Dirent[];
    try {
        entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
        if (isMissing(error)) {
            return [];
        }
        throw error;
    }

    const files: string[] = [];
    for (const entry of entries) {
        const full = path.join(directory, entry.name);
        if (entry.isDirectory()) {
            files.push(...(await collectMarkdown(full)));
        } else if (entry.isFile() && entry.name.endsWith(".md")) {
            files.push(full);
        }
    }
    return files;
}

function isMissing(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}
