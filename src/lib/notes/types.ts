/**
 * Docloom Notes — Shared Types
 */

export type SaveNoteResult =
    | {
          success: true;
          /** Absolute path (or sink-specific locator) of the stored note */
          location: string;
          fileName: string;
          size: number;
          created: string;
      }
    | { success: false; error: string };

/** Anywhere generated Markdown can be stored. `saveNote` never throws. */
export interface NoteSink {
    saveNote(title: string, bodyMarkdown: string, category?: string): Promise<SaveNoteResult>;
}

export interface NoteEntry {
    fileName: string;
    path: string;
    size: number;
    modified: Date;
    category: string;
}

export interface VaultValidation {
    valid: boolean;
    issues: string[];
    vaultPath: string;
    rootPath: string;
}
