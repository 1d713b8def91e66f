export { MarkdownVault, fileTimestamp, renderNote, sanitizeTitle } from "./vault";
export type { MarkdownVaultOptions } from "./vault";
export type { NoteEntry, NoteSink, SaveNoteResult, VaultValidation } from "./types";
