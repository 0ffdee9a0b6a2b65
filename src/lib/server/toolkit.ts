import { existsSync } from "node:fs";
import { docxFactory } from "./documents/docx.js";
import { pdfLibrary, pdfTextExtractor } from "./documents/pdf.js";
import type { DocumentLibrary, TextDocumentFactory, TextExtractor } from "./documents/types.js";
import { systemOpener, type FileOpener } from "./opener.js";

/** External collaborators a task needs. Swapped wholesale in tests. */
export type TaskToolkit = {
  documents: DocumentLibrary;
  text: TextExtractor;
  writer: TextDocumentFactory;
  opener: FileOpener;
  /** Existence check used when picking collision-free output names. */
  pathExists: (filePath: string) => boolean;
};

export function createDefaultToolkit(overrides: Partial<TaskToolkit> = {}): TaskToolkit {
  return {
    documents: pdfLibrary,
    text: pdfTextExtractor,
    writer: docxFactory,
    opener: systemOpener,
    pathExists: existsSync,
    ...overrides,
  };
}
