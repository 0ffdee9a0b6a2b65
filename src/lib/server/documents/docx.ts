import { Document, Packer, Paragraph, TextRun } from "docx";
import { writeBytes } from "./files.js";
import type { TextDocument, TextDocumentFactory } from "./types.js";

class DocxDocument implements TextDocument {
  private paragraphs: Paragraph[] = [];

  addParagraph(text: string): void {
    this.paragraphs.push(new Paragraph({ children: [new TextRun(text)] }));
  }

  async save(filePath: string): Promise<void> {
    const document = new Document({ sections: [{ children: this.paragraphs }] });
    await writeBytes(filePath, await Packer.toBuffer(document));
  }
}

/** Writes Word documents, one paragraph per line of source text. */
export const docxFactory: TextDocumentFactory = {
  extension: ".docx",
  create: () => new DocxDocument(),
};
