import { readFile } from "node:fs/promises";
import { PDFDocument, StandardFonts, rgb, type PDFFont } from "pdf-lib";
import { extractText, getDocumentProxy } from "unpdf";
import type {
  DocumentHandle,
  DocumentLibrary,
  PageHandle,
  Position,
  TextExtractor,
  TextStyle,
} from "./types.js";
import { writeBytes } from "./files.js";

const STANDARD_FONTS = { helvetica: StandardFonts.Helvetica } as const;

type TextSource = Awaited<ReturnType<typeof getDocumentProxy>>;

// pdf.js takes ownership of the buffer it is given, so hand it a copy
const openTextSource = (bytes: Uint8Array): Promise<TextSource> => getDocumentProxy(new Uint8Array(bytes));

/** Text of one page, with a line break wherever pdf.js saw the end of a line. */
async function readPageText(source: TextSource, index: number): Promise<string> {
  const page = await source.getPage(index + 1);
  const content = await page.getTextContent();
  return content.items
    .map((item) => ("str" in item ? `${item.str}${item.hasEOL ? "\n" : ""}` : ""))
    .join("");
}

class PdfPage implements PageHandle {
  constructor(
    private readonly owner: PdfDocument,
    readonly index: number,
  ) {}

  async textContent(): Promise<string> {
    return readPageText(await this.owner.textSource(), this.index);
  }

  async insertText(position: Position, text: string, style: TextStyle): Promise<void> {
    const font = await this.owner.font(style.font);
    const [r, g, b] = style.color;
    const page = this.owner.pdf.getPage(this.index);
    const box = page.getMediaBox();
    page.drawText(text, {
      x: box.x + position.x,
      y: box.y + position.y,
      size: style.size,
      font,
      color: rgb(r, g, b),
    });
  }
}

/**
 * pdf-lib document. Page text comes from pdf.js (through unpdf), which opens the bytes
 * the document was loaded from on first use and reads one page per request.
 */
export class PdfDocument implements DocumentHandle {
  private source: Promise<TextSource> | undefined;
  private fonts = new Map<TextStyle["font"], Promise<PDFFont>>();

  constructor(
    readonly pdf: PDFDocument,
    private readonly bytes?: Uint8Array,
  ) {}

  get pageCount(): number {
    return this.pdf.getPageCount();
  }

  async loadPage(index: number): Promise<PageHandle> {
    if (index < 0 || index >= this.pageCount) {
      throw new RangeError(`Page index ${index} is out of range (0..${this.pageCount - 1})`);
    }
    return new PdfPage(this, index);
  }

  /** The pdf.js view of this document. Documents built in memory are serialized first. */
  textSource(): Promise<TextSource> {
    this.source ??= this.bytes ? openTextSource(this.bytes) : this.pdf.save().then(openTextSource);
    return this.source;
  }

  font(name: TextStyle["font"]): Promise<PDFFont> {
    let font = this.fonts.get(name);
    if (!font) {
      font = this.pdf.embedFont(STANDARD_FONTS[name]);
      this.fonts.set(name, font);
    }
    return font;
  }

  async insertPages(from: DocumentHandle, fromIndex: number, toIndex: number): Promise<void> {
    if (!(from instanceof PdfDocument)) {
      throw new TypeError("Pages can only be copied between PDF documents");
    }
    const indices: number[] = [];
    for (let index = fromIndex; index <= toIndex; index++) indices.push(index);

    const pages = await this.pdf.copyPages(from.pdf, indices);
    for (const page of pages) this.pdf.addPage(page);
    // A text view taken before the copy no longer matches the pages
    if (!this.bytes) await this.releaseTextSource();
  }

  async save(filePath: string): Promise<void> {
    await writeBytes(filePath, await this.pdf.save());
  }

  async close(): Promise<void> {
    await this.releaseTextSource();
  }

  private async releaseTextSource(): Promise<void> {
    const source = this.source;
    if (!source) return;
    this.source = undefined;
    await (await source).destroy();
  }
}

export const pdfLibrary: DocumentLibrary = {
  async open(filePath) {
    const bytes = new Uint8Array(await readFile(filePath));
    const pdf = await PDFDocument.load(bytes);
    return new PdfDocument(pdf, bytes);
  },
  async create() {
    return new PdfDocument(await PDFDocument.create());
  },
};

export const pdfTextExtractor: TextExtractor = {
  async extractAllText(filePath) {
    const source = await openTextSource(new Uint8Array(await readFile(filePath)));
    try {
      // Merged extraction collapses every run of whitespace, line breaks included
      const { text } = await extractText(source, { mergePages: false });
      return Array.isArray(text) ? text.join("\n") : text;
    } finally {
      await source.destroy();
    }
  },
};
