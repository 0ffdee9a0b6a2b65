import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { PDFDocument, StandardFonts } from "pdf-lib";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { MemoryWorkspace } from "../../../test/memory-workspace.js";
import { splitLines } from "../tasks/convert.js";
import { PdfDocument, pdfLibrary, pdfTextExtractor } from "./pdf.js";

/** One page per entry, each line drawn 20pt below the previous one. */
async function writeSamplePdf(filePath: string, pages: string[][]): Promise<void> {
  const pdf = await PDFDocument.create();
  const font = await pdf.embedFont(StandardFonts.Helvetica);
  for (const lines of pages) {
    const page = pdf.addPage([300, 200]);
    lines.forEach((line, i) => page.drawText(line, { x: 20, y: 160 - 20 * i, size: 14, font }));
  }
  await writeFile(filePath, await pdf.save());
}

const openPdf = async (filePath: string): Promise<PdfDocument> => {
  const document = await pdfLibrary.open(filePath);
  if (!(document instanceof PdfDocument)) throw new Error("expected a PdfDocument");
  return document;
};

describe("pdf documents", () => {
  let dir: string;
  let sample: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "pdf-taskkit-pdf-"));
    sample = path.join(dir, "sample.pdf");
    await writeSamplePdf(sample, [["first page"], ["second page"], ["third page"]]);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("opens a document and reads page text", async () => {
    const document = await pdfLibrary.open(sample);

    expect(document.pageCount).toBe(3);
    expect(await (await document.loadPage(1)).textContent()).toContain("second page");
    await document.close();
  });

  it("reads only the requested page", async () => {
    const document = await openPdf(sample);
    const getPage = vi.spyOn(await document.textSource(), "getPage");

    await (await document.loadPage(2)).textContent();

    expect(getPage).toHaveBeenCalledOnce();
    expect(getPage).toHaveBeenCalledWith(3);
    await document.close();
  });

  it("destroys the pdf.js document on close", async () => {
    const document = await openPdf(sample);
    await (await document.loadPage(0)).textContent();
    const destroy = vi.spyOn(await document.textSource(), "destroy");

    await document.close();
    await document.close();

    expect(destroy).toHaveBeenCalledOnce();
  });

  it("rejects a page index outside the document", async () => {
    const document = await pdfLibrary.open(sample);

    await expect(document.loadPage(3)).rejects.toThrowError(RangeError);
    await document.close();
  });

  it("copies pages into a new document and saves it", async () => {
    const source = await pdfLibrary.open(sample);
    const target = await pdfLibrary.create();
    await target.insertPages(source, 0, 0);
    await target.insertPages(source, 2, 2);

    const output = path.join(dir, "nested", "out.pdf");
    await target.save(output);
    await source.close();
    await target.close();

    const saved = await pdfLibrary.open(output);
    expect(saved.pageCount).toBe(2);
    expect(await (await saved.loadPage(1)).textContent()).toContain("third page");
    await saved.close();
  });

  it("draws text onto a page", async () => {
    const document = await pdfLibrary.open(sample);
    const page = await document.loadPage(0);
    await page.insertText({ x: 50, y: 50 }, "Pág. 7", { font: "helvetica", size: 12, color: [0, 0, 0] });

    const output = path.join(dir, "stamped.pdf");
    await document.save(output);
    await document.close();

    expect(await pdfTextExtractor.extractAllText(output)).toContain("Pág. 7");
  });

  it("positions text from the corner of the media box", async () => {
    const pdf = await PDFDocument.create();
    pdf.addPage([300, 200]).setMediaBox(100, 40, 300, 200);
    const document = new PdfDocument(pdf);
    const drawText = vi.spyOn(pdf.getPage(0), "drawText");

    await (await document.loadPage(0)).insertText({ x: 10, y: 20 }, "Page 1", {
      font: "helvetica",
      size: 12,
      color: [0, 0, 0],
    });

    expect(drawText).toHaveBeenCalledWith("Page 1", expect.objectContaining({ x: 110, y: 60, size: 12 }));
  });

  it("extracts the text of every page", async () => {
    const text = await pdfTextExtractor.extractAllText(sample);

    expect(text).toContain("first page");
    expect(text).toContain("third page");
  });

  it("keeps line breaks in the extracted text", async () => {
    const notes = path.join(dir, "notes.pdf");
    await writeSamplePdf(notes, [
      ["p1 line 1", "p1 line 2", "p1 line 3"],
      ["p2 line 1", "p2 line 2", "p2 line 3"],
    ]);

    expect(splitLines(await pdfTextExtractor.extractAllText(notes))).toEqual([
      "p1 line 1",
      "p1 line 2",
      "p1 line 3",
      "p2 line 1",
      "p2 line 2",
      "p2 line 3",
    ]);
  });

  it("refuses to copy pages from another kind of document", async () => {
    const target = await pdfLibrary.create();
    const other = await new MemoryWorkspace().documents.create();

    await expect(target.insertPages(other, 0, 0)).rejects.toThrowError(TypeError);
  });

  it("fails to open a file that is not a PDF", async () => {
    const bogus = path.join(dir, "bogus.pdf");
    await writeFile(bogus, "not a pdf");

    await expect(pdfLibrary.open(bogus)).rejects.toThrowError();
  });
});
