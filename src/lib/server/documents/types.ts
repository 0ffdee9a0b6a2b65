/** Point in PDF user space, measured from the page's bottom-left corner. */
export type Position = { x: number; y: number };

export type TextStyle = {
  /** Standard font name. Only Helvetica is used today. */
  font: "helvetica";
  size: number;
  /** RGB components in `[0, 1]`. */
  color: readonly [number, number, number];
};

export type PageHandle = {
  /** 0-based position in its document. */
  readonly index: number;
  textContent: () => Promise<string>;
  insertText: (position: Position, text: string, style: TextStyle) => Promise<void>;
};

/**
 * An open paginated document. Handles from one {@link DocumentLibrary} only accept pages
 * from handles of the same library.
 */
export type DocumentHandle = {
  readonly pageCount: number;
  loadPage: (index: number) => Promise<PageHandle>;
  /** Append pages `fromIndex..toIndex` (inclusive, 0-based) of `from` to this document. */
  insertPages: (from: DocumentHandle, fromIndex: number, toIndex: number) => Promise<void>;
  /** Serialize to `filePath`, creating its folder when missing. */
  save: (filePath: string) => Promise<void>;
  /** Release what the handle holds. Safe to call more than once. */
  close: () => Promise<void>;
};

export type DocumentLibrary = {
  open: (filePath: string) => Promise<DocumentHandle>;
  create: () => Promise<DocumentHandle>;
};

/** Whole-document plain text extraction. */
export type TextExtractor = {
  extractAllText: (filePath: string) => Promise<string>;
};

/** Flowing text document built one paragraph at a time. */
export type TextDocument = {
  addParagraph: (text: string) => void;
  save: (filePath: string) => Promise<void>;
};

export type TextDocumentFactory = {
  /** File extension of the documents this factory writes, including the dot. */
  readonly extension: string;
  create: () => TextDocument;
};
