import { describe, it, expect } from "vitest";
import { ValidationError } from "../shared/errors.js";
import { EventChannel } from "./channel.js";
import { createTaskSpec, type TaskSpecOptions } from "./task-spec.js";

const options = (isFile: (filePath: string) => boolean = () => true): TaskSpecOptions => ({
  config: { resultFolder: "/out", debug: false },
  channel: new EventChannel(),
  isFile,
});

const issuesOf = (fn: () => unknown): string[] => {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error.issues;
    throw error;
  }
  throw new Error("expected a ValidationError");
};

describe("createTaskSpec", () => {
  it("fills search defaults and drops blank queries", () => {
    const spec = createTaskSpec("search", { file: " /in/a.pdf ", queries: [" alpha ", "", "beta"] }, options());

    expect(spec).toMatchObject({
      kind: "search",
      outputFolder: "/out",
      params: {
        file: "/in/a.pdf",
        queries: ["alpha", "beta"],
        caseSensitive: false,
        requireAll: false,
        preview: false,
      },
    });
  });

  it("returns a frozen spec bound to the given channel", () => {
    const opts = options();
    const spec = createTaskSpec("convert", { file: "/in/a.pdf" }, opts);

    expect(Object.isFrozen(spec)).toBe(true);
    expect(spec.channel).toBe(opts.channel);
  });

  it("requires one to three search texts", () => {
    expect(issuesOf(() => createTaskSpec("search", { file: "/in/a.pdf", queries: ["  "] }, options()))).toEqual([
      "queries: at least one search text is required",
    ]);
    expect(
      issuesOf(() => createTaskSpec("search", { file: "/in/a.pdf", queries: ["a", "b", "c", "d"] }, options())),
    ).toEqual(["queries: at most three search texts are allowed"]);
  });

  it("fills numbering defaults", () => {
    const spec = createTaskSpec("number", { file: "/in/a.pdf" }, options());

    expect(spec.params).toEqual({
      file: "/in/a.pdf",
      startNumber: 1,
      startPage: 1,
      useInitial: true,
      x: 50,
      y: 50,
      prefix: "Page ",
      preview: false,
    });
  });

  it("rejects a non-numeric start page", () => {
    expect(issuesOf(() => createTaskSpec("number", { file: "/in/a.pdf", startPage: "2" }, options()))).toEqual([
      "startPage: startPage must be a number",
    ]);
  });

  it("rejects a fractional coordinate", () => {
    expect(issuesOf(() => createTaskSpec("number", { file: "/in/a.pdf", x: 1.5 }, options()))).toEqual([
      "x: x must be an integer",
    ]);
  });

  it("rejects a prefix the label font cannot draw", () => {
    expect(issuesOf(() => createTaskSpec("number", { file: "/in/a.pdf", prefix: "Стр. " }, options()))).toEqual([
      "prefix: prefix can only use characters of the Windows-1252 (Latin) set",
    ]);
  });

  it("accepts accented Latin prefixes", () => {
    const spec = createTaskSpec("number", { file: "/in/a.pdf", prefix: "Pág. – " }, options());

    expect(spec.params).toMatchObject({ prefix: "Pág. – " });
  });

  it("requires at least one file to merge", () => {
    expect(issuesOf(() => createTaskSpec("merge", { files: [] }, options()))).toEqual([
      "files: add at least one file to merge",
    ]);
  });

  it("defaults the merge output name", () => {
    const spec = createTaskSpec("merge", { files: ["/in/a.pdf", "/in/b.pdf"] }, options());

    expect(spec.params).toEqual({ files: ["/in/a.pdf", "/in/b.pdf"], outputName: "merged", preview: false });
  });

  it("requires page ranges for extraction", () => {
    expect(issuesOf(() => createTaskSpec("extract", { file: "/in/a.pdf", ranges: "   " }, options()))).toEqual([
      "ranges: page ranges are required",
    ]);
  });

  it("reports every input file that does not exist", () => {
    const isFile = (filePath: string) => filePath === "/in/a.pdf";

    expect(
      issuesOf(() => createTaskSpec("merge", { files: ["/in/a.pdf", "/in/b.pdf", "/in/c.pdf"] }, options(isFile))),
    ).toEqual(['"/in/b.pdf" is not an existing file', '"/in/c.pdf" is not an existing file']);
  });

  it("names the missing field", () => {
    const issues = issuesOf(() => createTaskSpec("convert", {}, options()));

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^file: /);
  });

  it("rejects input that is not an object", () => {
    expect(() => createTaskSpec("extract", null, options())).toThrowError(ValidationError);
  });

  it("joins the issues into the error message", () => {
    expect(() => createTaskSpec("extract", { file: "", ranges: "" }, options())).toThrowError(
      "file: file is required; ranges: page ranges are required",
    );
  });
});
