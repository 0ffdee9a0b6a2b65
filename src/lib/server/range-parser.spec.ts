import { describe, it, expect } from "vitest";
import { parsePageRanges } from "./range-parser.js";

describe("parsePageRanges", () => {
  it("expands ranges and single pages into 0-based indices", () => {
    expect(parsePageRanges("1-3,6-7", 10)).toEqual([0, 1, 2, 5, 6]);
  });

  it("sorts and de-duplicates", () => {
    expect(parsePageRanges("5, 2, 2-3, 5", 10)).toEqual([1, 2, 4]);
  });

  it("ignores whitespace around tokens and numbers", () => {
    expect(parsePageRanges(" 1 - 2 ,  4 ", 5)).toEqual([0, 1, 3]);
  });

  it("skips malformed tokens", () => {
    expect(parsePageRanges("abc,5-2,3", 10)).toEqual([2]);
    expect(parsePageRanges("3-x,1.5,2", 10)).toEqual([1]);
  });

  it("returns nothing for an empty or unusable expression", () => {
    expect(parsePageRanges("", 10)).toEqual([]);
    expect(parsePageRanges(" , ,", 10)).toEqual([]);
    expect(parsePageRanges("abc", 10)).toEqual([]);
  });

  it("drops pages outside the document", () => {
    expect(parsePageRanges("0,11,12", 10)).toEqual([]);
    expect(parsePageRanges("9-12", 10)).toEqual([8, 9]);
  });

  it("clamps huge ranges to the document", () => {
    expect(parsePageRanges("2-999999999", 4)).toEqual([1, 2, 3]);
  });

  it("accepts a range starting at zero", () => {
    expect(parsePageRanges("0-2", 10)).toEqual([0, 1]);
  });

  it("selects nothing from an empty document", () => {
    expect(parsePageRanges("1-3", 0)).toEqual([]);
  });
});
