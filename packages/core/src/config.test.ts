import { describe, it, expect } from "vitest";
import { DEFAULT_SUMMARY_PAGES, loadCoreConfig, parsePositiveInt } from "./config";

describe("loadCoreConfig", () => {
  it("defaults to two leading pages", () => {
    expect(loadCoreConfig({})).toEqual({ summaryPages: DEFAULT_SUMMARY_PAGES });
    expect(DEFAULT_SUMMARY_PAGES).toBe(2);
  });

  it("reads SUMMARY_PAGES", () => {
    expect(loadCoreConfig({ SUMMARY_PAGES: "5" }).summaryPages).toBe(5);
  });

  it("falls back on invalid values", () => {
    expect(loadCoreConfig({ SUMMARY_PAGES: "0" }).summaryPages).toBe(2);
    expect(loadCoreConfig({ SUMMARY_PAGES: "two" }).summaryPages).toBe(2);
  });
});

describe("parsePositiveInt", () => {
  it("accepts whole numbers from one up", () => {
    expect(parsePositiveInt("3")).toBe(3);
    expect(parsePositiveInt(" 12 ")).toBe(12);
    expect(parsePositiveInt("1.5")).toBeNull();
    expect(parsePositiveInt("-1")).toBeNull();
    expect(parsePositiveInt(undefined)).toBeNull();
  });
});
