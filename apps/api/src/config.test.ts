import { describe, it, expect } from "vitest";
import { loadApiConfig } from "./config";

describe("loadApiConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadApiConfig({})).toEqual({ port: 3001, bodyLimit: "25mb", summaryPages: 2 });
  });

  it("reads the port, body limit and page count", () => {
    expect(loadApiConfig({ API_PORT: "8080", API_BODY_LIMIT: " 10mb ", SUMMARY_PAGES: "4" })).toEqual({
      port: 8080,
      bodyLimit: "10mb",
      summaryPages: 4,
    });
  });

  it("falls back on an invalid port", () => {
    expect(loadApiConfig({ API_PORT: "http" }).port).toBe(3001);
  });
});
