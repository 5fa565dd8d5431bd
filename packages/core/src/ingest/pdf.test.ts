import { describe, it, expect, vi } from "vitest";

const { destroy, getDocument } = vi.hoisted(() => {
  const destroy = vi.fn(async () => {});
  const getDocument = vi.fn(() => ({
    promise: Promise.reject(new Error("Invalid PDF structure.")),
    destroy,
  }));
  return { destroy, getDocument };
});

vi.mock("pdfjs-dist/legacy/build/pdf.mjs", () => ({ getDocument }));

import { readPdfText } from "./pdf";

describe("readPdfText", () => {
  it("releases the loading task when the document cannot be opened", async () => {
    await expect(readPdfText(Buffer.from("junk"))).rejects.toThrow("Invalid PDF structure.");
    expect(getDocument).toHaveBeenCalledTimes(1);
    expect(destroy).toHaveBeenCalledTimes(1);
  });
});
