import { describe, it, expect, vi } from "vitest";
import { runBatch } from "./batch";
import { getLogger } from "./logger";
import { makePdf, SUMMARY_LINES, SUMMARY_TEXT } from "./testing/pdf";
import { BatchProgressEvent, SourceDocument } from "./types";

const quiet = getLogger("test", { sink: () => {} });

function textDoc(name: string, text: string): SourceDocument {
  return { name, data: Buffer.from(text, "utf8"), mime: "text/plain" };
}

describe("runBatch", () => {
  it("returns one record per document in input order", async () => {
    const docs = [
      textDoc("a.txt", "Currency : USD"),
      textDoc("b.txt", "Currency : EUR"),
      textDoc("c.txt", SUMMARY_TEXT),
    ];
    const result = await runBatch(docs, { logger: quiet });
    expect(result.records.map((r) => r.source_name)).toEqual(["a.txt", "b.txt", "c.txt"]);
    expect(result.records.map((r) => r.currency)).toEqual(["USD", "EUR", "USD"]);
    expect(result.failures).toEqual([]);
    expect(result.aborted).toBe(false);
  });

  it("skips an unreadable document and keeps going", async () => {
    const docs = [
      textDoc("first.txt", "Currency : USD"),
      { name: "broken.pdf", data: Buffer.from("not really a pdf", "utf8") },
      textDoc("last.txt", "Total Paid By Company : 10.00"),
    ];
    const result = await runBatch(docs, { logger: quiet });
    expect(result.records.map((r) => r.source_name)).toEqual(["first.txt", "last.txt"]);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0].source_name).toBe("broken.pdf");
    expect(result.failures[0].error).toMatch(/^Unable to read broken\.pdf: /);
  });

  it("records a failure when the text reader throws", async () => {
    const readText = vi.fn(async (doc: SourceDocument) => {
      if (doc.name === "bad") throw new Error("disk on fire");
      return "Currency : GBP";
    });
    const result = await runBatch([textDoc("bad", ""), textDoc("good", "")], { readText, logger: quiet });
    expect(result.failures).toEqual([{ source_name: "bad", error: "disk on fire" }]);
    expect(result.records).toHaveLength(1);
    expect(result.records[0].currency).toBe("GBP");
  });

  it("searches only the configured number of leading pages", async () => {
    const pdf = await makePdf([["Cover page"], ["Nothing here"], SUMMARY_LINES]);
    const doc = { name: "late-summary.pdf", data: pdf };

    const bounded = await runBatch([doc], { maxPages: 2, logger: quiet });
    expect(bounded.records[0].currency).toBeNull();

    const wider = await runBatch([doc], { maxPages: 3, logger: quiet });
    expect(wider.records[0].currency).toBe("USD");
    expect(wider.records[0].amount_due_company_card).toBe(-200);
  });

  it("passes the page bound to the reader", async () => {
    const readText = vi.fn(async () => "");
    await runBatch([textDoc("x", "")], { readText, maxPages: 4, logger: quiet });
    expect(readText).toHaveBeenCalledWith(expect.objectContaining({ name: "x" }), 4);
  });

  it("reports progress for every document", async () => {
    const events: BatchProgressEvent[] = [];
    await runBatch(
      [textDoc("ok.txt", "Currency : USD"), { name: "bad.pdf", data: Buffer.from("junk") }],
      { onProgress: (e) => events.push(e), logger: quiet }
    );
    expect(events.map((e) => `${e.type}:${e.name}:${e.index}/${e.total}`)).toEqual([
      "document.start:ok.txt:0/2",
      "document.done:ok.txt:0/2",
      "document.start:bad.pdf:1/2",
      "document.failed:bad.pdf:1/2",
    ]);
  });

  it("stops before the next document once aborted", async () => {
    const controller = new AbortController();
    const docs = [textDoc("one.txt", "Currency : USD"), textDoc("two.txt", "Currency : EUR")];
    const result = await runBatch(docs, {
      signal: controller.signal,
      logger: quiet,
      onProgress: (e) => {
        if (e.type === "document.done") controller.abort();
      },
    });
    expect(result.aborted).toBe(true);
    expect(result.records.map((r) => r.source_name)).toEqual(["one.txt"]);
  });
});
