export type Adapter = "pdf" | "text";

export type PageSpan = {
  page: number;  // 1-based
  start: number; // inclusive char offset in full text
  end: number;   // exclusive char offset
};

export type DocumentText = {
  // Text of the pages that were read, joined by newlines
  text: string;
  pageMap: PageSpan[];
  // Pages in the whole document, which may exceed pageMap.length
  pageCount: number;
  warnings: string[];
  meta: {
    adapter: Adapter;
    mime?: string;
    filename?: string;
    bytes: number;
  };
};

export type IngestOptions = {
  // Read at most this many leading pages; all pages when omitted
  maxPages?: number;
  mime?: string;
  filename?: string;
};
