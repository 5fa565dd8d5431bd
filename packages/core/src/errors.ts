export class DocumentReadError extends Error {
  readonly document: string;

  constructor(document: string, cause: unknown) {
    super(`Unable to read ${document}: ${errorMessage(cause)}`, { cause });
    this.name = "DocumentReadError";
    this.document = document;
  }
}

export class NothingToExportError extends Error {
  constructor() {
    super("No data could be extracted from the submitted documents; nothing to export.");
    this.name = "NothingToExportError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
