export class RuleCatalogLoadError extends Error {
  readonly source: string;

  constructor(message: string, source: string, options?: { cause?: unknown }) {
    super(`${message} (${source})`, options);
    this.name = "RuleCatalogLoadError";
    this.source = source;
  }
}
