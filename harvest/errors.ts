export class HarvestError extends Error {
  constructor(message: string, readonly url: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class FetchError extends HarvestError {
  constructor(url: string, message: string, readonly status?: number) {
    super(message, url);
  }
}

export class ParseError extends HarvestError {
  constructor(url: string, message: string) {
    super(message, url);
  }
}

export class EmptyContentError extends HarvestError {
  constructor(url: string, message = "page title and body text are both empty") {
    super(message, url);
  }
}

export type PageErrorKind = "FetchError" | "ParseError" | "EmptyContentError";

export type PageError = FetchError | ParseError | EmptyContentError;

export function pageErrorKind(err: PageError): PageErrorKind {
  if (err instanceof FetchError) return "FetchError";
  if (err instanceof ParseError) return "ParseError";
  return "EmptyContentError";
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class CmsRequestError extends Error {
  constructor(message: string, readonly status: number, readonly body: string) {
    super(message);
    this.name = "CmsRequestError";
  }
}
