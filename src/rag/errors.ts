export class DocumentLoadError extends Error {
  constructor(
    public readonly filePath: string,
    cause: unknown,
  ) {
    super(`Failed to load ${filePath}: ${describeError(cause)}`);
    this.name = "DocumentLoadError";
    this.cause = cause;
  }
}

export class MetadataExtractionError extends Error {
  constructor(
    public readonly source: string,
    cause: unknown,
  ) {
    super(`Metadata extraction failed for ${source}: ${describeError(cause)}`);
    this.name = "MetadataExtractionError";
    this.cause = cause;
  }
}

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly status: number | null = null,
  ) {
    super(message);
    this.name = "EmbeddingError";
  }
}

export class CompletionError extends Error {
  constructor(
    message: string,
    public readonly status: number | null = null,
  ) {
    super(message);
    this.name = "CompletionError";
  }
}

export class TimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export class InvalidArgumentError extends Error {
  constructor(
    public readonly argument: string,
    expected: string,
    received: unknown,
  ) {
    super(`Argument '${argument}' must be ${expected}, received ${typeOf(received)}`);
    this.name = "InvalidArgumentError";
  }
}

export class IndexNotFoundError extends Error {
  constructor(public readonly indexName: string) {
    super(`No index named '${indexName}' exists`);
    this.name = "IndexNotFoundError";
  }
}

export class IndexNotOpenError extends Error {
  constructor() {
    super("No index is open; call create(), load() or loadOrCreate() first");
    this.name = "IndexNotOpenError";
  }
}

export class PromptNotFoundError extends Error {
  constructor(
    public readonly category: string,
    public readonly index: number,
  ) {
    super(`No prompt found at index ${index} in category '${category}'`);
    this.name = "PromptNotFoundError";
  }
}

const TRANSIENT_STATUS = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

/** Failures worth another attempt: timeouts, rate limits, 5xx, dropped connections. */
export function isTransientError(err: unknown): boolean {
  if (err instanceof TimeoutError) return true;
  if (err instanceof EmbeddingError || err instanceof CompletionError) {
    return err.status !== null && TRANSIENT_STATUS.has(err.status);
  }
  // fetch() rejects with a TypeError when the network fails
  return err instanceof TypeError && err.message === "fetch failed";
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function typeOf(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

export function assertString(value: unknown, argument: string): asserts value is string {
  if (typeof value !== "string") {
    throw new InvalidArgumentError(argument, "a string", value);
  }
}
