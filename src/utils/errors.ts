export class ImportError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code: string) {
    super(message);
    this.name = "ImportError";
    this.code = code;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised by the repository client for any non-2xx response. `body` keeps the raw
 * response text so callers can surface the server's field errors.
 */
export class RepositoryHttpError extends Error {
  public readonly status: number;
  public readonly method: string;
  public readonly url: string;
  public readonly body: string;

  constructor(input: { status: number; method: string; url: string; body: string; message?: string }) {
    super(input.message ?? `${input.method} ${input.url} failed with status ${input.status}`);
    this.name = "RepositoryHttpError";
    this.status = input.status;
    this.method = input.method;
    this.url = input.url;
    this.body = input.body;
    Error.captureStackTrace(this, this.constructor);
  }
}

export function isRepositoryHttpError(error: unknown): error is RepositoryHttpError {
  return error instanceof RepositoryHttpError;
}

const UNKNOWN_HTTP_ERROR = "'unknown HTTP error'";

/**
 * Renders a failed response body as `key: value` lines when it is a JSON object,
 * e.g. `{"SKU": ["already exists"]}` becomes `    SKU: already exists`.
 */
export function describeHttpError(error: RepositoryHttpError): string {
  const body = error.body.trim();
  if (!body) {
    return UNKNOWN_HTTP_ERROR;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return UNKNOWN_HTTP_ERROR;
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return UNKNOWN_HTTP_ERROR;
  }

  const lines = Object.entries(parsed).map(([key, value]) => `    ${key}: ${formatDetail(value)}`);
  return lines.length ? `\n${lines.join("\n")}` : UNKNOWN_HTTP_ERROR;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : "unknown_error";
}

function formatDetail(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map((item) => formatDetail(item)).join(", ");
  }
  if (typeof value === "string") {
    return value;
  }
  return JSON.stringify(value);
}
