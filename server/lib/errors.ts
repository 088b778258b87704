// Failure talking to the generation API: non-2xx status, or the request never completed.
export class TransportError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
    this.status = status;
  }
}

// Request rejected before any model call. `code` is what the client sees.
export class ValidationError extends Error {
  readonly code: "missing_base_text" | "invalid_json_payload";

  constructor(code: ValidationError["code"]) {
    super(code);
    this.name = "ValidationError";
    this.code = code;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
