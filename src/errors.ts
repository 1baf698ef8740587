export type PipelineErrorCode = "transient_service" | "malformed_response" | "validation" | "conflict" | "not_found";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
  }
}

export class TransientServiceError extends PipelineError {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super("transient_service", message, { cause: options.cause });
    this.status = options.status;
  }
}

export class MalformedResponseError extends PipelineError {
  readonly rawContent: string;

  constructor(message: string, rawContent = "") {
    super("malformed_response", message);
    this.rawContent = rawContent;
  }
}

/**
 * Schema or coverage violation. `issues` lists every specific shortfall so
 * callers can report them individually.
 */
export class ValidationError extends PipelineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("validation", issues.length > 0 ? `${message}\n${issues.map((issue) => `  - ${issue}`).join("\n")}` : message);
    this.issues = issues;
  }
}

export class ConflictError extends PipelineError {
  constructor(message: string) {
    super("conflict", message);
  }
}

export class NotFoundError extends PipelineError {
  constructor(message: string) {
    super("not_found", message);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
