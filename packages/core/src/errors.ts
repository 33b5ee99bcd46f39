/**
 * Error types shared across the research engine
 */

export type ResearchErrorCode =
  | "InvalidRequest"
  | "ConfigurationError"
  | "StateStoreError"
  | "BudgetExhausted"
  | "ProviderError"
  | "RenderTimeout"
  | ToolErrorKind;

/**
 * Base class for every error raised by the engine
 */
export class ResearchError extends Error {
  readonly code: ResearchErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ResearchErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/**
 * Raised before any worker launches when a request cannot be researched.
 * The only error `ResearchSupervisor.run` lets escape.
 */
export class InvalidRequestError extends ResearchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("InvalidRequest", message, details);
  }
}

export class ConfigurationError extends ResearchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("ConfigurationError", message, details);
  }
}

export class StateStoreError extends ResearchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("StateStoreError", message, details);
  }
}

/**
 * Failure taxonomy of a single tool invocation
 */
export type ToolErrorKind =
  | "ToolUnavailable"
  | "ToolTimeout"
  | "ToolRejected"
  | "MalformedResponse";

/**
 * Typed failure of one tool call.
 *
 * `fatal` marks failures that retrying cannot fix (authorization failures,
 * missing credentials); a worker stops on the first one.
 */
export class ToolError extends ResearchError {
  readonly kind: ToolErrorKind;
  readonly fatal: boolean;
  readonly status?: number;

  constructor(
    kind: ToolErrorKind,
    message: string,
    options?: { fatal?: boolean; status?: number }
  ) {
    super(kind, message, options?.status ? { status: options.status } : undefined);
    this.kind = kind;
    this.fatal = options?.fatal ?? false;
    this.status = options?.status;
  }
}

/**
 * Normalize anything thrown by a provider into a ToolError
 */
export function toToolError(error: unknown): ToolError {
  if (error instanceof ToolError) {
    return error;
  }
  if (error instanceof Error) {
    if (error.name === "AbortError" || error.name === "TimeoutError") {
      return new ToolError("ToolTimeout", error.message || "Tool call aborted");
    }
    if (error instanceof SyntaxError) {
      return new ToolError("MalformedResponse", error.message);
    }
    return new ToolError("ToolUnavailable", error.message);
  }
  return new ToolError("ToolUnavailable", String(error));
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
