/**
 * Error taxonomy. Every failure raised by factkeeper carries a stable `code`
 * so the CLI and MCP layers can report it without string matching.
 */
export class FactkeeperError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MissingVariableError extends FactkeeperError {
  readonly variable: string;

  constructor(variable: string) {
    super("MISSING_VARIABLE", `No value provided for template variable "${variable}"`);
    this.variable = variable;
  }
}

export class MalformedTemplateError extends FactkeeperError {
  readonly position: number;

  constructor(detail: string, position: number) {
    super("MALFORMED_TEMPLATE", `Malformed template at offset ${position}: ${detail}`);
    this.position = position;
  }
}

export class PromptNotFoundError extends FactkeeperError {
  constructor(category: string, name: string) {
    super("PROMPT_NOT_FOUND", `No prompt template "${category}/${name}"`);
  }
}

/** The caller may retry with cleaned input. */
export class ExtractionFailure extends FactkeeperError {
  constructor(message: string) {
    super("EXTRACTION_FAILURE", message);
  }
}

/** The validator lost or duplicated a fact. Always a bug. */
export class ValidationInconsistency extends FactkeeperError {
  constructor(message: string) {
    super("VALIDATION_INCONSISTENCY", message);
  }
}

export class EmptyQueryError extends FactkeeperError {
  constructor() {
    super("EMPTY_QUERY", "Query must not be empty");
  }
}

export class TimeoutFailure extends FactkeeperError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, options?: { cause?: unknown }) {
    super("TIMEOUT", `${operation} timed out after ${timeoutMs}ms`, options);
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigError extends FactkeeperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG", message, options);
  }
}

export class ExternalServiceError extends FactkeeperError {
  readonly service: string;

  constructor(service: string, message: string, options?: { cause?: unknown }) {
    super("EXTERNAL_SERVICE", `${service}: ${message}`, options);
    this.service = service;
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
