/**
 * Error Classes for apidoc-graph
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Entity model errors (1xxx)
  CONSTRUCTION_FAILED = "E1000",
  UNDECLARED_ATTRIBUTE = "E1001",
  INVALID_SPECIALIZATION = "E1002",
  WRONG_RECORD_KIND = "E1003",
  UNKNOWN_HANDLE = "E1004",

  // Sentinel errors (2xxx)
  SENTINEL_MISUSE = "E2000",

  // Naming errors (3xxx)
  IDENTIFIER_SYNTAX = "E3000",
  EMPTY_NAME = "E3001",

  // Inheritance errors (4xxx)
  INCONSISTENT_HIERARCHY = "E4000",
  CYCLIC_HIERARCHY = "E4001",

  // Graph document errors (5xxx)
  DOCUMENT_INVALID = "E5000",
  DOCUMENT_DANGLING_REFERENCE = "E5001",
  DOCUMENT_READ_FAILED = "E5002",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_ARGUMENT = "E9001",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all apidoc-graph errors
 */
export class ApiDocGraphError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ApiDocGraphError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * A record was built or reshaped in a way its kind does not allow:
 * an undeclared attribute, a specialization to a non-subkind, or a
 * handle that points at a record of the wrong kind.
 */
export class ConstructionError extends ApiDocGraphError {
  public readonly kind?: string;
  public readonly attribute?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONSTRUCTION_FAILED,
    context?: Record<string, unknown> & { kind?: string; attribute?: string }
  ) {
    super(message, code, context);
    this.name = "ConstructionError";
    this.kind = context?.kind;
    this.attribute = context?.attribute;
  }
}

/**
 * The UNKNOWN sentinel was used where a concrete value is required.
 */
export class SentinelMisuseError extends ApiDocGraphError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.SENTINEL_MISUSE, context);
    this.name = "SentinelMisuseError";
  }
}

/**
 * A dotted name contained a malformed identifier.
 */
export class IdentifierSyntaxError extends ApiDocGraphError {
  public readonly identifier?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.IDENTIFIER_SYNTAX,
    context?: Record<string, unknown> & { identifier?: string }
  ) {
    super(message, code, context);
    this.name = "IdentifierSyntaxError";
    this.identifier = context?.identifier;
  }

  toString(): string {
    const suffix = this.identifier !== undefined ? ` (${JSON.stringify(this.identifier)})` : "";
    return `[${this.code}] ${this.name}: ${this.message}${suffix}`;
  }
}

/**
 * No consistent method resolution order exists for a class.
 */
export class InconsistentHierarchyError extends ApiDocGraphError {
  public readonly className?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INCONSISTENT_HIERARCHY,
    context?: Record<string, unknown> & { className?: string }
  ) {
    super(message, code, context);
    this.name = "InconsistentHierarchyError";
    this.className = context?.className;
  }
}

/**
 * A JSON graph document failed validation.
 */
export class GraphDocumentError extends ApiDocGraphError {
  public readonly source?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DOCUMENT_INVALID,
    context?: Record<string, unknown> & { source?: string }
  ) {
    super(message, code, context);
    this.name = "GraphDocumentError";
    this.source = context?.source;
  }
}

/**
 * Build configuration could not be read or validated.
 */
export class ConfigurationError extends ApiDocGraphError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context);
    this.name = "ConfigurationError";
  }
}
