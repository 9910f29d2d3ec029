/**
 * IR error types and helpers
 */

export type IRErrorCode =
  | "SyntaxError"
  | "UndefinedValue"
  | "DuplicateDefinition"
  | "TypeMismatch"
  | "VerifyError";

export interface IRSourceLocation {
  filePath: string;
  line: number;
  column: number;
}

/**
 * Position of a problem inside an in-memory module
 */
export interface IRSite {
  functionName: string;
  blockLabel?: string;
}

export class IRError extends Error {
  readonly code: IRErrorCode;
  readonly location?: IRSourceLocation;
  readonly site?: IRSite;

  constructor(
    code: IRErrorCode,
    message: string,
    where: { location?: IRSourceLocation; site?: IRSite } = {},
  ) {
    super(message);
    this.name = "IRError";
    this.code = code;
    this.location = where.location;
    this.site = where.site;
  }
}

export class IRParseError extends IRError {
  declare readonly location: IRSourceLocation;

  constructor(
    code: Exclude<IRErrorCode, "VerifyError">,
    message: string,
    location: IRSourceLocation,
  ) {
    super(code, message, { location });
    this.name = "IRParseError";
  }
}

/**
 * Raised when a graph operation is asked to break a use-def invariant.
 * This is a defect in the caller, never a recoverable condition.
 */
export class IRInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IRInvariantError";
  }
}

export const formatIRErrorWhere = (err: IRError): string => {
  if (err.location) {
    return `${err.location.filePath}:${err.location.line}:${err.location.column}`;
  }
  if (err.site) {
    const block = err.site.blockLabel ? `/${err.site.blockLabel}` : "";
    return `@${err.site.functionName}${block}`;
  }
  return "<unknown>";
};

export class AggregateIRError extends Error {
  readonly errors: IRError[];

  constructor(errors: IRError[]) {
    super(AggregateIRError.formatMessage(errors));
    this.name = "AggregateIRError";
    this.errors = errors;
  }

  private static formatMessage(errors: IRError[]): string {
    const header = `IR processing failed with ${errors.length} error(s):`;
    const lines = errors.map(
      (err) => `- [${err.code}] ${formatIRErrorWhere(err)} ${err.message}`,
    );
    return [header, ...lines].join("\n");
  }
}
