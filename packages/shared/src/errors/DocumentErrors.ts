export type StructuralErrorCode =
  | "duplicate_section"
  | "malformed_marker"
  | "invalid_span"
  | "table_schema"
  | "orphaned_lock";

export type DocumentErrorCode = StructuralErrorCode | "parse_failure" | "configuration";

export type DocumentErrorDetails = Record<string, unknown>;

type DocumentErrorInput<TCode extends DocumentErrorCode> = {
  code: TCode;
  message: string;
  details?: DocumentErrorDetails;
  name?: string;
};

export class DocumentError<TCode extends DocumentErrorCode = DocumentErrorCode> extends Error {
  readonly code: TCode;
  readonly details?: DocumentErrorDetails;

  constructor({ code, message, details, name }: DocumentErrorInput<TCode>) {
    super(message);
    this.name = name ?? "DocumentError";
    this.code = code;
    this.details = details;
  }
}

/**
 * Base class for every violation of the marker grammar or span invariants.
 * The validator collects these; edit paths throw the first one.
 */
export class StructuralError extends DocumentError<StructuralErrorCode> {}

export class DuplicateSectionError extends StructuralError {
  readonly sectionId: string;
  readonly lineNumbers: number[];

  constructor(sectionId: string, lineNumbers: number[]) {
    super({
      code: "duplicate_section",
      message: `Duplicate section '${sectionId}' at lines ${lineNumbers.join(", ")}`,
      details: { sectionId, lineNumbers },
      name: "DuplicateSectionError",
    });
    this.sectionId = sectionId;
    this.lineNumbers = [...lineNumbers];
  }
}

export class MalformedMarkerError extends StructuralError {
  readonly lineNumber?: number;
  readonly lineContent: string;
  readonly reason: string;

  constructor(lineNumber: number | undefined, lineContent: string, reason: string) {
    const where = lineNumber === undefined ? "" : `Line ${lineNumber}: `;
    super({
      code: "malformed_marker",
      message: `${where}${reason} (${lineContent.trim()})`,
      details: { lineNumber, lineContent, reason },
      name: "MalformedMarkerError",
    });
    this.lineNumber = lineNumber;
    this.lineContent = lineContent;
    this.reason = reason;
  }
}

export class InvalidSpanError extends StructuralError {
  readonly regionId: string;
  readonly reason: string;

  constructor(regionId: string, reason: string) {
    super({
      code: "invalid_span",
      message: `Invalid span for '${regionId}': ${reason}`,
      details: { regionId, reason },
      name: "InvalidSpanError",
    });
    this.regionId = regionId;
    this.reason = reason;
  }
}

export class TableSchemaError extends StructuralError {
  readonly tableId: string;
  readonly reason: string;
  readonly lineNumber?: number;

  constructor(tableId: string, reason: string, lineNumber?: number) {
    const where = lineNumber === undefined ? "" : ` (line ${lineNumber})`;
    super({
      code: "table_schema",
      message: `Table '${tableId}'${where}: ${reason}`,
      details: { tableId, reason, lineNumber },
      name: "TableSchemaError",
    });
    this.tableId = tableId;
    this.reason = reason;
    this.lineNumber = lineNumber;
  }
}

export class OrphanedLockError extends StructuralError {
  readonly lockId: string;
  readonly lineNumber: number;

  constructor(lockId: string, lineNumber: number) {
    super({
      code: "orphaned_lock",
      message: `Line ${lineNumber}: lock marker references missing section '${lockId}'`,
      details: { lockId, lineNumber },
      name: "OrphanedLockError",
    });
    this.lockId = lockId;
    this.lineNumber = lineNumber;
  }
}

export class ParseFailure extends DocumentError<"parse_failure"> {
  constructor(message: string, details?: DocumentErrorDetails) {
    super({ code: "parse_failure", message, details, name: "ParseFailure" });
  }
}

export class ConfigurationError extends DocumentError<"configuration"> {
  constructor(message: string, details?: DocumentErrorDetails) {
    super({ code: "configuration", message, details, name: "ConfigurationError" });
  }
}

export const isStructuralError = (error: unknown): error is StructuralError => error instanceof StructuralError;
