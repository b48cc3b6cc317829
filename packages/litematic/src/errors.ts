import { NbtError } from "@litekit/nbt";

export type DiagnosticSeverity = "warning" | "error";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
}

export type LitematicErrorCode =
  | "LITEMATIC_NBT_MALFORMED"
  | "LITEMATIC_VERSION_UNSUPPORTED"
  | "LITEMATIC_FIELD_MISSING"
  | "LITEMATIC_FIELD_WRONG_TAG"
  | "LITEMATIC_BLOCK_STATE_MALFORMED"
  | "LITEMATIC_UNKNOWN";

export interface LitematicErrorDetails {
  field?: string;
  region?: string;
  version?: number;
  cause?: unknown;
}

export class LitematicError extends Error {
  public readonly code: LitematicErrorCode;
  public readonly field?: string;
  public readonly region?: string;
  public readonly version?: number;
  /** Message without the region prefix. */
  public readonly detail: string;

  public constructor(code: LitematicErrorCode, detail: string, details: LitematicErrorDetails = {}) {
    super(
      details.region === undefined ? detail : `Region "${details.region}": ${detail}`,
      details.cause === undefined ? undefined : { cause: details.cause }
    );
    this.name = "LitematicError";
    this.code = code;
    this.detail = detail;
    this.field = details.field;
    this.region = details.region;
    this.version = details.version;
  }

  public toDiagnostic(): Diagnostic {
    return { code: this.code, severity: "error", message: this.message };
  }
}

function fromNbtError(error: NbtError, region: string | undefined): LitematicError {
  const details = { field: error.field, region, cause: error };
  switch (error.code) {
    case "NBT_MISSING_FIELD":
      return new LitematicError("LITEMATIC_FIELD_MISSING", error.message, details);
    case "NBT_WRONG_TAG":
      return new LitematicError("LITEMATIC_FIELD_WRONG_TAG", error.message, details);
    default:
      return new LitematicError("LITEMATIC_NBT_MALFORMED", `Invalid NBT: ${error.message}`, details);
  }
}

/** Maps anything thrown while decoding onto the error taxonomy, tagging it with the region when known. */
export function toLitematicError(error: unknown, region?: string): LitematicError {
  if (error instanceof LitematicError) {
    if (region === undefined || error.region !== undefined) return error;
    return new LitematicError(error.code, error.detail, {
      field: error.field,
      region,
      version: error.version,
      cause: error.cause
    });
  }
  if (error instanceof NbtError) {
    return fromNbtError(error, region);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new LitematicError("LITEMATIC_UNKNOWN", message, { region, cause: error });
}

/** Runs `read`, prefixing the field of any tree lookup failure with `prefix.`. */
export function withFieldPrefix<T>(prefix: string, read: () => T): T {
  try {
    return read();
  } catch (error) {
    if (error instanceof NbtError && error.field !== undefined) {
      const field = `${prefix}.${error.field}`;
      throw new NbtError(error.code, error.message.replace(`"${error.field}"`, `"${field}"`), { field, cause: error });
    }
    throw error;
  }
}
