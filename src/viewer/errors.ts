export type ConfigurationErrorCode =
  | "InvalidBinding"
  | "InvalidOption"
  | "DuplicateBinding"
  | "EmptyInput"
  | "OutOfRangeStart"
  | "NotADirectory"
  | "MissingPath";

/**
 * Raised while the session is being set up. Always fatal: the screen is
 * never opened once one of these escapes.
 */
export class ConfigurationError extends Error {
  readonly code: ConfigurationErrorCode;
  readonly value: string | undefined;

  constructor(code: ConfigurationErrorCode, message: string, value?: string) {
    super(message);
    this.name = "ConfigurationError";
    this.code = code;
    this.value = value;
  }
}

/** A bound action failed. Reported to the user; the session keeps going. */
export class RuntimeActionError extends Error {
  readonly actionKind: string;
  readonly path: string;

  constructor(actionKind: string, path: string, cause: unknown) {
    super(`${actionKind} failed for ${path}: ${getErrorMessage(cause)}`, {
      cause,
    });
    this.name = "RuntimeActionError";
    this.actionKind = actionKind;
    this.path = path;
  }
}

export function getErrorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === "string") return value;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

// Node's fs errors carry a string code ("ENOENT", "EACCES", ...).
export function getErrorCode(value: unknown): string | undefined {
  if (value instanceof Error && "code" in value) {
    const code = value.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
