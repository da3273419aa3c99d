/**
 * Failure kinds recorded on a file's outcome. Every one of them is scoped to
 * a single file: the batch records it and moves on.
 */
export const FAILURE_KINDS = [
  "UnreadablePdf",
  "NoPages",
  "NoTitleFound",
  "FilesystemFault",
  "CollisionExhausted",
] as const;

export type FailureKind = (typeof FAILURE_KINDS)[number];

export class RenameError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RenameError";
    this.kind = kind;
  }
}

/** Raised before any file is touched: bad input folder, unusable output folder. */
export class BatchSetupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BatchSetupError";
  }
}

/** Pull a printable message out of anything that was thrown */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/** Turn a Node filesystem error into a one-line reason for the run log */
export function describeFsError(err: unknown): string {
  switch (errorCode(err)) {
    case "EACCES":
    case "EPERM":
      return "Permission denied";
    case "ENOSPC":
      return "Disk full";
    case "ENAMETOOLONG":
      return "Path too long";
    case "EROFS":
      return "Destination is read-only";
    case "ENOENT":
      return "File no longer exists";
    case "EXDEV":
      return "Cannot move across devices";
    default:
      return errorMessage(err);
  }
}
