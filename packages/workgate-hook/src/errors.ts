export type ErrorKind = "malformed-input" | "corrupted-document" | "state-lock" | "external-tool";

export class WorkgateError extends Error {
  readonly kind: ErrorKind;

  constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
    super(message, options);
    this.name = "WorkgateError";
    this.kind = kind;
  }
}

/** The request payload could not be parsed or lacks a field the gate needs. */
export class MalformedInputError extends WorkgateError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "malformed-input", options);
    this.name = "MalformedInputError";
  }
}

export type DocumentName = "state" | "config";

export class CorruptedDocumentError extends WorkgateError {
  readonly document: DocumentName;
  readonly filePath: string;

  constructor(document: DocumentName, filePath: string, detail: string, options?: ErrorOptions) {
    super(`${document === "state" ? "State" : "Policy"} file ${filePath} is corrupted: ${detail}`, "corrupted-document", options);
    this.name = "CorruptedDocumentError";
    this.document = document;
    this.filePath = filePath;
  }

  get remediation(): string {
    return this.document === "state"
      ? `Restore ${this.filePath} from a backup, or delete it to restart in Discussion mode.`
      : `Fix or remove ${this.filePath}; the built-in defaults apply when it is absent.`;
  }
}

export class StateLockError extends WorkgateError {
  constructor(lockPath: string, waitedMs: number) {
    super(`Could not lock ${lockPath} within ${waitedMs}ms; another hook invocation is still writing state.`, "state-lock");
    this.name = "StateLockError";
  }
}

export class GitUnavailableError extends WorkgateError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "external-tool", options);
    this.name = "GitUnavailableError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Guidance printed under a fatal error, when the error carries any. */
export function remediationFor(error: unknown): string | null {
  if (error instanceof CorruptedDocumentError) return error.remediation;
  if (error instanceof StateLockError) return "Retry the tool call; remove the lock file if no other hook is running.";
  if (error instanceof MalformedInputError) return "The host must send a JSON object naming the tool and its input.";
  return null;
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
