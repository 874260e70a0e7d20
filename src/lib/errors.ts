import type { MergeState } from "./gitTypes.js";

export type BranchflowErrorKind =
  | "NotARepository"
  | "DirtyWorkingTree"
  | "UnpushedCommitsDeclined"
  | "VcsOperationFailed"
  | "MergeConflict"
  | "NotConfigured"
  | "RemoteError"
  | "NotFound"
  | "InvalidConfig";

export interface BranchflowErrorOptions {
  /** Workflow state the error was raised in */
  state?: MergeState;
  /** HTTP status for RemoteError / NotFound raised by a client */
  status?: number;
  cause?: unknown;
}

/**
 * Error raised by the workflows and clients. `kind` is what callers switch on.
 */
export class BranchflowError extends Error {
  readonly kind: BranchflowErrorKind;
  readonly state?: MergeState;
  readonly status?: number;

  constructor(
    kind: BranchflowErrorKind,
    message: string,
    options: BranchflowErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "BranchflowError";
    this.kind = kind;
    this.state = options.state;
    this.status = options.status;
  }
}

/**
 * A git invocation that exited non-zero or could not be started.
 */
export class GitCommandError extends Error {
  readonly args: string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(
    args: string[],
    exitCode: number | null,
    stderr: string,
    cause?: unknown,
  ) {
    const detail = stderr.trim();
    super(`git ${args.join(" ")} failed${detail ? `: ${detail}` : ""}`, {
      cause,
    });
    this.name = "GitCommandError";
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function isBranchflowError(
  error: unknown,
  kind?: BranchflowErrorKind,
): error is BranchflowError {
  return (
    error instanceof BranchflowError && (kind === undefined || error.kind === kind)
  );
}
