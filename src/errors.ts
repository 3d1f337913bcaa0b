/**
 * snapkeep error classes
 *
 * Every error raised by snapkeep carries a stable `code` for log filtering and
 * keeps its cause chain.
 */

export class SnapkeepError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    options?: {
      code?: string;
      cause?: unknown;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'SnapkeepError';
    this.code = options?.code ?? 'SNAPKEEP_ERROR';
    this.context = options?.context;

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Raised before any destroy command is issued for a name that is not
 * `<dataset>@<snapshot>`. `zfs destroy` takes whole datasets too.
 */
export class NotASnapshotError extends SnapkeepError {
  readonly snapshotName: string;

  constructor(snapshotName: string) {
    super(`Tried to destroy something that is not a snapshot: ${snapshotName}`, {
      code: 'NOT_A_SNAPSHOT',
      context: { name: snapshotName },
    });
    this.name = 'NotASnapshotError';
    this.snapshotName = snapshotName;
  }
}

function commandFailureReason(details: { exitCode: number | null; stderr: string; cause?: unknown }): string {
  if (details.stderr) {
    return details.stderr;
  }
  if (details.cause instanceof Error) {
    return details.cause.message;
  }
  return details.exitCode === null ? 'terminated without exit code' : `exit code ${details.exitCode}`;
}

/**
 * The zfs binary could not be spawned, timed out, or exited non-zero.
 */
export class ZfsCommandError extends SnapkeepError {
  readonly action: string;
  readonly args: readonly string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(
    action: string,
    args: readonly string[],
    details: { exitCode: number | null; stderr: string; cause?: unknown }
  ) {
    super(`zfs ${action} failed: ${commandFailureReason(details)}`, {
      code: 'ZFS_COMMAND_FAILED',
      cause: details.cause,
      context: { action, args: [...args], exitCode: details.exitCode },
    });
    this.name = 'ZfsCommandError';
    this.action = action;
    this.args = args;
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
  }
}

/**
 * zfs printed something snapkeep does not know how to read.
 */
export class ZfsOutputParseError extends SnapkeepError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, { code: 'ZFS_OUTPUT_PARSE_ERROR', context });
    this.name = 'ZfsOutputParseError';
  }
}

/**
 * Looking up a dataset's retention policy failed. Aggregation stops here: a
 * partial decision must never reach `gc`.
 */
export class PolicyLookupError extends SnapkeepError {
  readonly dataset: string;

  constructor(dataset: string, cause: unknown) {
    super(`Failed to read retention policy for ${dataset}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      code: 'POLICY_LOOKUP_FAILED',
      cause,
      context: { dataset },
    });
    this.name = 'PolicyLookupError';
    this.dataset = dataset;
  }
}
