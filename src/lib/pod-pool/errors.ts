/**
 * Error prefix constant for all pod pool errors
 */
export const podPoolErrPrefix = 'PodPoolErr';

/**
 * Error type constants
 */
export const podPoolErrTypes = {
  Pod: 'Pod',
  Entry: 'Entry',
  Dependency: 'Dependency',
  Lifecycle: 'Lifecycle',
} as const;

/**
 * Error code constants
 */
export const podPoolErrCodes = {
  InvalidPod: 'InvalidPod',
  BadImportEntry: 'BadImportEntry',
  BadExportEntry: 'BadExportEntry',
  BadFilterEntry: 'BadFilterEntry',
  CircularDependency: 'CircularDependency',
  SetupFailed: 'SetupFailed',
  FilterFailed: 'FilterFailed',
  InvalidState: 'InvalidState',
} as const;

export type PodPoolErrCode =
  (typeof podPoolErrCodes)[keyof typeof podPoolErrCodes];

/**
 * Ordered `key="value"` pairs appended to an error message
 */
export type ErrorDetails = Record<string, string>;

function formatMessage(
  kind: string,
  reason: string,
  details: ErrorDetails,
): string {
  const pairs = Object.entries(details).map(
    ([key, value]) => `${key}=${JSON.stringify(value)}`,
  );

  return pairs.length > 0
    ? `${kind}: ${reason}; ${pairs.join(' ')}`
    : `${kind}: ${reason}`;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export type InvalidPodReason =
  | 'wrong shape'
  | 'frozen pod'
  | 'pod method missing'
  | 'invalid entry group'
  | 'no import/export/filter entry';

/**
 * Error thrown at registration when a pod can't be wired at all
 *
 * Common causes:
 * - The pod isn't a mutable object
 * - A required pod method is missing
 * - The pod declares no import, export or filter entry
 */
export class InvalidPodError extends Error {
  public errPrefix = podPoolErrPrefix;
  public errType = podPoolErrTypes.Pod;
  public errCode = podPoolErrCodes.InvalidPod;
  public additionalInfo: { reason: InvalidPodReason; details: ErrorDetails };

  constructor(reason: InvalidPodReason, details: ErrorDetails) {
    super(formatMessage('invalid pod', reason, details));
    this.name = 'InvalidPodError';
    this.additionalInfo = { reason, details };
  }
}

type CommonEntryReason = 'field unexported' | 'unresolvable ref link';

type LookupEntryReason =
  | 'export entry not found by field type'
  | 'export entry not found by ref id'
  | 'field type mismatch';

export type ImportEntryReason = CommonEntryReason | LookupEntryReason;

export type ExportEntryReason =
  | CommonEntryReason
  | 'duplicate field type'
  | 'duplicate ref id';

export type FilterEntryReason =
  | CommonEntryReason
  | LookupEntryReason
  | 'non-ref field type'
  | 'missing argument `methodName`'
  | 'method undefined or unexported'
  | 'function type mismatch'
  | 'missing argument `priority`'
  | 'priority parse failed';

/**
 * Error thrown when an import entry is malformed or can't be bound to an export
 */
export class BadImportEntryError extends Error {
  public errPrefix = podPoolErrPrefix;
  public errType = podPoolErrTypes.Entry;
  public errCode = podPoolErrCodes.BadImportEntry;
  public additionalInfo: { reason: ImportEntryReason; details: ErrorDetails };

  constructor(reason: ImportEntryReason, details: ErrorDetails) {
    super(formatMessage('bad import entry', reason, details));
    this.name = 'BadImportEntryError';
    this.additionalInfo = { reason, details };
  }
}

/**
 * Error thrown when an export entry is malformed or collides with another export
 */
export class BadExportEntryError extends Error {
  public errPrefix = podPoolErrPrefix;
  public errType = podPoolErrTypes.Entry;
  public errCode = podPoolErrCodes.BadExportEntry;
  public additionalInfo: { reason: ExportEntryReason; details: ErrorDetails };

  constructor(reason: ExportEntryReason, details: ErrorDetails) {
    super(formatMessage('bad export entry', reason, details));
    this.name = 'BadExportEntryError';
    this.additionalInfo = { reason, details };
  }
}

/**
 * Error thrown when a filter entry is malformed or can't be bound to an export
 */
export class BadFilterEntryError extends Error {
  public errPrefix = podPoolErrPrefix;
  public errType = podPoolErrTypes.Entry;
  public errCode = podPoolErrCodes.BadFilterEntry;
  public additionalInfo: { reason: FilterEntryReason; details: ErrorDetails };

  constructor(reason: FilterEntryReason, details: ErrorDetails) {
    super(formatMessage('bad filter entry', reason, details));
    this.name = 'BadFilterEntryError';
    this.additionalInfo = { reason, details };
  }
}

export type BadEntryError =
  | BadImportEntryError
  | BadExportEntryError
  | BadFilterEntryError;

/**
 * Error thrown when pods depend on each other in a cycle
 *
 * The stack trace lists, per visited pod, the entry that led into it and the
 * entry being followed out of it: `A.Foo ==> B.Foo ... B.Bar ==> A.Bar`
 */
export class CircularDependencyError extends Error {
  public errPrefix = podPoolErrPrefix;
  public errType = podPoolErrTypes.Dependency;
  public errCode = podPoolErrCodes.CircularDependency;
  public additionalInfo: { stackTrace: string };

  constructor(additionalInfo: { stackTrace: string }) {
    super(
      formatMessage('pod circular dependency', 'cycle detected', {
        stackTrace: additionalInfo.stackTrace,
      }),
    );
    this.name = 'CircularDependencyError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown when a pod's setUp() hook fails
 *
 * This wraps the underlying error and names the pod that failed
 */
export class PodSetupError extends Error {
  public errPrefix = podPoolErrPrefix;
  public errType = podPoolErrTypes.Lifecycle;
  public errCode = podPoolErrCodes.SetupFailed;
  public additionalInfo: { podType: string };

  constructor(additionalInfo: { podType: string }, cause: unknown) {
    super(
      `${formatMessage('pod setup failed', 'hook error', additionalInfo)} | ${describeCause(cause)}`,
      { cause },
    );
    this.name = 'PodSetupError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown when a filter hook fails while post-processing an export
 */
export class FilterError extends Error {
  public errPrefix = podPoolErrPrefix;
  public errType = podPoolErrTypes.Lifecycle;
  public errCode = podPoolErrCodes.FilterFailed;
  public additionalInfo: { podType: string; filterEntryPath: string };

  constructor(
    additionalInfo: { podType: string; filterEntryPath: string },
    cause: unknown,
  ) {
    super(
      `${formatMessage('filter function failed', 'hook error', additionalInfo)} | ${describeCause(cause)}`,
      { cause },
    );
    this.name = 'FilterError';
    this.additionalInfo = additionalInfo;
  }
}

export type PoolStateReason = 'already set up' | 'setup in progress';

/**
 * Error thrown when a pool operation is called in a state that can't accept it
 */
export class PoolStateError extends Error {
  public errPrefix = podPoolErrPrefix;
  public errType = podPoolErrTypes.Lifecycle;
  public errCode = podPoolErrCodes.InvalidState;
  public additionalInfo: { reason: PoolStateReason; poolName: string };

  constructor(additionalInfo: { reason: PoolStateReason; poolName: string }) {
    super(
      formatMessage('invalid pool state', additionalInfo.reason, {
        poolName: additionalInfo.poolName,
      }),
    );
    this.name = 'PoolStateError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Narrow an unknown error to one raised by the pod pool
 */
export function isPodPoolError(
  error: unknown,
  errCode?: PodPoolErrCode,
): error is
  | InvalidPodError
  | BadEntryError
  | CircularDependencyError
  | PodSetupError
  | FilterError
  | PoolStateError {
  if (
    !(
      error instanceof InvalidPodError ||
      error instanceof BadImportEntryError ||
      error instanceof BadExportEntryError ||
      error instanceof BadFilterEntryError ||
      error instanceof CircularDependencyError ||
      error instanceof PodSetupError ||
      error instanceof FilterError ||
      error instanceof PoolStateError
    )
  ) {
    return false;
  }

  return errCode === undefined || error.errCode === errCode;
}
