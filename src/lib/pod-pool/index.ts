/**
 * PodPool - runtime dependency wiring for long-lived components
 *
 * Pods declare import, export and filter entries on their own fields. The
 * pool binds each import to a matching export, lets filters rewrite exports
 * in priority order, and sets pods up and tears them down in dependency
 * order.
 *
 * @module pod-pool
 */

export { PodPool } from './pod-pool';
export { BasePod } from './base-pod';
export { EntryDeclarator } from './entry-declarator';
export { ValueType, ValueTypes, createRef, type Ref } from './value-types';

export type {
  EntryGroup,
  Pod,
  PodPoolOptions,
  SetUpOptions,
} from './types';

export {
  podPoolErrPrefix,
  podPoolErrTypes,
  podPoolErrCodes,
  isPodPoolError,
  InvalidPodError,
  BadImportEntryError,
  BadExportEntryError,
  BadFilterEntryError,
  CircularDependencyError,
  PodSetupError,
  FilterError,
  PoolStateError,
  type PodPoolErrCode,
  type ErrorDetails,
  type InvalidPodReason,
  type ImportEntryReason,
  type ExportEntryReason,
  type FilterEntryReason,
  type BadEntryError,
  type PoolStateReason,
} from './errors';
