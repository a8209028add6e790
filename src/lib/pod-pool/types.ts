import type { Logger } from '../logger';
import type { EntryDeclarator } from './entry-declarator';
import type { ValueType } from './value-types';

/**
 * An object that declares import/export/filter entries on its own fields.
 * Pods are entry groups; a pod may also hand part of its declarations to a
 * nested object through `declare.group(field)`.
 */
export interface EntryGroup {
  declareEntries(declare: EntryDeclarator<this>): void;
}

/**
 * Contract every pod registered with a PodPool implements
 */
export interface Pod extends EntryGroup {
  /**
   * Resolve a ref link (an id starting with `@`) into a concrete export id.
   * Return undefined if the link is unresolvable. Entry fields have not been
   * initialized when this is called, so don't read them.
   */
  resolveRefLink(refLink: string): string | undefined;

  /**
   * Called during pool setup. All import fields are populated; export fields
   * must be populated before this returns.
   */
  setUp(signal: AbortSignal): Promise<void> | void;

  /**
   * Called during pool teardown while fields are still valid. Fields are
   * reset to their zero values right after this returns.
   */
  tearDown(): Promise<void> | void;
}

export type EntryRole = 'import' | 'export' | 'filter';

/**
 * Reads and writes one field of one object
 */
export interface FieldAccessor {
  get(): unknown;
  set(value: unknown): void;
}

/**
 * A declaration as collected from declareEntries(), before parsing
 */
export interface RawEntryDeclaration {
  role: EntryRole;
  /** Pod type name followed by the group and field names, dot separated */
  path: string;
  /** Object holding the field (the pod itself, or a nested group) */
  holder: object;
  fieldName: string;
  type: ValueType;
  /** Unparsed declaration arguments, comma separated */
  tag: string;
}

export type FilterHook = (signal: AbortSignal) => Promise<void>;

/**
 * PodPool constructor options
 */
export interface PodPoolOptions {
  /** Root logger; the pool logs as its own service */
  logger: Logger;

  /** Service name used for logging and errors (default: 'pod-pool') */
  name?: string;
}

/**
 * Options for PodPool.setUp()
 */
export interface SetUpOptions {
  /**
   * Passed to every setUp() and filter hook. The pool never checks it itself:
   * hooks observe it and throw to abort the setup (default: never aborts)
   */
  signal?: AbortSignal;
}
