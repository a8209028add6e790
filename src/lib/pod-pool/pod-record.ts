import {
  parseExportEntry,
  parseFilterEntry,
  parseImportEntry,
  type ExportEntry,
  type FilterEntry,
  type ImportEntry,
} from './entries';
import { EntryDeclarator, getTypeName } from './entry-declarator';
import { InvalidPodError } from './errors';
import type { Pod } from './types';

const podMethodNames = [
  'declareEntries',
  'resolveRefLink',
  'setUp',
  'tearDown',
] as const;

/**
 * A registered pod and its parsed entries, addressed by its index in the
 * pool. Built once at registration; only resolution-phase fields on the
 * entries change afterwards.
 */
export interface PodRecord {
  readonly index: number;
  readonly pod: Pod;
  readonly podType: string;
  readonly importEntries: readonly ImportEntry[];
  readonly exportEntries: readonly ExportEntry[];
  readonly filterEntries: readonly FilterEntry[];
}

/**
 * Pods are instances of a class, not plain objects, arrays or functions
 */
function isClassInstance(value: unknown): boolean {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }

  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype !== null && prototype !== Object.prototype;
}

/**
 * Validate a pod's shape, collect its declarations and parse them into
 * entries. Throws without side effects on the pool.
 *
 * @param nextSequence - Pool-wide counter for filter discovery order;
 *   advanced only if parsing succeeds
 */
export function createPodRecord(
  pod: Pod,
  index: number,
  nextSequence: number,
): PodRecord {
  const podType = getTypeName(pod);

  if (!isClassInstance(pod)) {
    throw new InvalidPodError('wrong shape', { podType });
  }

  if (Object.isFrozen(pod)) {
    throw new InvalidPodError('frozen pod', { podType });
  }

  for (const methodName of podMethodNames) {
    if (typeof Reflect.get(pod, methodName) !== 'function') {
      throw new InvalidPodError('pod method missing', { podType, methodName });
    }
  }

  const declarator = new EntryDeclarator(pod, podType);
  pod.declareEntries(declarator);

  const importEntries: ImportEntry[] = [];
  const exportEntries: ExportEntry[] = [];
  const filterEntries: FilterEntry[] = [];
  let sequence = nextSequence;

  for (const declaration of declarator.getDeclarations()) {
    switch (declaration.role) {
      case 'import':
        importEntries.push(parseImportEntry(declaration, index));
        break;
      case 'export':
        exportEntries.push(parseExportEntry(declaration, index));
        break;
      case 'filter':
        filterEntries.push(parseFilterEntry(declaration, index, sequence++));
        break;
    }
  }

  if (
    importEntries.length + exportEntries.length + filterEntries.length ===
    0
  ) {
    throw new InvalidPodError('no import/export/filter entry', { podType });
  }

  return {
    index,
    pod,
    podType,
    importEntries,
    exportEntries,
    filterEntries,
  };
}
