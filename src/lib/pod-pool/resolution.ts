import type { ExportEntry } from './entries';
import {
  BadExportEntryError,
  BadFilterEntryError,
  BadImportEntryError,
  CircularDependencyError,
} from './errors';
import type { PodRecord } from './pod-record';
import { ValueType } from './value-types';

/**
 * Export lookup tables for phases 1 and 2. An export is indexed by id when
 * it has one, by value type otherwise, never both.
 */
export class ExportTable {
  private readonly byID = new Map<string, ExportEntry>();
  private readonly byType = new Map<ValueType, ExportEntry>();

  /**
   * @returns the export already registered under the same key, or null
   */
  public add(exportEntry: ExportEntry): ExportEntry | null {
    if (exportEntry.id === '') {
      const existing = this.byType.get(exportEntry.type);
      if (existing) {
        return existing;
      }
      this.byType.set(exportEntry.type, exportEntry);
      return null;
    }

    const existing = this.byID.get(exportEntry.id);
    if (existing) {
      return existing;
    }
    this.byID.set(exportEntry.id, exportEntry);
    return null;
  }

  public findByID(id: string): ExportEntry | undefined {
    return this.byID.get(id);
  }

  public findByType(type: ValueType): ExportEntry | undefined {
    return this.byType.get(type);
  }
}

/**
 * Phase 1: resolve ref links on every entry and register every export
 */
export function resolveLinksAndExports(
  records: readonly PodRecord[],
  table: ExportTable,
): void {
  for (const record of records) {
    for (const importEntry of record.importEntries) {
      const refLink = importEntry.resolveRefLink(record.pod);
      if (refLink !== null) {
        throw new BadImportEntryError('unresolvable ref link', {
          importEntryPath: importEntry.path,
          refLink,
        });
      }
    }

    for (const exportEntry of record.exportEntries) {
      const refLink = exportEntry.resolveRefLink(record.pod);
      if (refLink !== null) {
        throw new BadExportEntryError('unresolvable ref link', {
          exportEntryPath: exportEntry.path,
          refLink,
        });
      }

      const conflicting = table.add(exportEntry);
      if (conflicting === null) {
        continue;
      }

      if (exportEntry.id === '') {
        throw new BadExportEntryError('duplicate field type', {
          exportEntryPath: exportEntry.path,
          conflictingExportEntryPath: conflicting.path,
          fieldType: exportEntry.type.name,
        });
      }

      throw new BadExportEntryError('duplicate ref id', {
        exportEntryPath: exportEntry.path,
        conflictingExportEntryPath: conflicting.path,
        refID: exportEntry.id,
      });
    }

    for (const filterEntry of record.filterEntries) {
      const refLink = filterEntry.resolveRefLink(record.pod);
      if (refLink !== null) {
        throw new BadFilterEntryError('unresolvable ref link', {
          filterEntryPath: filterEntry.path,
          refLink,
        });
      }
    }
  }
}

/**
 * Phase 2: bind every import and filter to exactly one export
 */
export function bindImportsAndFilters(
  records: readonly PodRecord[],
  table: ExportTable,
): void {
  for (const record of records) {
    for (const importEntry of record.importEntries) {
      importEntry.exportEntry = null;

      if (importEntry.id === '') {
        const exportEntry = table.findByType(importEntry.type);
        if (!exportEntry) {
          throw new BadImportEntryError('export entry not found by field type', {
            importEntryPath: importEntry.path,
            fieldType: importEntry.type.name,
          });
        }
        importEntry.exportEntry = exportEntry;
        continue;
      }

      const exportEntry = table.findByID(importEntry.id);
      if (!exportEntry) {
        throw new BadImportEntryError('export entry not found by ref id', {
          importEntryPath: importEntry.path,
          refID: importEntry.id,
        });
      }

      if (importEntry.type !== exportEntry.type) {
        throw new BadImportEntryError('field type mismatch', {
          importEntryPath: importEntry.path,
          fieldType: importEntry.type.name,
          expectedFieldType: exportEntry.type.name,
          exportEntryPath: exportEntry.path,
        });
      }

      importEntry.exportEntry = exportEntry;
    }

    for (const filterEntry of record.filterEntries) {
      let exportEntry: ExportEntry | undefined;

      if (filterEntry.id === '') {
        exportEntry = table.findByType(filterEntry.valueType);
        if (!exportEntry) {
          throw new BadFilterEntryError('export entry not found by field type', {
            filterEntryPath: filterEntry.path,
            fieldType: filterEntry.valueType.name,
          });
        }
      } else {
        exportEntry = table.findByID(filterEntry.id);
        if (!exportEntry) {
          throw new BadFilterEntryError('export entry not found by ref id', {
            filterEntryPath: filterEntry.path,
            refID: filterEntry.id,
          });
        }

        const expectedFieldType = ValueType.ref(exportEntry.type);
        if (filterEntry.type !== expectedFieldType) {
          throw new BadFilterEntryError('field type mismatch', {
            filterEntryPath: filterEntry.path,
            fieldType: filterEntry.type.name,
            expectedFieldType: expectedFieldType.name,
            exportEntryPath: exportEntry.path,
          });
        }
      }

      exportEntry.attachFilter(filterEntry);
    }
  }
}

type PodVisitState = 'entered' | 'left';

interface OrderingFrame {
  podIndex: number;
  /** Entry (in this pod) whose dependency led here */
  triggerEntryPath: string;
  /** Entry (in this pod) currently being followed */
  activeEntryPath: string;
}

/**
 * Phase 3 state: per-pod visit markers, the DFS frame stack and the
 * completion order
 */
class OrderingContext {
  private readonly states = new Map<number, PodVisitState>();
  private readonly stack: OrderingFrame[] = [];
  private readonly order: number[] = [];
  private readonly ordered = new Set<number>();

  /**
   * Push a frame for the pod and mark it entered
   *
   * @returns the pod's state before entering
   */
  public enterPod(
    podIndex: number,
    triggerEntryPath: string,
  ): PodVisitState | undefined {
    this.stack.push({ podIndex, triggerEntryPath, activeEntryPath: '' });

    const previous = this.states.get(podIndex);
    this.states.set(podIndex, 'entered');
    return previous;
  }

  public leavePod(): void {
    const frame = this.stack.pop();
    if (frame) {
      this.states.set(frame.podIndex, 'left');
    }
  }

  public setActiveEntryPath(activeEntryPath: string): void {
    const frame = this.stack[this.stack.length - 1];
    if (frame) {
      frame.activeEntryPath = activeEntryPath;
    }
  }

  public appendPod(podIndex: number): void {
    if (this.ordered.has(podIndex)) {
      return;
    }
    this.ordered.add(podIndex);
    this.order.push(podIndex);
  }

  /**
   * `trigger ... active` per frame, frames joined by ` ==> `
   */
  public dumpStack(): string {
    return this.stack
      .map((frame) =>
        [frame.triggerEntryPath, frame.activeEntryPath]
          .filter((path) => path !== '')
          .join(' ... '),
      )
      .join(' ==> ');
  }

  public getOrder(): number[] {
    return [...this.order];
  }
}

/**
 * Phase 3: depth-first walk of the pod dependency graph. A pod depends on
 * the owner of every export it imports, and an export's owner depends on
 * the owner of every filter attached to it (filters the pod owns itself are
 * skipped here, they still run during setup).
 *
 * @returns pod indexes in completion order, a valid setup order
 */
export function orderPods(records: readonly PodRecord[]): number[] {
  const context = new OrderingContext();

  const visit = (record: PodRecord, triggerEntryPath: string): void => {
    const previous = context.enterPod(record.index, triggerEntryPath);

    if (previous === 'left') {
      context.leavePod();
      return;
    }

    if (previous === 'entered') {
      throw new CircularDependencyError({ stackTrace: context.dumpStack() });
    }

    for (const importEntry of record.importEntries) {
      context.setActiveEntryPath(importEntry.path);
      const exportEntry = importEntry.exportEntry;
      if (exportEntry) {
        visit(records[exportEntry.podIndex], exportEntry.path);
      }
    }

    for (const exportEntry of record.exportEntries) {
      context.setActiveEntryPath(exportEntry.path);

      for (const filterEntry of exportEntry.filterEntries) {
        if (filterEntry.podIndex === record.index) {
          continue;
        }
        visit(records[filterEntry.podIndex], filterEntry.path);
      }
    }

    context.leavePod();
    context.appendPod(record.index);
  };

  for (const record of records) {
    visit(record, '');
  }

  return context.getOrder();
}

/**
 * Run all three phases over the pool's pods
 *
 * @returns pod indexes in setup order
 */
export function resolvePods(records: readonly PodRecord[]): number[] {
  const table = new ExportTable();

  resolveLinksAndExports(records, table);
  bindImportsAndFilters(records, table);

  return orderPods(records);
}
