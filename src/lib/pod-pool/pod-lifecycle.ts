import type { LoggerService } from '../logger';
import { FilterError, PodSetupError } from './errors';
import type { PodRecord } from './pod-record';

/**
 * Pods linked in setup order. Setup walks it forward from the head,
 * teardown and rollback walk it backward.
 */
export class PodSequence {
  public readonly head: number | null;
  public readonly tail: number | null;
  private readonly nextIndexes = new Map<number, number>();
  private readonly prevIndexes = new Map<number, number>();

  constructor(order: readonly number[]) {
    this.head = order.length > 0 ? order[0] : null;
    this.tail = order.length > 0 ? order[order.length - 1] : null;

    for (let i = 1; i < order.length; i++) {
      this.nextIndexes.set(order[i - 1], order[i]);
      this.prevIndexes.set(order[i], order[i - 1]);
    }
  }

  public next(podIndex: number): number | null {
    return this.nextIndexes.get(podIndex) ?? null;
  }

  public prev(podIndex: number): number | null {
    return this.prevIndexes.get(podIndex) ?? null;
  }

  /**
   * Pod indexes from head to tail
   */
  public toArray(): number[] {
    const indexes: number[] = [];

    for (let index = this.head; index !== null; index = this.next(index)) {
      indexes.push(index);
    }

    return indexes;
  }
}

/**
 * Run a pod's teardown hook, then reset every entry field to its zero value.
 * Hook failures are logged, never thrown.
 */
export async function tearDownPod(
  record: PodRecord,
  logger: LoggerService,
): Promise<void> {
  const podLogger = logger.entity(record.podType);

  try {
    await record.pod.tearDown();
  } catch (error) {
    try {
      podLogger.errorObject('Pod teardown failed', error);
    } catch {
      podLogger.error('Pod teardown failed (error could not be rendered)');
    }
  }

  for (const entry of record.importEntries) {
    entry.clear();
  }

  for (const entry of record.exportEntries) {
    entry.clear();
  }

  for (const entry of record.filterEntries) {
    entry.clear();
  }

  podLogger.debug('Pod torn down');
}

/**
 * Tear down `fromIndex` and every pod before it, walking backward
 */
export async function tearDownFrom(
  records: readonly PodRecord[],
  sequence: PodSequence,
  fromIndex: number | null,
  logger: LoggerService,
): Promise<void> {
  for (let index = fromIndex; index !== null; index = sequence.prev(index)) {
    await tearDownPod(records[index], logger);
  }
}

/**
 * Copy imports in, run the pod's setup hook, then run the filters attached
 * to each of its exports. A failing filter tears this pod down before the
 * error leaves.
 */
async function setUpPod(
  record: PodRecord,
  signal: AbortSignal,
  logger: LoggerService,
): Promise<void> {
  const podLogger = logger.entity(record.podType);

  for (const importEntry of record.importEntries) {
    if (importEntry.exportEntry) {
      importEntry.value = importEntry.exportEntry.value;
    }
  }

  try {
    await record.pod.setUp(signal);
  } catch (error) {
    throw new PodSetupError({ podType: record.podType }, error);
  }

  for (const exportEntry of record.exportEntries) {
    for (const filterEntry of exportEntry.filterEntries) {
      filterEntry.value = exportEntry.createRef();
    }

    for (const filterEntry of exportEntry.filterEntries) {
      try {
        await filterEntry.hook(signal);
      } catch (error) {
        await tearDownPod(record, logger);
        throw new FilterError(
          { podType: record.podType, filterEntryPath: filterEntry.path },
          error,
        );
      }
    }
  }

  podLogger.debug('Pod set up');
}

/**
 * Set up every pod in sequence order. On the first failure, pods that
 * completed are torn down in reverse order and the error is rethrown.
 */
export async function setUpPods(
  records: readonly PodRecord[],
  sequence: PodSequence,
  signal: AbortSignal,
  logger: LoggerService,
): Promise<void> {
  for (let index = sequence.head; index !== null; index = sequence.next(index)) {
    try {
      await setUpPod(records[index], signal, logger);
    } catch (error) {
      const completed = sequence.prev(index);

      if (completed !== null) {
        logger.warn('Setup failed at {{podType}}, rolling back', {
          params: { podType: records[index].podType },
        });
      }

      await tearDownFrom(records, sequence, completed, logger);
      throw error;
    }
  }
}
