import type { Logger, LoggerService } from '../logger';
import { PoolStateError } from './errors';
import { PodSequence, setUpPods, tearDownFrom } from './pod-lifecycle';
import { createPodRecord, type PodRecord } from './pod-record';
import { resolvePods } from './resolution';
import type { Pod, PodPoolOptions, SetUpOptions } from './types';

/**
 * PodPool - wires pods together through their declared entries and runs
 * their setup and teardown hooks in dependency order
 *
 * Each setUp() resolves the registered pods from scratch:
 * 1. Ref links are resolved and every export is indexed by id or value type
 * 2. Every import and filter is bound to exactly one export
 * 3. Pods are ordered so that an export's owner is set up after the owners
 *    of its filters and before the pods importing it
 *
 * Setup then walks that order. A failure tears down the pods already set up,
 * in reverse order, and leaves the pool ready for another setUp().
 *
 * @example
 * ```typescript
 * const { logger } = Logger.createTestOptimizedLogger();
 * const pool = new PodPool({ logger });
 *
 * pool.registerPod(new GreetingPod());
 * pool.registerPod(new PrinterPod());
 *
 * await pool.setUp({ signal: AbortSignal.timeout(5000) });
 * // ...
 * await pool.tearDown();
 * ```
 */
export class PodPool {
  private readonly name: string;
  private readonly logger: LoggerService;
  private readonly records: PodRecord[] = [];

  /** Discovery counter for filter entries, pool-wide */
  private nextSequence = 0;

  /** Set only after a fully successful setup */
  private sequence: PodSequence | null = null;
  private isSettingUp = false;

  constructor(options: PodPoolOptions) {
    this.name = options.name ?? 'pod-pool';
    this.logger = options.logger.service(this.name);
  }

  /**
   * Parse a pod's entries and add it to the pool
   *
   * @throws {InvalidPodError} If the pod's shape is wrong or it declares no entry
   * @throws {BadImportEntryError | BadExportEntryError | BadFilterEntryError} If an entry is malformed
   * @throws {PoolStateError} If a setup is in progress
   */
  public registerPod(pod: Pod): void {
    if (this.isSettingUp) {
      throw new PoolStateError({
        reason: 'setup in progress',
        poolName: this.name,
      });
    }

    const record = createPodRecord(pod, this.records.length, this.nextSequence);

    this.records.push(record);
    this.nextSequence += record.filterEntries.length;

    this.logger.entity(record.podType).debug('Pod registered', {
      params: {
        imports: record.importEntries.length,
        exports: record.exportEntries.length,
        filters: record.filterEntries.length,
      },
    });
  }

  /**
   * Resolve all pods and set them up in dependency order.
   *
   * If any hook fails, pods already set up are torn down in reverse order
   * and the error is rethrown (PodSetupError or FilterError, with the hook's
   * error as `cause`). The pool can be set up again afterwards.
   */
  public async setUp(options: SetUpOptions = {}): Promise<void> {
    if (this.isSettingUp) {
      throw new PoolStateError({
        reason: 'setup in progress',
        poolName: this.name,
      });
    }

    if (this.sequence !== null) {
      throw new PoolStateError({
        reason: 'already set up',
        poolName: this.name,
      });
    }

    const signal = options.signal ?? new AbortController().signal;
    this.isSettingUp = true;

    try {
      let sequence: PodSequence;

      try {
        sequence = new PodSequence(resolvePods(this.records));
      } catch (error) {
        this.logger.error('Failed to resolve pods', {
          params: { error: error instanceof Error ? error.message : error },
        });
        throw error;
      }

      this.logger.info('Setup order: {{order}}', {
        params: { order: this.describeOrder(sequence) },
      });

      await setUpPods(this.records, sequence, signal, this.logger);

      this.sequence = sequence;
      this.logger.success('All pods set up');
    } finally {
      this.isSettingUp = false;
    }
  }

  /**
   * Tear down all pods in reverse setup order and reset their entry fields.
   * Does nothing unless the last setUp() succeeded. Never throws: teardown
   * hook failures are logged.
   */
  public async tearDown(): Promise<void> {
    if (this.isSettingUp) {
      this.logger.warn('Cannot tear down: setup in progress');
      return;
    }

    const sequence = this.sequence;
    if (sequence === null) {
      return;
    }

    this.sequence = null;
    await tearDownFrom(this.records, sequence, sequence.tail, this.logger);

    this.logger.success('All pods torn down');
  }

  public getPodCount(): number {
    return this.records.length;
  }

  /**
   * Pod type names in the order of the last successful setup (empty when
   * the pool isn't set up)
   */
  public getSetupOrder(): string[] {
    if (this.sequence === null) {
      return [];
    }

    return this.sequence.toArray().map((index) => this.records[index].podType);
  }

  public isSetUp(): boolean {
    return this.sequence !== null;
  }

  private describeOrder(sequence: PodSequence): string {
    return sequence
      .toArray()
      .map((index) => this.records[index].podType)
      .join(' -> ');
  }
}
