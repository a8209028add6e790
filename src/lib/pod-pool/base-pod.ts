import type { EntryDeclarator } from './entry-declarator';
import type { Pod } from './types';

/**
 * Abstract base class for pods
 *
 * Pods extend this class and implement declareEntries(). The other pod
 * methods default to no-ops, so a pod only overrides the hooks it needs.
 *
 * Entry fields must be public own properties initialized in the class body
 * (a class field with an initializer), so the pool can find and write them.
 *
 * @example
 * ```typescript
 * const Database = ValueType.define<Database | null>('Database', null);
 *
 * class DatabasePod extends BasePod {
 *   public config = '';
 *   public db: Database | null = null;
 *
 *   public declareEntries(declare: EntryDeclarator<this>): void {
 *     declare
 *       .import('config', ValueTypes.string, 'database_url')
 *       .export('db', Database);
 *   }
 *
 *   public async setUp(signal: AbortSignal): Promise<void> {
 *     this.db = await connect(this.config, { signal });
 *   }
 *
 *   public async tearDown(): Promise<void> {
 *     await this.db?.close();
 *   }
 * }
 * ```
 */
export abstract class BasePod implements Pod {
  public abstract declareEntries(declare: EntryDeclarator<this>): void;

  /**
   * Resolve a ref link declared by this pod. Unresolvable by default.
   */
  public resolveRefLink(_refLink: string): string | undefined {
    return undefined;
  }

  public setUp(_signal: AbortSignal): Promise<void> | void {}

  public tearDown(): Promise<void> | void {}
}
