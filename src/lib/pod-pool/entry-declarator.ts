import { InvalidPodError } from './errors';
import type { EntryGroup, EntryRole, RawEntryDeclaration } from './types';
import type { ValueType } from './value-types';

/**
 * Name of the class an object was constructed from, for entry paths and
 * diagnostics
 */
export function getTypeName(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  if (typeof value !== 'object') {
    return typeof value;
  }

  const constructor: unknown = Reflect.get(value, 'constructor');

  if (typeof constructor === 'function' && constructor.name) {
    return constructor.name;
  }

  return 'Object';
}

function isEntryGroup(value: unknown): value is EntryGroup {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'declareEntries') === 'function'
  );
}

/**
 * Collects the entry declarations of one pod (or one nested group of a pod).
 *
 * Handed to `declareEntries()`. Each call records which field plays which
 * role; the arguments are parsed and validated later, when the pod is
 * registered.
 *
 * Tag grammar:
 * - import / export: `id` (empty = match by value type)
 * - filter: `id,methodName,priority` (priority is a signed integer, higher runs first)
 * - an id starting with `@` is a ref link, resolved through the pod's resolveRefLink()
 *
 * @example
 * ```typescript
 * class GreetingPod extends BasePod {
 *   public greeting = '';
 *   public excited: Ref<string> | null = null;
 *
 *   public declareEntries(declare: EntryDeclarator<this>): void {
 *     declare
 *       .export('greeting', ValueTypes.string, 'the_greeting')
 *       .filter('excited', ValueType.ref(ValueTypes.string), 'the_greeting,shout,10');
 *   }
 *
 *   public shout(): void {
 *     if (this.excited) {
 *       this.excited.value += '!';
 *     }
 *   }
 * }
 * ```
 */
export class EntryDeclarator<T extends object> {
  private readonly holder: T;
  private readonly pathPrefix: string;
  private readonly declarations: RawEntryDeclaration[];
  private readonly visitedHolders: Set<object>;

  constructor(
    holder: T,
    pathPrefix: string,
    declarations: RawEntryDeclaration[] = [],
    visitedHolders: Set<object> = new Set([holder]),
  ) {
    this.holder = holder;
    this.pathPrefix = pathPrefix;
    this.declarations = declarations;
    this.visitedHolders = visitedHolders;
  }

  /**
   * Declare a field to be filled from a matching export before setUp()
   */
  public import(fieldName: keyof T & string, type: ValueType, tag = ''): this {
    return this.declare('import', fieldName, type, tag);
  }

  /**
   * Declare a field the pod fills in setUp() for others to import or filter
   */
  public export(fieldName: keyof T & string, type: ValueType, tag = ''): this {
    return this.declare('export', fieldName, type, tag);
  }

  /**
   * Declare a Ref field and the method that rewrites the matching export
   * through it. `type` must be a ref type (ValueType.ref()).
   */
  public filter(fieldName: keyof T & string, type: ValueType, tag: string): this {
    return this.declare('filter', fieldName, type, tag);
  }

  /**
   * Descend into the entry group held by `fieldName`; its entries get the
   * field name inserted into their paths
   */
  public group(fieldName: keyof T & string): this {
    const groupPath = `${this.pathPrefix}.${fieldName}`;
    const group: unknown = Reflect.get(this.holder, fieldName);

    if (!isEntryGroup(group) || this.visitedHolders.has(group)) {
      throw new InvalidPodError('invalid entry group', {
        groupPath,
        groupType: getTypeName(group),
      });
    }

    this.visitedHolders.add(group);
    group.declareEntries(
      new EntryDeclarator(
        group,
        groupPath,
        this.declarations,
        this.visitedHolders,
      ),
    );

    return this;
  }

  /**
   * Declarations collected so far, in declaration order
   */
  public getDeclarations(): readonly RawEntryDeclaration[] {
    return this.declarations;
  }

  private declare(
    role: EntryRole,
    fieldName: string,
    type: ValueType,
    tag: string,
  ): this {
    this.declarations.push({
      role,
      path: `${this.pathPrefix}.${fieldName}`,
      holder: this.holder,
      fieldName,
      type,
      tag,
    });

    return this;
  }
}
