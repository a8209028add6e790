/**
 * Indirect handle to an export field, handed to filter entries so they can
 * rewrite the exported value in place.
 */
export interface Ref<T> {
  value: T;
}

/**
 * Create a ref whose reads and writes go through the given accessors
 */
export function createRef<T>(get: () => T, set: (value: T) => void): Ref<T> {
  return {
    get value(): T {
      return get();
    },
    set value(value: T) {
      set(value);
    },
  };
}

/**
 * Runtime token for the declared type of an entry field.
 *
 * Tokens compare by identity: two tokens defined with the same name are still
 * different types. Exports without an id are matched to imports by token, so
 * a pool holds at most one id-less export per token.
 *
 * @example
 * ```typescript
 * const Database = ValueType.define<Database | null>('Database', null);
 *
 * declare.export('db', Database);
 * declare.filter('db', ValueType.ref(Database), ',wrapDatabase,10');
 * ```
 */
export class ValueType<T = unknown> {
  /** 'ref' tokens are produced by ValueType.ref() and point at `elem` */
  public readonly kind: 'value' | 'ref';

  /** Display name used in diagnostics, e.g. `number` or `Ref<number>` */
  public readonly name: string;

  /** Value a field of this type is reset to on teardown */
  public readonly zero: T;

  public readonly elem: ValueType | null;

  private refType: ValueType<Ref<T> | null> | null = null;

  private static readonly classTypes = new WeakMap<
    object,
    ValueType<object | null>
  >();

  private constructor(
    kind: 'value' | 'ref',
    name: string,
    zero: T,
    elem: ValueType | null,
  ) {
    this.kind = kind;
    this.name = name;
    this.zero = zero;
    this.elem = elem;
  }

  /**
   * Define a new nominal value type
   */
  public static define<T>(name: string, zero: T): ValueType<T> {
    return new ValueType<T>('value', name, zero, null);
  }

  /**
   * The token for instances of `constructor` (zero `null`); repeated calls
   * with the same class return the same token
   */
  public static of(
    constructor: abstract new (...args: never[]) => object,
  ): ValueType<object | null> {
    let type = ValueType.classTypes.get(constructor);

    if (type === undefined) {
      type = new ValueType<object | null>(
        'value',
        constructor.name || 'anonymous class',
        null,
        null,
      );
      ValueType.classTypes.set(constructor, type);
    }

    return type;
  }

  /**
   * The ref type pointing at `type`; repeated calls return the same token
   */
  public static ref<T>(type: ValueType<T>): ValueType<Ref<T> | null> {
    if (type.refType === null) {
      type.refType = new ValueType<Ref<T> | null>(
        'ref',
        `Ref<${type.name}>`,
        null,
        type,
      );
    }

    return type.refType;
  }

  public isRef(): boolean {
    return this.kind === 'ref';
  }

  public toString(): string {
    return this.name;
  }
}

/**
 * Built-in value types
 */
export const ValueTypes = {
  string: ValueType.define<string>('string', ''),
  number: ValueType.define<number>('number', 0),
  boolean: ValueType.define<boolean>('boolean', false),
  bigint: ValueType.define<bigint>('bigint', 0n),
  unknown: ValueType.define<unknown>('unknown', undefined),
} as const;
