import {
  BadExportEntryError,
  BadFilterEntryError,
  BadImportEntryError,
} from './errors';
import type {
  FieldAccessor,
  FilterHook,
  Pod,
  RawEntryDeclaration,
} from './types';
import { createRef, type Ref, type ValueType } from './value-types';

const REF_LINK_PREFIX = '@';
const PRIORITY_PATTERN = /^[+-]?\d+$/;

export function isRefLink(id: string): boolean {
  return id.startsWith(REF_LINK_PREFIX);
}

/**
 * Leading underscore marks a member as private by convention
 */
function isExportedName(name: string): boolean {
  return name.length > 0 && !name.startsWith('_');
}

/**
 * A field is accessible when it's a public own property the pool can write:
 * a writable data property, or an accessor with a setter
 */
function isFieldAccessible(holder: object, fieldName: string): boolean {
  if (!isExportedName(fieldName)) {
    return false;
  }

  const descriptor = Object.getOwnPropertyDescriptor(holder, fieldName);

  if (!descriptor) {
    return false;
  }

  return descriptor.writable === true || descriptor.set !== undefined;
}

function createFieldAccessor(holder: object, fieldName: string): FieldAccessor {
  return {
    get: () => Reflect.get(holder, fieldName),
    set: (value) => {
      Reflect.set(holder, fieldName, value);
    },
  };
}

/**
 * Fields shared by import, export and filter entries
 */
abstract class Entry {
  /** Diagnostic path: pod type, group and field names */
  public readonly path: string;

  /** Declared field type */
  public readonly type: ValueType;

  /** Id as declared; may be a ref link */
  public readonly declaredID: string;

  /** Arena index of the owning pod in its pool */
  public readonly podIndex: number;

  /** Concrete id once ref links are resolved; empty = match by type */
  public id: string;

  private readonly field: FieldAccessor;

  protected constructor(
    declaration: RawEntryDeclaration,
    declaredID: string,
    podIndex: number,
  ) {
    this.path = declaration.path;
    this.type = declaration.type;
    this.declaredID = declaredID;
    this.podIndex = podIndex;
    this.id = declaredID;
    this.field = createFieldAccessor(declaration.holder, declaration.fieldName);
  }

  public get value(): unknown {
    return this.field.get();
  }

  public set value(value: unknown) {
    this.field.set(value);
  }

  /**
   * Resolve the declared id against the owning pod. Always starts from the
   * declared id, so repeated resolution gives the same result.
   *
   * @returns the unresolvable ref link, or null on success
   */
  public resolveRefLink(pod: Pod): string | null {
    if (!isRefLink(this.declaredID)) {
      this.id = this.declaredID;
      return null;
    }

    const resolved = pod.resolveRefLink(this.declaredID);

    if (resolved === undefined) {
      return this.declaredID;
    }

    this.id = resolved;
    return null;
  }

  /**
   * Reset the field to its type's zero value
   */
  public clear(): void {
    this.field.set(this.type.zero);
  }
}

/**
 * A field filled from another pod's export before the owning pod's setUp()
 */
export class ImportEntry extends Entry {
  public exportEntry: ExportEntry | null = null;

  constructor(declaration: RawEntryDeclaration, podIndex: number) {
    super(declaration, declaration.tag, podIndex);
  }
}

/**
 * A field the owning pod publishes for imports and filters
 */
export class ExportEntry extends Entry {
  private readonly filters: FilterEntry[] = [];

  constructor(declaration: RawEntryDeclaration, podIndex: number) {
    super(declaration, declaration.tag, podIndex);
  }

  /**
   * Attached filters, highest priority first, ties in discovery order
   */
  public get filterEntries(): readonly FilterEntry[] {
    return this.filters;
  }

  /**
   * Attach a filter unless it's already attached
   */
  public attachFilter(filterEntry: FilterEntry): void {
    if (this.filters.includes(filterEntry)) {
      return;
    }

    this.filters.push(filterEntry);
    this.filters.sort(
      (a, b) => b.priority - a.priority || a.sequence - b.sequence,
    );
  }

  /**
   * Ref that reads and writes this export's field
   */
  public createRef(): Ref<unknown> {
    return createRef(
      () => this.value,
      (value) => {
        this.value = value;
      },
    );
  }
}

/**
 * A Ref field plus a bound hook that rewrites one export in place
 */
export class FilterEntry extends Entry {
  /** Type of the export this filter targets (the type the ref points at) */
  public readonly valueType: ValueType;

  public readonly hook: FilterHook;
  public readonly priority: number;

  /** Pool-wide discovery order, used to break priority ties */
  public readonly sequence: number;

  constructor(input: {
    declaration: RawEntryDeclaration;
    declaredID: string;
    podIndex: number;
    valueType: ValueType;
    hook: FilterHook;
    priority: number;
    sequence: number;
  }) {
    super(input.declaration, input.declaredID, input.podIndex);
    this.valueType = input.valueType;
    this.hook = input.hook;
    this.priority = input.priority;
    this.sequence = input.sequence;
  }
}

export function parseImportEntry(
  declaration: RawEntryDeclaration,
  podIndex: number,
): ImportEntry {
  if (!isFieldAccessible(declaration.holder, declaration.fieldName)) {
    throw new BadImportEntryError('field unexported', {
      importEntryPath: declaration.path,
    });
  }

  return new ImportEntry(declaration, podIndex);
}

export function parseExportEntry(
  declaration: RawEntryDeclaration,
  podIndex: number,
): ExportEntry {
  if (!isFieldAccessible(declaration.holder, declaration.fieldName)) {
    throw new BadExportEntryError('field unexported', {
      exportEntryPath: declaration.path,
    });
  }

  return new ExportEntry(declaration, podIndex);
}

/**
 * Parse `id,methodName,priority` and bind the method on the field's holder
 */
export function parseFilterEntry(
  declaration: RawEntryDeclaration,
  podIndex: number,
  sequence: number,
): FilterEntry {
  const { path, holder, type } = declaration;

  if (!isFieldAccessible(holder, declaration.fieldName)) {
    throw new BadFilterEntryError('field unexported', {
      filterEntryPath: path,
    });
  }

  if (!type.isRef() || type.elem === null) {
    throw new BadFilterEntryError('non-ref field type', {
      filterEntryPath: path,
      fieldType: type.name,
    });
  }

  const args = declaration.tag.split(',');

  if (args.length < 2) {
    throw new BadFilterEntryError('missing argument `methodName`', {
      filterEntryPath: path,
    });
  }

  const methodName = args[1];
  const method: unknown = isExportedName(methodName)
    ? Reflect.get(holder, methodName)
    : undefined;

  if (typeof method !== 'function') {
    throw new BadFilterEntryError('method undefined or unexported', {
      filterEntryPath: path,
      methodName,
    });
  }

  // Hooks take (signal) at most
  if (method.length > 1) {
    throw new BadFilterEntryError('function type mismatch', {
      filterEntryPath: path,
      methodName,
      expectedParameters: '(signal: AbortSignal)',
      parameterCount: String(method.length),
    });
  }

  if (args.length < 3) {
    throw new BadFilterEntryError('missing argument `priority`', {
      filterEntryPath: path,
    });
  }

  const priorityStr = args[2];
  const priority = Number(priorityStr);

  if (!PRIORITY_PATTERN.test(priorityStr) || !Number.isSafeInteger(priority)) {
    throw new BadFilterEntryError('priority parse failed', {
      filterEntryPath: path,
      priorityStr,
    });
  }

  const hook: FilterHook = async (signal) => {
    await Reflect.apply(method, holder, [signal]);
  };

  return new FilterEntry({
    declaration,
    declaredID: args[0],
    podIndex,
    valueType: type.elem,
    hook,
    priority,
    sequence,
  });
}
