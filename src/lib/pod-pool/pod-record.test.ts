import { beforeEach, describe, expect, test } from 'vitest';
import { Logger } from '../logger';
import { BasePod } from './base-pod';
import type { EntryDeclarator } from './entry-declarator';
import {
  BadExportEntryError,
  BadFilterEntryError,
  BadImportEntryError,
  InvalidPodError,
  isPodPoolError,
  podPoolErrCodes,
} from './errors';
import { createPodRecord } from './pod-record';
import { PodPool } from './pod-pool';
import type { Pod } from './types';
import { ValueType, ValueTypes, type Ref } from './value-types';

const NumberRef = ValueType.ref(ValueTypes.number);

class NumberFilterFieldPod extends BasePod {
  public foo = 0;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.filter('foo', ValueTypes.number, ',modifyFoo,0');
  }

  public modifyFoo(): void {}
}

class EmptyTagFilterPod extends BasePod {
  public foo: Ref<number> | null = null;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.filter('foo', NumberRef, '');
  }

  public modifyFoo(): void {}
}

class MissingMethodFilterPod extends BasePod {
  public foo: Ref<number> | null = null;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.filter('foo', NumberRef, ',modifyFoo,0');
  }
}

class PrivateMethodFilterPod extends BasePod {
  public foo: Ref<number> | null = null;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.filter('foo', NumberRef, ',_modifyFoo,0');
  }

  public _modifyFoo(): void {}
}

class TwoParameterFilterPod extends BasePod {
  public foo: Ref<number> | null = null;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.filter('foo', NumberRef, ',modifyFoo,0');
  }

  public modifyFoo(_signal: AbortSignal, _extra: number): void {}
}

class MissingPriorityFilterPod extends BasePod {
  public foo: Ref<number> | null = null;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.filter('foo', NumberRef, ',modifyFoo');
  }

  public modifyFoo(): void {}
}

class EmptyPriorityFilterPod extends BasePod {
  public foo: Ref<number> | null = null;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.filter('foo', NumberRef, ',modifyFoo,');
  }

  public modifyFoo(): void {}
}

class FractionalPriorityFilterPod extends BasePod {
  public foo: Ref<number> | null = null;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.filter('foo', NumberRef, ',modifyFoo,1.5');
  }

  public modifyFoo(): void {}
}

class HugePriorityFilterPod extends BasePod {
  public foo: Ref<number> | null = null;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.filter('foo', NumberRef, ',modifyFoo,9007199254740993');
  }

  public modifyFoo(): void {}
}

class PrivateFieldFilterPod extends BasePod {
  public _foo: Ref<number> | null = null;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.filter('_foo', NumberRef, ',modifyFoo,0');
  }

  public modifyFoo(): void {}
}

class PrivateFieldImportPod extends BasePod {
  public _foo = 0;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.import('_foo', ValueTypes.number);
  }
}

class PrivateFieldExportPod extends BasePod {
  public _foo = 0;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.export('_foo', ValueTypes.number);
  }
}

class GetterOnlyExportPod extends BasePod {
  public get foo(): number {
    return 1;
  }

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.export('foo', ValueTypes.number);
  }
}

class EmptyPod extends BasePod {
  public declareEntries(): void {}
}

class FrozenPod extends BasePod {
  public foo = 0;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.export('foo', ValueTypes.number);
  }
}

class TwoFilterPod extends BasePod {
  public first: Ref<number> | null = null;
  public second: Ref<string> | null = null;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare
      .filter('first', NumberRef, ',modify,-3')
      .filter('second', ValueType.ref(ValueTypes.string), 'name,modify,+12');
  }

  public modify(): void {}
}

class FooGroup {
  public foo = 0;
  public bar = '';

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.export('foo', ValueTypes.number).import('bar', ValueTypes.string);
  }
}

class GroupedPod extends BasePod {
  public inner = new FooGroup();
  public baz = '';

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.group('inner').export('baz', ValueTypes.string, 'baz');
  }
}

class NotAGroupPod extends BasePod {
  public inner = 42;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.group('inner');
  }
}

class RepeatedGroupPod extends BasePod {
  public inner = new FooGroup();

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.group('inner').group('inner');
  }
}

describe('Pod registration', () => {
  let pool: PodPool;

  beforeEach(() => {
    const { logger } = Logger.createTestOptimizedLogger();
    pool = new PodPool({ logger });
  });

  describe('Entry parse failures', () => {
    const cases: Array<{
      pod: Pod;
      errorClass: new (...args: never[]) => Error;
      message: string;
    }> = [
      {
        pod: new NumberFilterFieldPod(),
        errorClass: BadFilterEntryError,
        message:
          'bad filter entry: non-ref field type; filterEntryPath="NumberFilterFieldPod.foo" fieldType="number"',
      },
      {
        pod: new EmptyTagFilterPod(),
        errorClass: BadFilterEntryError,
        message:
          'bad filter entry: missing argument `methodName`; filterEntryPath="EmptyTagFilterPod.foo"',
      },
      {
        pod: new MissingMethodFilterPod(),
        errorClass: BadFilterEntryError,
        message:
          'bad filter entry: method undefined or unexported; filterEntryPath="MissingMethodFilterPod.foo" methodName="modifyFoo"',
      },
      {
        pod: new PrivateMethodFilterPod(),
        errorClass: BadFilterEntryError,
        message:
          'bad filter entry: method undefined or unexported; filterEntryPath="PrivateMethodFilterPod.foo" methodName="_modifyFoo"',
      },
      {
        pod: new TwoParameterFilterPod(),
        errorClass: BadFilterEntryError,
        message:
          'bad filter entry: function type mismatch; filterEntryPath="TwoParameterFilterPod.foo" methodName="modifyFoo" expectedParameters="(signal: AbortSignal)" parameterCount="2"',
      },
      {
        pod: new MissingPriorityFilterPod(),
        errorClass: BadFilterEntryError,
        message:
          'bad filter entry: missing argument `priority`; filterEntryPath="MissingPriorityFilterPod.foo"',
      },
      {
        pod: new EmptyPriorityFilterPod(),
        errorClass: BadFilterEntryError,
        message:
          'bad filter entry: priority parse failed; filterEntryPath="EmptyPriorityFilterPod.foo" priorityStr=""',
      },
      {
        pod: new FractionalPriorityFilterPod(),
        errorClass: BadFilterEntryError,
        message:
          'bad filter entry: priority parse failed; filterEntryPath="FractionalPriorityFilterPod.foo" priorityStr="1.5"',
      },
      {
        pod: new HugePriorityFilterPod(),
        errorClass: BadFilterEntryError,
        message:
          'bad filter entry: priority parse failed; filterEntryPath="HugePriorityFilterPod.foo" priorityStr="9007199254740993"',
      },
      {
        pod: new PrivateFieldFilterPod(),
        errorClass: BadFilterEntryError,
        message:
          'bad filter entry: field unexported; filterEntryPath="PrivateFieldFilterPod._foo"',
      },
      {
        pod: new PrivateFieldImportPod(),
        errorClass: BadImportEntryError,
        message:
          'bad import entry: field unexported; importEntryPath="PrivateFieldImportPod._foo"',
      },
      {
        pod: new PrivateFieldExportPod(),
        errorClass: BadExportEntryError,
        message:
          'bad export entry: field unexported; exportEntryPath="PrivateFieldExportPod._foo"',
      },
      {
        pod: new GetterOnlyExportPod(),
        errorClass: BadExportEntryError,
        message:
          'bad export entry: field unexported; exportEntryPath="GetterOnlyExportPod.foo"',
      },
    ];

    for (const { pod, errorClass, message } of cases) {
      test(message, () => {
        expect(() => pool.registerPod(pod)).toThrow(errorClass);
        expect(() => pool.registerPod(pod)).toThrow(message);
        expect(pool.getPodCount()).toBe(0);
      });
    }
  });

  describe('Invalid pods', () => {
    test('should reject a pod with no entries', () => {
      expect(() => pool.registerPod(new EmptyPod())).toThrow(
        'invalid pod: no import/export/filter entry; podType="EmptyPod"',
      );
    });

    test('should reject a plain object that is not a class instance', () => {
      const pod: Pod = {
        declareEntries: () => {},
        resolveRefLink: () => undefined,
        setUp: () => {},
        tearDown: () => {},
      };

      expect(() => pool.registerPod(pod)).toThrow(
        'invalid pod: wrong shape; podType="Object"',
      );
      expect(pool.getPodCount()).toBe(0);
    });

    test('should reject a frozen pod', () => {
      expect(() => pool.registerPod(Object.freeze(new FrozenPod()))).toThrow(
        'invalid pod: frozen pod; podType="FrozenPod"',
      );
    });

    test('should reject a pod missing a pod method', () => {
      const pod: Pod = new FrozenPod();
      Reflect.set(pod, 'tearDown', undefined);

      expect(() => pool.registerPod(pod)).toThrow(
        'invalid pod: pod method missing; podType="FrozenPod" methodName="tearDown"',
      );
    });

    test('should reject a group field that is not an entry group', () => {
      expect(() => pool.registerPod(new NotAGroupPod())).toThrow(
        'invalid pod: invalid entry group; groupPath="NotAGroupPod.inner" groupType="number"',
      );
    });

    test('should reject a group declared twice', () => {
      expect(() => pool.registerPod(new RepeatedGroupPod())).toThrow(
        'invalid pod: invalid entry group; groupPath="RepeatedGroupPod.inner" groupType="FooGroup"',
      );
    });

    test('should carry the error code', () => {
      let caught: unknown = null;

      try {
        pool.registerPod(new EmptyPod());
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidPodError);
      expect(isPodPoolError(caught, podPoolErrCodes.InvalidPod)).toBe(true);
      expect(isPodPoolError(caught, podPoolErrCodes.BadImportEntry)).toBe(false);
    });
  });

  describe('createPodRecord', () => {
    test('should collect grouped entries with the group name in their paths', () => {
      const record = createPodRecord(new GroupedPod(), 3, 0);

      expect(record.index).toBe(3);
      expect(record.podType).toBe('GroupedPod');
      expect(record.exportEntries.map((entry) => entry.path)).toEqual([
        'GroupedPod.inner.foo',
        'GroupedPod.baz',
      ]);
      expect(record.importEntries.map((entry) => entry.path)).toEqual([
        'GroupedPod.inner.bar',
      ]);
      expect(record.exportEntries.map((entry) => entry.podIndex)).toEqual([3, 3]);
    });

    test('should number filters from the given sequence', () => {
      const record = createPodRecord(new TwoFilterPod(), 0, 7);

      expect(record.filterEntries.map((entry) => entry.sequence)).toEqual([7, 8]);
      expect(record.filterEntries.map((entry) => entry.priority)).toEqual([-3, 12]);
    });

    test('should write grouped fields through the group object', () => {
      const pod = new GroupedPod();
      const record = createPodRecord(pod, 0, 0);

      record.exportEntries[0].value = 5;
      expect(pod.inner.foo).toBe(5);

      record.exportEntries[0].clear();
      expect(pod.inner.foo).toBe(0);
    });
  });
});
