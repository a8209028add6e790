/**
 * Test pods for PodPool unit tests
 *
 * Small pods that wire strings and numbers to each other. Tracked pods
 * record their setup and teardown calls in a shared event list so tests can
 * assert the exact order.
 */

import { BasePod } from './base-pod';
import type { EntryDeclarator } from './entry-declarator';
import { ValueType, ValueTypes, type Ref } from './value-types';

export const Ratio = ValueType.define<number>('Ratio', 0);

/**
 * Exports "Hi!" under the id `the_greeting`
 */
export class GreetingPod extends BasePod {
  public greeting = '';

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.export('greeting', ValueTypes.string, 'the_greeting');
  }

  public setUp(): void {
    this.greeting = 'Hi!';
  }
}

/**
 * Imports `the_greeting` and remembers what it saw during setUp()
 */
export class GreetingReaderPod extends BasePod {
  public greeting = '';
  public seenAtSetUp = '';

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.import('greeting', ValueTypes.string, 'the_greeting');
  }

  public setUp(): void {
    this.seenAtSetUp = this.greeting;
  }
}

/**
 * Appends " Jack!" to `the_greeting`
 */
export class NameAppenderPod extends BasePod {
  public greeting: Ref<string> | null = null;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.filter(
      'greeting',
      ValueType.ref(ValueTypes.string),
      'the_greeting,appendName,0',
    );
  }

  public appendName(): void {
    if (this.greeting) {
      this.greeting.value += ' Jack!';
    }
  }
}

/**
 * Exports a string under the id `trail`, starting as "start"
 */
export class TrailPod extends BasePod {
  public trail = '';

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.export('trail', ValueTypes.string, 'trail');
  }

  public async setUp(): Promise<void> {
    await Promise.resolve();
    this.trail = 'start';
  }
}

/**
 * Appends `>label` to `trail` at the given priority
 */
export class TrailMarkerPod extends BasePod {
  public trail: Ref<string> | null = null;
  public readonly label: string;
  public readonly priority: number;

  constructor(label: string, priority: number) {
    super();
    this.label = label;
    this.priority = priority;
  }

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.filter(
      'trail',
      ValueType.ref(ValueTypes.string),
      `trail,mark,${this.priority}`,
    );
  }

  public async mark(signal: AbortSignal): Promise<void> {
    signal.throwIfAborted();
    await Promise.resolve();

    if (this.trail) {
      this.trail.value += `>${this.label}`;
    }
  }
}

/**
 * Exports `counter` (100) and filters its own export down by one
 */
export class SelfFilteringPod extends BasePod {
  public counter = 0;
  public counterRef: Ref<number> | null = null;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare
      .export('counter', ValueTypes.number, 'counter')
      .filter('counterRef', ValueType.ref(ValueTypes.number), 'counter,decrement,100');
  }

  public setUp(): void {
    this.counter = 100;
  }

  public decrement(): void {
    if (this.counterRef) {
      this.counterRef.value -= 1;
    }
  }
}

/**
 * Imports `counter` through the ref link `@counter` and exports counter + 2
 */
export class LinkedImporterPod extends BasePod {
  public counter = 0;
  public total = 0;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare
      .import('counter', ValueTypes.number, '@counter')
      .export('total', ValueTypes.number);
  }

  public resolveRefLink(refLink: string): string | undefined {
    return refLink === '@counter' ? 'counter' : undefined;
  }

  public setUp(): void {
    this.total = this.counter + 2;
  }
}

/**
 * Doubles the number export matched by type, at priority 1
 */
export class DoublingPod extends BasePod {
  public counter = 0;
  public total: Ref<number> | null = null;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare
      .import('counter', ValueTypes.number, 'counter')
      .filter('total', ValueType.ref(ValueTypes.number), ',double,1');
  }

  public double(): void {
    if (this.total) {
      this.total.value *= 2;
    }
  }
}

/**
 * Adds `counter + 1` to the number export matched by type, at priority -1
 */
export class AddingPod extends BasePod {
  public counter = 0;
  public total: Ref<number> | null = null;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare
      .import('counter', ValueTypes.number, 'counter')
      .filter('total', ValueType.ref(ValueTypes.number), ',add,-1');
  }

  public add(): void {
    if (this.total) {
      this.total.value += this.counter + 1;
    }
  }
}

/**
 * Imports the number export matched by type
 */
export class TotalReaderPod extends BasePod {
  public total = 0;
  public seenAtSetUp = 0;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.import('total', ValueTypes.number);
  }

  public setUp(): void {
    this.seenAtSetUp = this.total;
  }
}

/**
 * Base for pods that log `setUp <Type>` and `tearDown <Type>` into a shared list
 */
export abstract class TrackedPod extends BasePod {
  public readonly events: string[];

  constructor(events: string[]) {
    super();
    this.events = events;
  }

  public setUp(_signal: AbortSignal): Promise<void> | void {
    this.events.push(`setUp ${this.constructor.name}`);
  }

  public tearDown(): Promise<void> | void {
    this.events.push(`tearDown ${this.constructor.name}`);
  }
}

/**
 * Imports a number by type; its setUp() aborts when the signal is aborted
 */
export class CountConsumerPod extends TrackedPod {
  public count = 0;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.import('count', ValueTypes.number);
  }

  public setUp(signal: AbortSignal): Promise<void> | void {
    signal.throwIfAborted();
    return super.setUp(signal);
  }
}

export class CountProducerPod extends TrackedPod {
  public label = '';
  public count = 0;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare
      .import('label', ValueTypes.string)
      .export('count', ValueTypes.number);
  }
}

export class LabelProducerPod extends TrackedPod {
  public ratio = 0;
  public label = '';

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.import('ratio', Ratio).export('label', ValueTypes.string);
  }
}

export class RatioProducerPod extends TrackedPod {
  public ratio = 0;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.export('ratio', Ratio);
  }
}

/**
 * Filters the number export matched by type; its hook aborts when the
 * signal is aborted
 */
export class CountFilterPod extends TrackedPod {
  public count: Ref<number> | null = null;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.filter('count', ValueType.ref(ValueTypes.number), ',checkSignal,0');
  }

  public checkSignal(signal: AbortSignal): void {
    signal.throwIfAborted();
  }
}

/**
 * Exports a string whose setUp() waits until `release()` is called
 */
export class BlockingPod extends BasePod {
  public value = '';
  private releaseSetUp: (() => void) | null = null;

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.export('value', ValueTypes.string, 'blocking');
  }

  public setUp(): Promise<void> {
    return new Promise((resolve) => {
      this.releaseSetUp = () => {
        this.value = 'released';
        resolve();
      };
    });
  }

  public release(): void {
    this.releaseSetUp?.();
  }
}

/**
 * Exports a string; its tearDown() always throws
 */
export class FailingTearDownPod extends BasePod {
  public value = '';

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.export('value', ValueTypes.string, 'failing_teardown');
  }

  public setUp(): void {
    this.value = 'ready';
  }

  public tearDown(): void {
    throw new Error('teardown exploded');
  }
}

/**
 * Imports `the_greeting`; its teardown throws an error that is its own cause
 */
export class CyclicCauseReaderPod extends BasePod {
  public greeting = '';

  public declareEntries(declare: EntryDeclarator<this>): void {
    declare.import('greeting', ValueTypes.string, 'the_greeting');
  }

  public tearDown(): void {
    const error = new Error('teardown looped');
    error.cause = error;
    throw error;
  }
}
