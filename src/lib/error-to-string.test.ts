import { describe, expect, it } from 'vitest';
import { errorToString } from './error-to-string';
import { EOL } from './constants';

class SampleErr extends Error {
  public errPrefix = 'SampleErr';
  public errType = 'Sample';
  public errCode = 'Broken';
  public additionalInfo = { podType: 'GreetingPod', attempts: 3, tags: ['a', 'b'] };

  constructor() {
    super('Sample failed');
    this.name = 'SampleErr';
    this.stack = '';
  }
}

function withoutStack<T extends Error>(error: T): T {
  error.stack = '';
  return error;
}

describe('errorToString', () => {
  it('should list the error convention fields and additional info', () => {
    expect(errorToString(new SampleErr()).split(EOL)).toEqual([
      '+-------------------------+---------------+',
      '| Key                     | Value         |',
      '+-------------------------+---------------+',
      '| Message                 | Sample failed |',
      '| Name                    | SampleErr     |',
      '| Prefix                  | SampleErr     |',
      '| errType                 | Sample        |',
      '| errCode                 | Broken        |',
      '| AdditionalInfo.podType  | GreetingPod   |',
      '| AdditionalInfo.attempts | 3             |',
      '| AdditionalInfo.tags     | ["a","b"]     |',
      '+-------------------------+---------------+',
    ]);
  });

  it('should follow the cause chain', () => {
    const error = withoutStack(
      new Error('outer', { cause: withoutStack(new Error('inner')) }),
    );

    expect(errorToString(error).split(EOL)).toEqual([
      '+---------------+-------+',
      '| Key           | Value |',
      '+---------------+-------+',
      '| Message       | outer |',
      '| Name          | Error |',
      '| Cause.Message | inner |',
      '| Cause.Name    | Error |',
      '+---------------+-------+',
    ]);
  });

  it('should stop at a cause that loops back', () => {
    const error = withoutStack(new Error('loop'));
    error.cause = error;

    expect(errorToString(error).split(EOL)).toEqual([
      '+---------+------------+',
      '| Key     | Value      |',
      '+---------+------------+',
      '| Message | loop       |',
      '| Name    | Error      |',
      '| Cause   | [Circular] |',
      '+---------+------------+',
    ]);
  });

  it('should wrap values wider than the row limit', () => {
    const error = withoutStack(new Error('abcdefghijklmnopqrstuvwxyz'));

    expect(errorToString(error, 20).split(EOL)).toEqual([
      '+---------+--------+',
      '| Key     | Value  |',
      '+---------+--------+',
      '| Message | abcdef |',
      '|         | ghijkl |',
      '|         | mnopqr |',
      '|         | stuvwx |',
      '|         | yz     |',
      '| Name    | Error  |',
      '+---------+--------+',
    ]);
  });

  it('should include the stack of the top-level error', () => {
    const error = new Error('with stack');
    error.stack = 'Error: with stack\n    at somewhere';

    const lines = errorToString(error).split(EOL);

    expect(lines).toContain('| Stack   | Error: with stack |');
    expect(lines).toContain('|         |     at somewhere  |');
  });

  it('should handle a null', () => {
    expect(errorToString(null).split(EOL)).toEqual([
      '+-------+-------+',
      '| Key   | Value |',
      '+-------+-------+',
      '| Value | null  |',
      '+-------+-------+',
    ]);
  });

  it('should handle a normal object', () => {
    expect(errorToString({ message: 'plain object' }).split(EOL)).toEqual([
      '+---------+--------------+',
      '| Key     | Value        |',
      '+---------+--------------+',
      '| Message | plain object |',
      '+---------+--------------+',
    ]);
  });
});
