import stringWidth from 'string-width';
import { EOL } from './constants';

interface TableRow {
  key: string;
  value: string;
}

function safeStringify(value: unknown): string {
  if (value === null || value === undefined) {
    return String(value);
  }

  switch (typeof value) {
    case 'string':
      return value;
    case 'object':
      try {
        return JSON.stringify(value);
      } catch {
        return '[Unserializable]';
      }
    case 'function':
      return '[Function]';
    default:
      return String(value);
  }
}

function padToWidth(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - stringWidth(text)));
}

/**
 * Split a line into chunks no wider than `width` terminal columns
 */
function wrapLine(line: string, width: number): string[] {
  if (stringWidth(line) <= width) {
    return [line];
  }

  const chunks: string[] = [];
  let current = '';

  for (const char of line) {
    if (stringWidth(current + char) > width) {
      chunks.push(current);
      current = '';
    }

    current += char;
  }

  chunks.push(current);
  return chunks;
}

function collectRows(
  error: unknown,
  keyPrefix: string,
  rows: TableRow[],
  seen: Set<object>,
): void {
  if (!error || typeof error !== 'object') {
    rows.push({ key: `${keyPrefix}Value`, value: safeStringify(error) });
    return;
  }

  seen.add(error);

  const field = (name: string): unknown => Reflect.get(error, name);

  const simpleFields: Array<[string, string]> = [
    ['message', 'Message'],
    ['name', 'Name'],
    ['code', 'Code'],
    ['errPrefix', 'Prefix'],
    ['errType', 'errType'],
    ['errCode', 'errCode'],
  ];

  for (const [name, label] of simpleFields) {
    const value = field(name);
    if (value) {
      rows.push({ key: keyPrefix + label, value: safeStringify(value) });
    }
  }

  const additionalInfo = field('additionalInfo');
  if (additionalInfo && typeof additionalInfo === 'object') {
    for (const [key, value] of Object.entries(additionalInfo)) {
      rows.push({
        key: `${keyPrefix}AdditionalInfo.${key}`,
        value: safeStringify(value),
      });
    }
  }

  const cause = field('cause');
  if (typeof cause === 'object' && cause !== null && seen.has(cause)) {
    rows.push({ key: `${keyPrefix}Cause`, value: '[Circular]' });
  } else if (cause !== undefined) {
    collectRows(cause, `${keyPrefix}Cause.`, rows, seen);
  }

  const stack = field('stack');
  if (keyPrefix === '' && typeof stack === 'string' && stack.length > 0) {
    rows.push({ key: 'Stack', value: stack });
  }
}

/**
 * Render an error (its message, name, code, the errPrefix / errType /
 * errCode / additionalInfo convention, its cause chain and the top-level
 * stack) as a two column ASCII table no wider than `maxRowLength`.
 */
export function errorToString(error: unknown, maxRowLength = 80): string {
  const rows: TableRow[] = [{ key: 'Key', value: 'Value' }];
  collectRows(error, '', rows, new Set());

  const keyWidth = Math.max(...rows.map((row) => stringWidth(row.key)));
  const widestValue = Math.max(
    ...rows.flatMap((row) => row.value.split(EOL).map((l) => stringWidth(l))),
  );
  // '| ' + key + ' | ' + value + ' |'
  const valueWidth = Math.max(
    1,
    Math.min(widestValue, maxRowLength - keyWidth - 7),
  );

  const separator = `+${'-'.repeat(keyWidth + 2)}+${'-'.repeat(valueWidth + 2)}+`;
  const lines: string[] = [separator];

  rows.forEach((row, rowIndex) => {
    const valueLines = row.value
      .split(EOL)
      .flatMap((line) => wrapLine(line, valueWidth));

    valueLines.forEach((valueLine, lineIndex) => {
      const key = lineIndex === 0 ? row.key : '';
      lines.push(
        `| ${padToWidth(key, keyWidth)} | ${padToWidth(valueLine, valueWidth)} |`,
      );
    });

    if (rowIndex === 0) {
      lines.push(separator);
    }
  });

  lines.push(separator);
  return lines.join(EOL);
}
