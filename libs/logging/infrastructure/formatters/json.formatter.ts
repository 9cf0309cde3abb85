import { LogRecord, MESSAGE_FIELD, messageOf, stackOf } from '@logging/domain';
import { LogFormatter, toPlainValue } from './base.formatter';

const KEY_VALUE = /(\w+)=(\{.*?\}|\[.*?\]|\(.*?\)|\S+)/g;
const INTEGER = /^[+-]?\d+$/;
const NUMBER = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

type ValueParser = (raw: string) => unknown;

function parseBoolean(raw: string): boolean | undefined {
  const lower = raw.toLowerCase();
  if (lower === 'true') {
    return true;
  }
  if (lower === 'false') {
    return false;
  }
  return undefined;
}

/** Integers beyond the safe range stay strings rather than lose digits. */
function parseNumber(raw: string): number | undefined {
  if (!NUMBER.test(raw)) {
    return undefined;
  }
  const value = Number(raw);
  if (INTEGER.test(raw) && !Number.isSafeInteger(value)) {
    return undefined;
  }
  return value;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Rewrite a loosely written literal (single quotes, capitalised True/False/
 * None, a parenthesised tuple) as JSON.
 */
function toJsonLiteral(raw: string): string {
  let text = raw.trim();
  if (text.startsWith('(') && text.endsWith(')')) {
    text = `[${text.slice(1, -1)}]`;
  }
  return text
    .replace(/'/g, '"')
    .replace(/\bTrue\b/g, 'true')
    .replace(/\bFalse\b/g, 'false')
    .replace(/\bNone\b/g, 'null')
    .replace(/,\s*([\]}])/g, '$1');
}

function parseStructure(raw: string): unknown {
  if (!/^[{[(]/.test(raw)) {
    return undefined;
  }
  return parseJson(raw) ?? parseJson(toJsonLiteral(raw));
}

const VALUE_PARSERS: readonly ValueParser[] = [
  parseBoolean,
  parseNumber,
  parseStructure,
];

/** First successful parse wins; a value nothing can parse stays a string. */
export function parseTokenValue(raw: string): unknown {
  for (const parse of VALUE_PARSERS) {
    const value = parse(raw);
    if (value !== undefined) {
      return value;
    }
  }
  return raw;
}

/**
 * JsonFormatter - renders the declared fields as a pretty-printed JSON
 * object.
 *
 * `key=value` tokens found in the message are promoted to top-level keys
 * (`user_id=123` becomes `"user_id": 123`) and cut out of the message, which
 * is then flattened onto one line and written last, after the promoted keys,
 * wherever the template places it.
 */
export class JsonFormatter extends LogFormatter {
  render(record: LogRecord): string {
    const data: Record<string, unknown> = {};

    for (const field of this.fields) {
      if (field === MESSAGE_FIELD) {
        continue;
      }
      const value = this.fieldValue(record, field);
      if (value !== undefined && value !== null) {
        data[field] = toPlainValue(value);
      }
    }

    let message = messageOf(record);
    const pairs = this.extractPairs(message);
    if (pairs.size > 0) {
      for (const [key, value] of pairs) {
        data[key] = value;
      }
      message = message.replace(KEY_VALUE, '').trim();
    }

    data.message = message.replace(/[\n\t]/g, ' ').trim();

    const stack = stackOf(record);
    if (stack !== undefined) {
      data.exception = stack;
    }

    return JSON.stringify(data, null, 2);
  }

  private extractPairs(message: string): Map<string, unknown> {
    const pairs = new Map<string, unknown>();
    for (const [, key, raw] of message.matchAll(KEY_VALUE)) {
      pairs.set(key, parseTokenValue(raw));
    }
    return pairs;
  }
}
