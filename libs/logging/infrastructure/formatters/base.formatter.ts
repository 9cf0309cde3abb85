import {
  LogRecord,
  MESSAGE_FIELD,
  PID_FIELD,
  TIMESTAMP_FIELD,
  isContextSnapshot,
  messageOf,
  parseFieldTemplate,
  resolveFieldTemplate,
} from '@logging/domain';

export type PlainValue = string | PlainValue[] | { [key: string]: PlainValue };

/**
 * LogFormatter - renders a log record as one string, driven by a field
 * template such as "{level} | {timestamp} | {context} | {message}".
 *
 * Fields the record does not carry resolve to undefined; each formatter
 * decides how to render (usually: drop) them.
 */
export abstract class LogFormatter {
  readonly template: string;
  readonly fields: string[];

  constructor(format: string | number) {
    this.template = resolveFieldTemplate(format);
    this.fields = parseFieldTemplate(this.template);
  }

  abstract render(record: LogRecord): string;

  protected fieldValue(record: LogRecord, field: string): unknown {
    switch (field) {
      case MESSAGE_FIELD:
        return messageOf(record);
      case TIMESTAMP_FIELD:
        return record.timestamp;
      case PID_FIELD:
        return process.pid;
      default:
        return record[field];
    }
  }
}

/**
 * Convert a value to strings, keeping the shape of nested objects and
 * arrays.
 */
export function toPlainValue(value: unknown): PlainValue {
  if (Array.isArray(value)) {
    return value.map(toPlainValue);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Error) {
    return String(value);
  }
  if (isContextSnapshot(value)) {
    const plain: { [key: string]: PlainValue } = {};
    for (const [key, item] of Object.entries(value)) {
      plain[key] = toPlainValue(item);
    }
    return plain;
  }
  return String(value);
}

/** Single-line text for a value: objects as JSON, an empty object as ''. */
export function toInlineText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (isContextSnapshot(value) && !(value instanceof Date) && !(value instanceof Error)) {
    return Object.keys(value).length === 0 ? '' : JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return JSON.stringify(value);
  }
  return String(value);
}
