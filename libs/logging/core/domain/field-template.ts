/**
 * Field templates name the record fields a formatter renders, in order:
 *
 *   "{level} | {timestamp} | {context} | {message}"
 *
 * `message`, `timestamp` and `pid` are computed; every other name is looked
 * up on the record itself.
 */

const PLACEHOLDER = /\{(\w+)\}/g;

export const MESSAGE_FIELD = 'message';
export const TIMESTAMP_FIELD = 'timestamp';
export const PID_FIELD = 'pid';

export const LOG_FORMAT_OPTIONS: Readonly<Record<number, string>> = {
  1: '{level} | {timestamp} | {logger} | {message} | {context}',
  2: '{level} | {timestamp} | {context} | {message} | {stack}',
  3: '{level} | {context} | {message}',
  4: '{context} | {timestamp} - {logger} - {level} - {message}',
  5: '{level} | {message} | {context} | [in {filename}:{lineno}]',
  6: '{timestamp} | {context} | {level} | {message}',
  7: '{level} | {timestamp} | {context} | in {logger}: {message}',
  8: '{level} | {context} | {message} | [{filename}:{lineno}]',
  9: '[{timestamp}] | {level} | {context} | in {logger}: {message}',
  10: '{timestamp} | {pid} | {context} | {logger} | {level} | {message}',
};

export function parseFieldTemplate(template: string): string[] {
  return Array.from(template.matchAll(PLACEHOLDER), (match) => match[1]);
}

/** Accepts either a template or the number of a preset. */
export function resolveFieldTemplate(format: string | number): string {
  if (typeof format === 'number') {
    return LOG_FORMAT_OPTIONS[format] ?? '';
  }
  const trimmed = format.trim();
  if (/^\d+$/.test(trimmed)) {
    return LOG_FORMAT_OPTIONS[Number(trimmed)] ?? '';
  }
  return format;
}

export function isValidFieldTemplate(format: string | number): boolean {
  return parseFieldTemplate(resolveFieldTemplate(format)).length > 0;
}

/** Substitute every placeholder of `template` with `resolve(field)`. */
export function renderFieldTemplate(
  template: string,
  resolve: (field: string) => string,
): string {
  return template.replace(PLACEHOLDER, (_match, field: string) => resolve(field));
}
