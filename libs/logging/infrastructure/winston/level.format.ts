import { format, Logform } from 'winston';

/** Keep only records logged at exactly `level`. */
export function exactLevel(level: string): Logform.Format {
  return format((info) => (info.level === level ? info : false))();
}
