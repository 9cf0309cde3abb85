import { LogRecord, MESSAGE_FIELD, stackOf } from '@logging/domain';
import { LogFormatter, toInlineText } from './base.formatter';

/**
 * FlatFormatter - one line of `field='value'` tokens, e.g.
 * `level='info' logger='ReportsService' message='exported'`.
 * The message always comes after the other fields.
 */
export class FlatFormatter extends LogFormatter {
  render(record: LogRecord): string {
    const fields = this.fields.filter((field) => field !== MESSAGE_FIELD);
    if (fields.length < this.fields.length) {
      fields.push(MESSAGE_FIELD);
    }

    const tokens: string[] = [];
    for (const field of fields) {
      const value = this.fieldValue(record, field);
      if (value !== undefined && value !== null) {
        tokens.push(`${field}='${toInlineText(value)}'`);
      }
    }

    let line = tokens.join(' ');
    const stack = stackOf(record);
    if (stack !== undefined) {
      line += ` exception='${stack}'`;
    }
    return line;
  }
}
