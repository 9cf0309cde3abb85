import { LogRecord, renderFieldTemplate, stackOf } from '@logging/domain';
import { LogFormatter, toInlineText } from './base.formatter';

/**
 * TextFormatter - the template itself with every placeholder filled in.
 * Missing fields render empty; a stack trace goes on the following lines
 * unless the template already places it.
 */
export class TextFormatter extends LogFormatter {
  render(record: LogRecord): string {
    const line = renderFieldTemplate(this.template, (field) => {
      const value = this.fieldValue(record, field);
      return value === undefined || value === null ? '' : toInlineText(value);
    });

    const stack = stackOf(record);
    if (stack === undefined || this.fields.includes('stack')) {
      return line;
    }
    return `${line}\n${stack}`;
  }
}
