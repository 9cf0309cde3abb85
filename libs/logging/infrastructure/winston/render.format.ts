import { format, Logform } from 'winston';
import { MESSAGE } from 'triple-beam';
import { LogFormatter } from '../formatters';

/** Final transport format: sets the output line from `formatter`. */
export function renderWith(formatter: LogFormatter): Logform.Format {
  return format((info) => {
    info[MESSAGE] = formatter.render(info);
    return info;
  })();
}
