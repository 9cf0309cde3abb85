import { XMLBuilder } from 'fast-xml-parser';
import { LogRecord, stackOf } from '@logging/domain';
import { LogFormatter, PlainValue, toInlineText, toPlainValue } from './base.formatter';

type XmlNode = string | Record<string, string>;

function toXmlNode(value: PlainValue): XmlNode {
  if (Array.isArray(value)) {
    const items: Record<string, string> = {};
    value.forEach((item, index) => {
      items[`item_${index}`] = toInlineText(item);
    });
    return items;
  }
  if (typeof value === 'object') {
    const children: Record<string, string> = {};
    for (const [key, item] of Object.entries(value)) {
      children[key] = toInlineText(item);
    }
    return children;
  }
  return value;
}

/**
 * XmlFormatter - renders the declared fields as children of a `<log>`
 * element. Objects become one child element per key, arrays one
 * `item_<index>` element per entry.
 */
export class XmlFormatter extends LogFormatter {
  private readonly builder = new XMLBuilder({
    format: true,
    indentBy: '  ',
    suppressEmptyNode: true,
  });

  render(record: LogRecord): string {
    const log: Record<string, XmlNode> = {};

    for (const field of this.fields) {
      const value = this.fieldValue(record, field);
      if (value === undefined || value === null || value === '') {
        continue;
      }
      log[field] = toXmlNode(toPlainValue(value));
    }

    const stack = stackOf(record);
    if (stack !== undefined) {
      log.exception = stack;
    }

    return this.builder.build({ log }).trim();
  }
}
