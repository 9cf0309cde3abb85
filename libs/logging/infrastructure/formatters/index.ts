import { FormatterKind } from '@logging/value-objects';
import { LogFormatter } from './base.formatter';
import { FlatFormatter } from './flat.formatter';
import { JsonFormatter } from './json.formatter';
import { TextFormatter } from './text.formatter';
import { XmlFormatter } from './xml.formatter';

export { LogFormatter, PlainValue, toInlineText, toPlainValue } from './base.formatter';
export { FlatFormatter } from './flat.formatter';
export { JsonFormatter, parseTokenValue } from './json.formatter';
export { TextFormatter } from './text.formatter';
export { XmlFormatter } from './xml.formatter';

export function createFormatter(
  kind: FormatterKind,
  format: string | number,
): LogFormatter {
  switch (kind) {
    case FormatterKind.JSON:
      return new JsonFormatter(format);
    case FormatterKind.XML:
      return new XmlFormatter(format);
    case FormatterKind.FLAT:
      return new FlatFormatter(format);
    case FormatterKind.TEXT:
      return new TextFormatter(format);
  }
}
