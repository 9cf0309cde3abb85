import { ValidateBy, ValidationOptions, buildMessage } from 'class-validator';
import { isValidFieldTemplate } from '@logging/domain';

/**
 * Accepts a field template with at least one `{field}` placeholder, or the
 * number of one of the preset templates.
 */
export function IsFieldTemplate(
  validationOptions?: ValidationOptions,
): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isFieldTemplate',
      validator: {
        validate: (value: unknown): boolean =>
          (typeof value === 'string' || typeof value === 'number') &&
          isValidFieldTemplate(value),
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must contain at least one {field} placeholder or name a preset format`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
