import {
  registerDecorator,
  ValidationArguments,
  ValidationOptions,
  ValidatorConstraint,
  ValidatorConstraintInterface,
} from 'class-validator';

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MIN_YEAR = 1900;

/**
 * Parse a strict YYYY-MM-DD date. Returns undefined for anything else,
 * including impossible dates such as 2021-02-30.
 */
export function parseCalendarDate(value: string): Date | undefined {
  const match = CALENDAR_DATE.exec(value);
  if (!match) {
    return undefined;
  }

  const [year, month, day] = match.slice(1).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }
  return date;
}

export function isPastCalendarDate(value: string, today: Date = new Date()): boolean {
  const date = parseCalendarDate(value);
  if (!date || date.getUTCFullYear() < MIN_YEAR) {
    return false;
  }
  // Both sides are YYYY-MM-DD, so string order is date order
  return value < today.toISOString().slice(0, 10);
}

@ValidatorConstraint({ name: 'isPastDate', async: false })
export class IsPastDateConstraint implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    return typeof value === 'string' && isPastCalendarDate(value);
  }

  defaultMessage(args: ValidationArguments): string {
    return `${args.property} must be a past date in YYYY-MM-DD format, after ${MIN_YEAR}`;
  }
}

export function IsPastDate(options?: ValidationOptions) {
  return function (object: object, propertyName: string): void {
    registerDecorator({
      target: object.constructor,
      propertyName,
      options,
      constraints: [],
      validator: IsPastDateConstraint,
    });
  };
}
