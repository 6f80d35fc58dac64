import {
  registerDecorator,
  ValidationArguments,
  ValidationOptions,
  ValidatorConstraint,
  ValidatorConstraintInterface,
} from 'class-validator';
import { SectionMap } from '../../jobs/interfaces/grading-job.interface';

function isPlainObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `{ [questionType]: { [questionId]: label } }` with string labels only. */
export function isSectionMap(value: unknown): value is SectionMap {
  return (
    isPlainObject(value) &&
    Object.values(value).every(
      (byId: unknown) =>
        isPlainObject(byId) &&
        Object.values(byId).every((label: unknown) => typeof label === 'string'),
    )
  );
}

@ValidatorConstraint({ name: 'isSectionMap' })
export class IsSectionMapConstraint implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    return isSectionMap(value);
  }

  defaultMessage(args: ValidationArguments): string {
    return `${args.property} must map each question type to an object of string section labels`;
  }
}

export function IsSectionMap(options?: ValidationOptions) {
  return (target: object, propertyName: string) =>
    registerDecorator({
      target: target.constructor,
      propertyName,
      options,
      validator: IsSectionMapConstraint,
    });
}
