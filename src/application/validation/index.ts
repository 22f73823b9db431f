export { createValidator, acceptAll } from './IValidator';
export type { IValidator, ValidationFailure } from './IValidator';
export { ZodValidator, toValidationFailures } from './ZodValidator';
