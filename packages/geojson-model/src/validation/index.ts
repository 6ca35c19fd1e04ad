export { ValidationError } from './validation-error.js';
export { ValidationResult, type ValidationResultJSON } from './validation-result.js';
export { type Validatable, isValidatable } from './validatable.js';
export { validateOrThrow, safeValidate, type SafeValidateResult } from './validate.js';
