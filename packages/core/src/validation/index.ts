/**
 * Validation Index
 */

export { AuditTrail } from './audit-trail';
export { validateField, validateCrossFields, checkCompliance, validateForm } from './engine';
export { applyFieldRule, validateRegex, validateRange, validateDateFormat } from './field-validators';
export { evaluateCrossFieldRule } from './cross-field';
export type { CrossFieldOutcome, FormState } from './cross-field';
export { evaluateComplianceRule } from './compliance';
export {
  DEFAULT_DATE_FORMATS,
  isValidDateFormat,
  parseDate,
  parseDateWithFormat,
  parseNumericValue,
  isPresent,
} from './values';
