/**
 * Field-Level Validators
 *
 * One function per field rule kind. Each returns a single result: INFO when
 * the value passes, the rule's severity (CRITICAL by default) when it fails.
 */

import type { DateFormatRule, FieldRule, RangeRule, RegexRule } from '../knowledge/types';
import { compilePattern } from '../text';
import type { Severity, ValidationResult } from '../types';
import { makeResult } from './audit-trail';
import { parseDate, parseNumericValue } from './values';

const DEFAULT_FAILURE_SEVERITY: Severity = 'CRITICAL';

function outcome(
  rule: Readonly<FieldRule>,
  fieldName: string,
  passed: boolean,
  failureMessage: string
): ValidationResult {
  return makeResult({
    field_name: fieldName,
    is_valid: passed,
    severity: passed ? 'INFO' : rule.severity ?? DEFAULT_FAILURE_SEVERITY,
    message: passed ? `${fieldName} passed ${rule.name}` : rule.message ?? failureMessage,
    rule_name: rule.name,
    rule_kind: rule.kind,
    stage: 'field',
  });
}

export function validateRegex(rule: Readonly<RegexRule>, fieldName: string, value: string): ValidationResult {
  const fullMatch = compilePattern(`^(?:${rule.pattern})$`, rule.flags).test(value);
  return outcome(rule, fieldName, fullMatch, `${fieldName} does not match the required format`);
}

export function validateRange(rule: Readonly<RangeRule>, fieldName: string, value: string): ValidationResult {
  const numeric = parseNumericValue(value);
  if (numeric === null) {
    return outcome(rule, fieldName, false, `${fieldName} is not a number: "${value}"`);
  }

  const aboveMin = rule.min === undefined || numeric >= rule.min;
  const belowMax = rule.max === undefined || numeric <= rule.max;
  const bounds = `[${rule.min ?? '-inf'}, ${rule.max ?? 'inf'}]`;
  return outcome(rule, fieldName, aboveMin && belowMax, `${fieldName} ${numeric} is outside ${bounds}`);
}

export function validateDateFormat(
  rule: Readonly<DateFormatRule>,
  fieldName: string,
  value: string
): ValidationResult {
  const parsed = parseDate(value, rule.formats);
  return outcome(
    rule,
    fieldName,
    parsed !== null,
    `${fieldName} "${value}" is not a valid date in any of: ${rule.formats.join(', ')}`
  );
}

/**
 * Apply one field rule to a present value
 */
export function applyFieldRule(rule: Readonly<FieldRule>, fieldName: string, value: string): ValidationResult {
  const trimmed = value.trim();
  switch (rule.kind) {
    case 'regex':
      return validateRegex(rule, fieldName, trimmed);
    case 'range':
      return validateRange(rule, fieldName, trimmed);
    case 'date_format':
      return validateDateFormat(rule, fieldName, trimmed);
  }
}

/**
 * Result for a rule that has no value to check
 */
export function missingValueResult(rule: Readonly<FieldRule>, fieldName: string): ValidationResult {
  return makeResult({
    field_name: fieldName,
    is_valid: false,
    severity: 'OPTIONAL',
    message: `${fieldName} has no value to check against ${rule.name}`,
    rule_name: rule.name,
    rule_kind: rule.kind,
    stage: 'field',
  });
}
