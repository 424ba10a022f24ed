/**
 * Cross-Field Validators
 *
 * Relations between two or more fields of the same form. A rule is evaluated
 * only when every field it references is present and passed field-level
 * validation; `requires` only needs its first field.
 */

import type { CrossFieldRule } from '../knowledge/types';
import type { FieldValidationState, Severity, ValidationResult } from '../types';
import { makeResult } from './audit-trail';
import { DEFAULT_DATE_FORMATS, isPresent, parseDate, parseNumericValue } from './values';

const DEFAULT_FAILURE_SEVERITY: Severity = 'CRITICAL';

/** Form values and field states keyed by canonical field name */
export interface FormState {
  values: ReadonlyMap<string, string | null>;
  states: ReadonlyMap<string, FieldValidationState>;
}

export interface CrossFieldOutcome {
  result: ValidationResult;
  /** Whether the relation itself was checked (false when skipped for absent fields) */
  evaluated: boolean;
}

function result(rule: Readonly<CrossFieldRule>, isValid: boolean, severity: Severity, message: string): ValidationResult {
  return makeResult({
    field_name: rule.fields.join(', '),
    is_valid: isValid,
    severity,
    message,
    rule_name: rule.name,
    rule_kind: `cross_field:${rule.relation}`,
    stage: 'cross_field',
  });
}

function pass(rule: Readonly<CrossFieldRule>): CrossFieldOutcome {
  return { result: result(rule, true, 'INFO', `${rule.name} holds`), evaluated: true };
}

function fail(rule: Readonly<CrossFieldRule>, message: string): CrossFieldOutcome {
  return {
    result: result(rule, false, rule.severity ?? DEFAULT_FAILURE_SEVERITY, rule.message ?? message),
    evaluated: true,
  };
}

function numbers(fields: readonly string[], values: ReadonlyMap<string, string | null>): number[] | string {
  const parsed: number[] = [];
  for (const field of fields) {
    const numeric = parseNumericValue(values.get(field) ?? '');
    if (numeric === null) return `${field} is not numeric`;
    parsed.push(numeric);
  }
  return parsed;
}

function dates(
  fields: readonly string[],
  values: ReadonlyMap<string, string | null>,
  formats: readonly string[]
): Date[] | string {
  const parsed: Date[] = [];
  for (const field of fields) {
    const date = parseDate(values.get(field) ?? '', formats);
    if (date === null) return `${field} is not a valid date`;
    parsed.push(date);
  }
  return parsed;
}

function evaluateRelation(rule: Readonly<CrossFieldRule>, values: ReadonlyMap<string, string | null>): CrossFieldOutcome {
  const [first, second, third] = rule.fields;

  switch (rule.relation) {
    case 'less_than':
    case 'less_than_or_equal': {
      const parsed = numbers([first, second], values);
      if (typeof parsed === 'string') return fail(rule, parsed);
      const [a, b] = parsed;
      const holds = rule.relation === 'less_than' ? a < b : a <= b;
      const operator = rule.relation === 'less_than' ? '<' : '<=';
      return holds ? pass(rule) : fail(rule, `${first} (${a}) must be ${operator} ${second} (${b})`);
    }

    case 'date_before':
    case 'date_on_or_before': {
      const parsed = dates([first, second], values, rule.formats ?? DEFAULT_DATE_FORMATS);
      if (typeof parsed === 'string') return fail(rule, parsed);
      const [a, b] = parsed;
      const holds = rule.relation === 'date_before' ? a.getTime() < b.getTime() : a.getTime() <= b.getTime();
      const word = rule.relation === 'date_before' ? 'before' : 'on or before';
      return holds ? pass(rule) : fail(rule, `${first} must be ${word} ${second}`);
    }

    case 'difference_equals': {
      const parsed = numbers([first, second, third], values);
      if (typeof parsed === 'string') return fail(rule, parsed);
      const [a, b, c] = parsed;
      const tolerance = rule.tolerance ?? 0;
      return Math.abs(a - b - c) <= tolerance
        ? pass(rule)
        : fail(rule, `${first} - ${second} = ${a - b}, expected ${third} (${c})`);
    }

    case 'ratio_at_most': {
      const parsed = numbers([first, second], values);
      if (typeof parsed === 'string') return fail(rule, parsed);
      const [a, b] = parsed;
      if (b === 0) return fail(rule, `${second} is zero`);
      const max = rule.max ?? Number.POSITIVE_INFINITY;
      return a / b <= max ? pass(rule) : fail(rule, `${first} / ${second} = ${a / b} exceeds ${max}`);
    }

    case 'requires': {
      const missing = rule.fields.slice(1).filter((field) => !isPresent(values.get(field)));
      return missing.length === 0 ? pass(rule) : fail(rule, `${first} requires ${missing.join(', ')}`);
    }
  }
}

/**
 * Evaluate one cross-field rule whose field names are already canonical
 */
export function evaluateCrossFieldRule(rule: Readonly<CrossFieldRule>, form: FormState): CrossFieldOutcome {
  const { values, states } = form;
  const absent =
    rule.relation === 'requires'
      ? rule.fields.slice(0, 1).filter((field) => !isPresent(values.get(field)))
      : rule.fields.filter((field) => !isPresent(values.get(field)) || states.get(field) !== 'FIELD_VALID');

  if (absent.length === 0) {
    return evaluateRelation(rule, values);
  }

  const mandatoryAbsent = absent.filter((field) => (rule.mandatory ?? []).includes(field));
  if (mandatoryAbsent.length > 0) {
    return {
      result: result(
        rule,
        false,
        rule.severity ?? DEFAULT_FAILURE_SEVERITY,
        `${rule.name} needs ${mandatoryAbsent.join(', ')}`
      ),
      evaluated: true,
    };
  }

  return {
    result: result(rule, true, 'INFO', `${rule.name} skipped: ${absent.join(', ')} absent or invalid`),
    evaluated: false,
  };
}
