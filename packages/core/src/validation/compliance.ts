/**
 * Compliance Checks
 *
 * Form-wide predicates from a domain's compliance rules. Each rule yields one
 * result carrying the rule's declared severity on failure.
 */

import type { ComplianceRule } from '../knowledge/types';
import { compilePattern } from '../text';
import type { ValidationResult } from '../types';
import { makeResult } from './audit-trail';
import { isPresent } from './values';

function result(rule: Readonly<ComplianceRule>, fieldName: string, isValid: boolean, message: string): ValidationResult {
  return makeResult({
    field_name: fieldName,
    is_valid: isValid,
    severity: isValid ? 'INFO' : rule.severity,
    message: isValid ? `${rule.name} satisfied` : rule.message ?? message,
    rule_name: rule.name,
    rule_kind: `compliance:${rule.predicate}`,
    stage: 'compliance',
  });
}

/**
 * Evaluate a compliance rule whose field names are already canonical
 */
export function evaluateComplianceRule(
  rule: Readonly<ComplianceRule>,
  values: ReadonlyMap<string, string | null>
): ValidationResult {
  const fields = rule.fields ?? [];

  switch (rule.predicate) {
    case 'required_fields': {
      const missing = fields.filter((field) => !isPresent(values.get(field)));
      return result(rule, fields.join(', '), missing.length === 0, `Missing required fields: ${missing.join(', ')}`);
    }

    case 'at_least_one_of': {
      const anyPresent = fields.some((field) => isPresent(values.get(field)));
      return result(rule, fields.join(', '), anyPresent, `At least one of ${fields.join(', ')} is required`);
    }

    case 'disallowed_pattern': {
      const pattern = compilePattern(rule.pattern ?? '', rule.flags);
      const scope = rule.fields ?? [...values.keys()];
      const offending = scope.filter((field) => {
        const value = values.get(field);
        return isPresent(value) && pattern.test(value);
      });
      return result(
        rule,
        rule.fields ? fields.join(', ') : '*',
        offending.length === 0,
        `Disallowed content found in: ${offending.join(', ')}`
      );
    }
  }
}
