/**
 * Validation Engine
 *
 * Layered validation of one form:
 *
 *   UNVALIDATED -> FIELD_VALID | FIELD_INVALID      (field rules)
 *   FIELD_VALID -> CROSS_VALID | CROSS_INVALID      (cross-field rules that apply)
 *   then compliance rules over the whole form
 *
 * Form keys are resolved through the domain's knowledge base first, so a value
 * supplied as "Seller Name" is checked by rules written for "Grantor".
 */

import { getKnowledgeBase } from '../knowledge/registry';
import { fieldRulesFor, normalizeTerm } from '../knowledge/terms';
import type { ComplianceRule, CrossFieldRule, KnowledgeBase } from '../knowledge/types';
import { logger } from '../logger';
import { complianceReportsCounter, validationResultsCounter } from '../metrics';
import type { ComplianceReport, FieldValidationState, FormValues, ValidationResult } from '../types';
import { AuditTrail, makeResult } from './audit-trail';
import { evaluateComplianceRule } from './compliance';
import { evaluateCrossFieldRule } from './cross-field';
import { applyFieldRule, missingValueResult } from './field-validators';
import { isPresent } from './values';

type CanonicalValues = Map<string, string | null>;

/**
 * Re-key form values by canonical term. When two keys resolve to the same
 * term, the first present value wins.
 */
function canonicalValues(kb: KnowledgeBase, values: FormValues): CanonicalValues {
  const canonical: CanonicalValues = new Map();
  for (const [key, value] of Object.entries(values)) {
    const term = normalizeTerm(kb, key);
    if (!isPresent(canonical.get(term))) {
      canonical.set(term, isPresent(value) ? value : null);
    }
  }
  return canonical;
}

function crossFieldRules(kb: KnowledgeBase): Readonly<CrossFieldRule>[] {
  return kb.validationRules
    .filter((rule): rule is Readonly<CrossFieldRule> => rule.kind === 'cross_field')
    .map((rule) => ({
      ...rule,
      fields: rule.fields.map((field) => normalizeTerm(kb, field)),
      mandatory: rule.mandatory?.map((field) => normalizeTerm(kb, field)),
    }));
}

function complianceRules(kb: KnowledgeBase): Readonly<ComplianceRule>[] {
  return kb.validationRules
    .filter((rule): rule is Readonly<ComplianceRule> => rule.kind === 'compliance')
    .map((rule) => ({
      ...rule,
      fields: rule.fields?.map((field) => normalizeTerm(kb, field)),
    }));
}

/**
 * A field fails field-level validation on a CRITICAL failure or a missing
 * value; WARNING failures leave it usable by cross-field rules.
 */
function fieldState(results: readonly ValidationResult[]): FieldValidationState {
  const blocking = results.some(
    (result) => !result.is_valid && (result.severity === 'CRITICAL' || result.severity === 'OPTIONAL')
  );
  return blocking ? 'FIELD_INVALID' : 'FIELD_VALID';
}

function fieldResults(kb: KnowledgeBase, fieldName: string, value: string | null | undefined): ValidationResult[] {
  const canonical = normalizeTerm(kb, fieldName);
  const rules = fieldRulesFor(kb, canonical);

  if (rules.length === 0) {
    return [
      makeResult({
        field_name: canonical,
        is_valid: true,
        severity: 'INFO',
        message: `No validation rules for ${canonical}`,
        rule_name: 'none',
        rule_kind: 'none',
        stage: 'field',
      }),
    ];
  }

  if (!isPresent(value)) {
    return rules.map((rule) => missingValueResult(rule, canonical));
  }
  return rules.map((rule) => applyFieldRule(rule, canonical, value));
}

function runCrossFields(
  kb: KnowledgeBase,
  values: CanonicalValues,
  states: Map<string, FieldValidationState>
): ValidationResult[] {
  const results: ValidationResult[] = [];

  for (const rule of crossFieldRules(kb)) {
    const { result, evaluated } = evaluateCrossFieldRule(rule, { values, states });
    results.push(result);
    if (!evaluated) continue;

    for (const field of rule.fields) {
      if (!states.has(field)) continue;
      if (!result.is_valid) {
        states.set(field, 'CROSS_INVALID');
      } else if (states.get(field) !== 'CROSS_INVALID') {
        states.set(field, 'CROSS_VALID');
      }
    }
  }
  return results;
}

function fieldStates(kb: KnowledgeBase, values: CanonicalValues): Map<string, FieldValidationState> {
  const states = new Map<string, FieldValidationState>();
  for (const [field, value] of values) {
    states.set(field, fieldState(fieldResults(kb, field, value)));
  }
  return states;
}

function recordMetrics(domain: string, results: readonly ValidationResult[]): void {
  for (const result of results) {
    validationResultsCounter.inc({
      domain,
      stage: result.stage,
      severity: result.severity,
      valid: String(result.is_valid),
    });
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Apply the field-level rules for one field.
 *
 * @throws UnknownDomainError if the domain has no knowledge base
 */
export function validateField(
  domain: string,
  fieldName: string,
  value: string | null | undefined,
  trail?: AuditTrail
): ValidationResult[] {
  const results = fieldResults(getKnowledgeBase(domain), fieldName, value);
  trail?.recordAll(results);
  return results;
}

/**
 * Apply every cross-field rule of the domain to a form. Field states are
 * derived from field-level validation of the same values.
 */
export function validateCrossFields(domain: string, values: FormValues, trail?: AuditTrail): ValidationResult[] {
  const kb = getKnowledgeBase(domain);
  const canonical = canonicalValues(kb, values);
  const results = runCrossFields(kb, canonical, fieldStates(kb, canonical));
  trail?.recordAll(results);
  return results;
}

/**
 * Apply every compliance rule of the domain to a form
 */
export function checkCompliance(domain: string, values: FormValues, trail?: AuditTrail): ValidationResult[] {
  const kb = getKnowledgeBase(domain);
  const canonical = canonicalValues(kb, values);
  const results = complianceRules(kb).map((rule) => evaluateComplianceRule(rule, canonical));
  trail?.recordAll(results);
  return results;
}

/**
 * Validate a whole form: field rules, then cross-field rules, then
 * compliance. The form is NON_COMPLIANT when any check fails with CRITICAL
 * severity.
 */
export function validateForm(domain: string, values: FormValues, trail: AuditTrail = new AuditTrail()): ComplianceReport {
  const kb = getKnowledgeBase(domain);
  const canonical = canonicalValues(kb, values);
  const states = new Map<string, FieldValidationState>();

  for (const [field, value] of canonical) {
    states.set(field, 'UNVALIDATED');
    const results = fieldResults(kb, field, value);
    trail.recordAll(results);
    states.set(field, fieldState(results));
  }

  trail.recordAll(runCrossFields(kb, canonical, states));
  trail.recordAll(complianceRules(kb).map((rule) => evaluateComplianceRule(rule, canonical)));

  const results = [...trail.snapshot()];
  const critical_failures = results.filter((r) => !r.is_valid && r.severity === 'CRITICAL').length;
  const warnings = results.filter((r) => !r.is_valid && r.severity === 'WARNING').length;
  const status = critical_failures > 0 ? 'NON_COMPLIANT' : 'COMPLIANT';

  recordMetrics(kb.domain, results);
  complianceReportsCounter.inc({ domain: kb.domain, status });

  logger.info('Form validated', {
    domain: kb.domain,
    fields: canonical.size,
    checks: results.length,
    critical_failures,
    warnings,
    status,
  });

  return Object.freeze({
    domain: kb.domain,
    status,
    results,
    critical_failures,
    warnings,
    field_states: Object.fromEntries(states),
  });
}
