/**
 * Validation Tests
 *
 * Field rules, cross-field rules, compliance checks and the form report.
 */

import {
  AuditTrail,
  checkCompliance,
  clearRegistry,
  createKnowledgeBase,
  registerBuiltinDomains,
  registerDomain,
  validateCrossFields,
  validateField,
  validateForm,
  validateRegex,
} from '@fieldsense/core';
import type { FormValues, RegexRule, ValidationResult } from '@fieldsense/core';

function byRule(results: readonly ValidationResult[], ruleName: string): ValidationResult | undefined {
  return results.find((result) => result.rule_name === ruleName);
}

const completeDeed: FormValues = {
  Grantor: 'John Smith',
  'Buyer Name': 'Jane Doe',
  'Property Address': '123 Main St, Nashville, TN 37201',
  'Purchase Price': '$250,000',
  'Contract Date': '2024-01-02',
  'Closing Date': '2024-02-15',
};

describe('Validation', () => {
  beforeAll(() => {
    clearRegistry();
    registerBuiltinDomains();
    registerDomain(
      'lending',
      createKnowledgeBase({
        domain: 'lending',
        glossary: {
          'Loan Amount': { definition: 'Principal borrowed', category: 'financial' },
          'Appraised Value': { definition: 'Value set by the appraiser', category: 'financial' },
        },
        abbreviations: {},
        aliases: {},
        relationships: [],
        categories: { financial: ['amount', 'value'] },
        entity_patterns: [],
        extraction_rules: [],
        validation_rules: [
          {
            kind: 'cross_field',
            name: 'loan_within_value',
            relation: 'less_than_or_equal',
            fields: ['Loan Amount', 'Appraised Value'],
            mandatory: ['Appraised Value'],
          },
        ],
      })
    );
  });

  describe('validateField', () => {
    it('should pass a well-formed purchase price on every rule', () => {
      const results = validateField('real_estate', 'Purchase Price', '$250,000');

      expect(results.map((r) => r.rule_name)).toEqual([
        'purchase_price_format',
        'purchase_price_range',
        'purchase_price_reasonable',
      ]);
      expect(results.every((r) => r.is_valid && r.severity === 'INFO')).toBe(true);
      expect(results[0].message).toBe('Purchase Price passed purchase_price_format');
    });

    it('should fail a negative purchase price as CRITICAL on the range rule', () => {
      const results = validateField('real_estate', 'Purchase Price', '-$5');
      const range = byRule(results, 'purchase_price_range');

      expect(range?.is_valid).toBe(false);
      expect(range?.severity).toBe('CRITICAL');
      expect(range?.message).toBe('Purchase Price -5 is outside [0, 100000000]');
      expect(byRule(results, 'purchase_price_format')?.severity).toBe('WARNING');
      expect(byRule(results, 'purchase_price_reasonable')?.severity).toBe('WARNING');
    });

    it('should check rules written for the canonical term of an alias', () => {
      const results = validateField('real_estate', 'Sale Price', '$250,000');

      expect(results).toHaveLength(3);
      expect(results[0].field_name).toBe('Purchase Price');
    });

    it('should report an INFO result for a field without rules', () => {
      const results = validateField('real_estate', 'Title Company', 'First Title Co');

      expect(results).toHaveLength(1);
      expect(results[0]).toMatchObject({
        field_name: 'Title Company',
        is_valid: true,
        severity: 'INFO',
        rule_name: 'none',
        stage: 'field',
      });
    });

    it('should mark every rule OPTIONAL for an empty value', () => {
      const results = validateField('real_estate', 'Purchase Price', '  ');

      expect(results).toHaveLength(3);
      expect(results.every((r) => !r.is_valid && r.severity === 'OPTIONAL')).toBe(true);
    });

    it('should reject an impossible calendar date', () => {
      const [result] = validateField('real_estate', 'Closing Date', '02/30/2024');

      expect(result.is_valid).toBe(false);
      expect(result.severity).toBe('CRITICAL');
      expect(result.message).toBe(
        'Closing Date "02/30/2024" is not a valid date in any of: MM/DD/YYYY, YYYY-MM-DD, MMMM D, YYYY'
      );
    });

    it('should accept a date written with the month name', () => {
      const [result] = validateField('real_estate', 'Closing Date', 'January 15, 2024');

      expect(result.is_valid).toBe(true);
    });

    it('should fail a range rule on a non-numeric value', () => {
      const [result] = validateField('insurance', 'Premium', 'about twelve hundred');

      expect(result.is_valid).toBe(false);
      expect(result.message).toBe('Premium is not a number: "about twelve hundred"');
    });
  });

  describe('validateRegex', () => {
    it('should match the whole value against any alternative', () => {
      const rule: RegexRule = { kind: 'regex', name: 'code_shape', field: 'Code', pattern: 'a|ab' };

      expect(validateRegex(rule, 'Code', 'ab').is_valid).toBe(true);
      expect(validateRegex(rule, 'Code', 'a').is_valid).toBe(true);
      expect(validateRegex(rule, 'Code', 'abc').is_valid).toBe(false);
      expect(validateRegex(rule, 'Code', 'xab').is_valid).toBe(false);
    });
  });

  describe('validateCrossFields', () => {
    it('should fail a closing date before the contract date', () => {
      const results = validateCrossFields('real_estate', {
        'Closing Date': '2024-02-15',
        'Contract Date': '2024-03-01',
      });

      expect(byRule(results, 'closing_after_contract')).toMatchObject({
        is_valid: false,
        severity: 'CRITICAL',
        stage: 'cross_field',
        rule_kind: 'cross_field:date_before',
        field_name: 'Contract Date, Closing Date',
        message: 'Closing Date must be after Contract Date',
      });
    });

    it('should pass dates in order', () => {
      const results = validateCrossFields('real_estate', {
        'Contract Date': '2024-01-02',
        'Closing Date': '2024-02-15',
      });

      expect(byRule(results, 'closing_after_contract')?.is_valid).toBe(true);
    });

    it('should skip a rule when one of its fields is absent', () => {
      const results = validateCrossFields('real_estate', { 'Closing Date': '2024-02-15' });
      const rule = byRule(results, 'closing_after_contract');

      expect(results.some((r) => r.severity === 'CRITICAL')).toBe(false);
      expect(rule?.is_valid).toBe(true);
      expect(rule?.severity).toBe('INFO');
      expect(rule?.message).toBe('closing_after_contract skipped: Contract Date absent or invalid');
    });

    it('should fail when a mandatory field is absent', () => {
      const [result] = validateCrossFields('lending', { 'Loan Amount': '200000' });

      expect(result.is_valid).toBe(false);
      expect(result.severity).toBe('CRITICAL');
      expect(result.message).toBe('loan_within_value needs Appraised Value');
    });

    it('should require the page when a deed book is given', () => {
      const without = validateCrossFields('real_estate', { 'Deed Book': 'Book 5432' });
      const withPage = validateCrossFields('real_estate', { 'Deed Book': 'Book 5432', 'Page Number': '234' });

      expect(byRule(without, 'deed_book_with_page')).toMatchObject({
        is_valid: false,
        severity: 'WARNING',
        message: 'A deed book reference needs its page number',
      });
      expect(byRule(withPage, 'deed_book_with_page')?.is_valid).toBe(true);
    });

    it('should check that net income balances within tolerance', () => {
      const balanced = validateCrossFields('finance', {
        Revenue: '$1,500,000',
        Expense: '$900,000',
        'Net Income': '$600,000',
      });
      const unbalanced = validateCrossFields('finance', {
        Revenue: '$1,500,000',
        Expense: '$900,000',
        'Net Income': '$500,000',
      });

      expect(byRule(balanced, 'net_income_balances')?.is_valid).toBe(true);
      expect(byRule(unbalanced, 'net_income_balances')).toMatchObject({
        is_valid: false,
        severity: 'CRITICAL',
        message: 'Net Income must equal Revenue minus Expense',
      });
    });

    it('should warn when the premium is high relative to the limit', () => {
      const results = validateCrossFields('insurance', { Premium: '$50,000', 'Coverage Limit': '$100,000' });

      expect(results.map((r) => r.rule_name)).toEqual([
        'deductible_within_limit',
        'premium_to_limit_ratio',
        'coverage_period_order',
      ]);
      expect(byRule(results, 'premium_to_limit_ratio')).toMatchObject({ is_valid: false, severity: 'WARNING' });
      expect(byRule(results, 'deductible_within_limit')?.severity).toBe('INFO');
    });
  });

  describe('checkCompliance', () => {
    it('should evaluate every compliance rule of the domain', () => {
      const results = checkCompliance('medical', {
        'Patient ID': 'MRN448812',
        Dx: 'Hypertension',
        Notes: 'SSN on file 000-12-3456',
      });

      expect(results.map((r) => [r.rule_name, r.is_valid])).toEqual([
        ['hipaa_identifier_present', true],
        ['clinical_reason_documented', true],
        ['no_social_security_numbers', false],
      ]);
      expect(byRule(results, 'no_social_security_numbers')).toMatchObject({
        field_name: '*',
        severity: 'CRITICAL',
        rule_kind: 'compliance:disallowed_pattern',
        message: 'Social Security numbers must not appear in extracted fields',
      });
    });

    it('should list missing required fields', () => {
      const [result] = checkCompliance('insurance', { 'Policy Number': 'POL123456' });

      expect(result.is_valid).toBe(false);
      expect(result.message).toBe('Missing required fields: Policyholder');
    });
  });

  describe('validateForm', () => {
    it('should report a complete form as compliant', () => {
      const report = validateForm('real_estate', completeDeed);

      expect(report.status).toBe('COMPLIANT');
      expect(report.critical_failures).toBe(0);
      expect(report.warnings).toBe(0);
      expect(report.results).toHaveLength(11);
      expect(report.field_states).toEqual({
        Grantor: 'FIELD_VALID',
        Grantee: 'FIELD_VALID',
        'Property Address': 'FIELD_VALID',
        'Purchase Price': 'FIELD_VALID',
        'Contract Date': 'CROSS_VALID',
        'Closing Date': 'CROSS_VALID',
      });
    });

    it('should report a CRITICAL cross-field failure as non-compliant', () => {
      const report = validateForm('real_estate', { ...completeDeed, 'Contract Date': '2024-03-01' });

      expect(report.status).toBe('NON_COMPLIANT');
      expect(report.critical_failures).toBe(1);
      expect(report.field_states['Closing Date']).toBe('CROSS_INVALID');
      expect(report.field_states['Contract Date']).toBe('CROSS_INVALID');
    });

    it('should stay compliant with warnings only', () => {
      const report = validateForm('real_estate', { ...completeDeed, 'Purchase Price': '250000.5' });

      expect(report.status).toBe('COMPLIANT');
      expect(report.warnings).toBe(1);
      expect(report.field_states['Purchase Price']).toBe('FIELD_VALID');
    });

    it('should mark a field with a CRITICAL failure as FIELD_INVALID', () => {
      const report = validateForm('real_estate', { ...completeDeed, 'Purchase Price': '-$5' });

      expect(report.status).toBe('NON_COMPLIANT');
      expect(report.field_states['Purchase Price']).toBe('FIELD_INVALID');
    });

    it('should freeze the report', () => {
      const report = validateForm('real_estate', completeDeed);

      expect(Object.isFrozen(report)).toBe(true);
      expect(Object.isFrozen(report.results[0])).toBe(true);
    });
  });

  describe('AuditTrail', () => {
    it('should collect results across calls in order', () => {
      const trail = new AuditTrail();
      validateField('real_estate', 'Purchase Price', '-$5', trail);
      validateField('real_estate', 'Closing Date', '2024-02-15', trail);

      expect(trail.size).toBe(4);
      expect(trail.snapshot().map((r) => r.rule_name)).toEqual([
        'purchase_price_format',
        'purchase_price_range',
        'purchase_price_reasonable',
        'closing_date_format',
      ]);
      expect(trail.failures('CRITICAL')).toHaveLength(1);
      expect(trail.failures()).toHaveLength(3);
      expect(trail.byStage('cross_field')).toHaveLength(0);
    });

    it('should hand out frozen snapshots', () => {
      const trail = new AuditTrail();
      validateField('real_estate', 'Purchase Price', '$250,000', trail);
      const snapshot = trail.snapshot();

      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(Object.isFrozen(snapshot[0])).toBe(true);

      validateField('real_estate', 'Purchase Price', '$250,000', trail);
      expect(snapshot).toHaveLength(3);
      expect(trail.size).toBe(6);
    });

    it('should stamp each result with an ISO timestamp', () => {
      const [result] = validateField('real_estate', 'Closing Date', '2024-02-15');

      expect(new Date(result.timestamp).toISOString()).toBe(result.timestamp);
    });
  });
});
