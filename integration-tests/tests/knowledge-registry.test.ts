/**
 * Knowledge Registry Tests
 *
 * Built-in domain loading, term normalization and knowledge-base invariants.
 */

import {
  BUILTIN_DOMAINS,
  KnowledgeBaseConfigError,
  UnknownDomainError,
  categorizeField,
  clearRegistry,
  createKnowledgeBase,
  expandAbbreviations,
  getKnowledgeBase,
  getRegistryStats,
  hasDomain,
  listDomains,
  normalizeTerm,
  registerBuiltinDomains,
  registerDomain,
  relatedTerms,
  rulesForField,
  termVariants,
  validateKnowledgeBaseDefinition,
} from '@fieldsense/core';
import type { KnowledgeBaseDefinition } from '@fieldsense/core';

function definition(overrides: Partial<KnowledgeBaseDefinition> = {}): KnowledgeBaseDefinition {
  return {
    domain: 'lending',
    glossary: {
      'Loan Amount': { definition: 'Principal borrowed', category: 'financial' },
      'Appraised Value': { definition: 'Value set by the appraiser', category: 'financial' },
    },
    abbreviations: {},
    aliases: { principal: 'Loan Amount' },
    relationships: [],
    categories: { financial: ['amount', 'value'] },
    entity_patterns: [],
    extraction_rules: [],
    validation_rules: [],
    ...overrides,
  };
}

describe('Knowledge Registry', () => {
  beforeAll(() => {
    clearRegistry();
    registerBuiltinDomains();
  });

  describe('built-in domains', () => {
    it('should register every built-in domain in order', () => {
      expect(listDomains()).toEqual(['real_estate', 'medical', 'insurance', 'finance', 'legal']);
    });

    it('should look domains up case-insensitively', () => {
      expect(hasDomain(' Real_Estate ')).toBe(true);
      expect(getKnowledgeBase('INSURANCE').domain).toBe('insurance');
    });

    it('should throw UnknownDomainError for an unregistered domain', () => {
      expect(() => getKnowledgeBase('aviation')).toThrow(UnknownDomainError);

      try {
        getKnowledgeBase('aviation');
      } catch (error) {
        expect(error).toBeInstanceOf(UnknownDomainError);
        if (error instanceof UnknownDomainError) {
          expect(error.code).toBe('UnknownDomain');
          expect(error.registeredDomains).toContain('medical');
        }
      }
    });

    it('should freeze the knowledge base record', () => {
      const kb = getKnowledgeBase('real_estate');

      expect(Object.isFrozen(kb)).toBe(true);
      expect(Object.isFrozen(kb.glossary)).toBe(true);
      expect(Object.isFrozen(kb.glossary['Grantor'])).toBe(true);
      expect(Object.isFrozen(kb.validationRules)).toBe(true);
    });

    it('should freeze every nested table and rule', () => {
      const kb = getKnowledgeBase('insurance');

      expect(Object.isFrozen(kb.aliases)).toBe(true);
      expect(Object.isFrozen(kb.categories)).toBe(true);
      expect(Object.isFrozen(kb.categories['policy'])).toBe(true);
      expect(Object.isFrozen(kb.entityPatterns[0])).toBe(true);
      expect(Object.isFrozen(kb.validationRules[0])).toBe(true);
      expect(Object.isFrozen(kb.relationships[0])).toBe(true);
    });

    it('should be safe to register the built-ins again', () => {
      registerBuiltinDomains();
      expect(listDomains()).toHaveLength(BUILTIN_DOMAINS.length);
    });
  });

  describe('normalizeTerm', () => {
    it('should resolve "Seller" and "Grantor" to the same canonical term', () => {
      const kb = getKnowledgeBase('real_estate');

      expect(normalizeTerm(kb, 'Seller')).toBe('Grantor');
      expect(normalizeTerm(kb, 'Grantor')).toBe('Grantor');
    });

    it('should ignore case, whitespace and punctuation', () => {
      const kb = getKnowledgeBase('real_estate');

      expect(normalizeTerm(kb, 'PURCHASE   price')).toBe('Purchase Price');
      expect(normalizeTerm(kb, 'seller-name')).toBe('Grantor');
    });

    it('should resolve abbreviations', () => {
      expect(normalizeTerm(getKnowledgeBase('medical'), 'HTN')).toBe('Hypertension');
      expect(normalizeTerm(getKnowledgeBase('medical'), 'dob')).toBe('Date of Birth');
      expect(normalizeTerm(getKnowledgeBase('insurance'), 'Policy #')).toBe('Policy Number');
    });

    it('should return unknown terms unchanged', () => {
      expect(normalizeTerm(getKnowledgeBase('real_estate'), 'Zoning Variance')).toBe('Zoning Variance');
    });

    it('should be idempotent over every known form of every built-in domain', () => {
      for (const domain of BUILTIN_DOMAINS) {
        const kb = getKnowledgeBase(domain);
        const forms = [
          ...Object.keys(kb.glossary),
          ...Object.keys(kb.aliases),
          ...Object.keys(kb.abbreviations),
        ];

        for (const form of forms) {
          const once = normalizeTerm(kb, form);
          expect(Object.prototype.hasOwnProperty.call(kb.glossary, once)).toBe(true);
          expect(normalizeTerm(kb, once)).toBe(once);
        }
      }
    });
  });

  describe('term lookups', () => {
    it('should list related terms in either direction', () => {
      const kb = getKnowledgeBase('real_estate');

      expect(relatedTerms(kb, 'Deed Book')).toEqual(
        new Set(['Page Number', 'Legal Description', 'Recording Date'])
      );
      expect(relatedTerms(kb, 'book')).toEqual(relatedTerms(kb, 'Deed Book'));
      expect(relatedTerms(kb, 'Page Number').has('Deed Book')).toBe(true);
    });

    it('should return an empty set for a term without relationships', () => {
      expect(relatedTerms(getKnowledgeBase('real_estate'), 'Zoning Variance').size).toBe(0);
    });

    it('should list the canonical term followed by aliases and abbreviations', () => {
      expect(termVariants(getKnowledgeBase('real_estate'), 'Grantor')).toEqual([
        'Grantor',
        'seller',
        'seller name',
        'conveyor',
        'donor',
        'gr',
      ]);
    });

    it('should categorize fields', () => {
      const kb = getKnowledgeBase('real_estate');

      expect(categorizeField(kb, 'Seller Name')).toBe('party');
      expect(categorizeField(kb, 'Lot Address Line')).toBe('property');
      expect(categorizeField(kb, 'Zoning Variance')).toBe('general');
      expect(categorizeField(kb, 'Anything', 'Financial Info')).toBe('financial_info');
    });

    it('should not read inherited object keys as glossary entries', () => {
      const kb = getKnowledgeBase('real_estate');

      expect(categorizeField(kb, 'constructor')).toBe('general');
      expect(categorizeField(kb, 'toString')).toBe('general');
      expect(categorizeField(kb, 'valueOf')).toBe('general');
    });

    it('should expand whole-word abbreviations in free text', () => {
      const kb = getKnowledgeBase('medical');

      expect(expandAbbreviations(kb, 'Hx of HTN and DM')).toBe('Hx of Hypertension and Diabetes Mellitus');
      expect(expandAbbreviations(kb, 'ADMIT')).toBe('ADMIT');
    });

    it('should find the rules that name a field through its aliases', () => {
      const names = rulesForField(getKnowledgeBase('real_estate'), 'Sale Price').map((rule) => rule.name);

      expect(names).toEqual([
        'purchase_price_format',
        'purchase_price_range',
        'purchase_price_reasonable',
        'transaction_completeness',
      ]);
    });
  });

  describe('createKnowledgeBase', () => {
    it('should build a knowledge base from a valid definition', () => {
      const kb = createKnowledgeBase(definition());

      expect(kb.domain).toBe('lending');
      expect(normalizeTerm(kb, 'Principal')).toBe('Loan Amount');
    });

    it('should not freeze the caller definition', () => {
      const source = definition();
      createKnowledgeBase(source);

      expect(Object.isFrozen(source.glossary)).toBe(false);
    });

    it('should reject an alias that targets a missing term', () => {
      expect(() => createKnowledgeBase(definition({ aliases: { lender: 'Lender Name' } }))).toThrow(
        'alias "lender" targets "Lender Name", which is not a glossary term'
      );
    });

    it('should reject an alias that shadows another glossary term', () => {
      try {
        createKnowledgeBase(definition({ aliases: { 'APPRAISED VALUE': 'Loan Amount' } }));
        throw new Error('expected a configuration error');
      } catch (error) {
        expect(error).toBeInstanceOf(KnowledgeBaseConfigError);
        if (error instanceof KnowledgeBaseConfigError) {
          expect(error.domain).toBe('lending');
          expect(error.problems).toEqual([
            'alias "APPRAISED VALUE" resolves to "Loan Amount" but names glossary term "Appraised Value"',
          ]);
        }
      }
    });

    it('should reject a pattern that does not compile', () => {
      const broken = definition({
        entity_patterns: [
          {
            name: 'broken',
            entity_type: 'money',
            pattern: '(\\d+',
            specificity: 0.5,
            categories: [],
            keywords: [],
          },
        ],
      });

      expect(() => createKnowledgeBase(broken)).toThrow(KnowledgeBaseConfigError);
    });

    it('should reject a range with min above max', () => {
      const inverted = definition({
        validation_rules: [{ kind: 'range', name: 'loan_range', field: 'Loan Amount', min: 10, max: 1 }],
      });

      expect(() => createKnowledgeBase(inverted)).toThrow('validation rule "loan_range": min 10 exceeds max 1');
    });

    it('should reject a cross-field rule with the wrong number of fields', () => {
      const short = definition({
        validation_rules: [
          { kind: 'cross_field', name: 'loan_vs_value', relation: 'difference_equals', fields: ['Loan Amount', 'Appraised Value'] },
        ],
      });

      expect(() => createKnowledgeBase(short)).toThrow('difference_equals takes 3 field(s), got 2');
    });
  });

  describe('registration', () => {
    it('should register a custom domain and report stats', () => {
      registerDomain('Lending', createKnowledgeBase(definition()));

      const stats = getRegistryStats();
      expect(stats.totalDomains).toBe(6);
      expect(stats.byDomain['lending']).toEqual({
        terms: 2,
        aliases: 1,
        abbreviations: 0,
        relationships: 0,
        rules: 0,
      });
    });

    it('should reject a definition file that breaks the schema', () => {
      const check = validateKnowledgeBaseDefinition({ domain: 'partial' });

      expect(check.valid).toBe(false);
    });

    it('should accept a definition that matches the schema', () => {
      const check = validateKnowledgeBaseDefinition(definition());

      expect(check.valid).toBe(true);
    });
  });
});
