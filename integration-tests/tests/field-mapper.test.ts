/**
 * Field Mapper Tests
 *
 * Five-factor document scoring, ranking with ties and source selection.
 */

import {
  InvalidConfigurationError,
  clearRegistry,
  createFieldMapper,
  getKnowledgeBase,
  registerBuiltinDomains,
} from '@fieldsense/core';
import type { MapperWeights, SourceDocument } from '@fieldsense/core';

const declarationPage: SourceDocument = {
  content: 'Policy Number: POL123456\nPolicyholder: Jane Roe',
  category: 'policy',
  date: '2024-01-15',
  source: 'policy register',
};

const bareLine: SourceDocument = {
  content: 'Policy Number: POL999999',
};

const billingNote: SourceDocument = {
  content: 'Premium: $1,200',
  category: 'billing',
};

describe('Field Mapper', () => {
  beforeAll(() => {
    clearRegistry();
    registerBuiltinDomains();
  });

  describe('scoreDocument', () => {
    it('should give a fully matching document every sub-score', () => {
      const mapper = createFieldMapper();
      const result = mapper.scoreDocument('Policy Number', declarationPage, getKnowledgeBase('insurance'));

      expect(result.sub_scores).toEqual({
        token_overlap: 100,
        category_match: 100,
        domain_keyword: 100,
        metadata: 100,
        knowledge_base: 100,
      });
      expect(result.score).toBe(100);
    });

    it('should fall back to category keywords when the document declares no category', () => {
      const mapper = createFieldMapper();
      const result = mapper.scoreDocument('Policy Number', bareLine, getKnowledgeBase('insurance'));

      expect(result.sub_scores.category_match).toBe(50);
      expect(result.sub_scores.metadata).toBe(0);
      expect(result.score).toBe(72.5);
    });

    it('should lower the metadata score for a distant reference date', () => {
      const mapper = createFieldMapper();
      const result = mapper.scoreDocument(
        { name: 'Policy Number', reference_date: '2026-01-15' },
        declarationPage,
        getKnowledgeBase('insurance')
      );

      expect(result.sub_scores.metadata).toBe(75);
      expect(result.score).toBe(96.25);
    });

    it('should never lower a score when a weight is raised', () => {
      const kb = getKnowledgeBase('insurance');
      const base = createFieldMapper();
      const bumps: Array<Partial<MapperWeights>> = [
        { token_overlap: 0.5 },
        { category_match: 0.5 },
        { domain_keyword: 0.5 },
        { metadata: 0.5 },
        { knowledge_base: 0.5 },
      ];

      for (const document of [bareLine, billingNote]) {
        const before = base.scoreDocument('Policy Number', document, kb).score;
        for (const weights of bumps) {
          const after = createFieldMapper({ weights }).scoreDocument('Policy Number', document, kb).score;
          expect(after).toBeGreaterThanOrEqual(before);
        }
      }
    });

    it('should keep every score within [0, 100]', () => {
      const mapper = createFieldMapper({ weights: { token_overlap: 5, knowledge_base: 5 } });
      const result = mapper.scoreDocument('Policy Number', declarationPage, getKnowledgeBase('insurance'));

      expect(result.score).toBe(100);
    });
  });

  describe('rankDocumentsForField', () => {
    it('should rank a field named after an inherited object key', () => {
      const mapper = createFieldMapper();
      const kb = getKnowledgeBase('real_estate');

      expect(() =>
        mapper.rankDocumentsForField('toString', [{ content: 'x', category: 'contract' }], kb)
      ).not.toThrow();
      const scored = mapper.scoreDocument({ name: 'Notes', category: 'constructor' }, { content: 'x' }, kb);
      expect(scored.sub_scores.category_match).toBe(0);
    });

    it('should report identical documents as tied and the selection as ambiguous', () => {
      const mapper = createFieldMapper();
      const ranked = mapper.rankDocumentsForField(
        'Policy Number',
        [declarationPage, { ...declarationPage }],
        getKnowledgeBase('insurance')
      );

      expect(ranked).toHaveLength(2);
      expect(ranked.map((candidate) => candidate.document_index)).toEqual([0, 1]);
      expect(ranked.every((candidate) => candidate.tied_for_top)).toBe(true);

      const selection = mapper.selectSourceDocument(ranked);
      expect(selection.kind).toBe('ambiguous');
      if (selection.kind === 'ambiguous') {
        expect(selection.candidates.map((candidate) => candidate.document_index)).toEqual([0, 1]);
      }
    });

    it('should leave out documents that score zero', () => {
      const mapper = createFieldMapper();
      const ranked = mapper.rankDocumentsForField(
        'Policy Number',
        [billingNote, declarationPage],
        getKnowledgeBase('insurance')
      );

      expect(ranked.map((candidate) => candidate.document_index)).toEqual([1]);
    });

    it('should order by score and select the unique leader', () => {
      const mapper = createFieldMapper();
      const ranked = mapper.rankDocumentsForField(
        'Policy Number',
        [bareLine, declarationPage],
        getKnowledgeBase('insurance')
      );

      expect(ranked.map((candidate) => candidate.score)).toEqual([100, 72.5]);
      expect(ranked.some((candidate) => candidate.tied_for_top)).toBe(false);

      const selection = mapper.selectSourceDocument(ranked);
      expect(selection.kind).toBe('unique');
      if (selection.kind === 'unique') {
        expect(selection.candidate.document_index).toBe(1);
      }
    });

    it('should keep tied leaders beyond topK', () => {
      const mapper = createFieldMapper();
      const ranked = mapper.rankDocumentsForField(
        'Policy Number',
        [declarationPage, { ...declarationPage }, bareLine],
        getKnowledgeBase('insurance'),
        1
      );

      expect(ranked.map((candidate) => candidate.document_index)).toEqual([0, 1]);
    });

    it('should cut untied candidates at topK', () => {
      const mapper = createFieldMapper();
      const ranked = mapper.rankDocumentsForField(
        'Policy Number',
        [bareLine, declarationPage],
        getKnowledgeBase('insurance'),
        1
      );

      expect(ranked.map((candidate) => candidate.document_index)).toEqual([1]);
    });

    it('should select nothing from an empty ranking', () => {
      expect(createFieldMapper().selectSourceDocument([])).toEqual({ kind: 'none' });
    });
  });

  describe('configuration', () => {
    it('should reject a negative weight', () => {
      expect(() => createFieldMapper({ weights: { metadata: -1 } })).toThrow(InvalidConfigurationError);
    });

    it('should reject a negative tie epsilon', () => {
      expect(() => createFieldMapper({ tieEpsilon: -0.5 })).toThrow(InvalidConfigurationError);
    });

    it('should reject a topK below one', () => {
      const mapper = createFieldMapper();

      expect(() =>
        mapper.rankDocumentsForField('Policy Number', [bareLine], getKnowledgeBase('insurance'), 0)
      ).toThrow('topK must be a positive integer, got 0');
    });

    it('should freeze its configuration', () => {
      const mapper = createFieldMapper({ tieEpsilon: 0.5 });

      expect(mapper.config.tieEpsilon).toBe(0.5);
      expect(Object.isFrozen(mapper.config)).toBe(true);
      expect(Object.isFrozen(mapper.config.weights)).toBe(true);
    });
  });

  describe('extractFeatures', () => {
    it('should describe a field name', () => {
      const features = createFieldMapper().extractFeatures('Policy Number', getKnowledgeBase('insurance'));

      expect(features).toEqual({
        tokens: ['policy', 'number'],
        token_count: 2,
        has_numbers: false,
        has_special_chars: false,
        category: 'policy',
        domain_keywords: ['policy', 'number'],
      });
    });
  });

  describe('disambiguateField', () => {
    it('should pick the candidate with the highest token overlap', () => {
      const mapper = createFieldMapper();

      expect(mapper.disambiguateField('policy no', ['Policyholder', 'Policy Number', 'Premium'])).toBe(
        'Policy Number'
      );
    });

    it('should return null when nothing overlaps', () => {
      expect(createFieldMapper().disambiguateField('zzz', ['Policy Number', 'Premium'])).toBeNull();
    });
  });
});
