/**
 * Term Lookup
 *
 * Pure functions over a knowledge base record: canonicalization, variants,
 * relationships and categorisation of field names.
 */

import { containsPhrase, escapeRegExp, foldTerm, tokenSet } from '../text';
import type { FieldRule, KnowledgeBase, ValidationRule } from './types';

/**
 * Resolve a raw term to its canonical glossary form.
 *
 * Lookup order: exact glossary key, exact abbreviation, exact alias, then the
 * same three tables compared case-, whitespace- and punctuation-insensitively.
 * Unknown input is returned unchanged.
 */
export function normalizeTerm(kb: KnowledgeBase, raw: string): string {
  if (Object.prototype.hasOwnProperty.call(kb.glossary, raw)) return raw;
  if (Object.prototype.hasOwnProperty.call(kb.abbreviations, raw)) return kb.abbreviations[raw];
  if (Object.prototype.hasOwnProperty.call(kb.aliases, raw)) return kb.aliases[raw];

  const folded = foldTerm(raw);
  return (
    kb.index.canonicalByFolded.get(folded) ??
    kb.index.abbreviationByFolded.get(folded) ??
    kb.index.aliasByFolded.get(folded) ??
    raw
  );
}

/**
 * Whether a term resolves to a glossary entry
 */
export function isKnownTerm(kb: KnowledgeBase, raw: string): boolean {
  return Object.prototype.hasOwnProperty.call(kb.glossary, normalizeTerm(kb, raw));
}

/**
 * Terms linked to `term` through a relationship, in either direction.
 * The term itself is never included.
 */
export function relatedTerms(kb: KnowledgeBase, term: string): Set<string> {
  const canonical = normalizeTerm(kb, term);
  const linked = kb.index.relatedByTerm.get(foldTerm(canonical)) ?? [];
  return new Set(linked.filter((t) => foldTerm(t) !== foldTerm(canonical)));
}

/**
 * Canonical form followed by every alias and abbreviation of it
 */
export function termVariants(kb: KnowledgeBase, term: string): string[] {
  const canonical = normalizeTerm(kb, term);
  const variants = [canonical, ...(kb.index.variantsByCanonical.get(canonical) ?? [])];
  if (foldTerm(term) !== foldTerm(canonical)) {
    variants.unshift(term);
  }
  return variants;
}

/**
 * Category of a field: the declared one, else the glossary category of its
 * canonical term, else the first category whose keyword appears in the name.
 */
export function categorizeField(kb: KnowledgeBase, fieldName: string, declared?: string): string {
  if (declared && declared.trim()) return foldTerm(declared).replace(/ /g, '_');

  const canonical = normalizeTerm(kb, fieldName);
  if (Object.prototype.hasOwnProperty.call(kb.glossary, canonical)) {
    return kb.glossary[canonical].category;
  }

  for (const [category, keywords] of Object.entries(kb.categories)) {
    if (keywords.some((keyword) => containsPhrase(fieldName, keyword))) {
      return category;
    }
  }
  return 'general';
}

/**
 * Whether a document category and a field category share a token.
 * "insurance_policy" aligns with "policy".
 */
export function categoriesAlign(documentCategory: string | undefined, fieldCategory: string): boolean {
  if (!documentCategory) return false;
  const documentTokens = tokenSet(documentCategory);
  for (const token of tokenSet(fieldCategory)) {
    if (documentTokens.has(token)) return true;
  }
  return false;
}

/**
 * Category keywords of the domain that appear in a field name
 */
export function domainKeywords(kb: KnowledgeBase, fieldName: string): string[] {
  const found: string[] = [];
  for (const keywords of Object.values(kb.categories)) {
    for (const keyword of keywords) {
      if (containsPhrase(fieldName, keyword) && !found.includes(keyword)) {
        found.push(keyword);
      }
    }
  }
  return found;
}

/**
 * Replace whole-word abbreviations in free text with their canonical terms.
 * "Hx of HTN" becomes "Hx of Hypertension" in the medical domain.
 */
export function expandAbbreviations(kb: KnowledgeBase, text: string): string {
  const forms = Object.keys(kb.abbreviations).sort((a, b) => b.length - a.length);
  if (forms.length === 0) return text;

  const pattern = new RegExp(`(?<![\\p{L}\\p{N}])(${forms.map(escapeRegExp).join('|')})(?![\\p{L}\\p{N}])`, 'gu');
  return text.replace(pattern, (form: string) => kb.abbreviations[form] ?? form);
}

/**
 * Validation rules that name a field, matched on the canonical form
 */
export function rulesForField(kb: KnowledgeBase, fieldName: string): Readonly<ValidationRule>[] {
  const key = foldTerm(normalizeTerm(kb, fieldName));
  const names = (rule: Readonly<ValidationRule>): readonly string[] => {
    switch (rule.kind) {
      case 'regex':
      case 'range':
      case 'date_format':
        return [rule.field];
      case 'cross_field':
        return rule.fields;
      case 'compliance':
        return rule.fields ?? [];
    }
  };

  return kb.validationRules.filter((rule) =>
    names(rule).some((name) => foldTerm(normalizeTerm(kb, name)) === key)
  );
}

/**
 * Field-level rules (regex, range, date format) for a field
 */
export function fieldRulesFor(kb: KnowledgeBase, fieldName: string): Readonly<FieldRule>[] {
  return rulesForField(kb, fieldName).filter(
    (rule): rule is Readonly<FieldRule> =>
      rule.kind === 'regex' || rule.kind === 'range' || rule.kind === 'date_format'
  );
}
