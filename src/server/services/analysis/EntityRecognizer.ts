/**
 * Entity recognition
 *
 * PERSON, ORG, GPE and PRODUCT come from compromise's rule-based tagger, with a
 * lexicon of well-known organizations and products loaded as a plugin. EMAIL,
 * PHONE and URL come from regular expressions. Each type is deduplicated,
 * sorted and capped.
 */

import nlp from 'compromise';
import lexicon from './data/entity-lexicon.json' with { type: 'json' };
import type { IEntityRecognizer } from './interfaces/IEntityRecognizer.js';
import { ENTITY_TYPES, type EntityMap, type EntityType } from '../../types/deep-search.js';

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;
const URL_PATTERN = /https?:\/\/[^\s'"<>]+/g;
// Optional country code and area code, then at least two separated digit groups
const PHONE_PATTERN = /(?<![\w+])(?:\+\d{1,3}[ .-]?)?(?:\(\d{1,4}\)[ .-]?)?\d{2,4}(?:[ .-]\d{2,4}){1,4}(?!\w)/g;
const DATE_LIKE = /^(?:\d{4}[-./]\d{1,2}[-./]\d{1,2}|\d{1,2}[-./]\d{1,2}[-./]\d{2,4})$/;

const words: Record<string, string> = {};
for (const name of lexicon.organizations) words[name.toLowerCase()] = 'Organization';
for (const name of lexicon.products) words[name.toLowerCase()] = 'Product';
nlp.plugin({ tags: { Product: { isA: 'Noun' } }, words });

export class EntityRecognizer implements IEntityRecognizer {
  constructor(private readonly maxPerType: number = 10) {}

  recognize(text: string): EntityMap {
    if (!text.trim()) {
      return {};
    }

    const doc = nlp(text);
    const found: Record<EntityType, string[]> = {
      PERSON: normalize(toStrings(doc.people().out('array'))),
      // lexicon entries are case-insensitive; "apple" the fruit is not Apple
      ORG: normalize(toStrings(doc.organizations().out('array'))).filter(isCapitalized),
      GPE: normalize(toStrings(doc.places().out('array'))),
      PRODUCT: normalize(toStrings(doc.match('#Product+').out('array'))).filter(isCapitalized),
      EMAIL: unique(text.match(EMAIL_PATTERN) ?? []),
      PHONE: unique((text.match(PHONE_PATTERN) ?? []).filter(isPhoneNumber)),
      URL: unique((text.match(URL_PATTERN) ?? []).map((url) => url.replace(/[.,;:!?)\]]+$/, ''))),
    };

    const entities: EntityMap = {};
    for (const type of ENTITY_TYPES) {
      const values = found[type].slice(0, this.maxPerType);
      if (values.length > 0) {
        entities[type] = values;
      }
    }
    return entities;
  }
}

function toStrings(output: unknown): string[] {
  if (!Array.isArray(output)) return [];
  return output.filter((value): value is string => typeof value === 'string');
}

function isCapitalized(value: string): boolean {
  return /\p{Lu}/u.test(value);
}

function isPhoneNumber(candidate: string): boolean {
  const digits = candidate.replace(/\D/g, '').length;
  return digits >= 7 && digits <= 15 && !DATE_LIKE.test(candidate);
}

/**
 * Trim surrounding punctuation, drop empties, deduplicate and sort
 */
function normalize(values: readonly string[]): string[] {
  const cleaned = values
    .map((value) => value.replace(/\s+/g, ' ').replace(/^[\s"'“‘(]+|[\s"'”’.,;:!?)]+$/g, ''))
    .filter((value) => value.length > 0);
  return unique(cleaned);
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)].sort();
}
