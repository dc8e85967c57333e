import { describe, it, expect } from 'vitest';
import { EntityRecognizer } from '../EntityRecognizer.js';

describe('EntityRecognizer', () => {
  const recognizer = new EntityRecognizer();

  it('finds e-mail addresses and URLs', () => {
    const entities = recognizer.recognize('Contact press@example.org or visit https://example.org/about.');
    expect(entities.EMAIL).toEqual(['press@example.org']);
    expect(entities.URL).toEqual(['https://example.org/about']);
  });

  it('deduplicates and sorts each type', () => {
    const entities = recognizer.recognize('Write to b@example.org, a@example.org and again b@example.org today.');
    expect(entities.EMAIL).toEqual(['a@example.org', 'b@example.org']);
  });

  it('caps the number of entities per type', () => {
    const capped = new EntityRecognizer(2);
    const entities = capped.recognize('Mail c@example.org, a@example.org or b@example.org.');
    expect(entities.EMAIL).toEqual(['a@example.org', 'b@example.org']);
  });

  it('finds people and places', () => {
    const entities = recognizer.recognize('John Smith met Mary Jones in Paris last week.');
    expect(entities.PERSON).toContain('John Smith');
    expect(entities.GPE).toContain('Paris');
  });

  it('finds organizations and products', () => {
    const entities = recognizer.recognize(
      'Barack Obama met Microsoft leaders in Paris to discuss the new iPhone from Apple.'
    );
    expect(entities.ORG).toContain('Microsoft');
    expect(entities.ORG).toContain('Apple');
    expect(entities.PRODUCT).toEqual(['iPhone']);
  });

  it('does not tag lowercase common words as organizations', () => {
    expect(recognizer.recognize('She ate an apple after lunch with her friends.').ORG).toBeUndefined();
  });

  it('finds phone numbers but not dates or plain numbers', () => {
    const entities = recognizer.recognize(
      'Call +31 20 123 4567 or (555) 010-9999 before 2024-03-01; the office has 1500 desks.'
    );
    expect(entities.PHONE).toEqual(['(555) 010-9999', '+31 20 123 4567']);
  });

  it('omits types without entities', () => {
    expect(recognizer.recognize('')).toEqual({});
    expect(recognizer.recognize('no entities in this lowercase sentence').EMAIL).toBeUndefined();
    expect(recognizer.recognize('The budget grew from 2019 to 2021 by 12.5 percent.').PHONE).toBeUndefined();
  });
});
