import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  existingLanguages,
  isTwoLetterCode,
  missingLanguages,
  normalizeLanguage,
  normalizeLanguageSet,
} from '../src/languages.js';

describe('normalizeLanguage', () => {
  it('maps known 3-letter codes', () => {
    assert.equal(normalizeLanguage('eng'), 'en');
    assert.equal(normalizeLanguage('spa'), 'es');
    assert.equal(normalizeLanguage('ger'), 'de');
    assert.equal(normalizeLanguage('POR'), 'pt');
  });

  it('truncates unknown 3-letter codes', () => {
    assert.equal(normalizeLanguage('xyz'), 'xy');
  });

  it('lower-cases other lengths unchanged', () => {
    assert.equal(normalizeLanguage('xx'), 'xx');
    assert.equal(normalizeLanguage(' EN '), 'en');
    assert.equal(normalizeLanguage('pt-BR'), 'pt-br');
  });
});

describe('normalizeLanguageSet', () => {
  it('de-duplicates after normalizing, keeping first-seen order', () => {
    assert.deepEqual(normalizeLanguageSet(['fr', 'eng', 'en', 'fre', '']), ['fr', 'en']);
  });
});

describe('missingLanguages', () => {
  it('returns wanted languages without a matching track', () => {
    const item = { subtitleLanguages: ['eng', 'spa'] };

    assert.deepEqual([...existingLanguages(item)], ['en', 'es']);
    assert.deepEqual(missingLanguages(item, ['en', 'fr', 'es', 'de']), ['fr', 'de']);
  });

  it('normalizes the wanted list too', () => {
    assert.deepEqual(missingLanguages({ subtitleLanguages: ['en'] }, ['ENG', 'fra']), ['fr']);
  });

  it('returns nothing when every language is present', () => {
    assert.deepEqual(missingLanguages({ subtitleLanguages: ['fre'] }, ['fr']), []);
  });
});

describe('isTwoLetterCode', () => {
  it('accepts only two lower-case letters', () => {
    assert.equal(isTwoLetterCode('en'), true);
    assert.equal(isTwoLetterCode('pt-br'), false);
    assert.equal(isTwoLetterCode('e1'), false);
  });
});
