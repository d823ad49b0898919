import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { selectBest } from '../src/selector.js';
import { candidate } from './helpers.js';

describe('selectBest', () => {
  it('prefers rating, then download count', () => {
    const candidates = [candidate('en', 1, 7, 100), candidate('en', 2, 9, 5), candidate('en', 3, 9, 50)];

    assert.equal(selectBest(candidates, 'en')?.fileId, 3);
  });

  it('keeps catalog order for exact ties', () => {
    const candidates = [candidate('en', 1, 8, 10), candidate('en', 2, 8, 10)];

    assert.equal(selectBest(candidates, 'en')?.fileId, 1);
    assert.equal(selectBest([...candidates].reverse(), 'en')?.fileId, 2);
  });

  it('only considers the requested language', () => {
    const candidates = [candidate('fr', 1, 10, 1000), candidate('en', 2, 1, 1)];

    assert.equal(selectBest(candidates, 'en')?.fileId, 2);
  });

  it('returns null when nothing matches', () => {
    assert.equal(selectBest([candidate('fr', 1, 10, 1000)], 'en'), null);
    assert.equal(selectBest([], 'en'), null);
  });

  it('does not reorder its input', () => {
    const candidates = [candidate('en', 1, 1, 1), candidate('en', 2, 9, 9)];

    selectBest(candidates, 'en');

    assert.deepEqual(candidates.map((c) => c.fileId), [1, 2]);
  });
});
