import test from 'node:test';
import assert from 'node:assert/strict';
import { hasDigits, joinTopSentences, stableTopK, termFreq, tokenize } from '../src/core/text';

test('tokenize keeps hyphen and underscore joined identifiers whole', () => {
  assert.deepEqual(tokenize('INC-49217 user_id, Hello!! foo--bar'), ['inc-49217', 'user_id', 'hello', 'foo', 'bar']);
});

test('tokenize of empty or punctuation-only text is empty', () => {
  assert.deepEqual(tokenize(''), []);
  assert.deepEqual(tokenize('?! -- ...'), []);
});

test('termFreq counts repeats', () => {
  const tf = termFreq(['a', 'b', 'a']);
  assert.equal(tf.get('a'), 2);
  assert.equal(tf.get('b'), 1);
});

test('hasDigits detects any digit', () => {
  assert.equal(hasDigits('inc-49217'), true);
  assert.equal(hasDigits('cache'), false);
});

test('stableTopK orders by score and keeps index order on ties', () => {
  assert.deepEqual(stableTopK([1, 3, 3, 0], 3), [1, 2, 0]);
  assert.deepEqual(stableTopK([0, 0, 0], 5), [0, 1, 2]);
  assert.deepEqual(stableTopK([1, 2], 0), []);
});

test('joinTopSentences keeps the first sentences and closes with punctuation', () => {
  assert.equal(joinTopSentences('First one. Second one! Third?', 2), 'First one. Second one.');
  assert.equal(joinTopSentences('Only one sentence.'), 'Only one sentence.');
  assert.equal(joinTopSentences(''), '');
});
