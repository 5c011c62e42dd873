import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { cleanUtterance, isConversational } from '../intent.js';

describe('cleanUtterance', () => {
  it('lowercases and strips punctuation', () => {
    assert.equal(cleanUtterance('  Hello, Blu!  '), 'hello blu');
  });

  it('keeps letters outside ASCII', () => {
    assert.equal(cleanUtterance('Hallo Müller?'), 'hallo müller');
  });
});

describe('isConversational', () => {
  for (const utterance of ['hi', 'Hello!', 'thanks a lot', 'What can you do?', 'who are you', 'Tell me a joke']) {
    it(`routes "${utterance}" to conversation`, () => {
      assert.equal(isConversational(utterance), true);
    });
  }

  for (const utterance of [
    'highest sales last month',
    'helpers on payroll',
    'show pending orders',
    'how many employees were absent today',
    '',
  ]) {
    it(`routes "${utterance}" to data`, () => {
      assert.equal(isConversational(utterance), false);
    });
  }

  it('treats an utterance that opens with a greeting as conversational', () => {
    assert.equal(isConversational('hi, what were sales yesterday'), true);
  });
});
