import { after, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { AssistantReply } from '../../assistant/pipeline.js';
import { HistoryStore } from '../history.js';

const dataReply: AssistantReply = {
  route: 'data',
  summary: 'There were 12 delivered orders.',
  success: true,
  sql: "SELECT count(*) FROM orders WHERE status = 'DELIVERED'::orderstatus",
  rowCount: 1,
  truncated: false,
};

const rejectedReply: AssistantReply = {
  route: 'error',
  summary: "I'm sorry, there was an issue processing your request. (Only SELECT queries are allowed.)",
  success: false,
  sql: 'DELETE FROM orders',
  error: { kind: 'sql_rejected', message: 'Only SELECT queries are allowed.', sql: 'DELETE FROM orders' },
};

describe('HistoryStore', () => {
  const dir = mkdtempSync(join(tmpdir(), 'erp-assistant-history-'));

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('records and reads back an entry', async () => {
    const store = await HistoryStore.open(':memory:');
    const entry = store.record('delivered orders', dataReply, new Date('2024-05-01T10:00:00.000Z'));
    assert.deepEqual(store.get(entry.id), {
      id: entry.id,
      askedAt: '2024-05-01T10:00:00.000Z',
      utterance: 'delivered orders',
      route: 'data',
      sql: dataReply.sql,
      success: true,
      rowCount: 1,
      errorKind: null,
      errorText: null,
    });
    store.close();
  });

  it('keeps the error kind of a failed reply', async () => {
    const store = await HistoryStore.open(':memory:');
    const entry = store.record('remove orders', rejectedReply);
    const stored = store.get(entry.id);
    assert.equal(stored?.success, false);
    assert.equal(stored?.errorKind, 'sql_rejected');
    assert.equal(stored?.errorText, 'Only SELECT queries are allowed.');
    assert.equal(stored?.rowCount, null);
    store.close();
  });

  it('lists most recent first and honours the limit', async () => {
    const store = await HistoryStore.open(':memory:');
    store.record('first', dataReply, new Date('2024-05-01T10:00:00.000Z'));
    store.record('third', dataReply, new Date('2024-05-03T10:00:00.000Z'));
    store.record('second', dataReply, new Date('2024-05-02T10:00:00.000Z'));
    assert.deepEqual(
      store.list().map((e) => e.utterance),
      ['third', 'second', 'first'],
    );
    assert.deepEqual(
      store.list(2).map((e) => e.utterance),
      ['third', 'second'],
    );
    store.close();
  });

  it('returns undefined for an unknown id', async () => {
    const store = await HistoryStore.open(':memory:');
    assert.equal(store.get('missing'), undefined);
    store.close();
  });

  it('resolves a unique id prefix', async () => {
    const store = await HistoryStore.open(':memory:');
    const entry = store.record('delivered orders', dataReply);
    assert.equal(store.resolveId(entry.id.slice(0, 8)), entry.id);
    assert.equal(store.resolveId(entry.id), entry.id);
    assert.equal(store.resolveId('%'), undefined);
    store.close();
  });

  it('does not resolve an ambiguous prefix', async () => {
    const store = await HistoryStore.open(':memory:');
    store.record('a', dataReply);
    store.record('b', dataReply);
    assert.equal(store.resolveId(''), undefined);
    store.close();
  });

  it('creates missing directories and persists across reopen', async () => {
    const path = join(dir, 'nested', 'deeper', 'history.db');
    const first = await HistoryStore.open(path);
    const entry = first.record('delivered orders', dataReply);
    first.close();
    assert.equal(existsSync(path), true);

    const second = await HistoryStore.open(path);
    assert.equal(second.get(entry.id)?.utterance, 'delivered orders');
    assert.equal(second.list().length, 1);
    second.close();
  });
});
