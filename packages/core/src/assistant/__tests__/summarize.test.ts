import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { QueryResult } from '../../db/types.js';
import { CompletionGateway } from '../../llm/gateway.js';
import { createLogger } from '../../log.js';
import { ScriptedTransport, captureSink } from '../../__tests__/fakes.js';
import { NO_DATA_MESSAGE, summarizeResults } from '../summarize.js';

function resultOf(rows: QueryResult['rows']): QueryResult {
  return { columns: ['total'], rows, rowCount: rows.length, truncated: false, execMs: 2 };
}

describe('summarizeResults', () => {
  it('answers an empty result without calling the model', async () => {
    const transport = new ScriptedTransport([]);
    const summary = await summarizeResults('sales today', resultOf([]), new CompletionGateway(transport), {
      model: 'chat-model',
    });
    assert.equal(summary, NO_DATA_MESSAGE);
    assert.equal(transport.requests.length, 0);
  });

  it('returns the model summary', async () => {
    const transport = new ScriptedTransport(['Sales today came to 420.\n']);
    const summary = await summarizeResults('sales today', resultOf([{ total: 420 }]), new CompletionGateway(transport), {
      model: 'chat-model',
    });
    assert.equal(summary, 'Sales today came to 420.');
    assert.equal(transport.requests[0].temperature, 0.7);
    assert.equal(transport.requests[0].maxTokens, 512);
  });

  it('samples only the first rows', async () => {
    const transport = new ScriptedTransport(['ok']);
    const rows = [{ total: 1 }, { total: 2 }, { total: 3 }];
    await summarizeResults('totals', resultOf(rows), new CompletionGateway(transport), {
      model: 'chat-model',
      sampleSize: 2,
    });
    assert.ok(transport.requests[0].messages[0].content.includes('Query Results (sample): [{"total":1},{"total":2}]'));
    assert.ok(transport.requests[0].messages[0].content.includes('Total results found: 3'));
  });

  it('falls back to the row count when the model fails', async () => {
    const { lines, sink } = captureSink();
    const transport = new ScriptedTransport([new Error('timeout')]);
    const summary = await summarizeResults(
      'totals',
      resultOf([{ total: 1 }, { total: 2 }, { total: 3 }]),
      new CompletionGateway(transport),
      { model: 'chat-model', logger: createLogger('warn', sink) },
    );
    assert.equal(summary, "Found 3 results, but couldn't summarize them due to an error.");
    assert.deepEqual(lines, ['WARN: Summary failed, using fallback {"error":"Completion failed (sdk): timeout"}']);
  });
});
