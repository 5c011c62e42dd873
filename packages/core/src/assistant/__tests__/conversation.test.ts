import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { CompletionGateway } from '../../llm/gateway.js';
import { ScriptedTransport } from '../../__tests__/fakes.js';
import {
  GREETING_MESSAGE,
  OFF_TOPIC_MESSAGE,
  cannedReply,
  conversationalReply,
} from '../conversation.js';

describe('cannedReply', () => {
  it('deflects off-topic requests', () => {
    assert.equal(cannedReply('What is the weather in Paris?'), OFF_TOPIC_MESSAGE);
  });

  it('checks off-topic keywords before greetings', () => {
    assert.equal(cannedReply('hi, recommend a movie'), OFF_TOPIC_MESSAGE);
  });

  it('answers a bare greeting', () => {
    assert.equal(cannedReply('  Hey '), GREETING_MESSAGE);
  });

  it('has nothing for other input', () => {
    assert.equal(cannedReply('how are you'), undefined);
  });
});

describe('conversationalReply', () => {
  it('uses the canned reply without calling the model', async () => {
    const transport = new ScriptedTransport([]);
    const result = await conversationalReply('hello', new CompletionGateway(transport), { model: 'chat-model' });
    assert.deepEqual(result, { ok: true, value: GREETING_MESSAGE });
    assert.equal(transport.requests.length, 0);
  });

  it('asks the chat model otherwise', async () => {
    const transport = new ScriptedTransport(['  I am Blu, nice to meet you.  ']);
    const result = await conversationalReply('who are you', new CompletionGateway(transport), { model: 'chat-model' });
    assert.deepEqual(result, { ok: true, value: 'I am Blu, nice to meet you.' });
    assert.equal(transport.requests.length, 1);
    assert.equal(transport.requests[0].model, 'chat-model');
    assert.equal(transport.requests[0].temperature, 0.7);
    assert.equal(transport.requests[0].maxTokens, 150);
  });

  it('reports a model failure as reply_failed', async () => {
    const transport = new ScriptedTransport([new Error('quota exceeded')]);
    const result = await conversationalReply('thanks', new CompletionGateway(transport), { model: 'chat-model' });
    assert.deepEqual(result, {
      ok: false,
      error: { kind: 'reply_failed', message: 'Completion failed (sdk): quota exceeded' },
    });
  });
});
