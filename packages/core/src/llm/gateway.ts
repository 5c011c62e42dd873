/**
 * Completion gateway: the only way pipeline stages talk to the model.
 * One attempt per call; every failure surfaces as CompletionFailedError.
 */

import { CompletionFailedError, errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../log.js';
import type { CompletionTransport, PromptMessage, TransportKind } from './types.js';

export interface CompletionOptions {
  model: string;
  temperature: number;
  maxTokens: number;
}

export class CompletionGateway {
  private readonly transport: CompletionTransport;
  private readonly logger: Logger;

  constructor(transport: CompletionTransport, logger: Logger = silentLogger) {
    this.transport = transport;
    this.logger = logger;
  }

  get transportKind(): TransportKind {
    return this.transport.kind;
  }

  /** Returns the completion text, trimmed. May be empty. */
  async complete(messages: readonly PromptMessage[], options: CompletionOptions): Promise<string> {
    const started = performance.now();
    let content: string;
    try {
      content = await this.transport.complete({ messages, ...options });
    } catch (err: unknown) {
      const failure =
        err instanceof CompletionFailedError ? err : new CompletionFailedError(this.transport.kind, errorMessage(err));
      this.logger.warn('Completion failed', { transport: this.transport.kind, model: options.model, error: failure.message });
      throw failure;
    }

    this.logger.debug('Completion received', {
      transport: this.transport.kind,
      model: options.model,
      ms: Math.round(performance.now() - started),
      chars: content.length,
    });
    return content.trim();
  }
}
