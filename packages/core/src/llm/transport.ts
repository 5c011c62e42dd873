/**
 * Transport selection. Runs once at startup; the result is passed to the
 * gateway and shared by every request.
 */

import { requireApiKey, type AssistantConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../log.js';
import { OpenAISdkTransport } from './openai.js';
import { RestTransport, type FetchLike } from './rest.js';
import type { CompletionTransport, TransportOptions } from './types.js';

export interface TransportDeps {
  logger?: Logger;
  fetchImpl?: FetchLike;
  /** Builds the SDK transport; defaults to OpenAISdkTransport */
  createSdk?: (options: TransportOptions) => CompletionTransport;
}

export function createTransport(config: AssistantConfig, deps: TransportDeps = {}): CompletionTransport {
  const logger = deps.logger ?? silentLogger;
  const options: TransportOptions = {
    apiKey: requireApiKey(config),
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
  };
  const buildSdk = deps.createSdk ?? ((o: TransportOptions) => new OpenAISdkTransport(o));
  const buildRest = (): CompletionTransport => new RestTransport(options, deps.fetchImpl);

  switch (config.transport) {
    case 'sdk':
      return buildSdk(options);
    case 'rest':
      return buildRest();
    case 'auto':
      try {
        return buildSdk(options);
      } catch (err: unknown) {
        logger.warn('SDK client unavailable, falling back to REST transport', { reason: errorMessage(err) });
        return buildRest();
      }
  }
}
