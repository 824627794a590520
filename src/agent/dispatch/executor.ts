import type { Logger } from '../../core/logger.js';
import { err, ok, type Result } from '../../core/result.js';
import { isTimeoutError, withTimeout } from '../../core/retry.js';
import type { HandlerRegistry } from '../handlers/types.js';
import type { Intent } from '../intents/types.js';
import type { Requester } from '../types.js';

export interface HandlerFailure {
  kind: 'handler_failed' | 'timeout';
  intent: Intent;
  message: string;
}

export interface DispatchOptions {
  handlerTimeoutMs: number;
}

/**
 * Runs the handler that owns an intent. Failures come back as values; nothing is
 * retried and nothing is thrown past this point.
 */
export class DispatchExecutor {
  constructor(
    private readonly registry: HandlerRegistry,
    private readonly options: DispatchOptions,
    private readonly logger: Logger
  ) {}

  async execute(intent: Intent, text: string, requester: Requester): Promise<Result<string, HandlerFailure>> {
    const handler = this.registry[intent];
    try {
      const output = await withTimeout(
        () => handler.process(text, requester),
        this.options.handlerTimeoutMs,
        `${intent} handler`
      );
      return ok(output);
    } catch (error) {
      const failure: HandlerFailure = {
        kind: isTimeoutError(error) ? 'timeout' : 'handler_failed',
        intent,
        message: error instanceof Error ? error.message : String(error),
      };
      this.logger.error(`Handler "${intent}" failed for ${requester.id}`, error);
      return err(failure);
    }
  }
}
