import type { LogMeta, MatchLogger, MessageSender, SendResult } from './types.js';

/**
 * Sends through `inner`, trying again up to `retries` more times when a send
 * fails. Every failed attempt is logged; the last result is returned.
 */
export class RetryingSender implements MessageSender {
  constructor(
    private readonly inner: MessageSender,
    private readonly retries: number,
    private readonly logger: MatchLogger,
    private readonly meta: LogMeta = {},
  ) {}

  send(payload: string): SendResult {
    let result = this.inner.send(payload);
    for (let attempt = 1; !result.ok; attempt++) {
      const exhausted = attempt > this.retries;
      this.logger.warn(exhausted ? 'Send failed, giving up' : 'Send failed, retrying', {
        ...this.meta,
        attempt,
        error: result.error.message,
      });
      if (exhausted) break;
      result = this.inner.send(payload);
    }
    return result;
  }
}
