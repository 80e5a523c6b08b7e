import { PathwatchError } from 'pathwatch';
import type { TxPacer } from './rate-limiter.js';

/** Sends one page of a reply. `page` is 1-based. */
export type ReplySender = (text: string, page: number, pages: number) => Promise<void> | void;

/**
 * Send pages in order, waiting for the pacer before each one.
 * @throws PathwatchError SEND_FAILED when the sender rejects; later pages are not sent
 */
export async function sendPaged(pages: string[], send: ReplySender, pacer: TxPacer): Promise<number> {
  for (let i = 0; i < pages.length; i++) {
    await pacer.waitForTx();
    try {
      await send(pages[i], i + 1, pages.length);
    } catch (err) {
      throw new PathwatchError('SEND_FAILED', `Failed to send reply page ${i + 1}/${pages.length}`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    pacer.recordSend();
  }
  return pages.length;
}
