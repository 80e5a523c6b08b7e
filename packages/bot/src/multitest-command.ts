import { paginateReport, tryHexToBytes } from 'pathwatch';
import type { CorrelationWindow, ObservationBuffer, PathSource } from 'pathwatch';
import { matchesKeyword } from './command.js';
import type { BotCommand, IncomingMessage } from './command.js';
import type { TxPacer } from './rate-limiter.js';
import { sendPaged } from './send-paged.js';
import type { ReplySender } from './send-paged.js';

export const NO_PACKET_DATA_REPLY = 'Error: Could not find packet data for this message. Please try again.';
export const NO_PACKET_HASH_REPLY = 'Error: Could not calculate packet hash for this message. Please try again.';

/** How far back the newest buffered frame may be to stand in for the trigger */
export const DEFAULT_TRIGGER_LOOKBACK_MS = 5_000;

export interface MultitestCommandOptions {
  maxReplyLength?: number;
  triggerLookbackMs?: number;
}

interface Trigger {
  raw: Uint8Array;
  packetHash?: string;
}

/**
 * `multitest` / `mt`: listen for the retransmissions of the triggering
 * message and reply with every distinct path it travelled.
 */
export class MultitestCommand implements BotCommand {
  readonly name = 'multitest';
  readonly keywords = ['multitest', 'mt'] as const;

  private buffer: ObservationBuffer;
  private correlation: CorrelationWindow;
  private pacer: TxPacer;
  private maxReplyLength: number | undefined;
  private triggerLookbackMs: number;

  constructor(
    buffer: ObservationBuffer,
    correlation: CorrelationWindow,
    pacer: TxPacer,
    options: MultitestCommandOptions = {},
  ) {
    this.buffer = buffer;
    this.correlation = correlation;
    this.pacer = pacer;
    this.maxReplyLength = options.maxReplyLength;
    this.triggerLookbackMs = options.triggerLookbackMs ?? DEFAULT_TRIGGER_LOOKBACK_MS;
  }

  matches(message: IncomingMessage): boolean {
    return matchesKeyword(message.content, this.keywords);
  }

  async execute(message: IncomingMessage, reply: ReplySender): Promise<void> {
    const trigger = this.resolveTrigger(message);
    if (!trigger) {
      await sendPaged([NO_PACKET_DATA_REPLY], reply, this.pacer);
      return;
    }

    const initialPath: PathSource | undefined = message.path ? { kind: 'display', text: message.path } : undefined;
    const started = this.correlation.start(trigger.raw, { initialPath, targetHash: trigger.packetHash });
    if (!started.ok) {
      await sendPaged([NO_PACKET_HASH_REPLY], reply, this.pacer);
      return;
    }

    const report = await started.finished;
    await sendPaged(paginateReport(report, this.maxReplyLength), reply, this.pacer);
  }

  /** The message's own frame, else the newest frame heard within the trigger lookback. */
  private resolveTrigger(message: IncomingMessage): Trigger | null {
    if (message.raw !== undefined) {
      const raw = typeof message.raw === 'string' ? tryHexToBytes(message.raw) : message.raw;
      if (raw && raw.length > 0) return { raw };
    }

    const recent = this.buffer.latest(this.triggerLookbackMs);
    if (!recent) return null;
    return { raw: recent.raw, packetHash: recent.packetHash };
  }
}
