import { CorrelationWindow, ObservationBuffer } from 'pathwatch';
import type { CorrelationReport, ObservationInput, RFObservation } from 'pathwatch';
import type { BotCommand, IncomingMessage } from './command.js';
import { DEFAULT_BOT_CONFIG } from './config.js';
import type { BotConfig } from './config.js';
import { MultitestCommand } from './multitest-command.js';
import { RateLimiter } from './rate-limiter.js';
import type { TxPacer } from './rate-limiter.js';
import type { ReplySender } from './send-paged.js';

export interface PathwatchBotOptions {
  config?: Partial<BotConfig>;
  /** Shared transmit pacer; a RateLimiter on `txCooldownMs` by default */
  pacer?: TxPacer;
}

export type StatusHandler = (status: string, detail?: string) => void;
export type ReportHandler = (report: CorrelationReport) => void;

/**
 * Wires the observation buffer, correlation window and commands together.
 * The transport calls `ingest` for every frame heard and `handleMessage`
 * for every chat message addressed to the bot.
 */
export class PathwatchBot {
  readonly config: BotConfig;
  readonly buffer: ObservationBuffer;
  readonly correlation: CorrelationWindow;
  private pacer: TxPacer;
  private commands: BotCommand[];

  private statusHandlers: StatusHandler[] = [];
  private reportHandlers: ReportHandler[] = [];

  constructor(options: PathwatchBotOptions = {}) {
    this.config = { ...DEFAULT_BOT_CONFIG, ...options.config };
    this.pacer = options.pacer ?? new RateLimiter(this.config.txCooldownMs);
    this.buffer = new ObservationBuffer({
      maxAgeMs: this.config.observationMaxAgeMs,
      maxEntries: this.config.observationMaxEntries,
      pathBytesPerHop: this.config.pathBytesPerHop,
    });
    this.correlation = new CorrelationWindow(this.buffer, {
      listeningDurationMs: this.config.listeningDurationMs,
      lookbackMs: this.config.lookbackMs,
      pathBytesPerHop: this.config.pathBytesPerHop,
      events: {
        onPathCollected: (targetHash, path) => this.emitStatus('path:collected', `${targetHash} ${path}`),
        onSessionReplaced: (previous, next) =>
          this.emitStatus('session:replaced', `${previous.targetHash} -> ${next.targetHash}`),
        onSessionFinished: (report) => {
          this.emitStatus('session:finished', `${report.targetHash} ${report.kind}`);
          for (const handler of this.reportHandlers) handler(report);
        },
      },
    });
    this.commands = [
      new MultitestCommand(this.buffer, this.correlation, this.pacer, {
        maxReplyLength: this.config.maxReplyLength,
      }),
    ];
  }

  /** Record one frame heard on the radio. */
  ingest(input: ObservationInput): RFObservation | null {
    return this.buffer.record(input);
  }

  /**
   * Dispatch a chat message to the first command that matches it.
   * @returns Whether a command handled the message
   */
  async handleMessage(message: IncomingMessage, reply: ReplySender): Promise<boolean> {
    const command = this.commands.find((c) => c.matches(message));
    if (!command) return false;

    this.emitStatus('command:started', command.name);
    await command.execute(message, reply);
    this.emitStatus('command:finished', command.name);
    return true;
  }

  onStatus(handler: StatusHandler): void {
    this.statusHandlers.push(handler);
  }

  onReport(handler: ReportHandler): void {
    this.reportHandlers.push(handler);
  }

  destroy(): void {
    this.correlation.destroy();
    this.buffer.clear();
  }

  private emitStatus(status: string, detail?: string): void {
    for (const handler of this.statusHandlers) handler(status, detail);
  }
}
