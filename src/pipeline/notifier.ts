import { silentLogger, type Logger } from "../logger.js";

export const DEFAULT_STATUS_DEDUP_MS = 3_000;
const MAX_SEEN_ENTRIES = 512;

export type StatusEventData = {
  description: string;
  done: boolean;
  hidden: boolean;
};

export type PipelineEvent =
  | {
      type: "status";
      data: StatusEventData;
    }
  | {
      type: "message";
      data: { content: string };
    };

export type PipelineEventSink = (event: PipelineEvent) => void | Promise<void>;

/**
 * Remembers keys for a limited time. `seen` records the key and reports whether it
 * was already recorded within `ttlMs`.
 */
export type SeenCache = {
  seen: (key: string, ttlMs: number) => boolean;
};

export class TtlSeenCache implements SeenCache {
  private readonly entries = new Map<string, number>();

  constructor(private readonly now: () => number = Date.now) {}

  seen(key: string, ttlMs: number): boolean {
    const nowMs = this.now();
    this.prune(nowMs, ttlMs);

    const last = this.entries.get(key);
    if (last !== undefined && nowMs - last < ttlMs) {
      return true;
    }
    this.entries.delete(key);
    this.entries.set(key, nowMs);
    return false;
  }

  size(): number {
    return this.entries.size;
  }

  private prune(nowMs: number, ttlMs: number): void {
    for (const [key, at] of this.entries) {
      if (nowMs - at >= ttlMs) {
        this.entries.delete(key);
      }
    }
    while (this.entries.size >= MAX_SEEN_ENTRIES) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }
}

export type RunNotifierOptions = {
  sink?: PipelineEventSink;
  cache: SeenCache;
  showStatus: boolean;
  showResults: boolean;
  dedupTtlMs?: number;
  logger?: Logger;
};

/**
 * Per-run view of the side channel. Status lines are de-duplicated through the
 * shared cache, the final clear status goes out at most once, and a sink that
 * throws never reaches the caller.
 */
export class RunNotifier {
  private finished = false;
  private readonly ttlMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: RunNotifierOptions) {
    this.ttlMs = options.dedupTtlMs ?? DEFAULT_STATUS_DEDUP_MS;
    this.logger = options.logger ?? silentLogger;
  }

  async status(description: string, done: boolean): Promise<void> {
    if (!this.options.showStatus) {
      return;
    }
    if (this.options.cache.seen(`${description}|${done}`, this.ttlMs)) {
      return;
    }
    await this.emit({ type: "status", data: { description, done, hidden: false } });
  }

  async message(content: string): Promise<void> {
    if (!this.options.showResults || !content) {
      return;
    }
    await this.emit({ type: "message", data: { content } });
  }

  async finish(): Promise<void> {
    if (this.finished) {
      return;
    }
    this.finished = true;
    if (!this.options.showStatus) {
      return;
    }
    await this.emit({ type: "status", data: { description: "", done: true, hidden: true } });
  }

  private async emit(event: PipelineEvent): Promise<void> {
    const sink = this.options.sink;
    if (!sink) {
      return;
    }
    try {
      await sink(event);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`event sink failed on ${event.type}: ${message}`);
    }
  }
}
