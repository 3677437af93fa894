import { describe, expect, it, vi } from "vitest";
import type { Logger } from "../logger.js";
import { RunNotifier, TtlSeenCache, type PipelineEvent } from "./notifier.js";

function buildLogger() {
  return { info: vi.fn(), warn: vi.fn(), debug: vi.fn() } satisfies Logger;
}

describe("ttl seen cache", () => {
  it("remembers keys until the ttl passes", () => {
    let now = 0;
    const cache = new TtlSeenCache(() => now);

    expect(cache.seen("a", 1_000)).toBe(false);
    now = 500;
    expect(cache.seen("a", 1_000)).toBe(true);
    expect(cache.seen("b", 1_000)).toBe(false);
    now = 1_000;
    expect(cache.seen("a", 1_000)).toBe(false);
    expect(cache.size()).toBe(2);
    now = 5_000;
    expect(cache.seen("c", 1_000)).toBe(false);
    expect(cache.size()).toBe(1);
  });
});

describe("run notifier", () => {
  it("suppresses repeated status lines within the window", async () => {
    const events: PipelineEvent[] = [];
    const notifier = new RunNotifier({
      sink: (event) => {
        events.push(event);
      },
      cache: new TtlSeenCache(() => 0),
      showStatus: true,
      showResults: true,
    });

    await notifier.status("Running OCR...", false);
    await notifier.status("Running OCR...", false);
    await notifier.status("Running OCR...", true);

    expect(events).toEqual([
      { type: "status", data: { description: "Running OCR...", done: false, hidden: false } },
      { type: "status", data: { description: "Running OCR...", done: true, hidden: false } },
    ]);
  });

  it("emits the clear status once per run", async () => {
    const events: PipelineEvent[] = [];
    const cache = new TtlSeenCache(() => 0);
    const sink = (event: PipelineEvent) => {
      events.push(event);
    };
    const first = new RunNotifier({ sink, cache, showStatus: true, showResults: true });
    const second = new RunNotifier({ sink, cache, showStatus: true, showResults: true });

    await first.finish();
    await first.finish();
    await second.finish();

    const clear = { type: "status", data: { description: "", done: true, hidden: true } };
    expect(events).toEqual([clear, clear]);
  });

  it("respects the status and result switches", async () => {
    const events: PipelineEvent[] = [];
    const notifier = new RunNotifier({
      sink: (event) => {
        events.push(event);
      },
      cache: new TtlSeenCache(),
      showStatus: false,
      showResults: true,
    });

    await notifier.status("Running OCR...", false);
    await notifier.message("");
    await notifier.message("preview");
    await notifier.finish();

    expect(events).toEqual([{ type: "message", data: { content: "preview" } }]);
  });

  it("swallows sink failures", async () => {
    const logger = buildLogger();
    const notifier = new RunNotifier({
      sink: () => {
        throw new Error("ui went away");
      },
      cache: new TtlSeenCache(),
      showStatus: true,
      showResults: true,
      logger,
    });

    await expect(notifier.status("Running OCR...", false)).resolves.toBeUndefined();
    await expect(notifier.finish()).resolves.toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith("event sink failed on status: ui went away");
  });

  it("is a no-op without a sink", async () => {
    const notifier = new RunNotifier({ cache: new TtlSeenCache(), showStatus: true, showResults: true });
    await expect(notifier.status("x", true)).resolves.toBeUndefined();
  });
});
