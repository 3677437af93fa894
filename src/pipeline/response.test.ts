import { describe, expect, it, vi } from "vitest";
import type { ChatCompletionChunk, CompletionOutcome } from "../chat-types.js";
import {
  collectStreamText,
  extractResponseText,
  readOutcomeText,
  rewriteFirstChoiceContent,
  withCompletionCallback,
} from "./response.js";

async function* chunkStream(deltas: string[]): AsyncGenerator<ChatCompletionChunk> {
  for (const delta of deltas) {
    yield { choices: [{ index: 0, delta: { content: delta } }] };
  }
}

describe("completion responses", () => {
  it("reads the first choice", () => {
    expect(
      extractResponseText({ choices: [{ index: 0, message: { role: "assistant", content: "  hi  " } }] }),
    ).toBe("hi");
    expect(extractResponseText({ choices: [] })).toBe("");
  });

  it("collects streamed deltas", async () => {
    const deltas: string[] = [];
    const text = await collectStreamText(chunkStream(["Hel", "", "lo"]), (delta) => deltas.push(delta));

    expect(text).toBe("Hello");
    expect(deltas).toEqual(["Hel", "lo"]);
    await expect(readOutcomeText({ kind: "stream", chunks: chunkStream([" a ", "b "]) })).resolves.toBe("a b");
  });

  it("fires the completion callback right away for a full response", async () => {
    const onComplete = vi.fn();
    const outcome: CompletionOutcome = {
      kind: "response",
      response: { choices: [{ index: 0, message: { role: "assistant", content: "done" } }] },
    };

    await expect(withCompletionCallback(outcome, onComplete)).resolves.toBe(outcome);
    expect(onComplete).toHaveBeenCalledTimes(1);
  });

  it("fires the completion callback once the stream is drained", async () => {
    const onComplete = vi.fn();
    const outcome = await withCompletionCallback({ kind: "stream", chunks: chunkStream(["a", "b"]) }, onComplete);

    expect(onComplete).not.toHaveBeenCalled();
    if (outcome.kind !== "stream") {
      throw new Error("expected a stream");
    }
    await expect(collectStreamText(outcome.chunks)).resolves.toBe("ab");
    expect(onComplete).toHaveBeenCalledTimes(1);
  });

  it("fires the completion callback when the consumer stops early", async () => {
    const onComplete = vi.fn();
    const outcome = await withCompletionCallback({ kind: "stream", chunks: chunkStream(["a", "b", "c"]) }, onComplete);
    if (outcome.kind !== "stream") {
      throw new Error("expected a stream");
    }

    for await (const chunk of outcome.chunks) {
      expect(chunk.choices[0]?.delta.content).toBe("a");
      break;
    }
    expect(onComplete).toHaveBeenCalledTimes(1);
  });

  it("fires the completion callback when the stream is closed before it is read", async () => {
    const onComplete = vi.fn();
    const outcome = await withCompletionCallback({ kind: "stream", chunks: chunkStream(["a"]) }, onComplete);
    if (outcome.kind !== "stream") {
      throw new Error("expected a stream");
    }

    const iterator = outcome.chunks[Symbol.asyncIterator]();
    await expect(iterator.return?.()).resolves.toEqual({ done: true, value: undefined });
    expect(onComplete).toHaveBeenCalledTimes(1);
    await expect(iterator.next()).resolves.toEqual({ done: true, value: undefined });
    expect(onComplete).toHaveBeenCalledTimes(1);
  });

  it("fires the completion callback when the stream fails", async () => {
    const onComplete = vi.fn();
    async function* failing(): AsyncGenerator<ChatCompletionChunk> {
      yield { choices: [{ index: 0, delta: { content: "a" } }] };
      throw new Error("connection reset");
    }
    const outcome = await withCompletionCallback({ kind: "stream", chunks: failing() }, onComplete);
    if (outcome.kind !== "stream") {
      throw new Error("expected a stream");
    }

    await expect(collectStreamText(outcome.chunks)).rejects.toThrow("connection reset");
    expect(onComplete).toHaveBeenCalledTimes(1);
  });

  it("rewrites the first choice content", () => {
    expect(
      rewriteFirstChoiceContent(
        {
          id: "cmpl-1",
          choices: [{ index: 0, message: { role: "assistant", content: "old" }, finish_reason: "stop" }],
        },
        "new",
      ),
    ).toEqual({
      id: "cmpl-1",
      choices: [{ index: 0, message: { role: "assistant", content: "new" }, finish_reason: "stop" }],
    });
    expect(rewriteFirstChoiceContent({ choices: [] }, "x").choices).toEqual([
      { index: 0, message: { role: "assistant", content: "x" }, finish_reason: "stop" },
    ]);
  });
});
