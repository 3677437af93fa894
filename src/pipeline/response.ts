import type { ChatCompletion, ChatCompletionChunk, CompletionOutcome } from "../chat-types.js";

export function extractResponseText(response: ChatCompletion): string {
  const content = response.choices[0]?.message.content;
  return typeof content === "string" ? content.trim() : "";
}

export function extractChunkText(chunk: ChatCompletionChunk): string {
  return chunk.choices.map((choice) => choice.delta.content ?? "").join("");
}

export async function collectStreamText(
  chunks: AsyncIterable<ChatCompletionChunk>,
  onDelta?: (delta: string) => void,
): Promise<string> {
  let text = "";
  for await (const chunk of chunks) {
    const delta = extractChunkText(chunk);
    if (!delta) {
      continue;
    }
    text += delta;
    onDelta?.(delta);
  }
  return text;
}

export async function readOutcomeText(outcome: CompletionOutcome): Promise<string> {
  if (outcome.kind === "response") {
    return extractResponseText(outcome.response);
  }
  return (await collectStreamText(outcome.chunks)).trim();
}

/**
 * Attaches a callback that runs exactly once: right after a complete response is
 * produced, or when a streamed response is exhausted, fails, or is closed by its
 * consumer. Closing the stream through `return()` fires it even when no chunk was
 * ever requested.
 */
export async function withCompletionCallback(
  outcome: CompletionOutcome,
  onComplete: () => void | Promise<void>,
): Promise<CompletionOutcome> {
  let fired = false;
  const fire = async () => {
    if (fired) {
      return;
    }
    fired = true;
    await onComplete();
  };

  if (outcome.kind === "response") {
    await fire();
    return outcome;
  }

  return { kind: "stream", chunks: new GuardedChunkStream(outcome.chunks[Symbol.asyncIterator](), fire) };
}

class GuardedChunkStream implements AsyncIterableIterator<ChatCompletionChunk> {
  constructor(
    private readonly source: AsyncIterator<ChatCompletionChunk>,
    private readonly onSettled: () => Promise<void>,
  ) {}

  async next(): Promise<IteratorResult<ChatCompletionChunk>> {
    let result: IteratorResult<ChatCompletionChunk>;
    try {
      result = await this.source.next();
    } catch (error) {
      await this.onSettled();
      throw error;
    }
    if (result.done) {
      await this.onSettled();
    }
    return result;
  }

  async return(): Promise<IteratorResult<ChatCompletionChunk>> {
    try {
      if (this.source.return) {
        await this.source.return();
      }
    } finally {
      await this.onSettled();
    }
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<ChatCompletionChunk> {
    return this;
  }
}

export function rewriteFirstChoiceContent(response: ChatCompletion, content: string): ChatCompletion {
  const [first, ...rest] = response.choices;
  if (!first) {
    return {
      ...response,
      choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }],
    };
  }
  return {
    ...response,
    choices: [{ ...first, message: { ...first.message, content } }, ...rest],
  };
}
