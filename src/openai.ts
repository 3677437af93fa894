import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionChoice,
  ChatCompletionChunk,
  ChatCompletionChunkChoice,
  ChatMessage,
  ChatRequestBody,
  CompleteChat,
  ContentPart,
  ImageContentPart,
  RequestUser,
} from "./chat-types.js";
import { isImageFile } from "./core/images.js";
import { isRecord, readTrimmedString, resolveLocator } from "./core/messages.js";

type WireMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type WireUserPart = OpenAI.Chat.Completions.ChatCompletionContentPart;
type WireTextPart = OpenAI.Chat.Completions.ChatCompletionContentPartText;
type WireRequest = Omit<OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming, "stream">;
type ImageDetail = NonNullable<OpenAI.Chat.Completions.ChatCompletionContentPartImage.ImageURL["detail"]>;

const IMAGE_DETAILS: readonly ImageDetail[] = ["auto", "low", "high"];

const NUMERIC_OPTIONS = [
  "temperature",
  "top_p",
  "max_tokens",
  "max_completion_tokens",
  "presence_penalty",
  "frequency_penalty",
  "seed",
] as const;

type SamplingOptions = Partial<Pick<WireRequest, (typeof NUMERIC_OPTIONS)[number] | "stop">>;

// Local backends ignore the key but the client refuses to start without one.
const KEYLESS_API_KEY = "not-needed";

export type OpenAiFunnelOptions = {
  baseUrl: string;
  apiKey?: string;
  fetchImpl?: typeof fetch;
  signal?: AbortSignal;
  headers?: Record<string, string>;
};

export class CompletionRequestError extends Error {
  status: number | undefined;
  body: string;

  constructor(status: number | undefined, message: string, body = "") {
    super(message);
    this.name = "CompletionRequestError";
    this.status = status;
    this.body = body;
  }
}

/**
 * Completion funnel for any backend speaking the OpenAI chat-completions dialect
 * (OpenAI, Ollama, vLLM, LM Studio, Open WebUI's proxy).
 */
export function createOpenAiCompatibleFunnel(options: OpenAiFunnelOptions): CompleteChat {
  const client = new OpenAI({
    baseURL: options.baseUrl.replace(/\/+$/, ""),
    apiKey: options.apiKey?.trim() || KEYLESS_API_KEY,
    fetch: options.fetchImpl,
    defaultHeaders: options.headers,
    maxRetries: 0,
  });
  const requestOptions = { signal: options.signal };

  return async (body, user) => {
    const request = toWireRequest(body, user);
    try {
      if (body.stream) {
        const stream = await client.chat.completions.create({ ...request, stream: true }, requestOptions);
        return { kind: "stream", chunks: readChunks(stream) };
      }
      const completion = await client.chat.completions.create({ ...request, stream: false }, requestOptions);
      return { kind: "response", response: normalizeChatCompletion(completion) };
    } catch (error) {
      throw toCompletionRequestError(error);
    }
  };
}

async function* readChunks(stream: AsyncIterable<unknown>): AsyncGenerator<ChatCompletionChunk> {
  try {
    for await (const raw of stream) {
      const chunk = normalizeChatCompletionChunk(raw);
      if (chunk) {
        yield chunk;
      }
    }
  } catch (error) {
    throw toCompletionRequestError(error);
  }
}

function toCompletionRequestError(error: unknown): unknown {
  if (!(error instanceof OpenAI.APIError)) {
    return error;
  }
  const body = error.error === undefined ? "" : JSON.stringify(error.error);
  return new CompletionRequestError(error.status, `chat completion failed: ${summarizeHttpError(error.message)}`, body);
}

/**
 * Top-level `images` and `files` never reach the backend. Unknown request keys are
 * dropped; the sampling options the dialect defines are forwarded when well typed.
 */
function toWireRequest(body: ChatRequestBody, user: RequestUser): WireRequest {
  const wire: WireRequest = {
    model: body.model,
    messages: body.messages.map((message) => toWireMessage(message)),
    ...readSamplingOptions(body),
  };
  const requestUser = readTrimmedString(body.user) || user.id;
  if (requestUser) {
    wire.user = requestUser;
  }
  return wire;
}

function readSamplingOptions(body: ChatRequestBody): SamplingOptions {
  const options: SamplingOptions = {};
  for (const key of NUMERIC_OPTIONS) {
    const value = body[key];
    if (typeof value === "number" && Number.isFinite(value)) {
      options[key] = value;
    }
  }

  const stop = body.stop;
  if (typeof stop === "string") {
    options.stop = stop;
  } else if (Array.isArray(stop)) {
    const words = stop.filter((word): word is string => typeof word === "string");
    if (words.length === stop.length) {
      options.stop = words;
    }
  }
  return options;
}

/**
 * Message-level `images` and image `files` are not part of the chat-completions
 * dialect, so they are folded into `image_url` content parts. Only user messages
 * carry images; other roles keep their text.
 */
function toWireMessage(message: ChatMessage): WireMessage {
  const content = collectMessageParts(message);
  switch (message.role) {
    case "system":
      return { role: "system", content: toTextContent(content) };
    case "assistant":
      return { role: "assistant", content: toTextContent(content) };
    case "tool": {
      const toolCallId = readTrimmedString(message.tool_call_id);
      if (toolCallId) {
        return { role: "tool", tool_call_id: toolCallId, content: toTextContent(content) };
      }
      return { role: "user", content: toUserContent(content) };
    }
    case "user":
      return { role: "user", content: toUserContent(content) };
  }
}

function collectMessageParts(message: ChatMessage): string | ContentPart[] {
  const { images, files, content } = message;
  const extraParts: ImageContentPart[] = [];
  for (const url of images ?? []) {
    extraParts.push({ type: "image", locator: url });
  }
  for (const file of files ?? []) {
    const url = readTrimmedString(file.url);
    if (url && isImageFile(file)) {
      extraParts.push({ type: "image", locator: url });
    }
  }
  if (extraParts.length === 0) {
    return content;
  }

  const parts: ContentPart[] =
    typeof content === "string" ? (content ? [{ type: "text", text: content }] : []) : [...content];
  const known = new Set(parts.map((part) => (part.type === "image" ? JSON.stringify(part.locator) : "")));
  for (const part of extraParts) {
    const key = JSON.stringify(part.locator);
    if (known.has(key)) {
      continue;
    }
    known.add(key);
    parts.push(part);
  }
  return parts;
}

function toUserContent(content: string | ContentPart[]): string | WireUserPart[] {
  if (typeof content === "string") {
    return content;
  }
  const parts: WireUserPart[] = [];
  for (const part of content) {
    if (part.type === "image") {
      const url = resolveLocator(part.locator);
      if (!url) {
        continue;
      }
      const detail = IMAGE_DETAILS.find((level) => level === part.detail);
      parts.push({ type: "image_url", image_url: detail ? { url, detail } : { url } });
      continue;
    }
    const text = readPartText(part);
    if (text !== null) {
      parts.push({ type: "text", text });
    }
  }
  return parts;
}

function toTextContent(content: string | ContentPart[]): string | WireTextPart[] {
  if (typeof content === "string") {
    return content;
  }
  const parts: WireTextPart[] = [];
  for (const part of content) {
    const text = part.type === "image" ? null : readPartText(part);
    if (text !== null) {
      parts.push({ type: "text", text });
    }
  }
  return parts;
}

// Opaque parts only survive the trip when they carry text.
function readPartText(part: ContentPart): string | null {
  if (part.type === "text") {
    return part.text;
  }
  if (part.type === "opaque" && isRecord(part.value) && typeof part.value.text === "string") {
    return part.value.text;
  }
  return null;
}

function normalizeChatCompletion(value: unknown): ChatCompletion {
  const record: Record<string, unknown> = isRecord(value) ? value : {};
  const rawChoices = Array.isArray(record.choices) ? record.choices : [];
  const choices: ChatCompletionChoice[] = [];
  for (const [position, raw] of rawChoices.entries()) {
    if (!isRecord(raw)) {
      continue;
    }
    const message: Record<string, unknown> = isRecord(raw.message) ? raw.message : {};
    choices.push({
      index: typeof raw.index === "number" ? raw.index : position,
      message: {
        ...message,
        role: readTrimmedString(message.role) || "assistant",
        content: readMessageContent(message.content),
      },
      finish_reason: typeof raw.finish_reason === "string" ? raw.finish_reason : null,
    });
  }
  return { ...record, choices };
}

function normalizeChatCompletionChunk(value: unknown): ChatCompletionChunk | null {
  if (!isRecord(value)) {
    return null;
  }
  const rawChoices = Array.isArray(value.choices) ? value.choices : [];
  const choices: ChatCompletionChunkChoice[] = [];
  for (const [position, raw] of rawChoices.entries()) {
    if (!isRecord(raw)) {
      continue;
    }
    const delta: Record<string, unknown> = isRecord(raw.delta) ? raw.delta : {};
    const role = readTrimmedString(delta.role);
    choices.push({
      index: typeof raw.index === "number" ? raw.index : position,
      delta: {
        ...(role ? { role } : {}),
        ...(typeof delta.content === "string" ? { content: delta.content } : {}),
      },
      finish_reason: typeof raw.finish_reason === "string" ? raw.finish_reason : null,
    });
  }
  return { ...value, choices };
}

function readMessageContent(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (!Array.isArray(value)) {
    return "";
  }
  const texts: string[] = [];
  for (const part of value) {
    if (typeof part === "string") {
      texts.push(part);
      continue;
    }
    if (isRecord(part) && typeof part.text === "string") {
      texts.push(part.text);
    }
  }
  return texts.join("\n\n");
}

function summarizeHttpError(payload: string): string {
  const text = payload.trim();
  if (!text) {
    return "empty response";
  }
  if (text.length <= 220) {
    return text;
  }
  return `${text.slice(0, 217)}...`;
}

export const __openAiInternals = {
  toWireRequest,
  toWireMessage,
  normalizeChatCompletion,
  normalizeChatCompletionChunk,
  readMessageContent,
};
