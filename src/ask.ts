import fs from "node:fs/promises";
import path from "node:path";
import type { ChatRequestBody, CompleteChat, ContentPart } from "./chat-types.js";
import type { ServiceConfig } from "./config.js";
import { VisionPipeRuntime, type RuntimeEventListener } from "./core/runtime.js";
import { createLogger } from "./logger.js";
import { ANONYMOUS_USER } from "./rpc/protocol.js";

export type AskArgs = {
  prompt: string;
  images: string[];
  stream: boolean;
};

const IMAGE_MEDIA_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".bmp": "image/bmp",
  ".webp": "image/webp",
  ".tif": "image/tiff",
  ".tiff": "image/tiff",
};

export function parseAskArgs(args: string[]): AskArgs {
  const promptWords: string[] = [];
  const images: string[] = [];
  let stream = false;

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index] ?? "";
    if (arg === "--stream") {
      stream = true;
      continue;
    }
    if (arg === "--image") {
      const value = (args[index + 1] ?? "").trim();
      if (!value || value.startsWith("--")) {
        throw new Error("Missing value for --image.");
      }
      images.push(value);
      index += 1;
      continue;
    }
    if (arg.startsWith("--image=")) {
      const value = arg.slice("--image=".length).trim();
      if (!value) {
        throw new Error("Missing value for --image.");
      }
      images.push(value);
      continue;
    }
    if (arg.startsWith("--")) {
      throw new Error(`Unknown option ${arg}.`);
    }
    promptWords.push(arg);
  }

  const prompt = promptWords.join(" ").trim();
  if (!prompt) {
    throw new Error("A prompt is required.");
  }
  return { prompt, images, stream };
}

export function buildAskRequest(args: AskArgs, imageUrls: string[], model: string): ChatRequestBody {
  const content: ContentPart[] = [{ type: "text", text: args.prompt }];
  for (const url of imageUrls) {
    content.push({ type: "image", locator: { url } });
  }
  return {
    model,
    stream: args.stream,
    messages: [{ role: "user", content }],
  };
}

/** Remote and data URLs pass through; local files are inlined as base64 data URLs. */
export async function resolveImageArgument(value: string, cwd = process.cwd()): Promise<string> {
  if (/^(https?:|data:)/i.test(value)) {
    return value;
  }
  const filePath = path.resolve(cwd, value);
  const mediaType = IMAGE_MEDIA_TYPES[path.extname(filePath).toLowerCase()];
  if (!mediaType) {
    throw new Error(`Unsupported image file ${value}. Use png, jpg, gif, bmp, webp or tiff.`);
  }
  const bytes = await fs.readFile(filePath);
  return `data:${mediaType};base64,${bytes.toString("base64")}`;
}

export type AskIo = {
  onEvent?: RuntimeEventListener;
  writeAnswer: (content: string) => void;
};

export async function runAsk(
  config: ServiceConfig,
  args: AskArgs,
  io: AskIo,
  options: { complete?: CompleteChat; cwd?: string } = {},
): Promise<string> {
  const runtime = new VisionPipeRuntime({
    config,
    complete: options.complete,
    logger: createLogger({ debug: config.debug }),
  });
  const unsubscribe = io.onEvent ? runtime.onEvent(io.onEvent) : () => {};
  try {
    const imageUrls = await Promise.all(args.images.map((image) => resolveImageArgument(image, options.cwd)));
    const result = await runtime.run({
      body: buildAskRequest(args, imageUrls, config.pipeId),
      user: ANONYMOUS_USER,
    });
    io.writeAnswer(result.content);
    return result.content;
  } finally {
    unsubscribe();
  }
}
