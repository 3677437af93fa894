import { describe, expect, it } from "vitest";
import type { ChatMessage, ChatRequestBody } from "../chat-types.js";
import {
  collectImageReferences,
  extractImageArtifacts,
  extractSinceLastAssistant,
  isImageFile,
  selectScanWindow,
} from "./images.js";
import { normalizeChatRequest } from "./messages.js";

function requestBody(raw: Record<string, unknown>): ChatRequestBody {
  const result = normalizeChatRequest({ model: "m", ...raw });
  if (!result.ok) {
    throw new Error(result.error);
  }
  return result.body;
}

function userWithImage(url: string): ChatMessage {
  return { role: "user", content: "look", images: [url] };
}

describe("core image helpers", () => {
  it("collapses one image attached in three shapes into one reference", () => {
    const body = requestBody({
      messages: [
        {
          role: "user",
          content: [
            { type: "text", text: "read this" },
            { type: "image_url", image_url: { url: "http://x/a.png" } },
          ],
          images: ["http://x/a.png"],
          files: [{ type: "image", url: "http://x/a.png" }],
        },
      ],
    });

    const artifacts = extractImageArtifacts(body);
    expect(artifacts.hasImages).toBe(true);
    expect(artifacts.imageUrls).toEqual(["http://x/a.png"]);
    expect(artifacts.imageFiles).toHaveLength(1);
    expect(artifacts.imageParts).toHaveLength(1);

    expect(collectImageReferences(artifacts)).toEqual([
      {
        locator: "http://x/a.png",
        part: { type: "image", locator: "http://x/a.png" },
        file: { type: "image", url: "http://x/a.png" },
      },
    ]);
  });

  it("reports no images for a plain text conversation", () => {
    const body = requestBody({ messages: [{ role: "user", content: "hello" }] });
    const artifacts = extractImageArtifacts(body);

    expect(artifacts).toEqual({ hasImages: false, imageUrls: [], imageFiles: [], imageParts: [] });
    expect(collectImageReferences(artifacts)).toEqual([]);
  });

  it("only scans user turns after the last assistant reply", () => {
    const messages: ChatMessage[] = [
      userWithImage("http://x/1.png"),
      { role: "assistant", content: "seen it" },
      userWithImage("http://x/2.png"),
      userWithImage("http://x/3.png"),
    ];
    const body: ChatRequestBody = { model: "m", stream: false, messages };

    expect(extractImageArtifacts(body).imageUrls).toEqual(["http://x/2.png", "http://x/3.png"]);
    expect(extractImageArtifacts(body, { maxUserMessages: 1 }).imageUrls).toEqual(["http://x/3.png"]);
    expect(extractSinceLastAssistant(body).imageUrls).toEqual(["http://x/2.png", "http://x/3.png"]);
  });

  it("falls back to the last user message when the assistant spoke last", () => {
    const messages: ChatMessage[] = [
      userWithImage("http://x/1.png"),
      userWithImage("http://x/2.png"),
      { role: "assistant", content: "done" },
    ];

    expect(selectScanWindow(messages, 5)).toEqual([messages[1]]);
    expect(selectScanWindow([{ role: "system", content: "s" }], 5)).toEqual([]);
  });

  it("always includes conversation-wide attachments", () => {
    const body = requestBody({
      images: ["http://x/top.jpg"],
      files: [{ name: "notes.txt" }, { name: "scan.PNG" }],
      messages: [{ role: "user", content: "hi" }],
    });

    const artifacts = extractImageArtifacts(body);
    expect(artifacts.imageUrls).toEqual(["http://x/top.jpg"]);
    expect(artifacts.imageFiles).toEqual([{ name: "scan.PNG" }]);
  });

  it("skips malformed entries", () => {
    const body = requestBody({
      messages: [
        {
          role: "user",
          content: [{ type: "image_url" }, "stray", { type: "text", text: "x" }],
          images: [" ", 7],
          files: ["nope", { type: "file" }],
        },
      ],
    });

    expect(extractImageArtifacts(body)).toEqual({
      hasImages: false,
      imageUrls: [],
      imageFiles: [],
      imageParts: [],
    });
  });

  it("classifies files by declared type or extension", () => {
    expect(isImageFile({ type: "file", mimetype: "image/png" })).toBe(true);
    expect(isImageFile({ meta: { content_type: "image/jpeg" } })).toBe(true);
    expect(isImageFile({ path: "/tmp/a.webp" })).toBe(true);
    expect(isImageFile({ type: "file", name: "notes.txt" })).toBe(false);
  });
});
