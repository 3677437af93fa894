import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { buildAskRequest, parseAskArgs, resolveImageArgument, runAsk } from "./ask.js";
import type { ChatRequestBody, CompletionOutcome, RequestUser } from "./chat-types.js";
import { DEFAULT_PIPELINE_CONFIG, type ServiceConfig } from "./config.js";
import type { RuntimeEvent } from "./core/runtime.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

const config: ServiceConfig = {
  ...DEFAULT_PIPELINE_CONFIG,
  visionModel: "vision-model",
  reasoningModel: "reasoner-model",
  showOcrResults: false,
  apiBaseUrl: "http://api.test/v1",
  apiKey: "",
  debug: false,
};

describe("ask command", () => {
  it("parses the prompt, images and stream flag", () => {
    expect(parseAskArgs(["what", "is", "this?", "--image", "http://x/a.png", "--stream", "--image=b.png"])).toEqual({
      prompt: "what is this?",
      images: ["http://x/a.png", "b.png"],
      stream: true,
    });
  });

  it("rejects incomplete arguments", () => {
    expect(() => parseAskArgs([])).toThrowError("A prompt is required.");
    expect(() => parseAskArgs(["hi", "--image"])).toThrowError("Missing value for --image.");
    expect(() => parseAskArgs(["hi", "--image", "--stream"])).toThrowError("Missing value for --image.");
    expect(() => parseAskArgs(["hi", "--fast"])).toThrowError("Unknown option --fast.");
  });

  it("builds a single user turn carrying the images", () => {
    expect(buildAskRequest({ prompt: "read it", images: [], stream: false }, ["http://x/a.png"], "pipe")).toEqual({
      model: "pipe",
      stream: false,
      messages: [
        {
          role: "user",
          content: [
            { type: "text", text: "read it" },
            { type: "image", locator: { url: "http://x/a.png" } },
          ],
        },
      ],
    });
  });

  it("inlines local images as data urls", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "visionpipe-ask-"));
    tempDirs.push(dir);
    fs.writeFileSync(path.join(dir, "sign.png"), Buffer.from("png-test"));

    await expect(resolveImageArgument("sign.png", dir)).resolves.toBe(
      `data:image/png;base64,${Buffer.from("png-test").toString("base64")}`,
    );
    await expect(resolveImageArgument("https://x/a.png", dir)).resolves.toBe("https://x/a.png");
    await expect(resolveImageArgument("notes.txt", dir)).rejects.toThrowError(
      "Unsupported image file notes.txt. Use png, jpg, gif, bmp, webp or tiff.",
    );
  });

  it("runs the pipeline and writes the answer", async () => {
    const complete = vi.fn(
      async (body: ChatRequestBody, _user: RequestUser): Promise<CompletionOutcome> => ({
        kind: "response",
        response: {
          choices: [
            {
              index: 0,
              message: { role: "assistant", content: body.model === "vision-model" ? "TEXT:\nSTOP" : "It says STOP." },
            },
          ],
        },
      }),
    );
    const answers: string[] = [];
    const events: RuntimeEvent[] = [];

    const content = await runAsk(
      config,
      { prompt: "what does it say?", images: ["http://x/sign.png"], stream: false },
      {
        onEvent: (event) => events.push(event),
        writeAnswer: (text) => answers.push(text),
      },
      { complete },
    );

    expect(content).toBe("It says STOP.");
    expect(answers).toEqual(["It says STOP."]);
    expect(complete).toHaveBeenCalledTimes(2);
    expect(complete.mock.calls[1]?.[1]).toEqual({ id: "anonymous" });
    expect(String(complete.mock.calls[1]?.[0].messages[0]?.content)).toContain("OCR_TEXT:\nSTOP");
    expect(events[0]).toEqual({
      type: "pipeline.status",
      payload: { run_id: "run-1", description: "Running OCR on 1 attached image(s)...", done: false, hidden: false },
    });
  });
});
