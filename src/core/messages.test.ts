import { describe, expect, it } from "vitest";
import {
  looksLikeImagePath,
  normalizeChatRequest,
  normalizeContentPart,
  normalizeFileList,
  normalizeImageList,
  resolveLocator,
} from "./messages.js";

describe("chat message normalization", () => {
  it("rejects requests without a message list", () => {
    expect(normalizeChatRequest(null)).toEqual({ ok: false, error: "request must be an object" });
    expect(normalizeChatRequest({ model: "m" })).toEqual({ ok: false, error: "request.messages must be an array" });
  });

  it("drops malformed messages and keeps unknown request keys", () => {
    const result = normalizeChatRequest({
      model: " reasoner ",
      temperature: 0.2,
      messages: [{ role: "user", content: "hi" }, "nope", { role: "narrator", content: "x" }, { content: "no role" }],
    });

    expect(result).toEqual({
      ok: true,
      body: {
        model: "reasoner",
        stream: false,
        temperature: 0.2,
        messages: [{ role: "user", content: "hi" }],
      },
    });
  });

  it("maps the image part spellings onto one shape", () => {
    expect(normalizeContentPart({ type: "image_url", image_url: { url: "http://x/a.png", detail: "high" } })).toEqual({
      type: "image",
      locator: { url: "http://x/a.png", detail: "high" },
      detail: "high",
    });
    expect(normalizeContentPart({ type: "input_image", image_url: "http://x/b.webp" })).toEqual({
      type: "image",
      locator: "http://x/b.webp",
    });
    expect(
      normalizeContentPart({ type: "image", source: { type: "base64", media_type: "image/png", data: "AAAA" } }),
    ).toEqual({
      type: "image",
      locator: { type: "base64", media_type: "image/png", data: "AAAA" },
    });
  });

  it("detects untagged parts that point at an image", () => {
    expect(normalizeContentPart({ url: "http://x/photo.jpg?size=2" })).toEqual({
      type: "image",
      locator: "http://x/photo.jpg?size=2",
    });
    expect(normalizeContentPart({ url: "http://x/doc.pdf" })).toEqual({
      type: "opaque",
      value: { url: "http://x/doc.pdf" },
    });
    expect(normalizeContentPart({ type: "input_audio", data: "AAAA" })).toEqual({
      type: "opaque",
      value: { type: "input_audio", data: "AAAA" },
    });
  });

  it("resolves nested locators", () => {
    expect(resolveLocator(" http://x/a.png ")).toBe("http://x/a.png");
    expect(resolveLocator({ image_url: { url: "http://x/b.png" } })).toBe("http://x/b.png");
    expect(resolveLocator({ source: { media_type: "image/png", data: "AAAA" } })).toBe("data:image/png;base64,AAAA");
    expect(resolveLocator({ caption: "nothing here" })).toBe("");
  });

  it("recognizes image paths and data urls", () => {
    expect(looksLikeImagePath("scan.TIFF")).toBe(true);
    expect(looksLikeImagePath("http://x/a.jpeg#frag")).toBe(true);
    expect(looksLikeImagePath("data:image/gif;base64,R0lG")).toBe(true);
    expect(looksLikeImagePath("report.pdf")).toBe(false);
    expect(looksLikeImagePath("   ")).toBe(false);
  });

  it("cleans image and file lists", () => {
    expect(normalizeImageList(["http://x/a.png", " ", 4, { url: "http://x/b.png" }])).toEqual([
      "http://x/a.png",
      "http://x/b.png",
    ]);
    expect(normalizeImageList("http://x/a.png")).toEqual([]);
    expect(normalizeFileList([{ url: "  ", name: " a.png ", size: 3 }, "nope"])).toEqual([{ name: "a.png", size: 3 }]);
  });
});
