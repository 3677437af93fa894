import { describe, expect, it } from "vitest";
import { createEmptyAggregate } from "../ocr/types.js";
import { ANSWER_SEPARATOR, mergePreviewIntoAnswer, renderOcrPreview } from "./preview.js";

const limits = { maxTextChars: 100, maxDescriptionChars: 100, includeDescription: true };

describe("ocr preview", () => {
  it("renders a collapsible block with escaped content", () => {
    const preview = renderOcrPreview(
      { ...createEmptyAggregate(), text: "a<b & c", categories: ["document"] },
      limits,
    );

    expect(preview).toBe(
      [
        "<details><summary>OCR Results</summary>",
        "<p><strong>Category:</strong> document</p>",
        "<p><strong>Text:</strong></p>",
        "<pre><code>a&lt;b &amp; c</code></pre>",
        "<p><strong>Description:</strong> (none)</p>",
        "</details>",
      ].join("\n"),
    );
  });

  it("notes missing text and omits the description when switched off", () => {
    const preview = renderOcrPreview(
      { ...createEmptyAggregate(), description: "a blank wall", categories: ["photo"] },
      { ...limits, includeDescription: false },
    );

    expect(preview).toBe(
      [
        "<details><summary>OCR Results</summary>",
        "<p><strong>Category:</strong> photo</p>",
        "<p><strong>Text:</strong> (no visible text)</p>",
        "</details>",
      ].join("\n"),
    );
  });

  it("renders nothing for an empty aggregate", () => {
    expect(renderOcrPreview(createEmptyAggregate(), limits)).toBe("");
  });

  it("merges the preview above or below the answer", () => {
    expect(mergePreviewIntoAnswer("P", "A", "top")).toBe(`P${ANSWER_SEPARATOR}A`);
    expect(mergePreviewIntoAnswer("P", "A", "bottom")).toBe(`A${ANSWER_SEPARATOR}P`);
    expect(mergePreviewIntoAnswer("", "A", "top")).toBe("A");
  });
});
