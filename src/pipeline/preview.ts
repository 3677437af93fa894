import { hasOcrContent, renderCategories, type AggregateOcrResult } from "../ocr/types.js";
import { truncateWithMarker, type OcrContextLimits } from "./context.js";

export type MergePlacement = "top" | "bottom";

export const ANSWER_SEPARATOR = "\n\n---\n\n";

/**
 * Collapsible block listing what the vision model found. Returns an empty string
 * when there is nothing to show.
 */
export function renderOcrPreview(
  aggregate: AggregateOcrResult,
  options: OcrContextLimits & { includeDescription: boolean },
): string {
  if (!hasOcrContent(aggregate)) {
    return "";
  }

  const text = truncateWithMarker(aggregate.text, options.maxTextChars);
  const description = truncateWithMarker(aggregate.description, options.maxDescriptionChars);
  const category = renderCategories(aggregate);

  const parts: string[] = ["<details><summary>OCR Results</summary>"];
  if (category) {
    parts.push(`<p><strong>Category:</strong> ${escapeHtml(category)}</p>`);
  }
  if (text) {
    parts.push("<p><strong>Text:</strong></p>");
    parts.push(`<pre><code>${escapeHtml(text)}</code></pre>`);
  } else {
    parts.push("<p><strong>Text:</strong> (no visible text)</p>");
  }
  if (options.includeDescription) {
    if (description) {
      parts.push("<p><strong>Description:</strong></p>");
      parts.push(`<blockquote>${escapeHtml(description)}</blockquote>`);
    } else {
      parts.push("<p><strong>Description:</strong> (none)</p>");
    }
  }
  parts.push("</details>");
  return parts.join("\n");
}

export function mergePreviewIntoAnswer(preview: string, answer: string, placement: MergePlacement): string {
  if (!preview) {
    return answer;
  }
  return placement === "top"
    ? `${preview}${ANSWER_SEPARATOR}${answer}`
    : `${answer}${ANSWER_SEPARATOR}${preview}`;
}

function escapeHtml(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}
