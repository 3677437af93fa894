import type { ChatMessage, ChatRequestBody } from "../chat-types.js";
import { isImagePart } from "../core/images.js";
import { hasOcrContent, renderCategories, type AggregateOcrResult } from "../ocr/types.js";

export const TRUNCATION_MARKER = "\n\n[...truncated]";

export const OCR_CONTEXT_HEADER = [
  "Image understanding results extracted from user-provided image(s).",
  "Use these alongside the user's prompt to answer accurately.",
];

export type OcrContextLimits = {
  maxTextChars: number;
  maxDescriptionChars: number;
};

export type ComposeOptions = OcrContextLimits & {
  reasoningModel: string;
  includeDescription: boolean;
};

/**
 * Cuts `value` to `maxChars` code points and appends the truncation marker when
 * anything was dropped. A non-positive cap disables truncation.
 */
export function truncateWithMarker(value: string, maxChars: number): string {
  if (maxChars <= 0) {
    return value;
  }
  const chars = Array.from(value);
  if (chars.length <= maxChars) {
    return value;
  }
  return `${chars.slice(0, maxChars).join("")}${TRUNCATION_MARKER}`;
}

export function stripImageArtifacts(messages: ChatMessage[]): ChatMessage[] {
  return messages.map((message) => {
    const { images: _images, files: _files, ...rest } = structuredClone(message);
    const content = rest.content;
    return {
      ...rest,
      content: typeof content === "string" ? content : content.filter((part) => !isImagePart(part)),
    };
  });
}

export function buildOcrContextMessage(
  aggregate: AggregateOcrResult,
  options: OcrContextLimits & { includeDescription: boolean },
): ChatMessage | null {
  const text = truncateWithMarker(aggregate.text, options.maxTextChars);
  const description = options.includeDescription
    ? truncateWithMarker(aggregate.description, options.maxDescriptionChars)
    : "";
  const category = renderCategories(aggregate);
  if (!text && !description && !category) {
    return null;
  }

  const lines = [...OCR_CONTEXT_HEADER, ""];
  if (text) {
    lines.push("OCR_TEXT:", text, "");
  }
  if (description) {
    lines.push("OCR_DESCRIPTION:", description, "");
  }
  if (category) {
    lines.push(`OCR_CATEGORY: ${category}`);
  }

  return {
    role: "system",
    content: lines.join("\n").trim(),
  };
}

/**
 * Builds the body for the reasoning model: image payloads removed everywhere, OCR
 * context prepended as a system message and the model swapped. Every other key of
 * the incoming body is left as it was.
 */
export function composeReasonerRequest(
  body: ChatRequestBody,
  aggregate: AggregateOcrResult,
  options: ComposeOptions,
): ChatRequestBody {
  const { images: _images, files: _files, ...rest } = structuredClone(body);
  const messages = stripImageArtifacts(rest.messages);

  if (hasOcrContent(aggregate)) {
    const context = buildOcrContextMessage(aggregate, options);
    if (context) {
      messages.unshift(context);
    }
  }

  return {
    ...rest,
    model: options.reasoningModel,
    messages,
  };
}
