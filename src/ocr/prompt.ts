import type { ChatMessage, ContentPart, FileDescriptor } from "../chat-types.js";
import type { ImageReference } from "../core/images.js";
import { readTrimmedString } from "../core/messages.js";
import { OCR_CATEGORIES } from "./types.js";

export const OCR_USER_INSTRUCTION =
  "Transcribe all text from the attached image(s). If requested, also provide a description and a category following the schema.";

const STRUCTURED_SYSTEM_INSTRUCTION = [
  "You are an OCR and image-understanding assistant. Extract all visible text verbatim from the provided image(s).",
  "- Preserve natural reading order, line breaks and headings.",
  "- Do not translate; keep original language.",
  "- Additionally, when it is relevant to understanding user intent (e.g., quiz questions, UI screenshots, diagrams, charts, math problems, slides, whiteboards, handwritten notes, or complex scenes), include a detailed but concise description of the image(s).",
  "- Always format your response using this schema:",
  "TEXT:",
  "<transcribed text>",
  "",
  "---",
  "DESCRIPTION:",
  "<description or 'N/A'>",
  "",
  "---",
  `CATEGORY: ${OCR_CATEGORIES.join("|")}`,
  "- If multiple images are present, separate each image's transcribed text in TEXT with blank lines and a line containing three dashes (---).",
].join("\n");

const PLAIN_SYSTEM_INSTRUCTION = [
  "You are an OCR engine. Extract all visible text verbatim from the provided image(s).",
  "- Preserve natural reading order, line breaks and headings.",
  "- Do not translate; keep original language.",
  "- If multiple images, separate each image's text by a blank line and a line with three dashes (---).",
  "- Return plain text only, no explanations.",
].join("\n");

export function buildOcrSystemInstruction(includeDescription: boolean): string {
  return includeDescription ? STRUCTURED_SYSTEM_INSTRUCTION : PLAIN_SYSTEM_INSTRUCTION;
}

/**
 * Messages for one vision request: the fixed instruction plus a user turn carrying
 * every referenced image as a content part. File descriptors ride along as `files`
 * for hosts that resolve uploads by id.
 */
export function buildOcrMessages(references: ImageReference[], includeDescription: boolean): ChatMessage[] {
  const content: ContentPart[] = [{ type: "text", text: OCR_USER_INSTRUCTION }];
  const files: FileDescriptor[] = [];
  for (const reference of references) {
    const file = reference.file;
    if (file) {
      files.push(file);
      if (!readTrimmedString(file.url) && !readTrimmedString(file.path)) {
        // only the host can resolve this upload
        continue;
      }
    }
    content.push(reference.part);
  }

  const user: ChatMessage = { role: "user", content };
  if (files.length > 0) {
    user.files = files;
  }

  return [{ role: "system", content: buildOcrSystemInstruction(includeDescription) }, user];
}
