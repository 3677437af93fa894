import { OCR_CATEGORIES, createEmptyOcrResult, isOcrCategory, type OcrCategory, type OcrResult } from "./types.js";

const TEXT_HEADER = /^\s*text\s*:\s*$/i;
const DESCRIPTION_HEADER = /^\s*description\s*:\s*$/i;
const CATEGORY_LINE = /^\s*category\s*:\s*(.*)$/i;
const SEPARATOR_LINE = /^\s*---\s*$/;

export const CATEGORY_SYNONYMS: Readonly<Record<string, OcrCategory>> = {
  handwritten: "handwritten_note",
  handwriting: "handwritten_note",
  hand_writing: "handwritten_note",
  hand_written: "handwritten_note",
  webpage: "screenshot",
  web_page: "screenshot",
  ui: "screenshot",
  screen: "screenshot",
  picture: "photo",
  image: "photo",
};

const EMPTY_DESCRIPTIONS = new Set(["n/a", "na", "none", "no description"]);

export type ParseOptions = {
  includeDescription?: boolean;
};

/**
 * Splits a vision model reply into text, description and category.
 *
 * Replies that ignore the schema entirely come back as plain text. `TEXT:` and
 * `DESCRIPTION:` only open a section when they stand alone on their line, so a
 * transcribed `Description: Blue widget` stays part of the text. `CATEGORY:`
 * carries its value inline.
 */
export function parseOcrStructuredOutput(raw: unknown, options: ParseOptions = {}): OcrResult {
  if (typeof raw !== "string" || !raw.trim()) {
    return createEmptyOcrResult();
  }

  const reply = raw.trim();
  const lowered = reply.toLowerCase();
  const hasMarkers = lowered.includes("text:") || lowered.includes("description:") || lowered.includes("category:");
  if (!hasMarkers) {
    return { text: reply, description: "", category: "" };
  }

  const textLines: string[] = [];
  const descriptionLines: string[] = [];
  let category = "";
  let current: "text" | "description" = "text";

  for (const line of reply.replace(/\r\n/g, "\n").split("\n")) {
    if (TEXT_HEADER.test(line)) {
      current = "text";
      continue;
    }
    if (DESCRIPTION_HEADER.test(line)) {
      current = "description";
      continue;
    }
    const categoryMatch = line.match(CATEGORY_LINE);
    if (categoryMatch) {
      category = (categoryMatch[1] ?? "").trim();
      continue;
    }
    if (SEPARATOR_LINE.test(line)) {
      continue;
    }

    if (current === "description") {
      descriptionLines.push(line);
    } else {
      textLines.push(line);
    }
  }

  let description = descriptionLines.join("\n").trim();
  if (options.includeDescription === false || EMPTY_DESCRIPTIONS.has(description.toLowerCase())) {
    description = "";
  }

  return {
    text: textLines.join("\n").trim(),
    description,
    category: normalizeOcrCategory(category),
  };
}

export function normalizeOcrCategory(value: unknown): OcrCategory | "" {
  if (typeof value !== "string") {
    return "";
  }
  const normalized = value.trim().toLowerCase().replace(/[ -]/g, "_");
  if (!normalized) {
    return "";
  }

  const mapped = CATEGORY_SYNONYMS[normalized] ?? normalized;
  if (isOcrCategory(mapped)) {
    return mapped;
  }
  return OCR_CATEGORIES.find((category) => mapped.startsWith(category)) ?? "";
}
