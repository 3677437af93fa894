export const OCR_CATEGORIES = [
  "screenshot",
  "document",
  "diagram",
  "math",
  "slide",
  "whiteboard",
  "handwritten_note",
  "photo",
  "other",
] as const;

export type OcrCategory = (typeof OCR_CATEGORIES)[number];

export type OcrResult = {
  text: string;
  description: string;
  category: OcrCategory | "";
};

export type OcrFailure = {
  locators: string[];
  message: string;
};

export type AggregateOcrResult = {
  text: string;
  description: string;
  categories: OcrCategory[];
  // locators already sent to the vision model during this run
  processed: string[];
  failures: OcrFailure[];
};

export type OcrMode = "per_image" | "batch";

export const OCR_SECTION_SEPARATOR = "\n\n---\n\n";

export function createEmptyOcrResult(): OcrResult {
  return { text: "", description: "", category: "" };
}

export function createEmptyAggregate(): AggregateOcrResult {
  return {
    text: "",
    description: "",
    categories: [],
    processed: [],
    failures: [],
  };
}

export function isOcrCategory(value: string): value is OcrCategory {
  return OCR_CATEGORIES.some((category) => category === value);
}

/**
 * Folds one more result into an aggregate. Texts and descriptions are joined with
 * the section separator; categories keep first-seen order without duplicates.
 */
export function appendOcrResult(
  aggregate: AggregateOcrResult,
  result: OcrResult,
  locators: string[] = [],
): AggregateOcrResult {
  return {
    text: joinSections(aggregate.text, result.text),
    description: joinSections(aggregate.description, result.description),
    categories:
      result.category && !aggregate.categories.includes(result.category)
        ? [...aggregate.categories, result.category]
        : aggregate.categories,
    processed: appendUnique(aggregate.processed, locators),
    failures: aggregate.failures,
  };
}

export function mergeAggregates(left: AggregateOcrResult, right: AggregateOcrResult): AggregateOcrResult {
  const categories = [...left.categories];
  for (const category of right.categories) {
    if (!categories.includes(category)) {
      categories.push(category);
    }
  }
  return {
    text: joinSections(left.text, right.text),
    description: joinSections(left.description, right.description),
    categories,
    processed: appendUnique(left.processed, right.processed),
    failures: [...left.failures, ...right.failures],
  };
}

export function renderCategories(aggregate: AggregateOcrResult): string {
  return aggregate.categories.join(", ");
}

export function hasOcrContent(aggregate: AggregateOcrResult): boolean {
  return Boolean(aggregate.text || aggregate.description || aggregate.categories.length > 0);
}

function joinSections(existing: string, incoming: string): string {
  if (!incoming) {
    return existing;
  }
  if (!existing) {
    return incoming;
  }
  return `${existing}${OCR_SECTION_SEPARATOR}${incoming}`;
}

function appendUnique(existing: string[], incoming: string[]): string[] {
  const merged = [...existing];
  for (const item of incoming) {
    if (!merged.includes(item)) {
      merged.push(item);
    }
  }
  return merged;
}
