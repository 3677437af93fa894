import type {
  ChatMessage,
  ChatRequestBody,
  ChatRole,
  ContentPart,
  FileDescriptor,
  ImageContentPart,
  ImageLocator,
} from "../chat-types.js";

const IMAGE_PART_TYPES = new Set(["image_url", "input_image", "image"]);
const IMAGE_PATH_PATTERN = /\.(jpe?g|png|gif|bmp|webp|tiff?)$/i;
const FILE_STRING_FIELDS = ["type", "mimetype", "url", "path", "name", "id"] as const;

export function normalizeChatRequest(value: unknown):
  | { ok: true; body: ChatRequestBody }
  | { ok: false; error: string } {
  if (!isRecord(value)) {
    return { ok: false, error: "request must be an object" };
  }
  if (!Array.isArray(value.messages)) {
    return { ok: false, error: "request.messages must be an array" };
  }

  const messages: ChatMessage[] = [];
  for (const raw of value.messages) {
    const message = normalizeChatMessage(raw);
    if (message) {
      messages.push(message);
    }
  }

  const { model: _model, stream: _stream, messages: _messages, images, files, ...rest } = value;
  const body: ChatRequestBody = {
    ...rest,
    model: readTrimmedString(value.model),
    stream: value.stream === true,
    messages,
  };
  if (images !== undefined) {
    body.images = normalizeImageList(images);
  }
  if (files !== undefined) {
    body.files = normalizeFileList(files);
  }
  return { ok: true, body };
}

export function normalizeChatMessage(value: unknown): ChatMessage | null {
  if (!isRecord(value)) {
    return null;
  }
  const role = readRole(value.role);
  if (!role) {
    return null;
  }

  const { role: _role, content, images, files, ...rest } = value;
  const message: ChatMessage = {
    ...rest,
    role,
    content: normalizeContent(content),
  };
  if (images !== undefined) {
    message.images = normalizeImageList(images);
  }
  if (files !== undefined) {
    message.files = normalizeFileList(files);
  }
  return message;
}

export function normalizeContent(value: unknown): string | ContentPart[] {
  if (typeof value === "string") {
    return value;
  }
  if (!Array.isArray(value)) {
    return "";
  }
  return value.map((part) => normalizeContentPart(part));
}

export function normalizeContentPart(value: unknown): ContentPart {
  if (!isRecord(value)) {
    return { type: "opaque", value };
  }

  const type = readTrimmedString(value.type).toLowerCase();
  if (type === "text" && typeof value.text === "string") {
    return { type: "text", text: value.text };
  }

  if (IMAGE_PART_TYPES.has(type)) {
    const locator = readImageLocatorField(value) ?? stripTypeField(value);
    if (isRecord(locator) && Object.keys(locator).length === 0) {
      return { type: "opaque", value };
    }
    return buildImagePart(value, locator);
  }

  if (!type || type === "opaque") {
    // untagged parts still count when they carry an image-looking locator
    const locator = readImageLocatorField(value);
    if (locator !== null && looksLikeImageLocator(locator)) {
      return buildImagePart(value, locator);
    }
  }

  return { type: "opaque", value };
}

export function normalizeImageList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const rows: string[] = [];
  for (const raw of value) {
    if (typeof raw !== "string" && !isRecord(raw)) {
      continue;
    }
    const resolved = resolveLocator(raw);
    if (!resolved) {
      continue;
    }
    rows.push(resolved);
  }
  return rows;
}

export function normalizeFileList(value: unknown): FileDescriptor[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const rows: FileDescriptor[] = [];
  for (const raw of value) {
    if (!isRecord(raw)) {
      continue;
    }
    const descriptor: FileDescriptor = { ...raw };
    for (const field of FILE_STRING_FIELDS) {
      const current = raw[field];
      if (current === undefined) {
        continue;
      }
      const normalized = readTrimmedString(current);
      if (normalized) {
        descriptor[field] = normalized;
      } else {
        delete descriptor[field];
      }
    }
    rows.push(descriptor);
  }
  return rows;
}

/**
 * Resolves a locator to the string a model can fetch. Nested shapes from the
 * different chat wire formats are followed; an empty string means nothing usable.
 */
export function resolveLocator(locator: ImageLocator): string {
  if (typeof locator === "string") {
    return locator.trim();
  }

  for (const key of ["url", "image_url", "data_url", "path"] as const) {
    const nested = locator[key];
    if (typeof nested === "string" && nested.trim()) {
      return nested.trim();
    }
    if (isRecord(nested)) {
      const resolved = resolveLocator(nested);
      if (resolved) {
        return resolved;
      }
    }
  }

  const data = readTrimmedString(locator.data);
  const mediaType = readTrimmedString(locator.media_type);
  if (data && mediaType) {
    return `data:${mediaType};base64,${data}`;
  }

  const source = locator.source;
  return isRecord(source) ? resolveLocator(source) : "";
}

export function looksLikeImagePath(value: string): boolean {
  const trimmed = value.trim();
  if (!trimmed) {
    return false;
  }
  if (/^data:image\//i.test(trimmed)) {
    return true;
  }
  const withoutSuffix = trimmed.split(/[?#]/, 1)[0] ?? "";
  return IMAGE_PATH_PATTERN.test(withoutSuffix);
}

/**
 * Writes a content part back in the chat-completions wire shape.
 */
function buildImagePart(raw: Record<string, unknown>, locator: ImageLocator): ImageContentPart {
  const part: ImageContentPart = { type: "image", locator };
  const nested = raw.image_url;
  const detail = readTrimmedString(raw.detail) || (isRecord(nested) ? readTrimmedString(nested.detail) : "");
  if (detail) {
    part.detail = detail;
  }
  return part;
}

function readImageLocatorField(value: Record<string, unknown>): ImageLocator | null {
  for (const key of ["image_url", "url", "image", "source"] as const) {
    const candidate = value[key];
    if (typeof candidate === "string" && candidate.trim()) {
      return candidate.trim();
    }
    if (isRecord(candidate)) {
      return candidate;
    }
  }
  return null;
}

function looksLikeImageLocator(locator: ImageLocator): boolean {
  return looksLikeImagePath(resolveLocator(locator));
}

function stripTypeField(value: Record<string, unknown>): Record<string, unknown> {
  const { type: _type, ...rest } = value;
  return rest;
}

function readRole(value: unknown): ChatRole | null {
  const normalized = readTrimmedString(value).toLowerCase();
  if (normalized === "system" || normalized === "user" || normalized === "assistant" || normalized === "tool") {
    return normalized;
  }
  return null;
}

export function readTrimmedString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
