import type {
  ChatMessage,
  ChatRequestBody,
  ContentPart,
  FileDescriptor,
  ImageContentPart,
} from "../chat-types.js";
import { isRecord, looksLikeImagePath, readTrimmedString, resolveLocator } from "./messages.js";

export const DEFAULT_SCAN_USER_MESSAGES = 5;

export type ImageArtifacts = {
  hasImages: boolean;
  imageUrls: string[];
  imageFiles: FileDescriptor[];
  imageParts: ImageContentPart[];
};

export type ImageReference = {
  locator: string;
  part: ImageContentPart;
  file?: FileDescriptor;
};

export type ScanOptions = {
  maxUserMessages?: number;
};

export function extractImageArtifacts(body: ChatRequestBody, options: ScanOptions = {}): ImageArtifacts {
  const window = selectScanWindow(body.messages, options.maxUserMessages ?? DEFAULT_SCAN_USER_MESSAGES);
  const collector = new ArtifactCollector();

  for (const message of window) {
    collector.addMessage(message);
  }
  // conversation-wide attachments always count
  collector.addImages(body.images);
  collector.addFiles(body.files);

  return collector.result();
}

/**
 * Every user turn after the last assistant reply, with no cap. Used to pick up
 * images spread across several unanswered turns.
 */
export function extractSinceLastAssistant(body: ChatRequestBody): ImageArtifacts {
  return extractImageArtifacts(body, { maxUserMessages: Number.POSITIVE_INFINITY });
}

export function selectScanWindow(messages: ChatMessage[], maxUserMessages: number): ChatMessage[] {
  const limit = Number.isNaN(maxUserMessages) ? DEFAULT_SCAN_USER_MESSAGES : Math.max(1, maxUserMessages);

  let lastAssistantIndex = -1;
  for (let i = messages.length - 1; i >= 0; i -= 1) {
    if (messages[i]?.role === "assistant") {
      lastAssistantIndex = i;
      break;
    }
  }

  const pending = messages.slice(lastAssistantIndex + 1).filter((message) => message.role === "user");
  if (pending.length === 0) {
    const lastUser = [...messages].reverse().find((message) => message.role === "user");
    return lastUser ? [lastUser] : [];
  }
  if (!Number.isFinite(limit)) {
    return pending;
  }
  return pending.slice(-Math.floor(limit));
}

/**
 * Flattens the three artifact collections into one ordered list keyed by locator,
 * so the same image attached in several shapes is processed once.
 */
export function collectImageReferences(artifacts: ImageArtifacts): ImageReference[] {
  const byLocator = new Map<string, ImageReference>();

  const push = (locator: string, part: ImageContentPart, file?: FileDescriptor) => {
    const existing = byLocator.get(locator);
    if (existing) {
      if (file && !existing.file) {
        existing.file = file;
      }
      return;
    }
    byLocator.set(locator, file ? { locator, part, file } : { locator, part });
  };

  for (const url of artifacts.imageUrls) {
    push(url, { type: "image", locator: url });
  }
  for (const file of artifacts.imageFiles) {
    const locator = fileLocator(file);
    if (!locator) {
      continue;
    }
    push(locator, { type: "image", locator }, file);
  }
  for (const part of artifacts.imageParts) {
    push(partKey(part), part);
  }

  return [...byLocator.values()];
}

export function isImageFile(file: FileDescriptor): boolean {
  const meta: Record<string, unknown> = isRecord(file.meta) ? file.meta : {};
  const declared = [file.type, file.mimetype, file.mime_type, file.content_type, meta.content_type].map((value) =>
    readTrimmedString(value).toLowerCase(),
  );
  if (declared.some((value) => value.startsWith("image"))) {
    return true;
  }
  return [file.url, file.path, file.name].some((value) => looksLikeImagePath(readTrimmedString(value)));
}

export function isImagePart(part: ContentPart): part is ImageContentPart {
  return part.type === "image";
}

export function fileLocator(file: FileDescriptor): string {
  return (
    readTrimmedString(file.url) ||
    readTrimmedString(file.path) ||
    readTrimmedString(file.name) ||
    readTrimmedString(file.id)
  );
}

function fileKey(file: FileDescriptor): string {
  const url = readTrimmedString(file.url);
  const path = readTrimmedString(file.path);
  const name = readTrimmedString(file.name);
  if (!url && !path && !name) {
    return `json:${safeStringify(file)}`;
  }
  return `${url}|${path}|${name}`;
}

function partKey(part: ImageContentPart): string {
  return resolveLocator(part.locator) || `json:${safeStringify(part.locator)}`;
}

class ArtifactCollector {
  private readonly urls: string[] = [];
  private readonly files: FileDescriptor[] = [];
  private readonly parts: ImageContentPart[] = [];
  private readonly seenUrls = new Set<string>();
  private readonly seenFiles = new Set<string>();
  private readonly seenParts = new Set<string>();

  addMessage(message: ChatMessage): void {
    this.addImages(message.images);
    this.addFiles(message.files);
    if (Array.isArray(message.content)) {
      for (const part of message.content) {
        if (isImagePart(part)) {
          this.addPart(part);
        }
      }
    }
  }

  addImages(images: string[] | undefined): void {
    if (!Array.isArray(images)) {
      return;
    }
    for (const raw of images) {
      if (typeof raw !== "string") {
        continue;
      }
      const url = raw.trim();
      if (!url || this.seenUrls.has(url)) {
        continue;
      }
      this.seenUrls.add(url);
      this.urls.push(url);
    }
  }

  addFiles(files: FileDescriptor[] | undefined): void {
    if (!Array.isArray(files)) {
      return;
    }
    for (const file of files) {
      if (!isRecord(file) || !isImageFile(file)) {
        continue;
      }
      const key = fileKey(file);
      if (this.seenFiles.has(key)) {
        continue;
      }
      this.seenFiles.add(key);
      this.files.push(file);
    }
  }

  addPart(part: ImageContentPart): void {
    const key = partKey(part);
    if (this.seenParts.has(key)) {
      return;
    }
    this.seenParts.add(key);
    this.parts.push(part);
  }

  result(): ImageArtifacts {
    return {
      hasImages: this.urls.length > 0 || this.files.length > 0 || this.parts.length > 0,
      imageUrls: [...this.urls],
      imageFiles: [...this.files],
      imageParts: [...this.parts],
    };
  }
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? "";
  } catch {
    return String(value);
  }
}
