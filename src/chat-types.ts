export type ChatRole = "system" | "user" | "assistant" | "tool";

export type ImageLocator = string | Record<string, unknown>;

export type TextContentPart = {
  type: "text";
  text: string;
};

export type ImageContentPart = {
  type: "image";
  locator: ImageLocator;
  detail?: string;
};

// Parts we do not understand are carried through untouched.
export type OpaqueContentPart = {
  type: "opaque";
  value: unknown;
};

export type ContentPart = TextContentPart | ImageContentPart | OpaqueContentPart;

export type FileDescriptor = {
  type?: string;
  mimetype?: string;
  url?: string;
  path?: string;
  name?: string;
  id?: string;
  [key: string]: unknown;
};

export type ChatMessage = {
  role: ChatRole;
  content: string | ContentPart[];
  images?: string[];
  files?: FileDescriptor[];
  [key: string]: unknown;
};

export type ChatRequestBody = {
  model: string;
  stream: boolean;
  messages: ChatMessage[];
  images?: string[];
  files?: FileDescriptor[];
  [key: string]: unknown;
};

export type RequestUser = {
  id: string;
  name?: string;
};

export type ChatCompletionMessage = {
  role: string;
  content: string;
  [key: string]: unknown;
};

export type ChatCompletionChoice = {
  index: number;
  message: ChatCompletionMessage;
  finish_reason?: string | null;
};

export type ChatCompletion = {
  choices: ChatCompletionChoice[];
  [key: string]: unknown;
};

export type ChatCompletionChunkChoice = {
  index: number;
  delta: {
    role?: string;
    content?: string;
  };
  finish_reason?: string | null;
};

export type ChatCompletionChunk = {
  choices: ChatCompletionChunkChoice[];
  [key: string]: unknown;
};

export type CompletionOutcome =
  | {
      kind: "response";
      response: ChatCompletion;
    }
  | {
      kind: "stream";
      chunks: AsyncIterable<ChatCompletionChunk>;
    };

/**
 * The single call every model interaction goes through. Implementations decide how
 * the request reaches a backend; the pipeline only relies on this shape.
 */
export type CompleteChat = (body: ChatRequestBody, user: RequestUser) => Promise<CompletionOutcome>;

export type DebugEvent = {
  stage: string;
  data: unknown;
};
