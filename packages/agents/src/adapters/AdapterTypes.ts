export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatRequest {
  messages: ChatMessage[];
  maxTokens?: number;
  temperature?: number;
}

export interface ChatUsage {
  promptTokens?: number;
  completionTokens?: number;
}

export interface ChatResult {
  output: string;
  adapter: string;
  model: string;
  usage?: ChatUsage;
}

export interface AdapterConfig {
  model: string;
  apiKey?: string;
  baseUrl?: string;
  maxTokens?: number;
  timeoutMs?: number;
  temperature?: number;
  headers?: Record<string, string>;
}

/** A chat-completion backend. Implementations perform one request per call. */
export interface ChatAdapter {
  readonly name: string;
  complete(request: ChatRequest): Promise<ChatResult>;
}

export type AdapterErrorCode = "auth_required" | "invalid_config" | "request_failed" | "timeout" | "invalid_response";

type AdapterErrorInput = {
  code: AdapterErrorCode;
  message: string;
  details?: Record<string, unknown>;
};

export class AdapterError extends Error {
  readonly code: AdapterErrorCode;
  readonly details?: Record<string, unknown>;

  constructor({ code, message, details }: AdapterErrorInput) {
    super(message);
    this.name = "AdapterError";
    this.code = code;
    this.details = details;
  }
}
