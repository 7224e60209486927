import { AdapterError, type AdapterConfig, type ChatAdapter, type ChatRequest, type ChatResult } from "../AdapterTypes.js";

const DEFAULT_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_TIMEOUT_MS = 120_000;
const DEFAULT_TEMPERATURE = 0.2;

const normalizeBaseUrl = (value?: string): string | undefined => {
  const str = value?.trim();
  if (!str) return undefined;
  return str.endsWith("/") ? str.slice(0, -1) : str;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readContent = (data: unknown): string | undefined => {
  if (!isRecord(data) || !Array.isArray(data.choices)) return undefined;
  const choice: unknown = data.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message)) return undefined;
  return typeof choice.message.content === "string" ? choice.message.content : undefined;
};

const readUsage = (data: unknown): ChatResult["usage"] => {
  if (!isRecord(data) || !isRecord(data.usage)) return undefined;
  const { prompt_tokens: prompt, completion_tokens: completion } = data.usage;
  return {
    promptTokens: typeof prompt === "number" ? prompt : undefined,
    completionTokens: typeof completion === "number" ? completion : undefined,
  };
};

/** Chat adapter for any OpenAI-compatible `chat/completions` endpoint. */
export class OpenAiAdapter implements ChatAdapter {
  readonly name = "openai-api";
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly config: AdapterConfig) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl) ?? DEFAULT_BASE_URL;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.assertConfig();
  }

  async complete(request: ChatRequest): Promise<ChatResult> {
    const apiKey = this.ensureApiKey();
    const url = `${this.baseUrl}/chat/completions`;
    const body: Record<string, unknown> = {
      model: this.config.model,
      messages: request.messages,
      temperature: request.temperature ?? this.config.temperature ?? DEFAULT_TEMPERATURE,
    };
    const maxTokens = request.maxTokens ?? this.config.maxTokens;
    if (maxTokens !== undefined) body.max_tokens = maxTokens;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    let resp: Response;
    try {
      resp = await fetch(url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
          ...(this.config.headers ?? {}),
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new AdapterError({
          code: "timeout",
          message: `Chat completion timed out after ${this.timeoutMs}ms`,
          details: { url, timeoutMs: this.timeoutMs },
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new AdapterError({ code: "request_failed", message: `Chat completion request failed: ${message}`, details: { url } });
    } finally {
      clearTimeout(timer);
    }

    if (!resp.ok) {
      const text = await resp.text().catch(() => "");
      throw new AdapterError({
        code: "request_failed",
        message: `Chat completions failed (${resp.status}): ${text}`,
        details: { url, status: resp.status },
      });
    }
    const data: unknown = await resp.json().catch(() => undefined);
    const content = readContent(data);
    if (content === undefined) {
      throw new AdapterError({ code: "invalid_response", message: "Chat completion response had no message content", details: { url } });
    }
    return {
      output: content.trim(),
      adapter: this.name,
      model: this.config.model,
      usage: readUsage(data),
    };
  }

  private assertConfig(): void {
    if (!/^https?:\/\//i.test(this.baseUrl)) {
      throw new AdapterError({ code: "invalid_config", message: "OpenAI baseUrl must start with http:// or https://" });
    }
    if (!this.config.model.trim()) {
      throw new AdapterError({ code: "invalid_config", message: "OpenAI model is not configured" });
    }
  }

  private ensureApiKey(): string {
    if (!this.config.apiKey) {
      throw new AdapterError({
        code: "auth_required",
        message: "AUTH_REQUIRED: API key missing; set REQFORGE_API_KEY or apiKey in .reqforge/config.yaml",
      });
    }
    return this.config.apiKey;
  }
}
