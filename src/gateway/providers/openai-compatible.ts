// ============================================================================
// OpenAI-compatible Adapter: Chat Completions + Embeddings
// ============================================================================
//
// Covers every provider that speaks the /chat/completions dialect
// (OpenAI, OpenRouter, DeepSeek, Qwen/DashScope compatible mode).

import { z } from "zod";
import { InvalidRequestError } from "../types.js";
import type {
  CompletionRequest,
  CompletionResponse,
  EmbeddingProvider,
  LlmProvider,
  ProviderCapabilities,
} from "../types.js";
import { httpRequest, raiseForStatus } from "../utils/http.js";

export interface OpenAICompatibleOptions {
  name: string;
  api_key: string;
  base_url: string;
  model: string;
  capabilities: ProviderCapabilities;
  default_headers?: Record<string, string>;
  timeout?: number;
}

const chatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }),
    finish_reason: z.string().nullable().optional(),
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
  }).optional(),
});

const embeddingResponseSchema = z.object({
  data: z.array(z.object({
    index: z.number(),
    embedding: z.array(z.number()),
  })),
});

function malformed(provider: string, issues: z.ZodError): InvalidRequestError {
  return new InvalidRequestError({
    message: `Malformed response from ${provider}: ${issues.issues.map((i) => `${i.path.join(".")} ${i.message}`).join("; ")}`,
    provider,
  });
}

export class OpenAICompatibleProvider implements LlmProvider {
  readonly name: string;
  readonly capabilities: ProviderCapabilities;
  private api_key: string;
  private base_url: string;
  private model: string;
  private default_headers: Record<string, string>;
  private timeout: number;

  constructor(opts: OpenAICompatibleOptions) {
    this.name = opts.name;
    this.capabilities = opts.capabilities;
    this.api_key = opts.api_key;
    this.base_url = opts.base_url.replace(/\/$/, "");
    this.model = opts.model;
    this.default_headers = { ...opts.default_headers };
    this.timeout = opts.timeout ?? 120_000;
  }

  private buildRequestBody(request: CompletionRequest): Record<string, unknown> {
    const messages: Array<{ role: string; content: string }> = [];
    if (request.system) messages.push({ role: "system", content: request.system });
    messages.push({ role: "user", content: request.prompt });

    const body: Record<string, unknown> = {
      model: request.model ?? this.model,
      messages,
    };
    if (request.max_tokens !== undefined) body.max_tokens = request.max_tokens;
    if (request.temperature !== undefined) body.temperature = request.temperature;
    if (request.response_format === "json") {
      body.response_format = { type: "json_object" };
    }
    return body;
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    const httpResp = await httpRequest({
      url: `${this.base_url}/chat/completions`,
      provider: this.name,
      headers: { Authorization: `Bearer ${this.api_key}`, ...this.default_headers },
      body: this.buildRequestBody(request),
      timeout: this.timeout,
      signal,
    });

    raiseForStatus(httpResp.status, httpResp.headers, httpResp.body, this.name);

    const parsed = chatCompletionSchema.safeParse(httpResp.body);
    if (!parsed.success) throw malformed(this.name, parsed.error);

    const data = parsed.data;
    const choice = data.choices[0];
    return {
      text: choice.message.content ?? "",
      model: data.model ?? request.model ?? this.model,
      finish_reason: choice.finish_reason ?? undefined,
      usage: data.usage
        ? { input_tokens: data.usage.prompt_tokens, output_tokens: data.usage.completion_tokens }
        : undefined,
    };
  }
}

export interface OpenAIEmbedderOptions {
  name?: string;
  api_key: string;
  base_url?: string;
  model?: string;
  dimensions: number;
  timeout?: number;
}

export class OpenAICompatibleEmbedder implements EmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;
  private api_key: string;
  private base_url: string;
  private model: string;
  private timeout: number;

  constructor(opts: OpenAIEmbedderOptions) {
    this.name = opts.name ?? "openai-embeddings";
    this.dimensions = opts.dimensions;
    this.api_key = opts.api_key;
    this.base_url = (opts.base_url ?? "https://api.openai.com/v1").replace(/\/$/, "");
    this.model = opts.model ?? "text-embedding-3-small";
    this.timeout = opts.timeout ?? 60_000;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    const httpResp = await httpRequest({
      url: `${this.base_url}/embeddings`,
      provider: this.name,
      headers: { Authorization: `Bearer ${this.api_key}` },
      body: { model: this.model, input: texts, dimensions: this.dimensions },
      timeout: this.timeout,
      signal,
    });

    raiseForStatus(httpResp.status, httpResp.headers, httpResp.body, this.name);

    const parsed = embeddingResponseSchema.safeParse(httpResp.body);
    if (!parsed.success) throw malformed(this.name, parsed.error);

    const ordered = [...parsed.data.data].sort((a, b) => a.index - b.index);
    if (ordered.length !== texts.length) {
      throw new InvalidRequestError({
        message: `Expected ${texts.length} embeddings from ${this.name}, got ${ordered.length}`,
        provider: this.name,
      });
    }
    return ordered.map((d) => d.embedding);
  }
}
