// ============================================================================
// Anthropic Adapter: Messages API (/v1/messages)
// ============================================================================

import { z } from "zod";
import { InvalidRequestError } from "../types.js";
import type {
  CompletionRequest,
  CompletionResponse,
  LlmProvider,
  ProviderCapabilities,
} from "../types.js";
import { httpRequest, raiseForStatus } from "../utils/http.js";

export interface AnthropicProviderOptions {
  api_key: string;
  model: string;
  base_url?: string;
  capabilities?: ProviderCapabilities;
  default_headers?: Record<string, string>;
  timeout?: number;
  api_version?: string;
}

const messageResponseSchema = z.object({
  model: z.string().optional(),
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  stop_reason: z.string().nullable().optional(),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }).optional(),
});

const DEFAULT_MAX_TOKENS = 4096;

export class AnthropicProvider implements LlmProvider {
  readonly name = "anthropic";
  readonly capabilities: ProviderCapabilities;
  private api_key: string;
  private base_url: string;
  private model: string;
  private default_headers: Record<string, string>;
  private timeout: number;
  private api_version: string;

  constructor(opts: AnthropicProviderOptions) {
    this.api_key = opts.api_key;
    this.model = opts.model;
    this.base_url = (opts.base_url ?? "https://api.anthropic.com/v1").replace(/\/$/, "");
    this.capabilities = opts.capabilities ?? { max_context_tokens: 200_000, cost_tier: "premium" };
    this.default_headers = { ...opts.default_headers };
    this.timeout = opts.timeout ?? 120_000;
    this.api_version = opts.api_version ?? "2023-06-01";
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    const body: Record<string, unknown> = {
      model: request.model ?? this.model,
      max_tokens: request.max_tokens ?? DEFAULT_MAX_TOKENS,
      messages: [{ role: "user", content: request.prompt }],
    };
    // The Messages API has no JSON mode; steer through the system prompt instead.
    const system = request.response_format === "json"
      ? [request.system, "Respond with a single JSON object and nothing else."].filter(Boolean).join("\n\n")
      : request.system;
    if (system) body.system = system;
    if (request.temperature !== undefined) body.temperature = request.temperature;

    const httpResp = await httpRequest({
      url: `${this.base_url}/messages`,
      provider: this.name,
      headers: {
        "x-api-key": this.api_key,
        "anthropic-version": this.api_version,
        ...this.default_headers,
      },
      body,
      timeout: this.timeout,
      signal,
    });

    raiseForStatus(httpResp.status, httpResp.headers, httpResp.body, this.name);

    const parsed = messageResponseSchema.safeParse(httpResp.body);
    if (!parsed.success) {
      throw new InvalidRequestError({
        message: `Malformed response from anthropic: ${parsed.error.message}`,
        provider: this.name,
      });
    }

    const data = parsed.data;
    return {
      text: data.content
        .filter((block) => block.type === "text")
        .map((block) => block.text ?? "")
        .join(""),
      model: data.model ?? this.model,
      finish_reason: data.stop_reason ?? undefined,
      usage: data.usage,
    };
  }
}
