/**
 * LLM Abstraction Layer
 *
 * Unified interface over local models (Ollama, LM Studio) and remote APIs
 * (OpenAI, Anthropic, OpenRouter, any OpenAI-compatible endpoint).
 * The consolidation scorer is the only consumer.
 */

import { z } from "zod";
import type { LLMConfig } from "./config.js";

// ============================================================================
// Types
// ============================================================================

export type { LLMConfig };

export interface LLMOptions {
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
  jsonMode?: boolean;
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  model: string;
  tokensUsed?: number;
}

export interface LLMProvider {
  name: string;
  model: string;
  complete(prompt: string, options?: LLMOptions): Promise<LLMResponse>;
  isAvailable(): Promise<boolean>;
}

// Response shapes, validated so a misbehaving endpoint fails loudly
const OllamaResponseSchema = z.object({
  response: z.string(),
  eval_count: z.number().optional(),
});

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })).min(1),
  usage: z.object({ total_tokens: z.number() }).optional(),
});

const AnthropicResponseSchema = z.object({
  model: z.string().optional(),
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }).optional(),
});

async function readJson<T>(response: Response, schema: z.ZodType<T>, provider: string): Promise<T> {
  const data: unknown = await response.json();
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`${provider} returned an unexpected response: ${parsed.error.issues[0]?.message}`);
  }
  return parsed.data;
}

async function isReachable(url: string, headers: Record<string, string> = {}): Promise<boolean> {
  try {
    const response = await fetch(url, {
      method: "GET",
      headers,
      signal: AbortSignal.timeout(5000),
    });
    return response.ok;
  } catch {
    return false;
  }
}

function chatMessages(prompt: string, options?: LLMOptions): Array<{ role: string; content: string }> {
  const messages: Array<{ role: string; content: string }> = [];
  if (options?.systemPrompt) {
    messages.push({ role: "system", content: options.systemPrompt });
  }
  messages.push({ role: "user", content: prompt });
  return messages;
}

// ============================================================================
// Provider Implementations
// ============================================================================

/**
 * Ollama - Local LLM server
 * Default: http://localhost:11434
 */
export class OllamaProvider implements LLMProvider {
  name = "ollama";

  constructor(private config: { host: string; model: string }) {}

  get model() { return this.config.model; }

  async isAvailable(): Promise<boolean> {
    return isReachable(`${this.config.host}/api/tags`);
  }

  async complete(prompt: string, options?: LLMOptions): Promise<LLMResponse> {
    const response = await fetch(`${this.config.host}/api/generate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      signal: options?.signal,
      body: JSON.stringify({
        model: this.config.model,
        prompt: options?.systemPrompt
          ? `${options.systemPrompt}\n\nUser: ${prompt}\n\nAssistant:`
          : prompt,
        stream: false,
        format: options?.jsonMode ? "json" : undefined,
        options: {
          num_predict: options?.maxTokens || 1024,
          temperature: options?.temperature ?? 0.3,
        },
      }),
    });

    if (!response.ok) {
      throw new Error(`Ollama error: ${response.status} ${response.statusText}`);
    }

    const data = await readJson(response, OllamaResponseSchema, "Ollama");
    return {
      content: data.response,
      model: this.config.model,
      tokensUsed: data.eval_count,
    };
  }
}

/**
 * OpenAI-compatible chat completions API
 * Works with: OpenAI, LM Studio, OpenRouter, Groq, Together, etc.
 */
export class OpenAICompatibleProvider implements LLMProvider {
  name: string;

  constructor(private config: {
    name: string;
    baseUrl: string;
    apiKey?: string;
    model: string;
    headers?: Record<string, string>;
  }) {
    this.name = config.name;
  }

  get model() { return this.config.model; }

  private headers(): Record<string, string> {
    return {
      ...(this.config.apiKey ? { Authorization: `Bearer ${this.config.apiKey}` } : {}),
      ...this.config.headers,
    };
  }

  async isAvailable(): Promise<boolean> {
    return isReachable(`${this.config.baseUrl}/models`, this.headers());
  }

  async complete(prompt: string, options?: LLMOptions): Promise<LLMResponse> {
    const body: Record<string, unknown> = {
      model: this.config.model,
      messages: chatMessages(prompt, options),
      max_tokens: options?.maxTokens || 1024,
      temperature: options?.temperature ?? 0.3,
    };

    if (options?.jsonMode) {
      body.response_format = { type: "json_object" };
    }

    const response = await fetch(`${this.config.baseUrl}/chat/completions`, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...this.headers() },
      signal: options?.signal,
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`${this.name} API error: ${response.status} ${errorText}`);
    }

    const data = await readJson(response, ChatCompletionSchema, this.name);
    return {
      content: data.choices[0]?.message.content ?? "",
      model: data.model ?? this.config.model,
      tokensUsed: data.usage?.total_tokens,
    };
  }
}

/**
 * Anthropic Messages API
 */
export class AnthropicProvider implements LLMProvider {
  name = "anthropic";

  constructor(private config: { apiKey: string; model: string; baseUrl?: string }) {}

  get model() { return this.config.model; }

  async isAvailable(): Promise<boolean> {
    // No cheap health check endpoint
    return this.config.apiKey.length > 0;
  }

  async complete(prompt: string, options?: LLMOptions): Promise<LLMResponse> {
    const response = await fetch(`${this.config.baseUrl ?? "https://api.anthropic.com"}/v1/messages`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.config.apiKey,
        "anthropic-version": "2023-06-01",
      },
      signal: options?.signal,
      body: JSON.stringify({
        model: this.config.model,
        max_tokens: options?.maxTokens || 1024,
        system: options?.systemPrompt,
        messages: [{ role: "user", content: prompt }],
      }),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Anthropic API error: ${response.status} ${errorText}`);
    }

    const data = await readJson(response, AnthropicResponseSchema, "Anthropic");
    return {
      content: data.content.map((block) => block.text ?? "").join(""),
      model: data.model ?? this.config.model,
      tokensUsed: data.usage ? data.usage.input_tokens + data.usage.output_tokens : undefined,
    };
  }
}

// ============================================================================
// Factory
// ============================================================================

const DEFAULT_MODELS: Record<LLMConfig["provider"], string> = {
  ollama: "llama3.1:8b",
  lmstudio: "local-model",      // LM Studio serves whatever is loaded
  openai: "gpt-4o-mini",
  anthropic: "claude-3-5-haiku-latest",
  openrouter: "meta-llama/llama-3.1-8b-instruct",
  custom: "default",
};

/**
 * Build the provider described by an `llm` config block.
 * Returns null if none is configured or the block is incomplete.
 */
export function createLLMProvider(llmConfig: LLMConfig | undefined): LLMProvider | null {
  if (!llmConfig) {
    return null;
  }

  const model = llmConfig.model || DEFAULT_MODELS[llmConfig.provider];

  switch (llmConfig.provider) {
    case "ollama":
      return new OllamaProvider({
        host: llmConfig.baseUrl || "http://localhost:11434",
        model,
      });

    case "lmstudio":
      return new OpenAICompatibleProvider({
        name: "lmstudio",
        baseUrl: llmConfig.baseUrl || "http://localhost:1234/v1",
        model,
      });

    case "openai":
      if (!llmConfig.apiKey) {
        console.error("[llm] OpenAI provider requires apiKey in config");
        return null;
      }
      return new OpenAICompatibleProvider({
        name: "openai",
        baseUrl: llmConfig.baseUrl || "https://api.openai.com/v1",
        apiKey: llmConfig.apiKey,
        model,
      });

    case "anthropic":
      if (!llmConfig.apiKey) {
        console.error("[llm] Anthropic provider requires apiKey in config");
        return null;
      }
      return new AnthropicProvider({ apiKey: llmConfig.apiKey, model, baseUrl: llmConfig.baseUrl });

    case "openrouter":
      if (!llmConfig.apiKey) {
        console.error("[llm] OpenRouter provider requires apiKey in config");
        return null;
      }
      return new OpenAICompatibleProvider({
        name: "openrouter",
        baseUrl: llmConfig.baseUrl || "https://openrouter.ai/api/v1",
        apiKey: llmConfig.apiKey,
        model,
        headers: { "X-Title": "memory-lifecycle-engine" },
      });

    case "custom":
      if (!llmConfig.baseUrl) {
        console.error("[llm] Custom provider requires baseUrl");
        return null;
      }
      return new OpenAICompatibleProvider({
        name: "custom",
        baseUrl: llmConfig.baseUrl,
        apiKey: llmConfig.apiKey,
        model,
      });
  }
}
