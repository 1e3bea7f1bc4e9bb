import OpenAI from "openai";
import { config } from "../config/index.js";
import { logInfo } from "../observability/logger.js";
import type { EmbeddingProvider } from "../modules/embeddings/types.js";
import type { CompletionProvider, CompletionRequest } from "../modules/summaries/types.js";

type HealthStatus = "ok" | "error";

export interface OpenAISingleton {
  client: OpenAI;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

export type GetOpenAIClient = () => Promise<OpenAISingleton>;

const HEALTH_CHECK_TIMEOUT_MS = 7000;

let singleton: OpenAISingleton | null = null;

function initialize(): OpenAISingleton {
  // Retries and per-call timeouts are owned by the embedding index and summarizer.
  const client = new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    maxRetries: 0
  });

  logInfo("clients.openai.initialized", {});

  return {
    client,
    async healthCheck() {
      try {
        await client.models.retrieve(config.OPENAI_MODEL, { timeout: HEALTH_CHECK_TIMEOUT_MS });
        return { status: "ok" };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getOpenAIClient(): Promise<OpenAISingleton> {
  if (!singleton) {
    singleton = initialize();
  }

  return singleton;
}

export async function shutdownOpenAIClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  logInfo("clients.openai.shutdown", {});
}

export function resetOpenAIClientForTests(): void {
  singleton = null;
}

const normalizeCompletionContent = (value: unknown): string => {
  if (typeof value === "string") {
    return value;
  }

  if (Array.isArray(value)) {
    return value
      .map((part: unknown) => {
        if (typeof part === "string") {
          return part;
        }
        if (part && typeof part === "object" && "text" in part && typeof part.text === "string") {
          return part.text;
        }
        return "";
      })
      .join("");
  }

  return "";
};

export interface OpenAIProviderOptions {
  model: string;
  getClient?: GetOpenAIClient;
}

export function createOpenAIEmbeddingProvider(options: OpenAIProviderOptions): EmbeddingProvider {
  const getClient = options.getClient ?? getOpenAIClient;

  return {
    model: options.model,
    async embedTexts(texts, requestOptions) {
      const { client } = await getClient();
      const response = await client.embeddings.create(
        { model: options.model, input: texts },
        { signal: requestOptions.signal }
      );

      const vectors: number[][] = new Array(texts.length);
      for (const item of response.data ?? []) {
        if (Number.isInteger(item.index) && item.index >= 0 && item.index < texts.length) {
          vectors[item.index] = item.embedding;
        }
      }
      return Array.from(vectors, (vector) => vector ?? []);
    }
  };
}

export function createOpenAICompletionProvider(options: OpenAIProviderOptions): CompletionProvider {
  const getClient = options.getClient ?? getOpenAIClient;

  return {
    model: options.model,
    async complete(request: CompletionRequest, requestOptions) {
      const { client } = await getClient();
      const response = await client.chat.completions.create(
        {
          model: options.model,
          temperature: request.temperature ?? 0.3,
          ...(request.maxTokens ? { max_tokens: request.maxTokens } : {}),
          ...(request.json ? { response_format: { type: "json_object" as const } } : {}),
          messages: [
            { role: "system", content: request.system },
            { role: "user", content: request.user }
          ]
        },
        { signal: requestOptions.signal }
      );

      return {
        content: normalizeCompletionContent(response.choices?.[0]?.message?.content),
        usage: response.usage
          ? {
              promptTokens: response.usage.prompt_tokens,
              completionTokens: response.usage.completion_tokens,
              totalTokens: response.usage.total_tokens
            }
          : undefined
      };
    }
  };
}
