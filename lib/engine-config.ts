/**
 * Generative Engine Configuration
 *
 * Every provider is reached through an OpenAI-compatible chat endpoint, so a
 * single client implementation serves all of them:
 *
 * - openai:   api.openai.com (default model gpt-4o-mini)
 * - deepseek: api.deepseek.com (deepseek-chat)
 * - ollama:   a local Ollama server's /v1 endpoint (llama3.1)
 */

export type EngineProvider = "openai" | "deepseek" | "ollama";

export const ENGINE_PROVIDERS: readonly EngineProvider[] = ["openai", "deepseek", "ollama"];

export interface EngineConfig {
  provider: EngineProvider;
  apiKey: string;
  baseURL: string;
  model: string;
  /** Client-side timeout for one completion; the only timeout in the pipeline. */
  timeoutMs: number;
}

type Env = Record<string, string | undefined>;

const DEFAULT_TIMEOUT_MS = 60_000;

export function parseEngineProvider(value: string | undefined): EngineProvider {
  const name = (value ?? "openai").trim().toLowerCase() || "openai";
  const match = ENGINE_PROVIDERS.find((provider) => provider === name);
  if (!match) {
    throw new Error(
      `Engine '${name}' not supported. Available engines: ${ENGINE_PROVIDERS.join(", ")}`
    );
  }
  return match;
}

function resolveTimeout(value: string | undefined): number {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_TIMEOUT_MS;
}

/**
 * Get the endpoint, key and model for a provider.
 * ACTIVE_AI_MODEL overrides the provider's default model.
 */
export function getEngineConfig(provider: EngineProvider, env: Env = process.env): EngineConfig {
  const timeoutMs = resolveTimeout(env.AI_REQUEST_TIMEOUT_MS);
  const modelOverride = env.ACTIVE_AI_MODEL?.trim();

  switch (provider) {
    case "deepseek":
      return {
        provider,
        apiKey: env.DEEPSEEK_API_KEY || "",
        baseURL: "https://api.deepseek.com/v1",
        model: modelOverride || "deepseek-chat",
        timeoutMs,
      };
    case "ollama": {
      const base = (env.OLLAMA_BASE_URL || "http://localhost:11434").replace(/\/+$/, "");
      return {
        provider,
        // Ollama ignores the key but the SDK requires one
        apiKey: "ollama",
        baseURL: `${base}/v1`,
        model: modelOverride || "llama3.1",
        timeoutMs,
      };
    }
    case "openai":
    default:
      return {
        provider: "openai",
        apiKey: env.OPENAI_API_KEY || "",
        baseURL: "https://api.openai.com/v1",
        model: modelOverride || "gpt-4o-mini",
        timeoutMs,
      };
  }
}
