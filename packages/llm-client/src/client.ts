/**
 * Client class — routes requests to provider adapters.
 *
 * Applies middleware in onion pattern and provides a factory for
 * environment-based configuration.
 */

import type { ProviderAdapter } from "./providers/adapter.js";
import type { Request } from "./types/request.js";
import type { Response } from "./types/response.js";
import { ConfigurationError } from "./types/errors.js";
import { OllamaAdapter } from "./providers/ollama/index.js";
import { OpenAICompatibleAdapter } from "./providers/openai-compatible/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Middleware for `complete()` calls.
 *
 * Follows the onion pattern: middleware runs in registration order for the
 * request phase and in reverse order for the response phase.
 */
export type Middleware = (
  request: Request,
  next: (request: Request) => Promise<Response>,
) => Promise<Response>;

/** Configuration for the Client constructor. */
export interface ClientConfig {
  /** Named provider adapters. */
  providers?: Record<string, ProviderAdapter>;
  /** Key into `providers` to use when `request.provider` is omitted. */
  defaultProvider?: string;
  /** Middleware chain for `complete()` calls (onion pattern). */
  middleware?: Middleware[];
}

/** The part of `Client` the orchestrator depends on. */
export interface CompletionClient {
  complete(request: Request): Promise<Response>;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class Client implements CompletionClient {
  private readonly providers: Record<string, ProviderAdapter>;
  private readonly defaultProvider: string | undefined;
  private readonly middleware: Middleware[];

  constructor(config: ClientConfig) {
    this.providers = { ...(config.providers ?? {}) };
    this.defaultProvider = config.defaultProvider;
    this.middleware = [...(config.middleware ?? [])];
  }

  /**
   * Create a Client from environment variables.
   *
   * Registers an OpenAI-compatible adapter when `OPENAI_COMPATIBLE_BASE_URL`
   * is set (with `OPENAI_COMPATIBLE_API_KEY` as its bearer token) and always
   * registers Ollama at `OLLAMA_BASE_URL` (default localhost). `LLM_PROVIDER`
   * picks the default; otherwise the OpenAI-compatible adapter wins when
   * present.
   */
  static fromEnv(env: Record<string, string | undefined> = process.env): Client {
    const providers: Record<string, ProviderAdapter> = {};

    const compatibleUrl = env.OPENAI_COMPATIBLE_BASE_URL?.trim();
    if (compatibleUrl) {
      providers["openai-compatible"] = new OpenAICompatibleAdapter({
        baseUrl: compatibleUrl,
        apiKey: env.OPENAI_COMPATIBLE_API_KEY?.trim(),
      });
    }
    providers.ollama = new OllamaAdapter({
      baseUrl: env.OLLAMA_BASE_URL?.trim() || undefined,
    });

    const defaultProvider =
      env.LLM_PROVIDER?.trim() || (compatibleUrl ? "openai-compatible" : "ollama");
    return new Client({ providers, defaultProvider });
  }

  /**
   * Resolve the adapter for a given request.
   *
   * If `request.provider` is set, look it up; otherwise fall back to the
   * default provider. Throws `ConfigurationError` on any routing failure.
   */
  private resolveAdapter(request: Request): ProviderAdapter {
    const providerName = request.provider ?? this.defaultProvider;

    if (!providerName) {
      throw new ConfigurationError(
        "No provider specified in request and no default provider configured",
      );
    }

    const adapter = this.providers[providerName];
    if (!adapter) {
      throw new ConfigurationError(
        `Provider "${providerName}" is not registered`,
      );
    }

    return adapter;
  }

  /**
   * Low-level blocking call. Routes to the resolved adapter and applies
   * the middleware chain in onion pattern.
   *
   * Does NOT retry. Raises on errors.
   */
  async complete(request: Request): Promise<Response> {
    const adapter = this.resolveAdapter(request);

    const innermost = (req: Request): Promise<Response> =>
      adapter.complete(req);

    // The first middleware registered is the outermost.
    const chain = this.middleware.reduceRight<
      (req: Request) => Promise<Response>
    >((next, mw) => (req: Request) => mw(req, next), innermost);

    return chain(request);
  }

  /**
   * Release resources held by all registered providers.
   */
  async close(): Promise<void> {
    await Promise.all(
      Object.values(this.providers).map((adapter) => adapter.close?.()),
    );
  }
}
