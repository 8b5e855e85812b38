import type { AppConfig } from "../config.js";
import { TerminalProviderError } from "../errors.js";
import { toErrorMessage } from "../utils.js";
import { ProviderClient } from "./provider_client.js";
import { StubImageGenerator } from "./stub_generator.js";
import type { FetchLike, GeneratorSource, ImageGenerator } from "./types.js";

type RegistryConfig = Pick<AppConfig, "generationMode" | "providers" | "retry" | "maxPromptLength">;

export type ProviderStatus = { id: string; configured: boolean };

export function providerStatuses(config: RegistryConfig): ProviderStatus[] {
  if (config.generationMode === "stub") return config.providers.map((p) => ({ id: p.id, configured: true }));
  return config.providers.map((p) => ({ id: p.id, configured: Boolean(p.apiKey && p.endpoint) }));
}

/**
 * Chooses live or stub generators once. Live clients are constructed per fan-out so a missing key
 * surfaces as missing_credentials at that point instead of failing startup.
 */
export function createGeneratorSource(config: RegistryConfig, options: { fetch?: FetchLike } = {}): GeneratorSource {
  if (config.generationMode === "stub") {
    const stubs = config.providers.map((p) => new StubImageGenerator({ id: `stub-${p.id}`, maxPromptLength: config.maxPromptLength }));
    return () => stubs;
  }

  return () => {
    const generators: ImageGenerator[] = [];
    const failures: string[] = [];
    for (const provider of config.providers) {
      try {
        generators.push(
          new ProviderClient({
            id: provider.id,
            endpoint: provider.endpoint,
            apiKey: provider.apiKey,
            model: provider.model,
            maxPromptLength: config.maxPromptLength,
            policy: config.retry,
            fetch: options.fetch
          })
        );
      } catch (err) {
        if (!(err instanceof TerminalProviderError)) throw err;
        failures.push(`${provider.id}: ${toErrorMessage(err)}`);
      }
    }

    if (generators.length === 0) {
      throw new TerminalProviderError(
        config.providers.map((p) => p.id).join(",") || "none",
        "missing_credentials",
        failures.length > 0 ? failures.join("; ") : "No image providers configured"
      );
    }
    if (failures.length > 0) console.warn(`[providers] skipping unconfigured providers (${failures.join("; ")})`);
    return generators;
  };
}
