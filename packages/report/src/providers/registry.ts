/**
 * Provider registry: name → factory, filled once at start-up.
 * Lookup happens before any client is constructed, so an unknown name or
 * a missing key fails the run before a single request is sent.
 */

import {
  ConfigError,
  DEFAULT_PROVIDER_SETTINGS,
  ProviderConfigError,
  UnknownProviderError,
  type GitBriefConfig,
  type Logger,
  type UsageTracker,
} from '@gitbrief/core';
import type { Env } from '@gitbrief/integrations';
import type { PromptLibrary } from '../prompts.js';
import { AnthropicProvider } from './anthropic.js';
import { GeminiProvider } from './gemini.js';
import { MockProvider } from './mock.js';
import { OpenAICompatibleProvider } from './openai-compatible.js';
import type { LLMProvider, ProviderFactory } from './types.js';

/** Per-run collaborators handed to every provider */
export interface ProviderRuntime {
  prompts: PromptLibrary;
  usage: UsageTracker;
  logger: Logger;
}

export class ProviderRegistry {
  private readonly factories = new Map<string, ProviderFactory>();

  register(name: string, factory: ProviderFactory): this {
    this.factories.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return [...this.factories.keys()].sort();
  }

  create(name: string, config: GitBriefConfig, env: Env, runtime: ProviderRuntime): LLMProvider {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new UnknownProviderError(name, this.names());
    }

    const configured = config.llm.providers[name];
    const defaults = DEFAULT_PROVIDER_SETTINGS[name];
    if (!configured && !defaults) {
      throw new ConfigError(`No settings for provider "${name}" under llm.providers`);
    }
    const settings = { ...defaults, ...configured };

    const apiKey = settings.apiKeyEnv ? env[settings.apiKeyEnv] : undefined;
    if (settings.apiKeyEnv && !apiKey) {
      throw new ProviderConfigError(name, settings.apiKeyEnv);
    }

    return factory({
      name,
      settings,
      apiKey,
      temperature: config.llm.temperature,
      maxTokens: config.llm.maxTokens,
      requestTimeoutMs: config.llm.requestTimeoutMs,
      ...runtime,
    });
  }
}

export function createDefaultProviderRegistry(): ProviderRegistry {
  return new ProviderRegistry()
    .register('anthropic', (deps) => new AnthropicProvider(deps))
    .register('openai', (deps) => new OpenAICompatibleProvider(deps))
    .register('deepseek', (deps) => new OpenAICompatibleProvider(deps))
    .register('ollama', (deps) => new OpenAICompatibleProvider(deps))
    .register('gemini', (deps) => new GeminiProvider(deps))
    .register('mock', (deps) => new MockProvider(deps));
}
