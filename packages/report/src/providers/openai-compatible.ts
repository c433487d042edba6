/**
 * Chat-completions provider for OpenAI and the services that speak the
 * same protocol (DeepSeek, a local Ollama server).
 */

import OpenAI from 'openai';
import type { RenderedPrompt } from '../prompts.js';
import { PromptedProvider, type Completion } from './base.js';
import type { ProviderDeps } from './types.js';

/** Ollama ignores the key, but the SDK refuses to start without one */
const KEYLESS_PLACEHOLDER = 'not-needed';

export class OpenAICompatibleProvider extends PromptedProvider {
  private readonly client: OpenAI;

  constructor(deps: ProviderDeps) {
    super(deps);
    this.client = new OpenAI({
      apiKey: deps.apiKey ?? KEYLESS_PLACEHOLDER,
      maxRetries: 0,
      timeout: deps.requestTimeoutMs,
      ...(deps.settings.baseUrl ? { baseURL: deps.settings.baseUrl } : {}),
    });
  }

  protected async complete(prompt: RenderedPrompt, signal: AbortSignal): Promise<Completion> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: this.temperature,
        max_tokens: this.maxTokens,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
      },
      { signal },
    );

    return {
      text: response.choices[0]?.message.content ?? '',
      inputTokens: response.usage?.prompt_tokens,
      outputTokens: response.usage?.completion_tokens,
    };
  }
}
