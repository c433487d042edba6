/**
 * Anthropic Messages API provider.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { RenderedPrompt } from '../prompts.js';
import { PromptedProvider, type Completion } from './base.js';
import type { ProviderDeps } from './types.js';

export class AnthropicProvider extends PromptedProvider {
  private readonly client: Anthropic;

  constructor(deps: ProviderDeps) {
    super(deps);
    this.client = new Anthropic({
      apiKey: deps.apiKey,
      // Retries and timeouts are applied by the pipeline
      maxRetries: 0,
      timeout: deps.requestTimeoutMs,
      ...(deps.settings.baseUrl ? { baseURL: deps.settings.baseUrl } : {}),
    });
  }

  protected async complete(prompt: RenderedPrompt, signal: AbortSignal): Promise<Completion> {
    const message = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: this.temperature,
        system: prompt.system,
        messages: [{ role: 'user', content: prompt.user }],
      },
      { signal },
    );

    const text = message.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');

    return {
      text,
      inputTokens: message.usage.input_tokens,
      outputTokens: message.usage.output_tokens,
    };
  }
}
