/**
 * Google Gemini provider.
 */

import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import type { RenderedPrompt } from '../prompts.js';
import { PromptedProvider, type Completion } from './base.js';
import type { ProviderDeps } from './types.js';

export class GeminiProvider extends PromptedProvider {
  private readonly genAI: GoogleGenerativeAI;
  private readonly timeoutMs: number;

  constructor(deps: ProviderDeps) {
    super(deps);
    this.genAI = new GoogleGenerativeAI(deps.apiKey ?? '');
    this.timeoutMs = deps.requestTimeoutMs;
  }

  protected async complete(prompt: RenderedPrompt, signal: AbortSignal): Promise<Completion> {
    const model: GenerativeModel = this.genAI.getGenerativeModel(
      {
        model: this.model,
        systemInstruction: prompt.system,
        generationConfig: {
          temperature: this.temperature,
          maxOutputTokens: this.maxTokens,
        },
      },
      { timeout: this.timeoutMs },
    );

    const result = await model.generateContent(
      { contents: [{ role: 'user', parts: [{ text: prompt.user }] }] },
      { signal },
    );

    return {
      text: result.response.text(),
      inputTokens: result.response.usageMetadata?.promptTokenCount,
      outputTokens: result.response.usageMetadata?.candidatesTokenCount,
    };
  }
}
