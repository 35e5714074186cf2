import { GoogleGenerativeAI } from '@google/generative-ai';
import { CircuitBreaker } from '../utils/circuit-breaker.js';
import { logger } from '../utils/logger.js';
import type { CompletionRequest, Oracle } from '../types/index.js';

export interface GeminiOracleOptions {
  apiKey: string;
  model: string;
  /** Minimum spacing between consecutive calls */
  minIntervalMs?: number;
  requestTimeoutMs?: number;
}

/**
 * Oracle backed by Gemini text generation
 *
 * Each call is independent (no chat history). Calls are spaced by minIntervalMs and
 * pass through a circuit breaker, so a failing service is rejected fast and callers
 * drop to their deterministic fallbacks.
 */
export class GeminiOracle implements Oracle {
  private readonly genAI: GoogleGenerativeAI;
  private readonly breaker: CircuitBreaker;
  private lastCallAt = 0;

  constructor(private readonly options: GeminiOracleOptions) {
    this.genAI = new GoogleGenerativeAI(options.apiKey);
    this.breaker = new CircuitBreaker({ name: 'gemini', failureThreshold: 5, resetTimeout: 60000 });
  }

  async complete(request: CompletionRequest): Promise<string> {
    return this.breaker.execute(async () => {
      await this.waitForSlot();

      const model = this.genAI.getGenerativeModel(
        {
          model: this.options.model,
          systemInstruction: request.systemPrompt,
          generationConfig: {
            maxOutputTokens: request.maxOutputTokens,
            temperature: request.temperature,
          },
        },
        { timeout: this.options.requestTimeoutMs ?? 60000 }
      );

      const result = await model.generateContent(request.userPrompt);
      const text = result.response.text().trim();

      if (!text) {
        throw new Error('Gemini returned an empty response');
      }

      logger.debug('Gemini completion received', {
        model: this.options.model,
        promptLength: request.userPrompt.length,
        responseLength: text.length,
      });

      return text;
    });
  }

  private async waitForSlot(): Promise<void> {
    const minInterval = this.options.minIntervalMs ?? 0;
    const wait = this.lastCallAt + minInterval - Date.now();
    if (wait > 0) {
      await new Promise((resolve) => setTimeout(resolve, wait));
    }
    this.lastCallAt = Date.now();
  }
}
