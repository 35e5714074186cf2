import type { CompletionRequest, Oracle } from '../types/index.js';

interface ScriptedAnswer {
  /** Matched against the user prompt */
  when: string | RegExp;
  answer: string | Error;
}

/**
 * Deterministic oracle: answers with the first scripted entry whose pattern
 * appears in the user prompt, and fails when nothing matches
 */
export class StubOracle implements Oracle {
  readonly requests: CompletionRequest[] = [];
  private readonly script: ScriptedAnswer[] = [];

  on(when: string | RegExp, answer: string | Error): this {
    this.script.push({ when, answer });
    return this;
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);

    const entry = this.script.find(({ when }) =>
      typeof when === 'string' ? request.userPrompt.includes(when) : when.test(request.userPrompt)
    );
    if (!entry) {
      throw new Error('StubOracle: no scripted answer for prompt');
    }
    if (entry.answer instanceof Error) {
      throw entry.answer;
    }
    return entry.answer;
  }
}

/** Prompt markers, one per oracle caller */
export const PROMPTS = {
  relevance: 'find pages containing product information',
  structure: 'understand its structure',
  extraction: 'Extract a table with the following columns',
  brandContext: 'text surrounding a brand logo image',
  association: 'associate products with their corresponding brands',
} as const;
