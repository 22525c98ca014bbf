// src/services/llm-client.ts: OpenAI implementation of LlmClient for the router

import OpenAI from 'openai';
import type { EngineConfig } from '@/config/app.config';
import { SimpleModelRouter, type LlmCallOptions, type LlmClient, type LlmTask } from './model-router';

const DEFAULT_SYSTEM: Record<LlmTask, string> = {
  decomposition: 'You split user requests into tool steps. Respond in JSON only.',
  reasoning: 'You justify a tool choice before it runs. Respond in JSON only.',
  refinement: 'You adjust the remaining steps of a plan after seeing results. Respond in JSON only.',
  critique: 'You are a strict reviewer of an executed plan. Respond in JSON only.',
  reflection: 'You assess whether a request was fulfilled and what to learn. Respond in JSON only.',
  synthesis: 'You are a concise personal assistant reporting what was done.',
};

export interface OpenAiLlmClientOptions {
  apiKey?: string;
  smallModel: string;
  mainModel: string;
}

export class OpenAiLlmClient implements LlmClient {
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenAiLlmClientOptions) {}

  private getClient(): OpenAI {
    if (!this.client) {
      const apiKey = this.options.apiKey ?? process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new Error('Missing OPENAI_API_KEY. Set it in .env or pass it in the engine config.');
      }
      this.client = new OpenAI({ apiKey });
    }
    return this.client;
  }

  async complete(prompt: string, options?: LlmCallOptions): Promise<string> {
    const modelId = options?.model === 'main' ? this.options.mainModel : this.options.smallModel;
    const system = DEFAULT_SYSTEM[options?.task ?? 'synthesis'];
    const maxTokens = typeof options?.maxTokens === 'number' ? options.maxTokens : 512;

    const res = await this.getClient().chat.completions.create({
      model: modelId,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: prompt },
      ],
      temperature: options?.task === 'synthesis' ? 0.5 : 0,
      max_tokens: maxTokens,
    });
    return res.choices[0]?.message?.content ?? '';
  }
}

/** Router over OpenAI for the configured models; undefined without an API key, so every stage stays heuristic. */
export function createRouterFromConfig(llm: EngineConfig['llm']): SimpleModelRouter | undefined {
  if (!llm.apiKey) return undefined;
  return new SimpleModelRouter(
    new OpenAiLlmClient({ apiKey: llm.apiKey, smallModel: llm.smallModel, mainModel: llm.mainModel }),
  );
}
