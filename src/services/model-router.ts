// src/services/model-router.ts: central routing per task type

export type ModelName = 'small' | 'main';

export type LlmTask = 'decomposition' | 'reasoning' | 'refinement' | 'critique' | 'reflection' | 'synthesis';

export interface LlmCallOptions {
  task: LlmTask;
  model: ModelName;
  maxTokens?: number;
}

/** The one capability the engine needs from a language model. */
export interface LlmClient {
  complete(prompt: string, options?: LlmCallOptions): Promise<string>;
}

export class SimpleModelRouter {
  private client: LlmClient;

  constructor(client: LlmClient) {
    this.client = client;
  }

  async decompose(prompt: string): Promise<string> {
    return this.client.complete(prompt, { task: 'decomposition', model: 'small', maxTokens: 512 });
  }

  async reason(prompt: string): Promise<string> {
    return this.client.complete(prompt, { task: 'reasoning', model: 'small', maxTokens: 256 });
  }

  async refine(prompt: string): Promise<string> {
    return this.client.complete(prompt, { task: 'refinement', model: 'small', maxTokens: 512 });
  }

  async critique(prompt: string): Promise<string> {
    return this.client.complete(prompt, { task: 'critique', model: 'main', maxTokens: 768 });
  }

  async reflect(prompt: string): Promise<string> {
    return this.client.complete(prompt, { task: 'reflection', model: 'main', maxTokens: 512 });
  }

  async synthesize(prompt: string): Promise<string> {
    return this.client.complete(prompt, { task: 'synthesis', model: 'main', maxTokens: 1024 });
  }
}
