export interface LLMRequest {
  model: string;
  prompt: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface LLMUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface LLMResponse {
  text: string;
  usage?: LLMUsage;
  raw?: unknown;
}

export interface LLMClient {
  complete(req: LLMRequest): Promise<LLMResponse>;
}
