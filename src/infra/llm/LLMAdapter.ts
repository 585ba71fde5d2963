import type { JSONSchema7 } from 'ai';

export interface LLMJsonSchema {
  name: string;
  schema: JSONSchema7;
  description?: string;
}

export interface LLMTextOptions {
  system?: string;
  input: string;
  model?: string;
  abortSignal?: AbortSignal;
}

export interface LLMObjectOptions extends LLMTextOptions {
  schema: LLMJsonSchema;
}

export interface LLMCapabilities {
  jsonSchema: boolean;
}

export interface LLMAdapter {
  generateText(options: LLMTextOptions): Promise<string>;
  /** Parsed structured output; callers validate its shape */
  generateObject(options: LLMObjectOptions): Promise<unknown>;
  isConfigured(): boolean;
  capabilities(): LLMCapabilities;
  providerId(): string;
}
