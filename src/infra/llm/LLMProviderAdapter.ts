import { generateText, jsonSchema, NoObjectGeneratedError, Output } from 'ai';
import type { LanguageModel } from 'ai';
import { LLMError } from '../../domain/errors.js';
import type { LLMErrorReason } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type {
  LLMAdapter,
  LLMCapabilities,
  LLMObjectOptions,
  LLMTextOptions,
} from './LLMAdapter.js';

type ModelFactory = (modelId: string) => LanguageModel;

interface ProviderAdapterOptions {
  providerId: string;
  defaultModel: string;
  modelFactory: ModelFactory;
  isConfigured: () => boolean;
  supportsJsonSchema?: boolean;
}

function truncateValue(value: string, limit = 800): string {
  if (value.length <= limit) return value;
  return `${value.slice(0, limit)}…`;
}

function safeSerialize(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function failureReason(error: unknown): LLMErrorReason {
  return NoObjectGeneratedError.isInstance(error) ? 'invalid_output' : 'unavailable';
}

export class LLMProviderAdapter implements LLMAdapter {
  private id: string;
  private defaultModel: string;
  private modelFactory: ModelFactory;
  private configured: () => boolean;
  private supportsJsonSchema: boolean;

  constructor(options: ProviderAdapterOptions) {
    this.id = options.providerId;
    this.defaultModel = options.defaultModel;
    this.modelFactory = options.modelFactory;
    this.configured = options.isConfigured;
    this.supportsJsonSchema = options.supportsJsonSchema ?? true;
  }

  providerId(): string {
    return this.id;
  }

  capabilities(): LLMCapabilities {
    return { jsonSchema: this.supportsJsonSchema };
  }

  isConfigured(): boolean {
    return this.configured();
  }

  async generateText(options: LLMTextOptions): Promise<string> {
    this.assertConfigured();

    const modelId = options.model ?? this.defaultModel;
    const model = this.modelFactory(modelId);

    try {
      logger.info('LLM text request', {
        provider: this.id,
        model: modelId,
        inputLength: options.input.length,
        hasSystem: Boolean(options.system),
        inputPreview: truncateValue(options.input),
      });

      const response = await generateText({
        model,
        system: options.system,
        prompt: options.input,
        abortSignal: options.abortSignal,
      });

      logger.info('LLM text response', {
        provider: this.id,
        model: modelId,
        responseLength: response.text.length,
        responsePreview: truncateValue(response.text),
      });

      return response.text;
    } catch (error) {
      logger.error('LLM text generation failed', {
        provider: this.id,
        message: error instanceof Error ? error.message : String(error),
      });
      throw new LLMError('Text generation failed', failureReason(error), { error });
    }
  }

  async generateObject(options: LLMObjectOptions): Promise<unknown> {
    this.assertConfigured();

    const modelId = options.model ?? this.defaultModel;
    const model = this.modelFactory(modelId);

    if (options.schema.schema.type !== 'object') {
      logger.error('LLM schema must be an object', {
        provider: this.id,
        schemaName: options.schema.name,
      });
      throw new LLMError('LLM schema must be a JSON object', 'invalid_output');
    }

    try {
      logger.info('LLM structured request', {
        provider: this.id,
        model: modelId,
        inputLength: options.input.length,
        hasSystem: Boolean(options.system),
        schemaName: options.schema.name,
        inputPreview: truncateValue(options.input),
      });

      const response = await generateText({
        model,
        system: options.system,
        prompt: options.input,
        abortSignal: options.abortSignal,
        output: Output.object({
          schema: jsonSchema(options.schema.schema),
          name: options.schema.name,
          description: options.schema.description,
        }),
      });

      logger.info('LLM structured response', {
        provider: this.id,
        model: modelId,
        outputPreview: truncateValue(safeSerialize(response.output)),
      });

      return response.output;
    } catch (error) {
      logger.error('LLM structured generation failed', {
        provider: this.id,
        message: error instanceof Error ? error.message : String(error),
      });
      throw new LLMError('Structured generation failed', failureReason(error), { error });
    }
  }

  private assertConfigured(): void {
    if (!this.isConfigured()) {
      logger.error('LLM provider is not configured', { provider: this.id });
      throw new LLMError('LLM provider is not configured', 'not_configured');
    }
  }
}
