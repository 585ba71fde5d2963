import type { JSONSchema7 } from 'ai';
import { z } from 'zod';
import type { CompanyProfile } from '../domain/entities/CompanyProfile.js';
import type { CampaignSuggestion, SuggestionDraft } from '../domain/entities/SuggestionSet.js';
import {
  DependencyError,
  GenerationParseError,
  GenerationUnavailableError,
  isPipelineError,
  LLMError,
  errorMessage,
} from '../domain/errors.js';
import type { PipelineError } from '../domain/errors.js';
import type { LLMAdapter, LLMJsonSchema } from '../infra/llm/LLMAdapter.js';
import { parseJsonResponse } from '../infra/llm/parseJsonResponse.js';
import { logger } from '../infra/logger.js';
import { withTimeout } from '../infra/withTimeout.js';

const CAMPAIGN_SUGGESTIONS_SCHEMA: JSONSchema7 = {
  type: 'object',
  additionalProperties: false,
  required: ['suggestions'],
  properties: {
    suggestions: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['title', 'rationale', 'channel'],
        properties: {
          title: { type: 'string' },
          rationale: { type: 'string' },
          channel: { type: 'string' },
        },
      },
    },
  },
};

const requiredText = z.string().trim().min(1);

const suggestionsResponseSchema = z.object({
  suggestions: z
    .array(
      z.object({
        title: requiredText,
        rationale: requiredText,
        channel: requiredText,
      })
    )
    .min(1),
});

export interface GenerationRequest {
  system: string;
  input: string;
  schema: LLMJsonSchema;
}

export interface SuggestionGeneratorOptions {
  timeoutMs: number;
  suggestionCount: number;
}

/**
 * SuggestionGenerator - asks the generation backend for campaign ideas and
 * validates the answer into a SuggestionDraft
 */
export class SuggestionGenerator {
  private readonly SYSTEM_PROMPT = `You are a senior marketing strategist.
Propose distinct, concrete marketing campaigns for the company described by the user.
Each campaign needs a short title, a rationale tied to the company's audience and voice, and one channel (for example email, social, search, events, content, partnerships).
Respond with JSON only.`;

  constructor(
    private llm: LLMAdapter,
    private options: SuggestionGeneratorOptions
  ) {}

  /**
   * Same profile and goal always give the same request
   */
  buildRequest(profile: CompanyProfile, campaignGoal?: string | null): GenerationRequest {
    const lines = [`Company: ${profile.name}`, `Domain: ${profile.domain}`];
    const optionalFields: Array<[string, string | null]> = [
      ['Industry', profile.industry],
      ['Description', profile.description],
      ['Brand voice', profile.brandVoice],
      ['Target audience', profile.targetAudience],
      ['Style guide', profile.styleGuide],
    ];
    for (const [label, value] of optionalFields) {
      if (value) lines.push(`${label}: ${value}`);
    }
    if (profile.recentCampaignMetrics) {
      lines.push(`Recent campaign metrics: ${JSON.stringify(profile.recentCampaignMetrics)}`);
    }
    if (campaignGoal) {
      lines.push(`Campaign goal: ${campaignGoal}`);
    }
    lines.push('', `Suggest ${this.options.suggestionCount} campaigns.`);

    return {
      system: this.SYSTEM_PROMPT,
      input: lines.join('\n'),
      schema: {
        name: 'campaign_suggestions',
        description: 'Ordered list of campaign suggestions',
        schema: CAMPAIGN_SUGGESTIONS_SCHEMA,
      },
    };
  }

  async generate(profile: CompanyProfile, campaignGoal?: string | null): Promise<SuggestionDraft> {
    const request = this.buildRequest(profile, campaignGoal);
    const { timeoutMs } = this.options;

    let raw: unknown;
    try {
      raw = await withTimeout(
        this.callBackend(request, AbortSignal.timeout(timeoutMs)),
        timeoutMs,
        () => new GenerationUnavailableError(`Generation timed out after ${timeoutMs}ms`)
      );
    } catch (error) {
      throw this.mapFailure(error);
    }

    return {
      profileId: profile.id,
      companyDomain: profile.domain,
      suggestions: this.parseSuggestions(raw),
    };
  }

  private async callBackend(request: GenerationRequest, abortSignal: AbortSignal): Promise<unknown> {
    if (this.llm.capabilities().jsonSchema) {
      return this.llm.generateObject({
        system: request.system,
        input: request.input,
        schema: request.schema,
        abortSignal,
      });
    }

    const text = await this.llm.generateText({
      system: request.system,
      input: request.input,
      abortSignal,
    });
    try {
      return parseJsonResponse(text);
    } catch (error) {
      throw new GenerationParseError('Generation response was not valid JSON', {
        error: errorMessage(error),
      });
    }
  }

  private parseSuggestions(raw: unknown): CampaignSuggestion[] {
    const parsed = suggestionsResponseSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Generation response rejected', { issues: parsed.error.issues });
      throw new GenerationParseError('Generation response did not match the expected shape', {
        issues: parsed.error.issues,
      });
    }
    return parsed.data.suggestions;
  }

  private mapFailure(error: unknown): PipelineError {
    if (isPipelineError(error)) {
      return error;
    }
    if (error instanceof LLMError) {
      switch (error.reason) {
        case 'not_configured':
          return new DependencyError(
            `Generation backend ${this.llm.providerId()} is not configured`,
            undefined,
            false
          );
        case 'invalid_output':
          return new GenerationParseError(error.message, error.details);
        case 'unavailable':
          return new GenerationUnavailableError(error.message, error.details);
      }
    }
    return new GenerationUnavailableError(errorMessage(error), { error });
  }
}
