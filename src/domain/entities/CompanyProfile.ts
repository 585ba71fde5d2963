/**
 * CompanyProfile entity - normalized description of a company derived from an input identifier
 * Immutable once created; one profile per job.
 */
import { ValidationError } from '../errors.js';

export interface CompanyProfile {
  id: string;
  jobId: string;
  sourceIdentifier: string;
  name: string;
  domain: string;
  industry: string | null;
  description: string | null;
  brandVoice: string | null;
  targetAudience: string | null;
  styleGuide: string | null;
  recentCampaignMetrics: Record<string, unknown> | null;
  createdAt: Date;
}

const DOMAIN_LABEL = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;
const TOP_LEVEL_LABEL = /^[a-z]{2,63}$/;

/**
 * Normalize a raw company identifier into a bare domain name
 * "https://www.Acme.com/about" -> "acme.com"
 */
export function normalizeCompanyIdentifier(identifier: string): string {
  const trimmed = identifier.trim().toLowerCase();
  if (trimmed.length === 0) {
    throw new ValidationError('Company identifier is required');
  }

  const domain = trimmed
    .replace(/^https?:\/\//, '')
    .replace(/^www\./, '')
    .replace(/[/?#].*$/, '')
    .replace(/\.$/, '');

  const labels = domain.split('.');
  const topLevel = labels[labels.length - 1];
  const valid =
    domain.length > 0 &&
    domain.length <= 253 &&
    labels.length >= 2 &&
    labels.every((label) => DOMAIN_LABEL.test(label)) &&
    TOP_LEVEL_LABEL.test(topLevel);

  if (!valid) {
    throw new ValidationError(`Company identifier "${identifier}" is not a valid domain`, {
      identifier,
    });
  }

  return domain;
}

/**
 * Normalized domain, or null when the identifier is not a valid domain
 */
export function companyDomainOf(identifier: string): string | null {
  try {
    return normalizeCompanyIdentifier(identifier);
  } catch (error) {
    if (error instanceof ValidationError) return null;
    throw error;
  }
}

/**
 * Display name from the first domain label: "blue-bottle.io" -> "Blue Bottle"
 */
export function deriveCompanyName(domain: string): string {
  const [firstLabel] = domain.split('.');
  return firstLabel
    .split('-')
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}

export function createCompanyProfile(params: {
  id: string;
  jobId: string;
  sourceIdentifier: string;
  name: string;
  domain: string;
  industry?: string | null;
  description?: string | null;
  brandVoice?: string | null;
  targetAudience?: string | null;
  styleGuide?: string | null;
  recentCampaignMetrics?: Record<string, unknown> | null;
}): CompanyProfile {
  return {
    id: params.id,
    jobId: params.jobId,
    sourceIdentifier: params.sourceIdentifier,
    name: params.name,
    domain: params.domain,
    industry: params.industry ?? null,
    description: params.description ?? null,
    brandVoice: params.brandVoice ?? null,
    targetAudience: params.targetAudience ?? null,
    styleGuide: params.styleGuide ?? null,
    recentCampaignMetrics: params.recentCampaignMetrics ?? null,
    createdAt: new Date(),
  };
}
