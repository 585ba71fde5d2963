import { describe, expect, it } from 'vitest';
import {
  createCompanyProfile,
  deriveCompanyName,
  normalizeCompanyIdentifier,
} from '../../../src/domain/entities/CompanyProfile.js';
import { ValidationError } from '../../../src/domain/errors.js';

describe('normalizeCompanyIdentifier', () => {
  it('reduces urls and mixed case to a bare domain', () => {
    expect(normalizeCompanyIdentifier('https://www.Acme.com/about')).toBe('acme.com');
    expect(normalizeCompanyIdentifier('  ACME.com  ')).toBe('acme.com');
    expect(normalizeCompanyIdentifier('acme.com.')).toBe('acme.com');
    expect(normalizeCompanyIdentifier('blue-bottle.io?ref=newsletter')).toBe('blue-bottle.io');
    expect(normalizeCompanyIdentifier('http://shop.acme.co.uk#top')).toBe('shop.acme.co.uk');
  });

  it('rejects empty identifiers', () => {
    expect(() => normalizeCompanyIdentifier('')).toThrow('Company identifier is required');
    expect(() => normalizeCompanyIdentifier('   ')).toThrow(ValidationError);
  });

  it.each(['acme', '-acme.com', 'acme-.com', 'acme..com', 'acme.c0m', 'ac me.com', 'https://'])(
    'rejects malformed identifier %j',
    (identifier) => {
      expect(() => normalizeCompanyIdentifier(identifier)).toThrow(ValidationError);
    }
  );

  it('names the offending input in the error', () => {
    expect(() => normalizeCompanyIdentifier('not a domain')).toThrow(
      'Company identifier "not a domain" is not a valid domain'
    );
  });
});

describe('deriveCompanyName', () => {
  it('title-cases the first label', () => {
    expect(deriveCompanyName('acme.com')).toBe('Acme');
    expect(deriveCompanyName('blue-bottle.io')).toBe('Blue Bottle');
    expect(deriveCompanyName('shop.acme.co.uk')).toBe('Shop');
  });
});

describe('createCompanyProfile', () => {
  it('defaults descriptive fields to null', () => {
    const profile = createCompanyProfile({
      id: 'profile-1',
      jobId: 'job-1',
      sourceIdentifier: 'Acme.com',
      name: 'Acme',
      domain: 'acme.com',
    });

    expect(profile).toMatchObject({
      id: 'profile-1',
      jobId: 'job-1',
      sourceIdentifier: 'Acme.com',
      name: 'Acme',
      domain: 'acme.com',
      industry: null,
      description: null,
      brandVoice: null,
      targetAudience: null,
      styleGuide: null,
      recentCampaignMetrics: null,
    });
  });
});
