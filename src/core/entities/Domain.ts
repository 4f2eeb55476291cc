/**
 * Domain tags a query can be routed to.
 * Order matters: the classifier checks domains in this order and the first match wins.
 */
export const CLASSIFIED_DOMAINS = ['government-scheme', 'health', 'education', 'environment'] as const;

export const FALLBACK_DOMAIN = 'other';

export const DOMAIN_TAGS = [...CLASSIFIED_DOMAINS, FALLBACK_DOMAIN] as const;

export type DomainTag = (typeof DOMAIN_TAGS)[number];

export type ClassifiedDomain = (typeof CLASSIFIED_DOMAINS)[number];

export const DOMAIN_LABELS: Record<DomainTag, string> = {
  'government-scheme': 'Government schemes',
  health: 'Health',
  education: 'Education',
  environment: 'Environment',
  other: 'General',
};
