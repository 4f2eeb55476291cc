import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { DomainTag } from '../entities/Domain.js';
import { ConfigError, errorMessage } from '../errors.js';
import { DomainTemplate, PromptStore } from './types.js';

export const BASE_PROMPT_FILE = 'base_prompt.txt';
export const SAFETY_RULES_FILE = 'safety_rules.txt';
export const DOMAINS_FILE = 'domains.json';

// Kept exactly as written; only blank text is rejected
const templateText = z.string().refine((text) => text.trim().length > 0, 'must not be empty');

const ClassifiedDomainSchema = z.object({
  instruction: templateText,
  keywords: z.array(z.string().trim().min(1)).min(1, 'at least 1 keyword is required'),
});

const DomainsFileSchema = z
  .object({
    'government-scheme': ClassifiedDomainSchema,
    health: ClassifiedDomainSchema,
    education: ClassifiedDomainSchema,
    environment: ClassifiedDomainSchema,
    other: z.object({
      instruction: templateText,
      keywords: z.array(z.string()).max(0, 'the fallback domain takes no keywords').default([]),
    }),
  })
  .strict();

const PromptStoreSchema = z.object({
  basePrompt: templateText,
  safetyRules: templateText,
  domains: DomainsFileSchema,
});

export interface PromptStoreInput {
  basePrompt: string;
  safetyRules: string;
  /** Parsed contents of domains.json, validated here */
  domains: unknown;
}

function freezeDomain(entry: { instruction: string; keywords: string[] }): DomainTemplate {
  return Object.freeze({
    instruction: entry.instruction,
    keywords: Object.freeze([...entry.keywords]),
  });
}

/**
 * Validate template text and freeze it into a PromptStore
 */
export function createPromptStore(input: PromptStoreInput): PromptStore {
  const parsed = PromptStoreSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid prompt templates',
      parsed.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
    );
  }

  const source = parsed.data.domains;
  const domains: Record<DomainTag, DomainTemplate> = {
    'government-scheme': freezeDomain(source['government-scheme']),
    health: freezeDomain(source.health),
    education: freezeDomain(source.education),
    environment: freezeDomain(source.environment),
    other: freezeDomain(source.other),
  };

  return Object.freeze({
    basePrompt: parsed.data.basePrompt,
    safetyRules: parsed.data.safetyRules,
    domains: Object.freeze(domains),
  });
}

function readTemplateFile(dir: string, file: string): string {
  const fullPath = path.join(dir, file);
  try {
    return fs.readFileSync(fullPath, 'utf-8');
  } catch (error) {
    const missing = typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
    throw new ConfigError(
      missing
        ? `Prompt template not found: ${fullPath}`
        : `Could not read prompt template ${fullPath}: ${errorMessage(error)}`
    );
  }
}

/**
 * Load base prompt, safety rules and domain definitions from the prompts directory
 */
export function loadPromptStore(dir: string): PromptStore {
  const basePrompt = readTemplateFile(dir, BASE_PROMPT_FILE);
  const safetyRules = readTemplateFile(dir, SAFETY_RULES_FILE);
  const domainsRaw = readTemplateFile(dir, DOMAINS_FILE);

  let domains: unknown;
  try {
    domains = JSON.parse(domainsRaw);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${path.join(dir, DOMAINS_FILE)}: ${errorMessage(error)}`);
  }

  return createPromptStore({ basePrompt, safetyRules, domains });
}
