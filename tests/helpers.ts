import { createPromptStore } from '../src/core/templates/PromptStore.js';
import { PromptStore } from '../src/core/templates/types.js';
import { IReasoningClient } from '../src/core/interfaces/IReasoningClient.js';

export const TEST_SAFETY_RULES = 'Safety rules:\n1. Never give a diagnosis.\n2. Never ask for an OTP.';
export const TEST_BASE_PROMPT = 'You are a helpful civic assistant.';

export const TEST_INSTRUCTIONS = {
  'government-scheme': 'Domain: schemes. Explain eligibility and how to apply.',
  health: 'Domain: health. Give first-aid steps and warning signs.',
  education: 'Domain: education. Explain admissions and scholarships.',
  environment: 'Domain: environment. Suggest practical actions.',
  other: 'Domain: general. Answer briefly.',
};

export function buildTestStore(): PromptStore {
  return createPromptStore({
    basePrompt: TEST_BASE_PROMPT,
    safetyRules: TEST_SAFETY_RULES,
    domains: {
      'government-scheme': {
        instruction: TEST_INSTRUCTIONS['government-scheme'],
        keywords: ['yojana', 'scheme*', 'awas', 'ration card*'],
      },
      health: {
        instruction: TEST_INSTRUCTIONS.health,
        keywords: ['health', 'symptom*', 'heat stroke', 'fever*'],
      },
      education: {
        instruction: TEST_INSTRUCTIONS.education,
        keywords: ['school*', 'exam', 'scholarship*'],
      },
      environment: {
        instruction: TEST_INSTRUCTIONS.environment,
        keywords: ['pollut*', 'rain', 'air quality'],
      },
      other: {
        instruction: TEST_INSTRUCTIONS.other,
        keywords: [],
      },
    },
  });
}

/**
 * In-process stand-in for the Gemini client
 */
export class FakeReasoningClient implements IReasoningClient {
  readonly model = 'fake-model';
  readonly prompts: string[] = [];
  readonly signals: Array<AbortSignal | undefined> = [];
  healthy = true;

  constructor(private reply: (prompt: string, signal?: AbortSignal) => Promise<string> = async () => '  Answer: ok  ') {}

  async generate(prompt: string, abortSignal?: AbortSignal): Promise<string> {
    this.prompts.push(prompt);
    this.signals.push(abortSignal);
    return this.reply(prompt, abortSignal);
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }
}
