import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AssistantConfig } from '../../../config/assistant.config';
import { ValidatorState } from '../rag.types';

export const SAFE_FALLBACK_RESPONSE =
  "I'm sorry, I can't give a reliable answer to that right now. Please rephrase, or ask about my education, experience, projects or skills.";

export type RetryAction = 'widen_context' | 'alternate_strategy';

export interface ValidationInput {
  draft: string;
  /** Text the draft may draw on: the context block plus tool summaries. */
  evidence: string;
  sourceCount: number;
  retryCount: number;
  generationError?: string;
}

export type ValidationVerdict =
  | { state: ValidatorState.PASSED; groundingRatio: number | null }
  | { state: ValidatorState.RETRY; reason: string; action: RetryAction }
  | { state: ValidatorState.FAILED_SAFE; reason: string };

interface SafetyRule {
  name: string;
  pattern: RegExp;
}

const SAFETY_RULES: readonly SafetyRule[] = [
  { name: 'secret', pattern: /\b(sk-[A-Za-z0-9_-]{16,}|AKIA[0-9A-Z]{16})\b/ },
  { name: 'private_key', pattern: /-----BEGIN [A-Z ]*PRIVATE KEY-----/ },
  { name: 'national_id', pattern: /\b\d{3}-\d{2}-\d{4}\b/ },
  {
    name: 'prompt_injection',
    pattern: /\bignore (all )?(the )?(previous|prior|above) instructions\b/i,
  },
  { name: 'system_prompt', pattern: /\b(my|the) system prompt\b/i },
];

const REFUSAL_PATTERNS: readonly RegExp[] = [
  /\bas an ai\b/i,
  /\bi('m| am) (just )?an? (ai|language model)\b/i,
  /\bi (cannot|can't|am unable to) (help|assist|answer)\b/i,
];

function words(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length > 2);
}

/** Share of the draft's words that also occur in the evidence. */
export function groundingRatio(draft: string, evidence: string): number {
  const draftWords = words(draft);
  if (draftWords.length === 0) return 0;
  const evidenceWords = new Set(words(evidence));
  const matched = draftWords.filter((word) => evidenceWords.has(word)).length;
  return matched / draftWords.length;
}

/**
 * Guardrail gate. Safety failures end the request at once; length and
 * quality failures ask for another attempt while the retry budget lasts.
 */
@Injectable()
export class ValidationService {
  private readonly logger = new Logger(ValidationService.name);

  constructor(private readonly configService: ConfigService) {}

  validate(input: ValidationInput): ValidationVerdict {
    const config = this.configService.getOrThrow<AssistantConfig>('assistant');
    const canRetry = input.retryCount < config.maxRetries;

    const retryOrFail = (reason: string, action: RetryAction): ValidationVerdict => {
      if (canRetry) {
        this.logger.log(`├─ Validation: RETRY (${reason}, ${action})`);
        return { state: ValidatorState.RETRY, reason, action };
      }
      this.logger.warn(`⚠️ Validation: FAILED_SAFE (${reason}, retries exhausted)`);
      return { state: ValidatorState.FAILED_SAFE, reason: `${reason}; retries_exhausted` };
    };

    if (input.generationError !== undefined) {
      return retryOrFail(`generation_failed: ${input.generationError}`, 'alternate_strategy');
    }

    const unsafe = SAFETY_RULES.find((rule) => rule.pattern.test(input.draft));
    if (unsafe) {
      this.logger.warn(`⚠️ Validation: FAILED_SAFE (safety:${unsafe.name})`);
      return { state: ValidatorState.FAILED_SAFE, reason: `safety:${unsafe.name}` };
    }

    const length = input.draft.trim().length;
    if (length < config.minResponseLength) {
      return retryOrFail(`too_short: ${length} < ${config.minResponseLength}`, 'widen_context');
    }

    if (REFUSAL_PATTERNS.some((pattern) => pattern.test(input.draft))) {
      return retryOrFail('quality:refusal', 'alternate_strategy');
    }

    // Without evidence there is nothing to be grounded in
    if (input.sourceCount === 0 && !input.evidence.trim()) {
      this.logger.log(`├─ Validation: PASSED (no evidence to ground against)`);
      return { state: ValidatorState.PASSED, groundingRatio: null };
    }

    const ratio = groundingRatio(input.draft, input.evidence);
    if (ratio < config.minGroundingRatio) {
      return retryOrFail(
        `quality:ungrounded: ${ratio.toFixed(2)} < ${config.minGroundingRatio}`,
        'alternate_strategy',
      );
    }

    this.logger.log(`├─ Validation: PASSED (grounding ${(ratio * 100).toFixed(1)}%)`);
    return { state: ValidatorState.PASSED, groundingRatio: ratio };
  }
}
