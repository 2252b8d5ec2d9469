import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LLMCacheService } from './llm-cache.service';
import { buildClassifyIntentPrompt } from '../../prompts';
import { AssistantConfig } from '../../../config/assistant.config';
import {
  ClassificationResult,
  DEFAULT_INTENT,
  Intent,
  QuickIntent,
  isIntent,
} from '../rag.types';
import {
  errorMessage,
  isCancellation,
  RequestCancelledError,
} from '../../../common/utils/errors';

interface IntentRule {
  intent: Intent;
  pattern: RegExp;
}

// Checked in order; the first match wins
const INTENT_RULES: readonly IntentRule[] = [
  {
    intent: Intent.PROJECT_TOUR,
    pattern:
      /\b(tour|walk\s*(me\s*)?through|repos?|repositories|github|all\s+(of\s+)?your\s+projects)\b/i,
  },
  {
    intent: Intent.CASE_STUDY,
    pattern: /\b(case[\s-]?stud(y|ies)|post[\s-]?mortem|deep[\s-]?dive)\b/i,
  },
  {
    intent: Intent.EDUCATION,
    pattern:
      /\b(degrees?|universit(y|ies)|college|school|stud(y|ied|ies|ying)|education|graduat\w*|thesis|bachelor'?s?|master'?s?|msc|bsc|phd|diplomas?|certificat\w*|courses?|coursework)\b/i,
  },
  {
    intent: Intent.SKILLS,
    pattern:
      /\b(skills?|skillset|tech\s*stack|stack|programming\s+languages?|languages?|frameworks?|proficient|expertise|good\s+at)\b/i,
  },
  {
    intent: Intent.EXPERIENCE,
    pattern:
      /\b(experience|worked|work\s+history|jobs?|employ\w*|roles?|positions?|career|compan(y|ies)|intern\w*|responsibilit\w*)\b/i,
  },
  {
    intent: Intent.PERSONAL_PROJECT,
    pattern:
      /\b(projects?|side[\s-]?projects?|built|build|apps?|made|created)\b/i,
  },
];

const QUICK_PATTERNS: ReadonlyArray<readonly [QuickIntent, RegExp]> = [
  [
    'greeting',
    /^(hi|hello|hey|howdy|greetings|good\s*(morning|afternoon|evening))( there| all| everyone| again)?$/,
  ],
  [
    'goodbye',
    /^(bye|bye bye|goodbye|see you( later| soon)?|farewell|cya)( for now)?$/,
  ],
  [
    'thank',
    /^(thanks?|thank you|ty|many thanks|appreciate it)( so much| very much| a lot)?( again)?$/,
  ],
];

const QUICK_TEMPLATES: Record<QuickIntent, readonly string[]> = {
  greeting: [
    'Hello! Ask me about my education, work experience, projects or skills.',
    'Hi there! I can walk you through my projects, career history and skills.',
  ],
  goodbye: [
    'Goodbye! Thanks for taking the time to look through my portfolio.',
    'See you! Feel free to come back with more questions about my work.',
  ],
  thank: [
    "You're welcome! Let me know if you'd like details on any project or role.",
    'Glad I could help! Ask anytime about my experience, projects or skills.',
  ],
};

@Injectable()
export class IntentClassificationService {
  private readonly logger = new Logger(IntentClassificationService.name);

  constructor(
    private readonly llmCacheService: LLMCacheService,
    private readonly configService: ConfigService,
  ) {}

  // ===== QUICK INTENT DETECTION (Greeting/Goodbye/Thank) =====
  // Only a standalone phrase counts; "Hi, what degree..." goes on to the rules
  detectQuickIntent(query: string): QuickIntent | null {
    const bare = query
      .toLowerCase()
      .replace(/[^\p{L}\p{N}\s']/gu, ' ')
      .replace(/\s+/g, ' ')
      .trim();

    for (const [type, pattern] of QUICK_PATTERNS) {
      if (pattern.test(bare)) return type;
    }
    return null;
  }

  /** Deterministic reply for a quick intent; the same query always gets the same text. */
  quickResponse(type: QuickIntent, query: string): string {
    const templates = QUICK_TEMPLATES[type];
    return templates[query.trim().length % templates.length];
  }

  /**
   * Route a query to exactly one intent: quick intents, then the ordered
   * rules, then the model. Ambiguity and model errors resolve to GENERAL.
   */
  async classify(
    query: string,
    signal?: AbortSignal,
  ): Promise<ClassificationResult> {
    this.logger.debug(`\n${'='.repeat(60)}`);
    this.logger.debug(`🎯 INTENT CLASSIFICATION`);
    this.logger.debug(`${'='.repeat(60)}`);
    this.logger.debug(`📥 INPUT - Query: "${query}"`);

    const quickIntent = this.detectQuickIntent(query);
    if (quickIntent) {
      this.logger.debug(`⚡ Quick intent: ${quickIntent}`);
      return { intent: DEFAULT_INTENT, method: 'quick', quickIntent };
    }

    for (const rule of INTENT_RULES) {
      const match = rule.pattern.exec(query);
      if (match) {
        this.logger.debug(`📤 OUTPUT - ${rule.intent} (rule "${match[0]}")`);
        return { intent: rule.intent, method: 'rule', matched: match[0] };
      }
    }

    const config = this.configService.getOrThrow<AssistantConfig>('assistant');
    const wordCount = query.trim().split(/\s+/).filter(Boolean).length;
    if (!config.useModelClassifier || wordCount < 3) {
      this.logger.debug(`📤 OUTPUT - ${DEFAULT_INTENT} (no rule matched)`);
      return { intent: DEFAULT_INTENT, method: 'default' };
    }

    try {
      const raw = await this.llmCacheService.cachedCall(
        buildClassifyIntentPrompt(query),
        { temperature: 0.1, model: this.llmCacheService.getFastModel(), maxTokens: 20 },
        signal,
      );
      const parsed = this.parseIntent(raw);
      this.logger.debug(`📨 Raw LLM response: "${raw}"`);

      if (!parsed) {
        this.logger.debug(`📤 OUTPUT - ${DEFAULT_INTENT} (unrecognised model answer)`);
        return { intent: DEFAULT_INTENT, method: 'default' };
      }
      this.logger.debug(`📤 OUTPUT - ${parsed} (model)`);
      return { intent: parsed, method: 'model' };
    } catch (error) {
      if (isCancellation(error) || signal?.aborted) {
        throw isCancellation(error) ? error : new RequestCancelledError();
      }
      this.logger.warn(
        `⚠️ Model classification failed, using ${DEFAULT_INTENT}: ${errorMessage(error)}`,
      );
      return {
        intent: DEFAULT_INTENT,
        method: 'default',
        degradedReason: `classifier_unavailable: ${errorMessage(error)}`,
      };
    }
  }

  parseIntent(raw: string): Intent | null {
    const match = /intent\s*:\s*\[?\s*([A-Za-z_]+)/i.exec(raw);
    const candidate = (match ? match[1] : raw.trim()).toUpperCase();
    return isIntent(candidate) ? candidate : null;
  }
}
