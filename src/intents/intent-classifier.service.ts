import { Injectable, Logger } from '@nestjs/common';
import { IntentCatalogService } from './intent-catalog.service';
import { FALLBACK_TAG, IntentCatalog, IntentMatch } from './intent.types';

export const CONFIDENCE_THRESHOLD = 0.2;

const GOAL_SET_INDICATORS = [
  'set goal', 'create goal', 'new goal', 'add goal', 'save for', 'saving goal',
  'want to save', 'financial goal', 'savings target', 'set savings goal',
  'i want to save for', 'help me save', 'saving plan', 'set target',
  'create savings goal', 'make a goal', 'i want to set goal', 'want to set goal',
];

const GOAL_QUERY_INDICATORS = [
  'show goals', 'view goals', 'check goals', 'goal progress', 'how are my goals',
  'goals status', 'my savings goals', 'goal summary', 'see goals', 'what are my goals',
  'goal overview', 'my goal', 'all goals', 'check goal progress', 'show my goals',
];

const GOAL_CONTRIBUTION_INDICATORS = [
  'add to goal', 'contribute to goal', 'save money for', 'put money towards',
  'add money to', 'goal contribution', 'save for my goal', 'progress on goal',
];

const BUDGET_QUERY_INDICATORS = [
  'show', 'view', 'check', 'what is', "what's", 'how is', "how's",
  'status', 'progress', 'overview', 'summary', 'see my', 'look at',
  'display', 'current', 'my budget',
];

const BUDGET_SET_INDICATORS = [
  'set budget', 'create budget', 'make budget', 'establish budget', 'new budget',
  'setup budget', 'allocate budget', 'limit', 'want to', 'help me', 'i need to',
];

function wordSet(text: string): Set<string> {
  return new Set(text.split(/\s+/).filter(Boolean).map((word) => word.toLowerCase()));
}

@Injectable()
export class IntentClassifierService {
  private readonly logger = new Logger(IntentClassifierService.name);

  constructor(private readonly catalogService: IntentCatalogService) {}

  /**
   * Bag-of-words overlap: each intent scores its best pattern as
   * |input ∩ pattern| / |pattern|. Ties keep the earlier intent.
   */
  classify(text: string, catalog: IntentCatalog): IntentMatch {
    const inputWords = wordSet(text);
    let highestScore = 0;
    let matchedTag: string | null = null;

    for (const intent of catalog.intents) {
      let best = 0;
      for (const pattern of intent.patterns) {
        const patternWords = wordSet(pattern);
        if (patternWords.size === 0) continue;
        let overlap = 0;
        for (const word of patternWords) {
          if (inputWords.has(word)) overlap++;
        }
        best = Math.max(best, overlap / patternWords.size);
      }
      if (best > highestScore) {
        highestScore = best;
        matchedTag = intent.tag;
      }
    }

    if (matchedTag === null || highestScore < CONFIDENCE_THRESHOLD) {
      return { tag: FALLBACK_TAG, confidence: highestScore };
    }
    return { tag: matchedTag, confidence: highestScore };
  }

  /**
   * Classifies against the loaded catalog, with goal and budget phrasing
   * overriding the overlap score.
   */
  resolve(text: string): IntentMatch {
    const lower = text.toLowerCase();

    if (GOAL_SET_INDICATORS.some((indicator) => lower.includes(indicator))) return { tag: 'goal_set', confidence: 0.9 };
    if (GOAL_QUERY_INDICATORS.some((indicator) => lower.includes(indicator))) return { tag: 'goal_query', confidence: 0.9 };
    if (GOAL_CONTRIBUTION_INDICATORS.some((indicator) => lower.includes(indicator))) {
      return { tag: 'goal_contribution', confidence: 0.9 };
    }

    const match = this.classify(text, this.catalogService.getCatalog());

    if (lower.includes('budget')) {
      const asksForStatus = BUDGET_QUERY_INDICATORS.some((indicator) => lower.includes(indicator));
      const asksToSet = BUDGET_SET_INDICATORS.some((indicator) => lower.includes(indicator));
      if (asksForStatus && !asksToSet) return { tag: 'budget_query', confidence: match.confidence };
      if (asksToSet) return { tag: 'budget_set', confidence: match.confidence };
    }

    this.logger.debug(`"${text}" -> ${match.tag} (${match.confidence.toFixed(2)})`);
    return match;
  }
}
