import { Injectable, Logger } from '@nestjs/common';
import { CategoryClassificationService } from '../classification/category-classification.service';
import { Category } from '../classification/category.types';
import { ExpensePatternRule, MULTI_EXPENSE_RULES, SINGLE_EXPENSE_RULES } from './expense-patterns';

export interface ExtractedEntities {
  amount?: number;
  description?: string;
  category?: Category;
  /** Set when the matched amount text is not a number. */
  amountError?: string;
}

export interface CandidateExpense {
  amount: number;
  description: string;
  category: Category;
}

interface RuleMatch {
  rule: ExpensePatternRule;
  rawAmount: string;
  rawDescription: string;
}

type AmountParse = { ok: true; value: number } | { ok: false; error: string };

// "rm" only as a word or a currency prefix, so "inform" and "warm" stay out
const SPENDING_KEYWORDS = /\brm(?:\b|\d)|\b(?:spent|paid|buy|bought|cost)\b/;
const LEADING_FILLER = /^(?:for|on|at|buying|getting|purchasing|to buy|to get)\s+/;
const CURRENCY_MENTION = /(?:\brm\s*|\$)\d[\d,.]*/g;
// split on commas, but not the ones inside 1,200; "lunch,500 for rent" still splits
const SEGMENT_SEPARATOR = /(?<!\d),|,(?!\d{3}(?!\d))/;

@Injectable()
export class ParserService {
  private readonly logger = new Logger(ParserService.name);

  constructor(private readonly categoryClassificationService: CategoryClassificationService) {}

  /** One expense from the utterance; empty object when nothing matched. */
  extract(text: string, customCategories: readonly string[] = []): ExtractedEntities {
    const normalized = text.toLowerCase().trim();
    if (!this.looksLikeExpense(normalized)) return {};

    const match = this.firstMatch(normalized, SINGLE_EXPENSE_RULES);
    if (!match) return {};

    const entities: ExtractedEntities = {};
    const description = this.cleanDescription(match.rawDescription);
    if (description) entities.description = description;

    const amount = this.parseAmount(match.rawAmount);
    if (amount.ok) {
      entities.amount = amount.value;
    } else {
      entities.amountError = amount.error;
      this.logger.warn(`${amount.error} (rule ${match.rule.name})`);
    }

    if (entities.description) {
      entities.category = this.categoryClassificationService.categorize(entities.description, customCategories);
    }

    this.logger.debug(`Extracted ${JSON.stringify(entities)} via ${match.rule.name}`);
    return entities;
  }

  /**
   * Every complete expense in a comma / "and" separated utterance, in the
   * order written. Segments that do not parse are skipped.
   */
  extractMultiple(text: string, customCategories: readonly string[] = []): CandidateExpense[] {
    const normalized = text.toLowerCase().trim();
    if (!this.looksLikeExpense(normalized)) return [];

    const expenses: CandidateExpense[] = [];
    for (const segment of this.splitSegments(normalized)) {
      const match = this.firstMatch(segment, MULTI_EXPENSE_RULES);
      if (!match) continue;

      const amount = this.parseAmount(match.rawAmount);
      const description = this.cleanDescription(match.rawDescription);
      if (!amount.ok) {
        this.logger.warn(`${amount.error} in segment "${segment}"`);
        continue;
      }
      if (!description) continue;

      expenses.push({
        amount: amount.value,
        description,
        category: this.categoryClassificationService.categorize(description, customCategories),
      });
    }
    return expenses;
  }

  splitSegments(text: string): string[] {
    const segments: string[] = [];
    for (const part of text.split(SEGMENT_SEPARATOR)) {
      const mentions = part.match(CURRENCY_MENTION) ?? [];
      const pieces = mentions.length > 1 ? part.split(/\s+and\s+/) : [part];
      for (const piece of pieces) {
        const trimmed = piece.replace(/^\s*and\s+/, '').trim();
        if (trimmed) segments.push(trimmed);
      }
    }
    return segments;
  }

  cleanDescription(raw: string): string {
    let description = raw.replace(CURRENCY_MENTION, ' ').replace(/\s+/g, ' ').trim();
    while (LEADING_FILLER.test(description)) {
      description = description.replace(LEADING_FILLER, '');
    }
    return description.replace(/[\s.,!?;:]+$/, '').trim();
  }

  private looksLikeExpense(text: string): boolean {
    if (text.length <= 2) return false;
    if (!/[a-z]/.test(text)) return false;
    return /\d/.test(text) || SPENDING_KEYWORDS.test(text);
  }

  private firstMatch(text: string, rules: readonly ExpensePatternRule[]): RuleMatch | null {
    for (const rule of rules) {
      const match = text.match(rule.pattern);
      if (!match) continue;
      return {
        rule,
        rawAmount: match[rule.amountGroup] ?? '',
        rawDescription: match[rule.descriptionGroup] ?? '',
      };
    }
    return null;
  }

  private parseAmount(raw: string): AmountParse {
    const cleaned = raw.trim().replace(/\$/g, '').replace(/rm/gi, '').replace(/,/g, '');
    const value = cleaned ? Number(cleaned) : NaN;
    if (!Number.isFinite(value) || value < 0) {
      return { ok: false, error: `Could not convert '${raw.trim()}' to a number` };
    }
    return { ok: true, value };
  }
}
