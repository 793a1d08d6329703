import { Injectable, Logger } from '@nestjs/common';
import budgetCategoryKeywords from './budget-category-keywords.json';
import categoryKeywords from './category-keywords.json';
import { Category, DEFAULT_CATEGORY, STANDARD_CATEGORIES } from './category.types';

export interface ClassificationResult {
  category: Category;
  source: 'keyword' | 'custom' | 'default';
  matchedKeyword?: string;
}

interface CategoryRule {
  category: Category;
  keywords: string[];
}

@Injectable()
export class CategoryClassificationService {
  private readonly logger = new Logger(CategoryClassificationService.name);

  // Order matters: the first category with a matching keyword wins.
  private readonly rules: readonly CategoryRule[] = categoryKeywords;
  private readonly budgetRules: readonly CategoryRule[] = budgetCategoryKeywords;

  categorize(description: string, customCategories: readonly string[] = []): Category {
    return this.classify(description, customCategories).category;
  }

  classify(description: string, customCategories: readonly string[] = []): ClassificationResult {
    const desc = description.toLowerCase();

    for (const rule of this.rules) {
      const keyword = rule.keywords.find((candidate) => desc.includes(candidate));
      if (keyword) {
        this.logger.debug(`"${description}" -> ${rule.category} (keyword "${keyword}")`);
        return { category: rule.category, source: 'keyword', matchedKeyword: keyword };
      }
    }

    const custom = customCategories.find((category) => desc.includes(category));
    if (custom) {
      this.logger.debug(`"${description}" -> custom category ${custom}`);
      return { category: custom, source: 'custom', matchedKeyword: custom };
    }

    return { category: DEFAULT_CATEGORY, source: 'default' };
  }

  /**
   * Reads an explicit category choice ("change it to transport", "Food").
   * Standard names win over custom ones; null when nothing is named.
   */
  matchCategoryName(input: string, customCategories: readonly string[] = []): Category | null {
    const text = input.toLowerCase().trim();
    const standard = STANDARD_CATEGORIES.find((category) => text.includes(category));
    if (standard) return standard;
    return customCategories.find((category) => text.includes(category)) ?? null;
  }

  /**
   * Maps a budget-wizard answer to a category. Broader synonyms than the
   * expense table; unknown answers land in "other".
   */
  mapBudgetCategory(input: string, customCategories: readonly string[] = []): Category {
    return this.findBudgetCategory(input, customCategories) ?? DEFAULT_CATEGORY;
  }

  /** Like mapBudgetCategory, but null when nothing in the input names a category. */
  findBudgetCategory(input: string, customCategories: readonly string[] = []): Category | null {
    const text = input.toLowerCase().trim();
    const rule = this.budgetRules.find((candidate) => candidate.keywords.some((keyword) => text.includes(keyword)));
    if (rule) return rule.category;
    return customCategories.find((category) => text.includes(category)) ?? null;
  }
}
