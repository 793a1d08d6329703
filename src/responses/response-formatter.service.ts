import { Injectable, Logger } from '@nestjs/common';
import { CategoryClassificationService } from '../classification/category-classification.service';
import { titleCase } from '../classification/category.types';
import { currentMonthName, currentYear } from '../common/dates';
import { formatRinggit } from '../common/money';
import { ExtractedEntities } from '../parser/parser.service';
import { ReportsService } from '../reports/reports.service';
import { FinanceStore } from '../storage/finance-store';
import savingsTips from './savings-tips.json';

const CATEGORY_TIPS: Record<string, string[]> = savingsTips.categories;

// replacer function, so "$&" or "$'" in user text is inserted literally
function fill(template: string, placeholder: string, value: string): string {
  return template.replaceAll(placeholder, () => value);
}

/**
 * Fills intent response templates with live data. Storage is only queried
 * for placeholders the template actually contains.
 */
@Injectable()
export class ResponseFormatterService {
  private readonly logger = new Logger(ResponseFormatterService.name);

  constructor(
    private readonly store: FinanceStore,
    private readonly reportsService: ReportsService,
    private readonly categoryClassificationService: CategoryClassificationService,
  ) {}

  async format(template: string, entities: ExtractedEntities, userId: string): Promise<string> {
    let response = template;
    const month = currentMonthName();
    const year = currentYear();

    if (entities.amount !== undefined) {
      response = fill(response, '{amount:.2f}', entities.amount.toFixed(2));
      response = fill(response, '{amount}', String(entities.amount));
    }
    if (entities.description !== undefined) {
      response = fill(response, '{description}', entities.description);
    }
    if (response.includes('{category}')) {
      const category =
        entities.category ??
        (entities.description ? this.categoryClassificationService.categorize(entities.description) : 'other');
      response = fill(response, '{category}', category);
    }

    response = fill(fill(response, '{month}', month), '{year}', String(year));

    if (response.includes('{expenses}')) {
      response = fill(response, '{expenses}', await this.recentExpenses(userId));
    }
    if (response.includes('{budgets}')) {
      response = fill(response, '{budgets}', await this.budgets(userId, month, year));
    }

    const needsSpending = ['{spending}', '{total:.2f}', '{highest_category}', '{tips}'].some((placeholder) =>
      response.includes(placeholder),
    );
    if (needsSpending) {
      const spending = await this.store.getSpendingByCategory(userId, month, year);
      const ranked = Object.entries(spending).sort((a, b) => b[1] - a[1]);
      const total = ranked.reduce((sum, [, amount]) => sum + amount, 0);
      const highest = ranked.length > 0 ? ranked[0][0] : null;

      response = fill(response, '{spending}', this.spendingBreakdown(ranked, total));
      response = fill(response, '{total:.2f}', total.toFixed(2));
      response = fill(response, '{highest_category}', highest ?? 'any category');
      response = fill(response, '{tips}', this.tipsFor(highest));
    }

    // Ringgit display convention
    return response.replaceAll('$', 'RM');
  }

  private async recentExpenses(userId: string): Promise<string> {
    const expenses = await this.store.getExpenses(userId, { limit: 5 });
    if (expenses.length === 0) return 'No expenses recorded yet.';
    return expenses
      .map((expense) => `• ${expense.date}: ${formatRinggit(expense.amount)} for ${expense.description} (${titleCase(expense.category)})\n`)
      .join('');
  }

  private async budgets(userId: string, month: string, year: number): Promise<string> {
    const lines = await this.reportsService.budgetLines(userId, month, year);
    if (lines.length === 0) return 'No budgets set up yet.';
    return lines.map((line) => `${this.reportsService.describeLine(line)}\n`).join('');
  }

  private spendingBreakdown(ranked: ReadonlyArray<[string, number]>, total: number): string {
    if (ranked.length === 0) return 'No spending data available yet.\n';
    return ranked
      .map(([category, amount]) => {
        const percent = total > 0 ? (amount / total) * 100 : 0;
        return `• ${titleCase(category)}: ${formatRinggit(amount)} (${percent.toFixed(1)}% of total)\n`;
      })
      .join('');
  }

  private tipsFor(highestCategory: string | null): string {
    if (highestCategory === null) return savingsTips.general.join('\n');
    const tips = CATEGORY_TIPS[highestCategory];
    if (!tips) {
      this.logger.debug(`No tips for ${highestCategory}, using category defaults`);
      return savingsTips.category.join('\n');
    }
    return tips.join('\n');
  }
}
