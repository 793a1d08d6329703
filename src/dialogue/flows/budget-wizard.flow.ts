import { Injectable, Logger } from '@nestjs/common';
import { CategoryClassificationService } from '../../classification/category-classification.service';
import { Category, titleCase } from '../../classification/category.types';
import { currentMonthName, currentYear, parseMonthName } from '../../common/dates';
import { formatRinggit, parsePositiveAmount } from '../../common/money';
import { pickOne } from '../../common/random';
import { FinanceStore } from '../../storage/finance-store';
import { BudgetDraft, BudgetWizardStage, BudgetWizardState } from '../conversation-state';
import { isConfirm, isDecline } from '../phrases';
import { SessionContext } from '../session-context';

export const MIN_BUDGET_YEAR = 2020;
export const MAX_BUDGET_YEAR = 2100;

const CATEGORY_CHOICES = 'Food, Transport, Entertainment, Shopping, Utilities, Housing, Healthcare, Education, or Other';

const CATEGORY_ENCOURAGEMENT: Record<string, string> = {
  food: 'Excellent choice! Food budgeting is one of the most impactful areas. 🍽️',
  transport: 'Smart pick! Transport costs can really sneak up on you. 🚗',
  entertainment: "Great thinking! It's important to budget for the fun stuff too. 🎬",
  shopping: 'Good idea! Shopping budgets help prevent those impulse buys. 🛍️',
  utilities: 'Very practical! Bills are so predictable when budgeted properly. 💡',
  housing: 'Essential choice! Housing is typically the biggest expense. 🏠',
  healthcare: 'Wise decision! Healthcare costs can be unpredictable. ⚕️',
  education: 'Fantastic! Investing in knowledge always pays off. 📚',
  other: 'Smart to budget for miscellaneous expenses! 📦',
};

const CURRENT_MONTH = /\b(?:this month|current|now|default|same)\b/;
const CURRENT_YEAR = /\b(?:this year|current|now|default|same)\b/;
const CHANGE_WORDS = /\b(?:change|edit|revise|modify|adjust)\b/;

const ACTIVATED = ['🎉 Budget Activated!', "✅ Success! You're All Set!", '🌟 Fantastic! Budget is Live!'];

type StageHandler = (session: SessionContext, state: BudgetWizardState, text: string) => Promise<string>;

export interface BudgetPrefill {
  category?: Category;
  amount?: number;
}

@Injectable()
export class BudgetWizardFlow {
  private readonly logger = new Logger(BudgetWizardFlow.name);

  private readonly stages: Record<BudgetWizardStage, StageHandler> = {
    ask_category: async (session, state, text) => this.onCategory(session, state, text, 'ask_amount'),
    ask_amount: async (_session, state, text) => this.onAmount(state, text, 'ask_month'),
    ask_month: async (_session, state, text) => this.onMonth(state, text, 'ask_year'),
    ask_year: async (_session, state, text) => this.onYear(state, text),
    confirm: (session, state, text) => this.onConfirm(session, state, text),
    revise_part: async (_session, state, text) => this.onRevisePart(state, text),
    revise_category: async (session, state, text) => this.onCategory(session, state, text, 'confirm'),
    revise_amount: async (_session, state, text) => this.onAmount(state, text, 'confirm'),
    revise_month: async (_session, state, text) => this.onMonth(state, text, 'confirm'),
    revise_year: async (_session, state, text) => this.onYear(state, text),
  };

  constructor(
    private readonly store: FinanceStore,
    private readonly categoryClassificationService: CategoryClassificationService,
  ) {}

  start(session: SessionContext, prefill: BudgetPrefill = {}): string {
    const draft: BudgetDraft = { ...prefill };
    this.logger.log(`Budget wizard for ${session.userId} started ${JSON.stringify(prefill)}`);

    if (!draft.category) {
      session.start({ flow: 'budget-wizard', stage: 'ask_category', draft });
      return `Let's set up a budget! 💰 Which category is it for? Choose from ${CATEGORY_CHOICES}.`;
    }
    if (draft.amount === undefined) {
      session.start({ flow: 'budget-wizard', stage: 'ask_amount', draft });
      return `${titleCase(draft.category)} budget, good call! How much would you like to set aside each month?`;
    }
    session.start({ flow: 'budget-wizard', stage: 'ask_month', draft });
    return `${formatRinggit(draft.amount)} for ${titleCase(draft.category)}. ${this.monthQuestion()}`;
  }

  handle(session: SessionContext, state: BudgetWizardState, text: string): Promise<string> {
    return this.stages[state.stage](session, state, text);
  }

  private onCategory(session: SessionContext, state: BudgetWizardState, text: string, next: BudgetWizardStage): string {
    const category = this.categoryClassificationService.mapBudgetCategory(text, session.customCategories);
    state.draft.category = category;
    state.stage = next;

    if (next === 'confirm') return this.summary(state.draft);
    const encouragement = CATEGORY_ENCOURAGEMENT[category] ?? 'Great choice for budgeting! 💰';
    return `${titleCase(category)} Budget - ${encouragement}\n\nWhat's a realistic monthly amount you'd like to set aside for ${titleCase(category)}?`;
  }

  private onAmount(state: BudgetWizardState, text: string, next: BudgetWizardStage): string {
    const amount = parsePositiveAmount(text);
    if (amount === null) {
      if (state.stage === 'ask_amount' && /\b(?:different|switch|another)\b|\bchange\b/.test(text.toLowerCase())) {
        state.stage = 'ask_category';
        return `Sure thing! Which spending area would you prefer to budget for? Choose from ${CATEGORY_CHOICES}.`;
      }
      return "I couldn't find the budget amount in that. Just the number is perfect, for example '400' for RM400.00.";
    }

    state.draft.amount = amount;
    state.stage = next;
    return next === 'confirm' ? this.summary(state.draft) : `${formatRinggit(amount)}, got it! ${this.monthQuestion()}`;
  }

  private onMonth(state: BudgetWizardState, text: string, next: BudgetWizardStage): string {
    const lower = text.toLowerCase();
    const month = parseMonthName(lower) ?? (CURRENT_MONTH.test(lower) ? currentMonthName() : null);
    if (!month) {
      return "Which month is this budget for? Say a month name like 'March' or 'this month'.";
    }

    state.draft.month = month;
    state.stage = next;
    return next === 'confirm'
      ? this.summary(state.draft)
      : `${month} it is. Which year? (${MIN_BUDGET_YEAR}-${MAX_BUDGET_YEAR}, or 'this year')`;
  }

  private onYear(state: BudgetWizardState, text: string): string {
    const year = this.parseYear(text);
    if (year === null) {
      return `Please give me a year between ${MIN_BUDGET_YEAR} and ${MAX_BUDGET_YEAR}, or say 'this year'.`;
    }

    state.draft.year = year;
    state.stage = 'confirm';
    return this.summary(state.draft);
  }

  private async onConfirm(session: SessionContext, state: BudgetWizardState, text: string): Promise<string> {
    const lower = text.toLowerCase();

    if (isConfirm(text)) return this.save(session, state);
    if (isDecline(text)) {
      session.clear();
      return "Absolutely no problem! 😊 I've discarded that budget. Say 'set budget' when you're ready to try again.";
    }

    if (CHANGE_WORDS.test(lower) || /\b(?:different|wrong)\b/.test(lower)) {
      const direct = this.revisionTarget(lower);
      if (direct) {
        state.stage = direct;
        return this.reviseQuestion(direct);
      }
      state.stage = 'revise_part';
      return this.reviseMenu();
    }

    return "Should I activate this budget? Say 'yes' to confirm, 'no' to discard it, or 'change' to edit something.";
  }

  private onRevisePart(state: BudgetWizardState, text: string): string {
    const target = this.revisionTarget(text.toLowerCase());
    if (!target) return this.reviseMenu();
    state.stage = target;
    return this.reviseQuestion(target);
  }

  private async save(session: SessionContext, state: BudgetWizardState): Promise<string> {
    const { category, amount, month, year } = state.draft;
    if (!category || amount === undefined || !month || year === undefined) {
      session.clear();
      return "Something went missing while we were setting that up. Say 'set budget' to start again.";
    }

    try {
      await this.store.setBudget(session.userId, category, amount, month, year);
    } catch (error) {
      this.logger.error(`Could not save budget for ${session.userId}`, error instanceof Error ? error.stack : String(error));
      return "Sorry, something went wrong while saving your budget. Your details are still here, so say 'yes' to try again.";
    }

    session.clear();
    this.logger.log(`Budget ${category} ${formatRinggit(amount)} (${month} ${year}) saved for ${session.userId}`);
    return (
      `${pickOne(ACTIVATED)}\n\nYour ${titleCase(category)} budget of ${formatRinggit(amount)} is now active for ${month} ${year}!\n\n` +
      "Want to set up another one? Just say 'set budget' again."
    );
  }

  private parseYear(text: string): number | null {
    const lower = text.toLowerCase();
    const match = lower.match(/\b(\d{4})\b/);
    if (match) {
      const year = Number(match[1]);
      return year >= MIN_BUDGET_YEAR && year <= MAX_BUDGET_YEAR ? year : null;
    }
    return CURRENT_YEAR.test(lower) ? currentYear() : null;
  }

  private revisionTarget(text: string): BudgetWizardStage | null {
    if (/\bcategory\b|^\s*1\s*$/.test(text)) return 'revise_category';
    if (/\bamount\b|^\s*2\s*$/.test(text)) return 'revise_amount';
    if (/\bmonth\b|^\s*3\s*$/.test(text)) return 'revise_month';
    if (/\byear\b|^\s*4\s*$/.test(text)) return 'revise_year';
    return null;
  }

  private reviseQuestion(stage: BudgetWizardStage): string {
    switch (stage) {
      case 'revise_category':
        return `Which category should it be instead? Choose from ${CATEGORY_CHOICES}.`;
      case 'revise_amount':
        return 'What amount would you prefer instead?';
      case 'revise_month':
        return "Which month should it be for? Say a month name or 'this month'.";
      default:
        return `Which year should it be for? (${MIN_BUDGET_YEAR}-${MAX_BUDGET_YEAR}, or 'this year')`;
    }
  }

  private reviseMenu(): string {
    return 'What would you like to change?\n1. Category\n2. Amount\n3. Month\n4. Year';
  }

  private monthQuestion(): string {
    return `Which month is this budget for? Say a month name, or 'this month' for ${currentMonthName()}.`;
  }

  private summary(draft: BudgetDraft): string {
    return [
      '📋 Budget summary:',
      `• Category: ${titleCase(draft.category ?? 'other')}`,
      `• Amount: ${formatRinggit(draft.amount ?? 0)}`,
      `• Month: ${draft.month ?? currentMonthName()} ${draft.year ?? currentYear()}`,
      '',
      "Shall I activate this budget? Say 'yes' to confirm, 'no' to discard it, or 'change' to edit something.",
    ].join('\n');
  }
}
