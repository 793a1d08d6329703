import { Injectable, Logger } from '@nestjs/common';
import { CategoryClassificationService } from '../../classification/category-classification.service';
import { STANDARD_CATEGORIES, titleCase } from '../../classification/category.types';
import { formatRinggit, parsePositiveAmount } from '../../common/money';
import { CandidateExpense } from '../../parser/parser.service';
import { FinanceStore } from '../../storage/finance-store';
import { ExpenseConfirmationState, ExpenseCorrectionStage, ExpenseCorrectionState } from '../conversation-state';
import { isNo, isYes } from '../phrases';
import { SessionContext } from '../session-context';

export const CATEGORY_QUESTION = 'Is that the right category?';

const CATEGORY_LIST = STANDARD_CATEGORIES.map(titleCase).join(', ');
const CATEGORY_WORDS = /\b(?:category|type|classification|group)\b/;
const AMOUNT_WORDS = /\b(?:amount|value|cost|price|rm|money|expense)\b/;
// a custom category is a short plain name, e.g. "pets" or "car wash"
const CUSTOM_CATEGORY = /^[a-z][a-z &-]{0,29}$/;

type CorrectionHandler = (session: SessionContext, state: ExpenseCorrectionState, text: string) => Promise<string>;

/**
 * Single expenses are saved straight away; this flow asks whether the
 * guessed category is right and applies a category or amount fix.
 */
@Injectable()
export class ExpenseCorrectionFlow {
  private readonly logger = new Logger(ExpenseCorrectionFlow.name);

  private readonly stages: Record<ExpenseCorrectionStage, CorrectionHandler> = {
    ask_what_to_change: async (_session, state, text) => this.onWhatToChange(state, text),
    change_category: (session, state, text) => this.onChangeCategory(session, state, text),
    change_amount: (session, state, text) => this.onChangeAmount(session, state, text),
  };

  constructor(
    private readonly store: FinanceStore,
    private readonly categoryClassificationService: CategoryClassificationService,
  ) {}

  async record(session: SessionContext, expense: CandidateExpense): Promise<string> {
    let id: number;
    try {
      id = await this.store.addExpense(session.userId, expense.amount, expense.description, expense.category);
    } catch (error) {
      this.logger.error(`Could not save expense for ${session.userId}`, error instanceof Error ? error.stack : String(error));
      return "Sorry, I couldn't save that expense just now. Please try again in a moment.";
    }

    this.logger.log(`Expense ${id} saved for ${session.userId}: ${formatRinggit(expense.amount)} ${expense.description} [${expense.category}]`);
    session.start({ flow: 'expense-confirmation', stage: 'await_answer', expense: { id, ...expense } });
    return (
      `I've recorded your expense: ${formatRinggit(expense.amount)} for ${expense.description} ` +
      `in the '${expense.category}' category. ${CATEGORY_QUESTION}`
    );
  }

  /** Strict yes/no; anything else asks again. */
  async confirm(session: SessionContext, state: ExpenseConfirmationState, text: string): Promise<string> {
    const lower = text.toLowerCase().trim();
    if (isYes(lower)) {
      session.clear();
      return 'Great! Your expense has been recorded successfully. What else can I help you with today?';
    }
    if (isNo(lower) || /\b(?:change|wrong|incorrect)\b/.test(lower)) {
      session.start({ flow: 'expense-correction', stage: 'ask_what_to_change', expense: state.expense });
      return 'What would you like to change - the category or the amount?';
    }
    return "I didn't understand that. Is the category correct? Please answer with yes or no.";
  }

  correct(session: SessionContext, state: ExpenseCorrectionState, text: string): Promise<string> {
    return this.stages[state.stage](session, state, text);
  }

  private onWhatToChange(state: ExpenseCorrectionState, text: string): string {
    const lower = text.toLowerCase();
    if (CATEGORY_WORDS.test(lower)) {
      state.stage = 'change_category';
      return `What category would you like to use instead? Choose from: ${CATEGORY_LIST}, or type a custom category.`;
    }
    if (AMOUNT_WORDS.test(lower)) {
      state.stage = 'change_amount';
      return 'What is the correct amount for this expense?';
    }
    state.stage = 'change_category';
    return `I'll help you change the category. What category would you like to use instead? Choose from: ${CATEGORY_LIST}, or type a custom category.`;
  }

  private async onChangeCategory(session: SessionContext, state: ExpenseCorrectionState, text: string): Promise<string> {
    const lower = text.toLowerCase().trim();
    let category = this.categoryClassificationService.matchCategoryName(lower, session.customCategories);
    if (!category && CUSTOM_CATEGORY.test(lower)) {
      category = session.addCustomCategory(lower);
      if (category) this.logger.log(`Custom category "${category}" added for ${session.userId}`);
    }
    if (!category) {
      return `I didn't catch a category name. Choose from: ${CATEGORY_LIST}, or type a short custom name.`;
    }

    try {
      await this.store.updateExpenseCategory(state.expense.id, category);
    } catch (error) {
      this.logger.error(`Could not update expense ${state.expense.id}`, error instanceof Error ? error.stack : String(error));
      return 'Sorry, I had trouble updating the category. Can you try again?';
    }

    session.clear();
    return `I've updated the category to '${category}'. Your expense has been recorded successfully.`;
  }

  private async onChangeAmount(session: SessionContext, state: ExpenseCorrectionState, text: string): Promise<string> {
    const amount = parsePositiveAmount(text);
    if (amount === null) {
      return "I couldn't understand that amount. Please provide a number like '25' or '25.50'.";
    }

    try {
      await this.store.updateExpenseAmount(state.expense.id, amount);
    } catch (error) {
      this.logger.error(`Could not update expense ${state.expense.id}`, error instanceof Error ? error.stack : String(error));
      return 'Sorry, I had trouble updating the amount. Can you try again?';
    }

    session.clear();
    return `I've updated the amount to ${formatRinggit(amount)}. Your expense has been recorded successfully.`;
  }
}
