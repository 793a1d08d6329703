import { Injectable, Logger } from '@nestjs/common';
import { CategoryClassificationService } from '../../classification/category-classification.service';
import { STANDARD_CATEGORIES, titleCase } from '../../classification/category.types';
import { formatRinggit, parsePositiveAmount } from '../../common/money';
import { CandidateExpense } from '../../parser/parser.service';
import { FinanceStore } from '../../storage/finance-store';
import {
  MultiExpenseConfirmationState,
  MultiExpenseCorrectionStage,
  MultiExpenseCorrectionState,
} from '../conversation-state';
import { isConfirm, isDecline } from '../phrases';
import { SessionContext } from '../session-context';

const CATEGORY_LIST = STANDARD_CATEGORIES.map(titleCase).join(', ');
const CUSTOM_CATEGORY = /^[a-z][a-z &-]{0,29}$/;

type CorrectionHandler = (session: SessionContext, state: MultiExpenseCorrectionState, text: string) => Promise<string>;

export function describeBatch(expenses: readonly CandidateExpense[]): string {
  const total = expenses.reduce((sum, expense) => sum + expense.amount, 0);
  const lines = expenses.map(
    (expense, index) => `${index + 1}. ${formatRinggit(expense.amount)} for ${expense.description} (${titleCase(expense.category)})`,
  );
  return [`I found ${expenses.length} expenses:`, ...lines, `Total: ${formatRinggit(total)}`].join('\n');
}

/**
 * Several expenses from one message. Nothing is saved until the whole batch
 * is confirmed, and then it is saved in one all-or-nothing insert.
 */
@Injectable()
export class MultiExpenseFlow {
  private readonly logger = new Logger(MultiExpenseFlow.name);

  private readonly stages: Record<MultiExpenseCorrectionStage, CorrectionHandler> = {
    select_expense: async (session, state, text) => this.onSelect(session, state, text),
    ask_what_to_change: async (_session, state, text) => this.onWhatToChange(state, text),
    change_amount: async (session, state, text) => this.onChangeAmount(session, state, text),
    change_description: async (session, state, text) => this.onChangeDescription(session, state, text),
    change_category: async (session, state, text) => this.onChangeCategory(session, state, text),
  };

  constructor(
    private readonly store: FinanceStore,
    private readonly categoryClassificationService: CategoryClassificationService,
  ) {}

  start(session: SessionContext, expenses: CandidateExpense[]): string {
    session.start({ flow: 'multi-expense-confirmation', stage: 'confirm_batch', expenses });
    this.logger.log(`Staged ${expenses.length} expenses for ${session.userId}`);
    return `${describeBatch(expenses)}\n\nShall I record all of them? (yes/no)`;
  }

  async confirm(session: SessionContext, state: MultiExpenseConfirmationState, text: string): Promise<string> {
    if (isConfirm(text)) return this.commit(session, state);
    if (isDecline(text) || /\b(?:change|edit|wrong|fix)\b/.test(text.toLowerCase())) {
      session.start({ flow: 'multi-expense-correction', stage: 'select_expense', expenses: state.expenses, selectedIndex: null });
      return `Which expense would you like to change? Reply with its number (1-${state.expenses.length}).`;
    }
    return "Should I record these expenses? Please answer 'yes' to save them all or 'no' to make changes.";
  }

  correct(session: SessionContext, state: MultiExpenseCorrectionState, text: string): Promise<string> {
    return this.stages[state.stage](session, state, text);
  }

  private async commit(session: SessionContext, state: MultiExpenseConfirmationState): Promise<string> {
    try {
      const ids = await this.store.addExpensesBatch(session.userId, state.expenses);
      this.logger.log(`Batch saved for ${session.userId}: ids ${ids.join(', ')}`);
    } catch (error) {
      this.logger.error(`Batch of ${state.expenses.length} failed for ${session.userId}`, error instanceof Error ? error.stack : String(error));
      return "Sorry, I couldn't save those expenses and nothing was recorded. Say 'yes' to try again or 'no' to make changes.";
    }

    session.clear();
    const total = state.expenses.reduce((sum, expense) => sum + expense.amount, 0);
    return `✅ Recorded ${state.expenses.length} expenses totalling ${formatRinggit(total)}. What else can I help you with?`;
  }

  private onSelect(session: SessionContext, state: MultiExpenseCorrectionState, text: string): string {
    if (isConfirm(text)) return this.backToConfirmation(session, state, 'No changes then.');

    const match = text.match(/\d+/);
    const index = match ? Number(match[0]) - 1 : -1;
    if (index < 0 || index >= state.expenses.length) {
      return `Please reply with a number from 1 to ${state.expenses.length}.`;
    }

    state.selectedIndex = index;
    state.stage = 'ask_what_to_change';
    return `What would you like to change for '${state.expenses[index].description}': the amount, description or category?`;
  }

  private onWhatToChange(state: MultiExpenseCorrectionState, text: string): string {
    const lower = text.toLowerCase();
    if (/\b(?:amount|price|cost|rm|money)\b/.test(lower)) {
      state.stage = 'change_amount';
      return 'What is the correct amount?';
    }
    if (/\b(?:description|desc|name|item|what)\b/.test(lower)) {
      state.stage = 'change_description';
      return 'What should the description be?';
    }
    if (/\b(?:category|type)\b/.test(lower)) {
      state.stage = 'change_category';
      return `Which category should it be? Choose from: ${CATEGORY_LIST}, or type a custom category.`;
    }
    return 'Please tell me what to change: the amount, description or category.';
  }

  private onChangeAmount(session: SessionContext, state: MultiExpenseCorrectionState, text: string): string {
    const amount = parsePositiveAmount(text);
    if (amount === null) return "I couldn't understand that amount. Please provide a number like '25' or '25.50'.";
    return this.update(session, state, (expense) => ({ ...expense, amount }));
  }

  private onChangeDescription(session: SessionContext, state: MultiExpenseCorrectionState, text: string): string {
    const description = text.toLowerCase().trim().replace(/[.!?]+$/, '');
    if (!description) return 'What should the description be?';
    const category = this.categoryClassificationService.categorize(description, session.customCategories);
    return this.update(session, state, (expense) => ({ ...expense, description, category }));
  }

  private onChangeCategory(session: SessionContext, state: MultiExpenseCorrectionState, text: string): string {
    const lower = text.toLowerCase().trim();
    let category = this.categoryClassificationService.matchCategoryName(lower, session.customCategories);
    if (!category && CUSTOM_CATEGORY.test(lower)) category = session.addCustomCategory(lower);
    if (!category) return `I didn't catch a category name. Choose from: ${CATEGORY_LIST}.`;
    const chosen = category;
    return this.update(session, state, (expense) => ({ ...expense, category: chosen }));
  }

  private update(
    session: SessionContext,
    state: MultiExpenseCorrectionState,
    change: (expense: CandidateExpense) => CandidateExpense,
  ): string {
    const index = state.selectedIndex;
    if (index === null || !state.expenses[index]) {
      state.stage = 'select_expense';
      return `Which expense would you like to change? Reply with its number (1-${state.expenses.length}).`;
    }
    const expenses = state.expenses.map((expense, position) => (position === index ? change(expense) : expense));
    return this.backToConfirmation(session, { ...state, expenses }, 'Updated!');
  }

  private backToConfirmation(session: SessionContext, state: MultiExpenseCorrectionState, lead: string): string {
    session.start({ flow: 'multi-expense-confirmation', stage: 'confirm_batch', expenses: state.expenses });
    return `${lead} ${describeBatch(state.expenses)}\n\nShall I record all of them? (yes/no)`;
  }
}
