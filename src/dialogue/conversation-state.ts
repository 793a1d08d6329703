import { Category } from '../classification/category.types';
import { CandidateExpense } from '../parser/parser.service';
import { GoalType } from '../storage/finance-store';

/** Saved optimistically; waits for the user to confirm its category. */
export interface PendingExpense {
  id: number;
  amount: number;
  description: string;
  category: Category;
}

export interface ExpenseConfirmationState {
  flow: 'expense-confirmation';
  stage: 'await_answer';
  expense: PendingExpense;
}

export type ExpenseCorrectionStage = 'ask_what_to_change' | 'change_category' | 'change_amount';

export interface ExpenseCorrectionState {
  flow: 'expense-correction';
  stage: ExpenseCorrectionStage;
  expense: PendingExpense;
}

export interface MultiExpenseConfirmationState {
  flow: 'multi-expense-confirmation';
  stage: 'confirm_batch';
  expenses: CandidateExpense[];
}

export type MultiExpenseCorrectionStage =
  | 'select_expense'
  | 'ask_what_to_change'
  | 'change_amount'
  | 'change_description'
  | 'change_category';

export interface MultiExpenseCorrectionState {
  flow: 'multi-expense-correction';
  stage: MultiExpenseCorrectionStage;
  expenses: CandidateExpense[];
  /** Zero-based; null until the user picks an item. */
  selectedIndex: number | null;
}

export type BudgetWizardStage =
  | 'ask_category'
  | 'ask_amount'
  | 'ask_month'
  | 'ask_year'
  | 'confirm'
  | 'revise_part'
  | 'revise_category'
  | 'revise_amount'
  | 'revise_month'
  | 'revise_year';

export interface BudgetDraft {
  category?: Category;
  amount?: number;
  month?: string;
  year?: number;
}

export interface BudgetWizardState {
  flow: 'budget-wizard';
  stage: BudgetWizardStage;
  draft: BudgetDraft;
}

export type GoalWizardStage = 'ask_goal_name' | 'ask_amount' | 'ask_timeframe' | 'confirm_goal';

export interface GoalDraft {
  goalName?: string;
  goalType: GoalType;
  amount?: number;
  months?: number;
}

export interface GoalWizardState {
  flow: 'goal-wizard';
  stage: GoalWizardStage;
  draft: GoalDraft;
}

export type ConversationState =
  | ExpenseConfirmationState
  | ExpenseCorrectionState
  | MultiExpenseConfirmationState
  | MultiExpenseCorrectionState
  | BudgetWizardState
  | GoalWizardState;

export type FlowKind = ConversationState['flow'];
