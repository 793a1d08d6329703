import { Category } from '../classification/category.types';

export interface NewExpense {
  amount: number;
  description: string;
  category: Category;
}

export interface ExpenseRecord extends NewExpense {
  id: number;
  userId: string;
  date: string; // ISO YYYY-MM-DD
}

export interface ExpenseFilters {
  limit?: number;
  startDate?: string;
  endDate?: string;
}

export interface BudgetRecord {
  id: number;
  userId: string;
  category: Category;
  amount: number;
  month: string; // full English month name, e.g. "March"
  year: number;
}

export type GoalType =
  | 'savings'
  | 'emergency_fund'
  | 'vacation'
  | 'car'
  | 'house'
  | 'electronics'
  | 'education'
  | 'wedding'
  | 'debt_payoff';

export interface NewGoal {
  goalName: string;
  goalType: GoalType;
  targetAmount: number;
  targetDate: string;
  monthlyContribution: number;
}

export interface GoalRecord extends NewGoal {
  id: number;
  userId: string;
  currentAmount: number;
  createdAt: string;
}

export interface IncomeRecord {
  userId: string;
  amount: number;
  month: string;
  year: number;
}

export class StorageError extends Error {
  constructor(
    readonly operation: string,
    message: string,
    readonly cause?: unknown,
  ) {
    super(`${operation} failed: ${message}`);
    this.name = 'StorageError';
  }
}

/**
 * Persistence contract for everything the chat records. Injected by class
 * token; see StorageModule for the implementation picked at startup.
 */
export abstract class FinanceStore {
  abstract addExpense(userId: string, amount: number, description: string, category: Category): Promise<number>;

  /** Persists every item or none of them. Ids come back in input order. */
  abstract addExpensesBatch(userId: string, items: readonly NewExpense[]): Promise<number[]>;

  abstract updateExpenseCategory(expenseId: number, category: Category): Promise<void>;

  abstract updateExpenseAmount(expenseId: number, amount: number): Promise<void>;

  /** Newest first. */
  abstract getExpenses(userId: string, filters?: ExpenseFilters): Promise<ExpenseRecord[]>;

  abstract getSpendingByCategory(userId: string, month: string, year: number): Promise<Record<string, number>>;

  abstract getBudgets(userId: string, month: string, year: number): Promise<BudgetRecord[]>;

  /** Upsert keyed by user, category, month and year. */
  abstract setBudget(userId: string, category: Category, amount: number, month: string, year: number): Promise<void>;

  abstract addGoal(userId: string, goal: NewGoal): Promise<number>;

  abstract getUserGoals(userId: string): Promise<GoalRecord[]>;

  abstract addGoalContribution(goalId: number, userId: string, amount: number, note?: string): Promise<void>;

  abstract setMonthlyIncome(userId: string, amount: number, month: string, year: number): Promise<void>;

  abstract getMonthlyIncome(userId: string, month: string, year: number): Promise<IncomeRecord | null>;

  abstract ping(): Promise<boolean>;
}
