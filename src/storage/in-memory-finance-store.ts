import { Logger } from '@nestjs/common';
import dayjs from 'dayjs';
import { Category } from '../classification/category.types';
import { monthWindow, today } from '../common/dates';
import {
  BudgetRecord,
  ExpenseFilters,
  ExpenseRecord,
  FinanceStore,
  GoalRecord,
  IncomeRecord,
  NewExpense,
  NewGoal,
  StorageError,
} from './finance-store';

interface ContributionRecord {
  goalId: number;
  userId: string;
  amount: number;
  note: string;
  createdAt: string;
}

/**
 * Process-local store. Used when Supabase is not configured and as the
 * storage stand-in for specs.
 */
export class InMemoryFinanceStore extends FinanceStore {
  private readonly logger = new Logger(InMemoryFinanceStore.name);

  protected readonly expenses: ExpenseRecord[] = [];
  protected readonly budgets: BudgetRecord[] = [];
  protected readonly goals: GoalRecord[] = [];
  protected readonly contributions: ContributionRecord[] = [];
  protected readonly income: IncomeRecord[] = [];
  private nextId = 1;

  async addExpense(userId: string, amount: number, description: string, category: Category): Promise<number> {
    const record = this.buildExpenseRow(userId, { amount, description, category });
    this.expenses.push(record);
    return record.id;
  }

  async addExpensesBatch(userId: string, items: readonly NewExpense[]): Promise<number[]> {
    const staged: ExpenseRecord[] = [];
    const idBefore = this.nextId;
    try {
      for (const item of items) {
        staged.push(this.buildExpenseRow(userId, item));
      }
    } catch (error) {
      this.nextId = idBefore;
      this.logger.error(`Batch of ${items.length} expenses rolled back`, error instanceof Error ? error.stack : String(error));
      throw error instanceof StorageError ? error : new StorageError('addExpensesBatch', 'could not stage expense', error);
    }
    this.expenses.push(...staged);
    return staged.map((record) => record.id);
  }

  async updateExpenseCategory(expenseId: number, category: Category): Promise<void> {
    this.findExpense(expenseId, 'updateExpenseCategory').category = category;
  }

  async updateExpenseAmount(expenseId: number, amount: number): Promise<void> {
    this.findExpense(expenseId, 'updateExpenseAmount').amount = amount;
  }

  async getExpenses(userId: string, filters: ExpenseFilters = {}): Promise<ExpenseRecord[]> {
    const rows = this.expenses
      .filter((expense) => expense.userId === userId)
      .filter((expense) => !filters.startDate || expense.date >= filters.startDate)
      .filter((expense) => !filters.endDate || expense.date <= filters.endDate)
      .sort((a, b) => (a.date === b.date ? b.id - a.id : b.date.localeCompare(a.date)))
      .map((expense) => ({ ...expense }));
    return filters.limit ? rows.slice(0, filters.limit) : rows;
  }

  async getSpendingByCategory(userId: string, month: string, year: number): Promise<Record<string, number>> {
    const { start, end } = monthWindow(month, year);
    const totals: Record<string, number> = {};
    for (const expense of this.expenses) {
      if (expense.userId !== userId || expense.date < start || expense.date >= end) continue;
      totals[expense.category] = (totals[expense.category] ?? 0) + expense.amount;
    }
    return totals;
  }

  async getBudgets(userId: string, month: string, year: number): Promise<BudgetRecord[]> {
    return this.budgets
      .filter((budget) => budget.userId === userId && budget.month === month && budget.year === year)
      .map((budget) => ({ ...budget }));
  }

  async setBudget(userId: string, category: Category, amount: number, month: string, year: number): Promise<void> {
    const existing = this.budgets.find(
      (budget) => budget.userId === userId && budget.category === category && budget.month === month && budget.year === year,
    );
    if (existing) {
      existing.amount = amount;
      return;
    }
    this.budgets.push({ id: this.nextId++, userId, category, amount, month, year });
  }

  async addGoal(userId: string, goal: NewGoal): Promise<number> {
    const id = this.nextId++;
    this.goals.push({ ...goal, id, userId, currentAmount: 0, createdAt: dayjs().toISOString() });
    return id;
  }

  async getUserGoals(userId: string): Promise<GoalRecord[]> {
    return this.goals.filter((goal) => goal.userId === userId).map((goal) => ({ ...goal }));
  }

  async addGoalContribution(goalId: number, userId: string, amount: number, note = ''): Promise<void> {
    const goal = this.goals.find((candidate) => candidate.id === goalId && candidate.userId === userId);
    if (!goal) {
      throw new StorageError('addGoalContribution', `goal ${goalId} not found`);
    }
    goal.currentAmount += amount;
    this.contributions.push({ goalId, userId, amount, note, createdAt: dayjs().toISOString() });
  }

  async setMonthlyIncome(userId: string, amount: number, month: string, year: number): Promise<void> {
    const existing = this.income.find((row) => row.userId === userId && row.month === month && row.year === year);
    if (existing) {
      existing.amount = amount;
      return;
    }
    this.income.push({ userId, amount, month, year });
  }

  async getMonthlyIncome(userId: string, month: string, year: number): Promise<IncomeRecord | null> {
    const row = this.income.find((candidate) => candidate.userId === userId && candidate.month === month && candidate.year === year);
    return row ? { ...row } : null;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  /** Builds the row without storing it; the batch path relies on that. */
  protected buildExpenseRow(userId: string, item: NewExpense): ExpenseRecord {
    if (!Number.isFinite(item.amount) || item.amount < 0) {
      throw new StorageError('addExpense', `invalid amount ${item.amount}`);
    }
    if (!item.description.trim()) {
      throw new StorageError('addExpense', 'description is empty');
    }
    return {
      id: this.nextId++,
      userId,
      amount: item.amount,
      description: item.description,
      category: item.category,
      date: today(),
    };
  }

  private findExpense(expenseId: number, operation: string): ExpenseRecord {
    const expense = this.expenses.find((candidate) => candidate.id === expenseId);
    if (!expense) {
      throw new StorageError(operation, `expense ${expenseId} not found`);
    }
    return expense;
  }
}
