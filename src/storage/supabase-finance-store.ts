import { Logger } from '@nestjs/common';
import { createClient, SupabaseClient } from '@supabase/supabase-js';
import dayjs from 'dayjs';
import { Category } from '../classification/category.types';
import { monthWindow, today } from '../common/dates';
import {
  BudgetRecord,
  ExpenseFilters,
  ExpenseRecord,
  FinanceStore,
  GoalRecord,
  GoalType,
  IncomeRecord,
  NewExpense,
  NewGoal,
  StorageError,
} from './finance-store';

interface ExpenseRow {
  id: number;
  user_id: string;
  amount: number;
  description: string;
  category: string;
  date: string;
}

interface BudgetRow {
  id: number;
  user_id: string;
  category: string;
  amount: number;
  month: string;
  year: number;
}

interface GoalRow {
  id: number;
  user_id: string;
  goal_name: string;
  goal_type: GoalType;
  target_amount: number;
  current_amount: number;
  target_date: string;
  monthly_contribution: number;
  created_at: string;
}

interface IncomeRow {
  user_id: string;
  amount: number;
  month: string;
  year: number;
}

interface PostgrestFailure {
  message: string;
}

const toExpense = (row: ExpenseRow): ExpenseRecord => ({
  id: row.id,
  userId: row.user_id,
  amount: Number(row.amount),
  description: row.description,
  category: row.category,
  date: row.date,
});

const toGoal = (row: GoalRow): GoalRecord => ({
  id: row.id,
  userId: row.user_id,
  goalName: row.goal_name,
  goalType: row.goal_type,
  targetAmount: Number(row.target_amount),
  currentAmount: Number(row.current_amount),
  targetDate: row.target_date,
  monthlyContribution: Number(row.monthly_contribution),
  createdAt: row.created_at,
});

/**
 * FinanceStore over Supabase/PostgREST. Tables are described in
 * supabase/schema.sql.
 */
export class SupabaseFinanceStore extends FinanceStore {
  private readonly logger = new Logger(SupabaseFinanceStore.name);

  constructor(private readonly client: SupabaseClient) {
    super();
  }

  static connect(url: string, key: string): SupabaseFinanceStore {
    return new SupabaseFinanceStore(createClient(url, key));
  }

  async addExpense(userId: string, amount: number, description: string, category: Category): Promise<number> {
    const [id] = await this.addExpensesBatch(userId, [{ amount, description, category }]);
    return id;
  }

  async addExpensesBatch(userId: string, items: readonly NewExpense[]): Promise<number[]> {
    const date = today();
    // one multi-row INSERT: PostgREST runs it as a single statement
    const { data, error } = await this.client
      .from('expenses')
      .insert(items.map((item) => ({ user_id: userId, amount: item.amount, description: item.description, category: item.category, date })))
      .select('id')
      .returns<Array<{ id: number }>>();
    this.check('addExpensesBatch', error);
    const ids = (data ?? []).map((row) => row.id);
    this.logger.log(`Stored ${ids.length} expense(s) for ${userId}`);
    return ids;
  }

  async updateExpenseCategory(expenseId: number, category: Category): Promise<void> {
    const { error } = await this.client.from('expenses').update({ category }).eq('id', expenseId);
    this.check('updateExpenseCategory', error);
  }

  async updateExpenseAmount(expenseId: number, amount: number): Promise<void> {
    const { error } = await this.client.from('expenses').update({ amount }).eq('id', expenseId);
    this.check('updateExpenseAmount', error);
  }

  async getExpenses(userId: string, filters: ExpenseFilters = {}): Promise<ExpenseRecord[]> {
    let query = this.client
      .from('expenses')
      .select('id, user_id, amount, description, category, date')
      .eq('user_id', userId);

    if (filters.startDate) query = query.gte('date', filters.startDate);
    if (filters.endDate) query = query.lte('date', filters.endDate);

    let ordered = query.order('date', { ascending: false }).order('id', { ascending: false });
    if (filters.limit) ordered = ordered.limit(filters.limit);

    const { data, error } = await ordered.returns<ExpenseRow[]>();
    this.check('getExpenses', error);
    return (data ?? []).map(toExpense);
  }

  async getSpendingByCategory(userId: string, month: string, year: number): Promise<Record<string, number>> {
    const { start, end } = monthWindow(month, year);
    const { data, error } = await this.client
      .from('expenses')
      .select('category, amount')
      .eq('user_id', userId)
      .gte('date', start)
      .lt('date', end)
      .returns<Array<Pick<ExpenseRow, 'category' | 'amount'>>>();
    this.check('getSpendingByCategory', error);

    const totals: Record<string, number> = {};
    for (const row of data ?? []) {
      totals[row.category] = (totals[row.category] ?? 0) + Number(row.amount);
    }
    return totals;
  }

  async getBudgets(userId: string, month: string, year: number): Promise<BudgetRecord[]> {
    const { data, error } = await this.client
      .from('budgets')
      .select('id, user_id, category, amount, month, year')
      .eq('user_id', userId)
      .eq('month', month)
      .eq('year', year)
      .returns<BudgetRow[]>();
    this.check('getBudgets', error);
    return (data ?? []).map((row) => ({
      id: row.id,
      userId: row.user_id,
      category: row.category,
      amount: Number(row.amount),
      month: row.month,
      year: row.year,
    }));
  }

  async setBudget(userId: string, category: Category, amount: number, month: string, year: number): Promise<void> {
    const { error } = await this.client
      .from('budgets')
      .upsert({ user_id: userId, category, amount, month, year }, { onConflict: 'user_id,category,month,year' });
    this.check('setBudget', error);
  }

  async addGoal(userId: string, goal: NewGoal): Promise<number> {
    const { data, error } = await this.client
      .from('goals')
      .insert({
        user_id: userId,
        goal_name: goal.goalName,
        goal_type: goal.goalType,
        target_amount: goal.targetAmount,
        current_amount: 0,
        target_date: goal.targetDate,
        monthly_contribution: goal.monthlyContribution,
      })
      .select('id')
      .returns<Array<{ id: number }>>();
    this.check('addGoal', error);
    const row = data?.[0];
    if (!row) throw new StorageError('addGoal', 'insert returned no id');
    return row.id;
  }

  async getUserGoals(userId: string): Promise<GoalRecord[]> {
    const { data, error } = await this.client
      .from('goals')
      .select('*')
      .eq('user_id', userId)
      .order('created_at', { ascending: true })
      .returns<GoalRow[]>();
    this.check('getUserGoals', error);
    return (data ?? []).map(toGoal);
  }

  async addGoalContribution(goalId: number, userId: string, amount: number, note = ''): Promise<void> {
    const { data, error } = await this.client
      .from('goals')
      .select('current_amount')
      .eq('id', goalId)
      .eq('user_id', userId)
      .returns<Array<Pick<GoalRow, 'current_amount'>>>();
    this.check('addGoalContribution', error);
    const goal = data?.[0];
    if (!goal) throw new StorageError('addGoalContribution', `goal ${goalId} not found`);

    const inserted = await this.client
      .from('goal_contributions')
      .insert({ goal_id: goalId, user_id: userId, amount, note, created_at: dayjs().toISOString() });
    this.check('addGoalContribution', inserted.error);

    const updated = await this.client
      .from('goals')
      .update({ current_amount: Number(goal.current_amount) + amount })
      .eq('id', goalId);
    this.check('addGoalContribution', updated.error);
  }

  async setMonthlyIncome(userId: string, amount: number, month: string, year: number): Promise<void> {
    const { error } = await this.client
      .from('income')
      .upsert({ user_id: userId, amount, month, year }, { onConflict: 'user_id,month,year' });
    this.check('setMonthlyIncome', error);
  }

  async getMonthlyIncome(userId: string, month: string, year: number): Promise<IncomeRecord | null> {
    const { data, error } = await this.client
      .from('income')
      .select('user_id, amount, month, year')
      .eq('user_id', userId)
      .eq('month', month)
      .eq('year', year)
      .returns<IncomeRow[]>();
    this.check('getMonthlyIncome', error);
    const row = data?.[0];
    return row ? { userId: row.user_id, amount: Number(row.amount), month: row.month, year: row.year } : null;
  }

  async ping(): Promise<boolean> {
    const { error } = await this.client.from('expenses').select('id').limit(1);
    if (error) {
      this.logger.warn(`Supabase ping failed: ${error.message}`);
      return false;
    }
    return true;
  }

  private check(operation: string, error: PostgrestFailure | null): void {
    if (!error) return;
    this.logger.error(`${operation} failed: ${error.message}`);
    throw new StorageError(operation, error.message, error);
  }
}
