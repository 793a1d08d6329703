import { Injectable, Logger } from '@nestjs/common';
import { titleCase } from '../classification/category.types';
import { currentMonthName, currentYear } from '../common/dates';
import { formatRinggit } from '../common/money';
import { BudgetRecord, FinanceStore, GoalRecord } from '../storage/finance-store';
import { goalProgress, goalTypeLabel } from './goal-progress';
import { ReportPeriod } from './report-periods';

export interface BudgetLine {
  category: string;
  budget: number;
  spent: number;
  remaining: number;
  percentUsed: number;
  status: string;
}

export function budgetStatusLabel(percentUsed: number): string {
  if (percentUsed < 80) return '🟢 Good';
  if (percentUsed < 100) return '🟠 Watch';
  return '🔴 Over';
}

function percentOf(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

@Injectable()
export class ReportsService {
  private readonly logger = new Logger(ReportsService.name);

  constructor(private readonly store: FinanceStore) {}

  async expensesForPeriod(userId: string, period: ReportPeriod): Promise<string> {
    const expenses = await this.store.getExpenses(userId, {
      startDate: period.startDate,
      endDate: period.endDate,
    });
    this.logger.debug(`${expenses.length} expenses for ${userId} in ${period.label}`);

    if (expenses.length === 0) {
      return `No expenses recorded for ${period.label}.`;
    }

    const total = expenses.reduce((sum, expense) => sum + expense.amount, 0);
    const lines = expenses.map(
      (expense) => `• ${expense.date}: ${formatRinggit(expense.amount)} for ${expense.description} (${titleCase(expense.category)})`,
    );
    return [`📅 Expenses for ${period.label}:`, '', ...lines, '', `Total: ${formatRinggit(total)}`].join('\n');
  }

  async budgetLines(userId: string, month: string, year: number): Promise<BudgetLine[]> {
    const [budgets, spending] = await Promise.all([
      this.store.getBudgets(userId, month, year),
      this.store.getSpendingByCategory(userId, month, year),
    ]);
    return budgets.map((budget) => this.toLine(budget, spending[budget.category] ?? 0));
  }

  async categoryBudgetStatus(
    userId: string,
    category: string,
    month = currentMonthName(),
    year = currentYear(),
  ): Promise<string> {
    const lines = await this.budgetLines(userId, month, year);
    const line = lines.find((candidate) => candidate.category === category.toLowerCase());
    if (!line) {
      return `No budget set for ${titleCase(category)} yet. Say 'set budget' to create one.`;
    }

    return [
      `${titleCase(line.category)} Budget for ${month} ${year}:`,
      '',
      `• Budget: ${formatRinggit(line.budget)}`,
      `• Spent: ${formatRinggit(line.spent)}`,
      `• Remaining: ${formatRinggit(line.remaining)}`,
      `• Used: ${line.percentUsed.toFixed(1)}%`,
      `• Status: ${line.status}`,
    ].join('\n');
  }

  async budgetOverview(userId: string, month = currentMonthName(), year = currentYear()): Promise<string> {
    const lines = await this.budgetLines(userId, month, year);
    if (lines.length === 0) {
      return "No budgets set up yet. Say 'set budget' to create your first one.";
    }

    const totalBudget = lines.reduce((sum, line) => sum + line.budget, 0);
    const totalSpent = lines.reduce((sum, line) => sum + line.spent, 0);
    return [
      `All Budgets for ${month} ${year}:`,
      '',
      ...lines.map((line) => this.describeLine(line)),
      '',
      `Totals: ${formatRinggit(totalSpent)} of ${formatRinggit(totalBudget)} (${percentOf(totalSpent, totalBudget).toFixed(1)}%) spent, ` +
        `${formatRinggit(totalBudget - totalSpent)} remaining`,
    ].join('\n');
  }

  describeLine(line: BudgetLine): string {
    return (
      `• ${titleCase(line.category)}: ${formatRinggit(line.spent)} of ${formatRinggit(line.budget)} ` +
      `(${line.percentUsed.toFixed(1)}%) - ${line.status}`
    );
  }

  async goalsSummary(userId: string): Promise<string> {
    const goals = await this.store.getUserGoals(userId);
    if (goals.length === 0) {
      return (
        "I don't see any goals set up yet, but that's fine, we all start somewhere!\n\n" +
        'I can help you save for an emergency fund, a vacation, a car, a home, gadgets, education or a special occasion.\n\n' +
        "Just say 'set a goal' to get started."
      );
    }

    const completed = goals.filter((goal) => goalProgress(goal).percent >= 100).length;
    const header =
      completed > 0
        ? `🏆 You've completed ${completed} out of ${goals.length} goals!`
        : `📈 You're working on ${goals.length} goal${goals.length > 1 ? 's' : ''}! Every step forward is progress!`;

    const blocks = goals.map((goal) => {
      const progress = goalProgress(goal);
      return [
        `${goal.goalName} (${goalTypeLabel(goal.goalType)})`,
        `├ Target: ${formatRinggit(goal.targetAmount)}`,
        `├ Saved: ${formatRinggit(goal.currentAmount)} (${progress.percent.toFixed(1)}%)`,
        `├ Remaining: ${formatRinggit(progress.remaining)}`,
        `└ Status: ${progress.status}`,
        `  ${progress.message}`,
      ].join('\n');
    });

    return ['Your Financial Goals 🎯', '', header, '', blocks.join('\n\n'), '', 'Want to add money to a goal or create a new one?'].join(
      '\n',
    );
  }

  /** Exact name first, then either name containing the other. */
  findGoalByName(goals: readonly GoalRecord[], name: string): GoalRecord | undefined {
    const wanted = name.toLowerCase().trim();
    return (
      goals.find((goal) => goal.goalName.toLowerCase() === wanted) ??
      goals.find((goal) => {
        const goalName = goal.goalName.toLowerCase();
        return goalName.includes(wanted) || wanted.includes(goalName);
      })
    );
  }

  async contributeToGoal(userId: string, amount: number, goalName: string): Promise<string> {
    const goals = await this.store.getUserGoals(userId);
    if (goals.length === 0) {
      return `You don't have any goals yet to add ${formatRinggit(amount)} to. Say 'set a goal' to create one first.`;
    }

    const goal = this.findGoalByName(goals, goalName.replace(/\b(?:goal|fund)\b/g, '').trim() || goalName);
    if (!goal) {
      const names = goals.map((candidate) => `• ${candidate.goalName}`).join('\n');
      return `I couldn't find a goal called "${goalName}". Which goal should I add ${formatRinggit(amount)} to?\n\n${names}`;
    }

    await this.store.addGoalContribution(goal.id, userId, amount, 'chat contribution');
    this.logger.log(`Added ${formatRinggit(amount)} to goal ${goal.id} for ${userId}`);

    const updated: GoalRecord = { ...goal, currentAmount: goal.currentAmount + amount };
    const progress = goalProgress(updated);
    return [
      `💰 ${formatRinggit(amount)} added to '${goal.goalName}'!`,
      '',
      `• Current: ${formatRinggit(updated.currentAmount)} of ${formatRinggit(goal.targetAmount)}`,
      `• Progress: ${progress.percent.toFixed(1)}% complete`,
      `• Remaining: ${formatRinggit(progress.remaining)}`,
      `• Status: ${progress.status}`,
      '',
      progress.message,
    ].join('\n');
  }

  async setIncome(userId: string, amount: number, month = currentMonthName(), year = currentYear()): Promise<string> {
    await this.store.setMonthlyIncome(userId, amount, month, year);
    this.logger.log(`Income for ${userId} set to ${formatRinggit(amount)} (${month} ${year})`);
    return `Got it! Your income for ${month} ${year} is set to ${formatRinggit(amount)}.`;
  }

  async incomeSummary(userId: string, month = currentMonthName(), year = currentYear()): Promise<string> {
    const income = await this.store.getMonthlyIncome(userId, month, year);
    if (!income) {
      return `You haven't told me your income for ${month} ${year} yet. Try 'my income is 5000'.`;
    }

    const spending = await this.store.getSpendingByCategory(userId, month, year);
    const spent = Object.values(spending).reduce((sum, value) => sum + value, 0);
    return [
      `Income for ${month} ${year}: ${formatRinggit(income.amount)}`,
      `Spent so far: ${formatRinggit(spent)} (${percentOf(spent, income.amount).toFixed(1)}%)`,
      `Left: ${formatRinggit(income.amount - spent)}`,
    ].join('\n');
  }

  private toLine(budget: BudgetRecord, spent: number): BudgetLine {
    const percentUsed = percentOf(spent, budget.amount);
    return {
      category: budget.category,
      budget: budget.amount,
      spent,
      remaining: budget.amount - spent,
      percentUsed,
      status: budgetStatusLabel(percentUsed),
    };
  }
}
