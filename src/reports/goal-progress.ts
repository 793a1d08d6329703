import dayjs from 'dayjs';
import { GoalRecord } from '../storage/finance-store';

export interface GoalProgress {
  percent: number;
  remaining: number;
  daysRemaining: number;
  requiredMonthly: number;
  status: string;
  message: string;
}

const AVERAGE_DAYS_PER_MONTH = 30.44;

export function goalProgress(goal: GoalRecord, now = dayjs()): GoalProgress {
  const rawPercent = goal.targetAmount > 0 ? (goal.currentAmount / goal.targetAmount) * 100 : 0;
  const remaining = goal.targetAmount - goal.currentAmount;
  const daysRemaining = dayjs(goal.targetDate).diff(now.startOf('day'), 'day');
  const monthsRemaining = Math.max(1, daysRemaining / AVERAGE_DAYS_PER_MONTH);

  let status: string;
  let message: string;
  if (rawPercent >= 100) {
    status = '🎉 Goal Achieved!';
    message = 'Congratulations! You did it!';
  } else if (daysRemaining < 0) {
    status = '⏰ Past Due Date';
    message = "Don't worry! You can still reach this goal, maybe adjust the date?";
  } else if (rawPercent >= 90) {
    status = '🔥 Almost There!';
    message = "You're so close! Keep pushing!";
  } else if (rawPercent >= 75) {
    status = '🟢 Excellent Progress!';
    message = "You're doing fantastic! Stay consistent and you'll nail this!";
  } else if (rawPercent >= 50) {
    status = '🟡 Good Progress';
    message = "You're halfway there! Keep up the momentum!";
  } else if (rawPercent >= 25) {
    status = '🟠 Getting Started';
    message = 'Nice start! Every step counts towards your goal!';
  } else {
    status = '🔴 Just Beginning';
    message = 'Every journey starts with a first step!';
  }

  return {
    percent: Math.min(100, rawPercent),
    remaining: Math.max(0, remaining),
    daysRemaining,
    requiredMonthly: Math.max(0, remaining) / monthsRemaining,
    status,
    message,
  };
}

/** "emergency_fund" -> "Emergency Fund" */
export function goalTypeLabel(goalType: string): string {
  return goalType
    .split('_')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}
