import dayjs from 'dayjs';
import { GoalRecord } from '../storage/finance-store';
import { goalProgress, goalTypeLabel } from './goal-progress';

const now = dayjs('2025-01-01');

function goal(currentAmount: number, targetDate = '2025-12-31'): GoalRecord {
  return {
    id: 1,
    userId: 'u1',
    goalName: 'Laptop',
    goalType: 'electronics',
    targetAmount: 1000,
    targetDate,
    monthlyContribution: 100,
    currentAmount,
    createdAt: '2024-12-01T00:00:00.000Z',
  };
}

describe('goalProgress', () => {
  it('spreads the remainder over the months left', () => {
    const progress = goalProgress(goal(500), now);
    expect(progress.daysRemaining).toBe(364);
    expect(progress.remaining).toBe(500);
    expect(progress.requiredMonthly).toBeCloseTo(41.81, 2);
    expect(progress.status).toBe('🟡 Good Progress');
  });

  it('moves through the status tiers', () => {
    expect(goalProgress(goal(0), now).status).toBe('🔴 Just Beginning');
    expect(goalProgress(goal(250), now).status).toBe('🟠 Getting Started');
    expect(goalProgress(goal(750), now).status).toBe('🟢 Excellent Progress!');
    expect(goalProgress(goal(950), now).status).toBe('🔥 Almost There!');
  });

  it('caps progress once the target is reached', () => {
    const progress = goalProgress(goal(1200), now);
    expect(progress.status).toBe('🎉 Goal Achieved!');
    expect(progress.percent).toBe(100);
    expect(progress.remaining).toBe(0);
  });

  it('flags unfinished goals past their date', () => {
    expect(goalProgress(goal(100, '2024-06-01'), now).status).toBe('⏰ Past Due Date');
  });
});

describe('goalTypeLabel', () => {
  it('title-cases snake case', () => {
    expect(goalTypeLabel('emergency_fund')).toBe('Emergency Fund');
  });
});
