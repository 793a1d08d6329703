import { Injectable, Logger } from '@nestjs/common';
import dayjs from 'dayjs';
import { formatRinggit, parsePositiveAmount } from '../../common/money';
import { pickOne } from '../../common/random';
import { FinanceStore } from '../../storage/finance-store';
import { GoalDraft, GoalWizardStage, GoalWizardState } from '../conversation-state';
import { isConfirm, isDecline } from '../phrases';
import { SessionContext } from '../session-context';
import { GoalPreset, inferGoalType } from '../triggers';

export const MIN_GOAL_MONTHS = 6;

const AVERAGE_DAYS_PER_MONTH = 30.44;
const TIMEFRAME = /(\d+)\s*(month|months|year|years|yr|yrs|week|weeks)\b/;

/** "8 weeks" -> 2, "2 years" -> 24. Null when no timeframe is given. */
export function parseTimeframeMonths(text: string): number | null {
  const match = text.toLowerCase().match(TIMEFRAME);
  if (!match) return null;
  const count = Number(match[1]);
  const unit = match[2];
  if (unit.startsWith('week')) return Math.max(1, Math.round((count * 7) / AVERAGE_DAYS_PER_MONTH));
  if (unit.startsWith('y')) return count * 12;
  return count;
}

const CELEBRATIONS = ['🎉 Goal Created!', '✨ Your Goal is Live!', '🚀 Goal Successfully Set Up!', '🏆 Your Dream is Now a Plan!'];

const GOAL_TIPS = [
  '💡 Tip: Set up automatic transfers to make saving effortless!',
  '💪 Remember: Small, consistent contributions add up to big results!',
  '🌟 Every ringgit you save brings you closer to your goal!',
];

type StageHandler = (session: SessionContext, state: GoalWizardState, text: string) => Promise<string>;

@Injectable()
export class GoalWizardFlow {
  private readonly logger = new Logger(GoalWizardFlow.name);

  private readonly stages: Record<GoalWizardStage, StageHandler> = {
    ask_goal_name: async (_session, state, text) => this.onGoalName(state, text),
    ask_amount: async (_session, state, text) => this.onAmount(state, text),
    ask_timeframe: async (_session, state, text) => this.onTimeframe(state, text),
    confirm_goal: (session, state, text) => this.onConfirm(session, state, text),
  };

  constructor(private readonly store: FinanceStore) {}

  /** Starts at the amount when the goal is already known, else asks for it. */
  start(session: SessionContext, preset?: GoalPreset): string {
    if (preset) {
      session.start({ flow: 'goal-wizard', stage: 'ask_amount', draft: { ...preset } });
      this.logger.log(`Goal wizard for ${session.userId} started with ${preset.goalName}`);
      return (
        `Saving for ${preset.goalName}? Love it! 🎯 Let's turn it into a plan.\n\n` +
        `How much do you want to save? For example '5000' for ${formatRinggit(5000)}.`
      );
    }

    session.start({ flow: 'goal-wizard', stage: 'ask_goal_name', draft: { goalType: 'savings' } });
    this.logger.log(`Goal wizard for ${session.userId} started`);
    return "Let's set a goal! 🎯 What are you saving for? (e.g. 'Emergency fund', 'Trip to Japan', 'New laptop')";
  }

  handle(session: SessionContext, state: GoalWizardState, text: string): Promise<string> {
    return this.stages[state.stage](session, state, text);
  }

  private onGoalName(state: GoalWizardState, text: string): string {
    const goalName = text.trim();
    if (!goalName) return 'What would you like to call this goal?';

    state.draft.goalName = goalName;
    state.draft.goalType = inferGoalType(goalName);
    state.stage = 'ask_amount';
    return `${goalName}, great choice! 🌟\n\nHow much do you want to save for this goal? Just tell me the target amount.`;
  }

  private onAmount(state: GoalWizardState, text: string): string {
    const amount = parsePositiveAmount(text);
    if (amount === null) {
      return "I'm looking for your target amount! 🔍 Just tell me the number, like '2500' for RM2500.00.";
    }

    state.draft.amount = amount;
    state.stage = 'ask_timeframe';
    return (
      `${formatRinggit(amount)} for ${state.draft.goalName ?? 'this goal'}! 💪\n\n` +
      "How long do you want to take to reach it? For example '6 months', '1 year' or '30 weeks'."
    );
  }

  private onTimeframe(state: GoalWizardState, text: string): string {
    const months = parseTimeframeMonths(text);
    if (months === null) {
      return "I didn't catch a timeframe. Tell me something like '8 months', '2 years' or '40 weeks'.";
    }
    if (months < MIN_GOAL_MONTHS) {
      return (
        `That works out to about ${months} month${months === 1 ? '' : 's'}. ` +
        `Goals need a timeframe of at least ${MIN_GOAL_MONTHS} months so the monthly amount stays realistic. ` +
        "Could you pick a longer timeframe, like '6 months' or '1 year'?"
      );
    }

    state.draft.months = months;
    state.stage = 'confirm_goal';
    return this.summary(state.draft, months);
  }

  private async onConfirm(session: SessionContext, state: GoalWizardState, text: string): Promise<string> {
    if (isDecline(text)) {
      session.clear();
      return "No problem, I've discarded that goal. Say 'set a goal' whenever you want to try again.";
    }
    if (!isConfirm(text)) {
      return "Should I create this goal? Please answer 'yes' to save it or 'no' to discard it.";
    }

    const { goalName, goalType, amount, months } = state.draft;
    if (!goalName || amount === undefined || months === undefined) {
      session.clear();
      return "Something went missing while we were setting that up. Say 'set a goal' to start again.";
    }

    const monthlyContribution = amount / months;
    const targetDate = dayjs().add(months, 'month');
    try {
      const goalId = await this.store.addGoal(session.userId, {
        goalName,
        goalType,
        targetAmount: amount,
        targetDate: targetDate.format('YYYY-MM-DD'),
        monthlyContribution,
      });
      this.logger.log(`Goal ${goalId} (${goalName}) saved for ${session.userId}`);
    } catch (error) {
      this.logger.error(`Could not save goal for ${session.userId}`, error instanceof Error ? error.stack : String(error));
      return "Sorry, I had trouble saving your goal just now. Your details are still here, so say 'yes' to try again.";
    }

    session.clear();
    return [
      pickOne(CELEBRATIONS),
      '',
      `Your '${goalName}' goal is ready!`,
      `• Target: ${formatRinggit(amount)}`,
      `• Target date: ${targetDate.format('MMMM D, YYYY')}`,
      `• Monthly saving: ${formatRinggit(monthlyContribution)}`,
      '',
      pickOne(GOAL_TIPS),
    ].join('\n');
  }

  private summary(draft: GoalDraft, months: number): string {
    const amount = draft.amount ?? 0;
    return [
      "Here's your goal plan 📋",
      `• Goal: ${draft.goalName ?? 'Savings'}`,
      `• Target: ${formatRinggit(amount)}`,
      `• Timeframe: ${months} months`,
      `• Monthly saving: ${formatRinggit(amount / months)}`,
      '',
      "Shall I create this goal? (yes/no)",
    ].join('\n');
  }
}
