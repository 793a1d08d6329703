import { parsePositiveAmount } from '../common/money';
import { GoalType } from '../storage/finance-store';

export interface GoalPreset {
  goalName: string;
  goalType: GoalType;
}

const GOAL_TYPE_KEYWORDS: ReadonlyArray<[GoalType, readonly string[]]> = [
  ['emergency_fund', ['emergency', 'fund']],
  ['vacation', ['vacation', 'trip', 'travel', 'holiday']],
  ['car', ['car', 'vehicle']],
  ['house', ['house', 'home', 'property']],
  ['electronics', ['laptop', 'computer', 'phone', 'gadget', 'tech']],
  ['education', ['education', 'course', 'school', 'study']],
  ['wedding', ['wedding', 'marriage']],
  ['debt_payoff', ['debt', 'loan', 'payoff']],
];

export function inferGoalType(goalName: string): GoalType {
  const lower = goalName.toLowerCase();
  const match = GOAL_TYPE_KEYWORDS.find(([, words]) => words.some((word) => lower.includes(word)));
  return match ? match[0] : 'savings';
}

const MAJOR_GOAL_RULES: ReadonlyArray<{ pattern: RegExp; preset: (match: RegExpMatchArray) => GoalPreset }> = [
  {
    pattern: /\bbuy(?:ing)?\s+(?:a\s+)?(?:new\s+)?(car|house|home)\b/,
    preset: (match) =>
      match[1] === 'car' ? { goalName: 'New Car', goalType: 'car' } : { goalName: 'Dream Home', goalType: 'house' },
  },
  {
    pattern: /\b(?:go|going)\s+(?:to\s+)?travel(?:l?ing)?\b|\bgo\s+(?:on\s+)?(?:a\s+)?(?:trip|vacation|holiday)\b/,
    preset: () => ({ goalName: 'Travel Fund', goalType: 'vacation' }),
  },
];

// "spent rm30 to buy car wax" is an expense, not a goal
const EXPENSE_SIGNAL = /\b(?:spent|paid|bought|purchased|cost)\b|\brm\s*\d|\$\s*\d|\d\s*(?:rm|ringgit)\b/;

/** "I want to buy a car", "planning to go travel" and the like. */
export function detectMajorGoal(text: string): GoalPreset | null {
  const lower = text.toLowerCase();
  if (EXPENSE_SIGNAL.test(lower)) return null;
  for (const rule of MAJOR_GOAL_RULES) {
    const match = lower.match(rule.pattern);
    if (match) return rule.preset(match);
  }
  return null;
}

const GOAL_NOUNS =
  'car|house|home|wedding|vacation|holiday|trip|travel|laptop|computer|phone|education|course|emergency fund|emergency|retirement|debt';

const GOAL_KEYWORD_PATTERNS = [
  new RegExp(`\\b(?:save|saving|plan|planning)\\b.*\\b(?:for|towards)\\b.*\\b(${GOAL_NOUNS})\\b`),
  new RegExp(`\\b(?:dream of|dreaming of|planning to get|planning to buy)\\b.*\\b(${GOAL_NOUNS})\\b`),
];

/**
 * Goal talk without an amount ("saving up for a wedding"). Anything with a
 * number in it is left for contributions and expenses.
 */
export function detectGoalKeyword(text: string): GoalPreset | null {
  const lower = text.toLowerCase();
  if (/\d/.test(lower)) return null;
  for (const pattern of GOAL_KEYWORD_PATTERNS) {
    const match = lower.match(pattern);
    if (match) {
      const noun = match[1];
      return { goalName: goalNameFor(noun), goalType: inferGoalType(noun) };
    }
  }
  return null;
}

function goalNameFor(noun: string): string {
  const titled = noun.replace(/\b[a-z]/g, (letter) => letter.toUpperCase());
  return titled.endsWith('Fund') ? titled : `${titled} Fund`;
}

export interface BudgetCommand {
  /** Text after the command words, for category lookup. */
  rest: string;
  amount: number | null;
}

const BUDGET_COMMAND = /\b(?:set|create|make|setup|set up|new|add)\s+(?:a\s+|my\s+)?(?:new\s+)?(?:monthly\s+)?budget\b/;

// "for 2025", "march 2026": a year, never the budget amount
const YEAR_MENTION =
  /\b(?:for|in|january|february|march|april|may|june|july|august|september|october|november|december|jan|feb|mar|apr|jun|jul|aug|sep|sept|oct|nov|dec)\s+(?:20[2-9]\d|2100)\b(?![.,]\d)/g;

export function detectBudgetCommand(text: string): BudgetCommand | null {
  const lower = text.toLowerCase();
  const match = BUDGET_COMMAND.exec(lower);
  if (!match) return null;
  const rest = lower.slice(match.index + match[0].length);
  return { rest, amount: parsePositiveAmount(rest.replace(YEAR_MENTION, ' ')) };
}

const GOAL_COMMAND =
  /\b(?:set|create|make|start|add|new)\s+(?:a\s+|my\s+)?(?:new\s+)?(?:savings?\s+|financial\s+)?goal\b|\bi\s+want\s+to\s+set\s+(?:a\s+)?goal\b/;

export function detectGoalCommand(text: string): boolean {
  return GOAL_COMMAND.test(text.toLowerCase());
}

const TRACK_EXPENSES = /\btrack\s+(?:my\s+)?(?:expenses?|spending)\b/;

export function isTrackExpensesRequest(text: string): boolean {
  return TRACK_EXPENSES.test(text.toLowerCase());
}

export interface GoalContributionRequest {
  amount: number;
  goalName: string;
}

const CONTRIBUTION = /(?:add|put|contribute|save)\s+(?:rm\s*)?([\d,.]+)\s+(?:to|towards|into|for)\s+(?:my\s+)?(.+)/;

/** "add RM200 to my vacation fund" */
export function detectGoalContribution(text: string): GoalContributionRequest | null {
  const match = text.toLowerCase().match(CONTRIBUTION);
  if (!match) return null;
  const amount = parsePositiveAmount(match[1]);
  const goalName = match[2].replace(/[.!?]+$/, '').trim();
  if (amount === null || !goalName) return null;
  return { amount, goalName };
}

const INCOME_SET = [
  /\b(?:my\s+)?(?:monthly\s+)?(?:income|salary|gaji)\s+(?:is|=|of)\s+(?:rm\s*)?(\d[\d,]*(?:\.\d+)?)/,
  /\bi\s+(?:earn|make)\s+(?:rm\s*)?(\d[\d,]*(?:\.\d+)?)/,
];

export function detectIncomeSetting(text: string): number | null {
  const lower = text.toLowerCase();
  for (const pattern of INCOME_SET) {
    const match = lower.match(pattern);
    if (match) return parsePositiveAmount(match[1]);
  }
  return null;
}

const INCOME_QUERY =
  /\b(?:what(?:'s| is)\s+my|show(?:\s+me)?\s+(?:my\s+)?|check\s+(?:my\s+)?)(?:monthly\s+)?(?:income|salary)\b|\bhow\s+much\s+(?:do\s+)?i\s+(?:earn|make)\b/;

export function isIncomeQuery(text: string): boolean {
  return INCOME_QUERY.test(text.toLowerCase());
}

const CATEGORY_BUDGET_QUERIES = [
  /(?:show|check|view|what(?:'s| is))\s+(?:my\s+)?(\w+)\s+budget/,
  /how(?:'s| is)\s+my\s+(\w+)\s+budget/,
  /(\w+)\s+budget\s+(?:status|left|remaining)/,
];

/** The word in front of "budget", when the text asks about one budget. */
export function detectCategoryBudgetQuery(text: string): string | null {
  const lower = text.toLowerCase();
  for (const pattern of CATEGORY_BUDGET_QUERIES) {
    const match = lower.match(pattern);
    if (match) return match[1];
  }
  return null;
}
