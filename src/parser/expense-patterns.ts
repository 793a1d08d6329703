/**
 * Pattern rules for pulling an amount and a description out of one
 * utterance. Each rule names the capture group holding each field, so rules
 * can be reordered or added without reading their regex.
 *
 * Rules are evaluated top to bottom and the first match wins. The specific
 * verb-led phrasings ("bought X for Y") must stay ahead of the bare
 * "amount for description" fallbacks.
 */
export interface ExpensePatternRule {
  name: string;
  pattern: RegExp;
  amountGroup: number;
  descriptionGroup: number;
}

const amountFirst = (name: string, pattern: RegExp): ExpensePatternRule => ({
  name,
  pattern,
  amountGroup: 1,
  descriptionGroup: 2,
});

const descriptionFirst = (name: string, pattern: RegExp): ExpensePatternRule => ({
  name,
  pattern,
  amountGroup: 2,
  descriptionGroup: 1,
});

export const SINGLE_EXPENSE_RULES: readonly ExpensePatternRule[] = [
  amountFirst('spent-on', /spent (?:rm\s*)?(\$?\d[\d,.]*)\s*(?:rm)?\s*on (.+)/),
  amountFirst('spent-for', /spent (?:rm\s*)?(\$?\d[\d,.]*)\s*(?:rm)?\s*for (.+)/),
  amountFirst('paid-for', /paid (?:rm\s*)?(\$?\d[\d,.]*)\s*(?:rm)?\s*for (.+)/),
  descriptionFirst('bought-for', /bought (.+) for (?:rm\s*)?(\$?\d[\d,.]*)\s*(?:rm)?/),
  descriptionFirst('purchased-for', /purchased (.+) for (?:rm\s*)?(\$?\d[\d,.]*)\s*(?:rm)?/),
  amountFirst('amount-for', /(\$?\d[\d,.]*)\s*(?:rm)?\s*for (.+)/),
  amountFirst('rm-for', /rm\s*(\d+\.?\d*) for (.+)/),
  amountFirst('rm-on', /rm\s*(\d+\.?\d*) on (.+)/),
  amountFirst('rm-then-description', /rm ?(\d+\.?\d*) (.+)/),
  amountFirst('amount-currency-description', /(\d+) (?:rm|\$) (.+)/),
  amountFirst('amount-on', /(\d+) on (.+)/),
];

// Applied per segment of a multi-item utterance; looser than the single set.
export const MULTI_EXPENSE_RULES: readonly ExpensePatternRule[] = [
  amountFirst('spent-or-paid', /(?:spent|paid)\s+(?:rm\s*)?(\$?\d[\d,.]*)\s*(?:rm)?\s+(?:on|for)\s+(.+)/),
  descriptionFirst('bought-for', /(?:bought|purchased|buy)\s+(.+?)\s+for\s+(?:rm\s*)?(\$?\d[\d,.]*)/),
  amountFirst('rm-on-or-for', /\brm\s*(\d[\d,.]*)\s+(?:on|for|at)\s+(.+)/),
  amountFirst('amount-on-or-for', /(\$?\d[\d,.]*)\s*(?:rm)?\s+(?:on|for|at)\s+(.+)/),
  amountFirst('rm-then-description', /\brm\s*(\d[\d,.]*)\s+(.+)/),
  descriptionFirst('description-then-amount', /^(.+?)\s+(?:rm\s*|\$)(\d[\d,.]*)\s*$/),
  amountFirst('amount-ringgit-description', /(\d[\d,.]*)\s*(?:rm|ringgit)\s+(.+)/),
];
