import { Injectable, Logger } from '@nestjs/common';
import { CategoryClassificationService } from '../classification/category-classification.service';
import { pickOne } from '../common/random';
import { IntentCatalogService } from '../intents/intent-catalog.service';
import { IntentClassifierService } from '../intents/intent-classifier.service';
import { FALLBACK_TAG } from '../intents/intent.types';
import { ParserService } from '../parser/parser.service';
import { detectReportPeriod } from '../reports/report-periods';
import { ReportsService } from '../reports/reports.service';
import { ResponseFormatterService } from '../responses/response-formatter.service';
import { GoalType, StorageError } from '../storage/finance-store';
import { ConversationState, FlowKind } from './conversation-state';
import { BudgetWizardFlow } from './flows/budget-wizard.flow';
import { ExpenseCorrectionFlow } from './flows/expense-correction.flow';
import { GoalWizardFlow } from './flows/goal-wizard.flow';
import { MultiExpenseFlow } from './flows/multi-expense.flow';
import { GuardrailService } from './guardrail.service';
import { FIRST_CANCEL_RESPONSES, REPEATED_CANCEL_RESPONSES, isCancelRequest } from './phrases';
import { SessionContext } from './session-context';
import { SessionRegistryService } from './session-registry.service';
import {
  detectBudgetCommand,
  detectCategoryBudgetQuery,
  detectGoalCommand,
  detectGoalContribution,
  detectGoalKeyword,
  detectIncomeSetting,
  detectMajorGoal,
  GoalPreset,
  inferGoalType,
  isIncomeQuery,
  isTrackExpensesRequest,
} from './triggers';

export const GENERIC_CLARIFICATION = "I'm having trouble understanding that. Could you try rephrasing your request?";
export const STORAGE_APOLOGY = "Sorry, I couldn't reach your records just now. Please try again in a moment.";

const TRACK_EXPENSES_HOWTO =
  "Tracking expenses is easy! Just tell me what you spent, for example:\n" +
  "• 'RM12 for lunch'\n• 'spent RM30 on petrol'\n• 'RM10 on nasi lemak, RM5 on kopi'\n\n" +
  "I'll categorize each one and ask you to confirm.";

const GOAL_NAMES: Record<GoalType, string> = {
  savings: 'Savings',
  emergency_fund: 'Emergency Fund',
  vacation: 'Travel Fund',
  car: 'New Car',
  house: 'Dream Home',
  electronics: 'New Gadget',
  education: 'Education Fund',
  wedding: 'Wedding Fund',
  debt_payoff: 'Debt Payoff',
};

// flows that honour the cancel vocabulary; a saved single expense is kept as it is
const CANCELLABLE: readonly FlowKind[] = [
  'goal-wizard',
  'budget-wizard',
  'expense-confirmation',
  'expense-correction',
  'multi-expense-confirmation',
  'multi-expense-correction',
];

type IdleHandler = (session: SessionContext, text: string) => Promise<string | null>;

/**
 * Entry point for one chat turn. Active flows get the turn first; with
 * none active, idle handlers run in order until one answers.
 */
@Injectable()
export class DialogueService {
  private readonly logger = new Logger(DialogueService.name);

  private readonly idleHandlers: ReadonlyArray<[string, IdleHandler]> = [
    ['guardrails', async (_session, text) => this.guardrailService.check(text)?.reply ?? null],
    ['goal-keyword', async (session, text) => this.goalKeyword(session, text)],
    ['commands', (session, text) => this.commands(session, text)],
    ['reports', (session, text) => this.reports(session, text)],
    ['new-expense', (session, text) => this.newExpense(session, text)],
    ['category-budget', (session, text) => this.categoryBudget(session, text)],
    ['intent', (session, text) => this.intentFallback(session, text)],
  ];

  constructor(
    private readonly sessions: SessionRegistryService,
    private readonly guardrailService: GuardrailService,
    private readonly parserService: ParserService,
    private readonly categoryClassificationService: CategoryClassificationService,
    private readonly intentClassifier: IntentClassifierService,
    private readonly intentCatalog: IntentCatalogService,
    private readonly formatter: ResponseFormatterService,
    private readonly reportsService: ReportsService,
    private readonly goalWizard: GoalWizardFlow,
    private readonly budgetWizard: BudgetWizardFlow,
    private readonly expenseCorrection: ExpenseCorrectionFlow,
    private readonly multiExpense: MultiExpenseFlow,
  ) {}

  /**
   * Always resolves to a non-empty reply. Turns for one user are queued, so
   * a turn never sees the state of another one half-way through.
   */
  processTurn(rawText: string, userId: string): Promise<string> {
    return this.sessions.run(userId, (session) => this.turn(session, rawText));
  }

  private async turn(session: SessionContext, rawText: string): Promise<string> {
    const text = (rawText ?? '').trim();

    let reply: string;
    try {
      reply = await this.route(session, text);
    } catch (error) {
      if (error instanceof StorageError) {
        this.logger.error(`Storage failure for ${session.userId}: ${error.message}`, error.stack);
        reply = STORAGE_APOLOGY;
      } else {
        this.logger.error(`Unhandled error for ${session.userId}`, error instanceof Error ? error.stack : String(error));
        reply = GENERIC_CLARIFICATION;
      }
    }

    return reply.trim() ? reply : GENERIC_CLARIFICATION;
  }

  private async route(session: SessionContext, text: string): Promise<string> {
    const state = session.state;

    if (state?.flow === 'goal-wizard') {
      return this.cancelIfAsked(session, text) ?? this.goalWizard.handle(session, state, text);
    }

    const majorGoal = detectMajorGoal(text);
    if (majorGoal) {
      this.logger.debug(`Major goal trigger for ${session.userId}: ${majorGoal.goalName}`);
      return this.goalWizard.start(session, majorGoal);
    }

    if (state) return this.continueFlow(session, state, text);

    for (const [name, handler] of this.idleHandlers) {
      const reply = await handler(session, text);
      if (reply !== null) {
        this.logger.debug(`Turn for ${session.userId} answered by ${name}`);
        return reply;
      }
    }
    return GENERIC_CLARIFICATION;
  }

  private async continueFlow(session: SessionContext, state: ConversationState, text: string): Promise<string> {
    if (CANCELLABLE.includes(state.flow)) {
      const cancelled = this.cancelIfAsked(session, text);
      if (cancelled) return cancelled;
    }

    switch (state.flow) {
      case 'goal-wizard':
        return this.goalWizard.handle(session, state, text);
      case 'budget-wizard':
        return this.budgetWizard.handle(session, state, text);
      case 'expense-confirmation':
        return this.expenseCorrection.confirm(session, state, text);
      case 'expense-correction':
        return this.expenseCorrection.correct(session, state, text);
      case 'multi-expense-correction':
        return this.multiExpense.correct(session, state, text);
      case 'multi-expense-confirmation':
        return this.multiExpense.confirm(session, state, text);
    }
  }

  private cancelIfAsked(session: SessionContext, text: string): string | null {
    if (!isCancelRequest(text)) return null;
    const flow = session.state?.flow ?? 'none';
    session.clear();
    session.cancelCount++;
    this.logger.log(`${session.userId} cancelled ${flow} (cancel #${session.cancelCount})`);
    return pickOne(session.cancelCount > 1 ? REPEATED_CANCEL_RESPONSES : FIRST_CANCEL_RESPONSES);
  }

  private goalKeyword(session: SessionContext, text: string): string | null {
    const preset = detectGoalKeyword(text);
    return preset ? this.goalWizard.start(session, preset) : null;
  }

  private async commands(session: SessionContext, text: string): Promise<string | null> {
    const budget = detectBudgetCommand(text);
    if (budget) {
      const category =
        this.categoryClassificationService.findBudgetCategory(budget.rest, session.customCategories) ?? undefined;
      return this.budgetWizard.start(session, { category, amount: budget.amount ?? undefined });
    }

    if (detectGoalCommand(text)) {
      const goalType = inferGoalType(text);
      return goalType === 'savings' ? this.goalWizard.start(session) : this.goalWizard.start(session, this.presetFor(goalType));
    }

    if (isTrackExpensesRequest(text)) return TRACK_EXPENSES_HOWTO;

    const contribution = detectGoalContribution(text);
    if (contribution) return this.reportsService.contributeToGoal(session.userId, contribution.amount, contribution.goalName);

    return null;
  }

  private async reports(session: SessionContext, text: string): Promise<string | null> {
    const period = detectReportPeriod(text);
    if (period) return this.reportsService.expensesForPeriod(session.userId, period);

    const income = detectIncomeSetting(text);
    if (income !== null) return this.reportsService.setIncome(session.userId, income);

    if (isIncomeQuery(text)) return this.reportsService.incomeSummary(session.userId);
    return null;
  }

  private async newExpense(session: SessionContext, text: string): Promise<string | null> {
    const custom = session.customCategories;
    const expenses = this.parserService.extractMultiple(text, custom);
    if (expenses.length > 1) return this.multiExpense.start(session, expenses);
    if (expenses.length === 1) return this.expenseCorrection.record(session, expenses[0]);

    const entities = this.parserService.extract(text, custom);
    if (entities.amount !== undefined && entities.description) {
      const category = entities.category ?? this.categoryClassificationService.categorize(entities.description, custom);
      return this.expenseCorrection.record(session, { amount: entities.amount, description: entities.description, category });
    }
    if (entities.description && entities.amountError) {
      return `I couldn't find a valid amount for "${entities.description}". Could you tell me how much it was, like 'RM12.50 for ${entities.description}'?`;
    }
    return null;
  }

  private async categoryBudget(session: SessionContext, text: string): Promise<string | null> {
    const word = detectCategoryBudgetQuery(text);
    if (!word) return null;
    const category = this.categoryClassificationService.matchCategoryName(word, session.customCategories);
    return category ? this.reportsService.categoryBudgetStatus(session.userId, category) : null;
  }

  private async intentFallback(session: SessionContext, text: string): Promise<string> {
    try {
      const match = this.intentClassifier.resolve(text);
      this.logger.debug(`Intent ${match.tag} (${match.confidence.toFixed(2)}) for ${session.userId}`);

      switch (match.tag) {
        case 'budget_query': {
          const category = this.categoryClassificationService.matchCategoryName(text, session.customCategories);
          return category
            ? await this.reportsService.categoryBudgetStatus(session.userId, category)
            : await this.reportsService.budgetOverview(session.userId);
        }
        case 'budget_set':
          return this.budgetWizard.start(session);
        case 'goal_set': {
          const goalType = inferGoalType(text);
          return goalType === 'savings' ? this.goalWizard.start(session) : this.goalWizard.start(session, this.presetFor(goalType));
        }
        case 'goal_query':
          return await this.reportsService.goalsSummary(session.userId);
        case 'goal_contribution': {
          const contribution = detectGoalContribution(text);
          if (contribution) {
            return await this.reportsService.contributeToGoal(session.userId, contribution.amount, contribution.goalName);
          }
          break;
        }
      }

      const template =
        this.intentCatalog.pickResponse(match.tag) ?? this.intentCatalog.pickResponse(FALLBACK_TAG) ?? GENERIC_CLARIFICATION;
      const entities = this.parserService.extract(text, session.customCategories);
      return await this.formatter.format(template, entities, session.userId);
    } catch (error) {
      this.logger.error(`Intent handling failed for ${session.userId}`, error instanceof Error ? error.stack : String(error));
      return GENERIC_CLARIFICATION;
    }
  }

  private presetFor(goalType: GoalType): GoalPreset {
    return { goalName: GOAL_NAMES[goalType], goalType };
  }
}
