import { Module } from '@nestjs/common';
import { IntentsModule } from '../intents/intents.module';
import { ParserModule } from '../parser/parser.module';
import { ReportsModule } from '../reports/reports.module';
import { ResponsesModule } from '../responses/responses.module';
import { DialogueService } from './dialogue.service';
import { BudgetWizardFlow } from './flows/budget-wizard.flow';
import { ExpenseCorrectionFlow } from './flows/expense-correction.flow';
import { GoalWizardFlow } from './flows/goal-wizard.flow';
import { MultiExpenseFlow } from './flows/multi-expense.flow';
import { GuardrailService } from './guardrail.service';
import { SessionRegistryService } from './session-registry.service';

@Module({
  imports: [ParserModule, IntentsModule, ReportsModule, ResponsesModule],
  providers: [
    DialogueService,
    SessionRegistryService,
    GuardrailService,
    GoalWizardFlow,
    BudgetWizardFlow,
    ExpenseCorrectionFlow,
    MultiExpenseFlow,
  ],
  exports: [DialogueService],
})
export class DialogueModule {}
