import { CategoryClassificationService } from '../classification/category-classification.service';
import { currentMonthName, currentYear, today } from '../common/dates';
import { ReportsService } from '../reports/reports.service';
import { InMemoryFinanceStore } from '../storage/in-memory-finance-store';
import { ResponseFormatterService } from './response-formatter.service';
import savingsTips from './savings-tips.json';

describe('ResponseFormatterService', () => {
  let store: InMemoryFinanceStore;
  let formatter: ResponseFormatterService;

  beforeEach(() => {
    store = new InMemoryFinanceStore();
    formatter = new ResponseFormatterService(store, new ReportsService(store), new CategoryClassificationService());
  });

  it('fills entity placeholders and shows ringgit instead of dollars', async () => {
    await expect(
      formatter.format('You spent ${amount:.2f} on {description}', { amount: 12.5, description: 'lunch' }, 'u1'),
    ).resolves.toBe('You spent RM12.50 on lunch');
  });

  it('inserts user text literally, even with replacement patterns in it', async () => {
    await expect(formatter.format('Noted: {description}!', { description: "a$&b$'c" }, 'u1')).resolves.toBe(
      "Noted: aRM&bRM'c!",
    );
  });

  it('leaves entity placeholders alone when the entity is missing', async () => {
    await expect(formatter.format('Spent {amount} on {description}', {}, 'u1')).resolves.toBe('Spent {amount} on {description}');
  });

  it('derives the category from the description, else other', async () => {
    await expect(formatter.format('Category: {category}', { description: 'kopi' }, 'u1')).resolves.toBe('Category: food');
    await expect(formatter.format('Category: {category}', {}, 'u1')).resolves.toBe('Category: other');
  });

  it('fills the current month and year', async () => {
    await expect(formatter.format('{month} {year}', {}, 'u1')).resolves.toBe(`${currentMonthName()} ${currentYear()}`);
  });

  it('does not read storage for templates without data placeholders', async () => {
    const spy = jest.spyOn(store, 'getSpendingByCategory');
    await formatter.format('Hello {description}', { description: 'there' }, 'u1');
    expect(spy).not.toHaveBeenCalled();
  });

  describe('spending placeholders', () => {
    beforeEach(async () => {
      await store.addExpense('u1', 10, 'lunch', 'food');
      await store.addExpense('u1', 30, 'grab', 'transport');
    });

    it('fills totals and the highest category', async () => {
      await expect(formatter.format('Top: {highest_category}, total ${total:.2f}', {}, 'u1')).resolves.toBe(
        'Top: transport, total RM40.00',
      );
    });

    it('breaks spending down by category, largest first', async () => {
      await expect(formatter.format('{spending}', {}, 'u1')).resolves.toBe(
        '• Transport: RM30.00 (75.0% of total)\n• Food: RM10.00 (25.0% of total)\n',
      );
    });

    it('gives tips for the highest category', async () => {
      await expect(formatter.format('{tips}', {}, 'u1')).resolves.toBe(savingsTips.categories.transport.join('\n'));
    });

    it('lists recent expenses newest first', async () => {
      await expect(formatter.format('{expenses}', {}, 'u1')).resolves.toBe(
        `• ${today()}: RM30.00 for grab (Transport)\n• ${today()}: RM10.00 for lunch (Food)\n`,
      );
    });
  });

  it('falls back to general tips without spending and category tips for custom categories', async () => {
    await expect(formatter.format('{tips}', {}, 'u1')).resolves.toBe(savingsTips.general.join('\n'));

    await store.addExpense('u2', 80, 'vet', 'pets');
    await expect(formatter.format('{tips}', {}, 'u2')).resolves.toBe(savingsTips.category.join('\n'));
  });

  it('explains empty data', async () => {
    await expect(formatter.format('{expenses}|{budgets}|{spending}|{highest_category}', {}, 'u1')).resolves.toBe(
      'No expenses recorded yet.|No budgets set up yet.|No spending data available yet.\n|any category',
    );
  });

  it('lists budgets with their usage', async () => {
    await store.setBudget('u1', 'food', 200, currentMonthName(), currentYear());
    await store.addExpense('u1', 50, 'lunch', 'food');

    await expect(formatter.format('{budgets}', {}, 'u1')).resolves.toBe('• Food: RM50.00 of RM200.00 (25.0%) - 🟢 Good\n');
  });
});
