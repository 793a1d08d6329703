import { currentMonthName, currentYear } from '../common/dates';
import { ExpenseRecord, NewExpense, StorageError } from './finance-store';
import { InMemoryFinanceStore } from './in-memory-finance-store';

/** Fails while staging the second row of whatever is being inserted. */
class FlakyStore extends InMemoryFinanceStore {
  private calls = 0;

  protected buildExpenseRow(userId: string, item: NewExpense): ExpenseRecord {
    this.calls++;
    if (this.calls === 2) throw new StorageError('addExpensesBatch', 'connection reset');
    return super.buildExpenseRow(userId, item);
  }
}

const lunch: NewExpense = { amount: 12, description: 'lunch', category: 'food' };
const grab: NewExpense = { amount: 18.5, description: 'grab', category: 'transport' };
const movie: NewExpense = { amount: 25, description: 'movie', category: 'entertainment' };

describe('InMemoryFinanceStore', () => {
  let store: InMemoryFinanceStore;

  beforeEach(() => {
    store = new InMemoryFinanceStore();
  });

  describe('addExpensesBatch', () => {
    it('returns distinct ids in input order', async () => {
      const ids = await store.addExpensesBatch('u1', [lunch, grab, movie]);
      expect(ids).toEqual([1, 2, 3]);
      expect((await store.getExpenses('u1')).map((expense) => expense.description)).toEqual(['movie', 'grab', 'lunch']);
    });

    it('persists nothing when one item fails', async () => {
      const flaky = new FlakyStore();
      await expect(flaky.addExpensesBatch('u1', [lunch, grab, movie])).rejects.toBeInstanceOf(StorageError);
      expect(await flaky.getExpenses('u1')).toEqual([]);

      // ids staged by the failed batch are handed out again
      expect(await flaky.addExpense('u1', 5, 'kopi', 'food')).toBe(1);
    });

    it('rejects invalid items before storing any', async () => {
      await expect(store.addExpensesBatch('u1', [lunch, { ...grab, description: '  ' }])).rejects.toThrow(
        'addExpense failed: description is empty',
      );
      expect(await store.getExpenses('u1')).toEqual([]);
    });
  });

  describe('expenses', () => {
    it('updates the category and amount of a stored expense', async () => {
      const id = await store.addExpense('u1', 500, 'rent', 'housing');
      await store.updateExpenseCategory(id, 'utilities');
      await store.updateExpenseAmount(id, 450);

      const [expense] = await store.getExpenses('u1');
      expect(expense).toMatchObject({ id, amount: 450, category: 'utilities' });
    });

    it('rejects updates to unknown expenses', async () => {
      await expect(store.updateExpenseAmount(99, 10)).rejects.toThrow('updateExpenseAmount failed: expense 99 not found');
    });

    it('applies the limit after sorting newest first', async () => {
      await store.addExpensesBatch('u1', [lunch, grab, movie]);
      await store.addExpense('u2', 7, 'kopi', 'food');

      expect((await store.getExpenses('u1', { limit: 2 })).map((expense) => expense.id)).toEqual([3, 2]);
    });

    it('sums spending by category for the current month', async () => {
      await store.addExpensesBatch('u1', [lunch, grab, { ...lunch, amount: 8 }]);
      const month = currentMonthName();

      expect(await store.getSpendingByCategory('u1', month, currentYear())).toEqual({ food: 20, transport: 18.5 });
      expect(await store.getSpendingByCategory('u1', month, currentYear() - 1)).toEqual({});
    });
  });

  describe('budgets', () => {
    it('upserts by category, month and year', async () => {
      await store.setBudget('u1', 'food', 500, 'March', 2025);
      await store.setBudget('u1', 'food', 650, 'March', 2025);
      await store.setBudget('u1', 'food', 400, 'April', 2025);

      const march = await store.getBudgets('u1', 'March', 2025);
      expect(march).toHaveLength(1);
      expect(march[0]).toMatchObject({ category: 'food', amount: 650 });
    });
  });

  describe('goals', () => {
    it('adds contributions to the matching goal only', async () => {
      const id = await store.addGoal('u1', {
        goalName: 'Emergency Fund',
        goalType: 'emergency_fund',
        targetAmount: 6000,
        targetDate: '2030-01-01',
        monthlyContribution: 500,
      });
      await store.addGoalContribution(id, 'u1', 250);

      expect((await store.getUserGoals('u1'))[0].currentAmount).toBe(250);
      await expect(store.addGoalContribution(id, 'u2', 10)).rejects.toBeInstanceOf(StorageError);
    });
  });

  describe('income', () => {
    it('keeps one income per month', async () => {
      await store.setMonthlyIncome('u1', 4000, 'May', 2025);
      await store.setMonthlyIncome('u1', 4500, 'May', 2025);

      expect(await store.getMonthlyIncome('u1', 'May', 2025)).toEqual({ userId: 'u1', amount: 4500, month: 'May', year: 2025 });
      expect(await store.getMonthlyIncome('u1', 'June', 2025)).toBeNull();
    });
  });
});
