import { CategoryClassificationService } from '../classification/category-classification.service';
import { ParserService } from './parser.service';

describe('ParserService', () => {
  let parser: ParserService;

  beforeEach(() => {
    parser = new ParserService(new CategoryClassificationService());
  });

  describe('extract', () => {
    it('reads "RM<amount> for <description>"', () => {
      expect(parser.extract('RM500 for rent')).toEqual({ amount: 500, description: 'rent', category: 'housing' });
      expect(parser.extract('RM12.50 for lunch')).toEqual({ amount: 12.5, description: 'lunch', category: 'food' });
    });

    it('gives the same category on repeated calls', () => {
      const first = parser.extract('rm8 for teh tarik');
      const second = parser.extract('rm8 for teh tarik');
      expect(first.category).toBe('food');
      expect(second).toEqual(first);
    });

    it('binds amount and description by rule, not by position', () => {
      expect(parser.extract('spent rm25 on grab')).toEqual({ amount: 25, description: 'grab', category: 'transport' });
      expect(parser.extract('bought shoes for rm120')).toEqual({ amount: 120, description: 'shoes', category: 'shopping' });
    });

    it('returns nothing without digits or spending words', () => {
      expect(parser.extract('hello there')).toEqual({});
      expect(parser.extract('what is the weather like')).toEqual({});
    });

    it('returns nothing for very short or letterless input', () => {
      expect(parser.extract('ab')).toEqual({});
      expect(parser.extract('12345')).toEqual({});
    });

    it('keeps the description when the amount is not a number', () => {
      expect(parser.extract('1.2.3 for lunch')).toEqual({
        description: 'lunch',
        category: 'food',
        amountError: "Could not convert '1.2.3' to a number",
      });
    });

    it('needs a digit in the amount', () => {
      expect(parser.extract('can you inform me, for example, how budgets work')).toEqual({});
      expect(parser.extract('it is warm, for sure')).toEqual({});
    });

    it('still reads rm as a currency prefix or a word', () => {
      expect(parser.extract('rm 15 for parking')).toEqual({ amount: 15, description: 'parking', category: 'transport' });
    });

    it('falls back to session custom categories', () => {
      expect(parser.extract('rm30 for pets', ['pets'])).toEqual({ amount: 30, description: 'pets', category: 'pets' });
    });
  });

  describe('extractMultiple', () => {
    it('splits comma separated expenses', () => {
      expect(parser.extractMultiple('I spent RM10 on nasi lemak, RM5 on kopi')).toEqual([
        { amount: 10, description: 'nasi lemak', category: 'food' },
        { amount: 5, description: 'kopi', category: 'food' },
      ]);
    });

    it('yields the same items when the segments are reordered', () => {
      const forward = parser.extractMultiple('rm10 on nasi lemak, rm5 on kopi');
      const reversed = parser.extractMultiple('rm5 on kopi, rm10 on nasi lemak');
      expect(reversed).toHaveLength(2);
      expect([...reversed].reverse()).toEqual(forward);
    });

    it('does not split inside thousands separators', () => {
      expect(parser.extractMultiple('rm1,200 for rent, rm50 for groceries')).toEqual([
        { amount: 1200, description: 'rent', category: 'housing' },
        { amount: 50, description: 'groceries', category: 'food' },
      ]);
    });

    it('splits a comma that follows a word even before three digits', () => {
      expect(parser.extractMultiple('rm10 for lunch,500 for rent')).toEqual([
        { amount: 10, description: 'lunch', category: 'food' },
        { amount: 500, description: 'rent', category: 'housing' },
      ]);
    });

    it('splits on "and" when a segment mentions two amounts', () => {
      expect(parser.extractMultiple('rm10 for lunch and rm5 for coffee')).toEqual([
        { amount: 10, description: 'lunch', category: 'food' },
        { amount: 5, description: 'coffee', category: 'food' },
      ]);
    });

    it('accepts description-first segments', () => {
      expect(parser.extractMultiple('nasi lemak rm10, teh tarik rm3')).toEqual([
        { amount: 10, description: 'nasi lemak', category: 'food' },
        { amount: 3, description: 'teh tarik', category: 'food' },
      ]);
    });

    it('skips segments that match nothing', () => {
      expect(parser.extractMultiple('rm10 for lunch, hello')).toEqual([{ amount: 10, description: 'lunch', category: 'food' }]);
    });
  });

  describe('cleanDescription', () => {
    it('strips fillers, currency and trailing punctuation', () => {
      expect(parser.cleanDescription('for lunch!')).toBe('lunch');
      expect(parser.cleanDescription('on buying  rm20 snacks.')).toBe('snacks');
      expect(parser.cleanDescription('to buy car wax')).toBe('car wax');
    });
  });
});
