import { CategoryClassificationService } from './category-classification.service';

describe('CategoryClassificationService', () => {
  const service = new CategoryClassificationService();

  it('knows local food and merchants', () => {
    expect(service.categorize('nasi lemak')).toBe('food');
    expect(service.categorize('Grab to office')).toBe('transport');
    expect(service.categorize('tnb bill')).toBe('utilities');
    expect(service.categorize('watsons')).toBe('healthcare');
  });

  it('lets the earlier category win when several match', () => {
    // "ticket" is a transport keyword and transport is checked before entertainment
    expect(service.categorize('movie ticket')).toBe('transport');
  });

  it('defaults to other', () => {
    expect(service.categorize('something random')).toBe('other');
  });

  it('reports how the category was found', () => {
    expect(service.classify('kopi')).toEqual({ category: 'food', source: 'keyword', matchedKeyword: 'kopi' });
    expect(service.classify('vet visit', ['vet'])).toEqual({ category: 'vet', source: 'custom', matchedKeyword: 'vet' });
    expect(service.classify('something random')).toEqual({ category: 'other', source: 'default' });
  });

  describe('matchCategoryName', () => {
    it('prefers standard names, then custom ones', () => {
      expect(service.matchCategoryName('change it to Transport')).toBe('transport');
      expect(service.matchCategoryName('pets', ['pets'])).toBe('pets');
      expect(service.matchCategoryName('whatever')).toBeNull();
    });
  });

  describe('budget categories', () => {
    it('maps wizard answers with the broader synonyms', () => {
      expect(service.mapBudgetCategory('groceries')).toBe('food');
      expect(service.mapBudgetCategory('my rent')).toBe('housing');
      expect(service.mapBudgetCategory('miscellaneous')).toBe('other');
      expect(service.mapBudgetCategory('random things')).toBe('other');
    });

    it('tells an unknown answer apart from an explicit one', () => {
      expect(service.findBudgetCategory('random things')).toBeNull();
      expect(service.findBudgetCategory('hobbies', ['hobbies'])).toBe('hobbies');
    });
  });
});
