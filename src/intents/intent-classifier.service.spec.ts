import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AppConfig } from '../config/app.config';
import { IntentCatalogService } from './intent-catalog.service';
import { CONFIDENCE_THRESHOLD, IntentClassifierService } from './intent-classifier.service';
import { IntentCatalog } from './intent.types';

const catalog: IntentCatalog = {
  intents: [
    { tag: 'greeting', patterns: ['hi', 'hello there'], responses: ['Hello!'] },
    { tag: 'budget_query', patterns: ['show my budget', 'budget status'], responses: ['Budgets'] },
    { tag: 'five_words', patterns: ['one two three four five'], responses: ['five'] },
    { tag: 'six_words', patterns: ['alpha beta gamma delta epsilon zeta'], responses: ['six'] },
    { tag: 'fallback', patterns: [], responses: ['?'] },
  ],
};

describe('IntentClassifierService', () => {
  let dir: string;
  let classifier: IntentClassifierService;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'intents-'));
    const intentsPath = path.join(dir, 'intents.json');
    fs.writeFileSync(intentsPath, JSON.stringify(catalog));
    const config: AppConfig = { port: 3000, nodeEnv: 'test', storageDriver: 'memory', intentsPath };
    classifier = new IntentClassifierService(new IntentCatalogService(config));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('classify', () => {
    it('scores the best pattern by word overlap', () => {
      expect(classifier.classify('hi', catalog)).toEqual({ tag: 'greeting', confidence: 1 });
      expect(classifier.classify('Hello', catalog)).toEqual({ tag: 'greeting', confidence: 0.5 });
      expect(classifier.classify('show me my budget please', catalog)).toEqual({ tag: 'budget_query', confidence: 1 });
    });

    it('falls back when nothing overlaps', () => {
      expect(classifier.classify('random words', catalog)).toEqual({ tag: 'fallback', confidence: 0 });
    });

    it('falls back below the threshold but accepts exactly the threshold', () => {
      const below = classifier.classify('alpha', catalog);
      expect(below.tag).toBe('fallback');
      expect(below.confidence).toBeCloseTo(1 / 6);

      expect(classifier.classify('one', catalog)).toEqual({ tag: 'five_words', confidence: CONFIDENCE_THRESHOLD });
    });

    it('keeps the earlier intent on a tie', () => {
      const tied: IntentCatalog = {
        intents: [
          { tag: 'first', patterns: ['hey'], responses: ['a'] },
          { tag: 'second', patterns: ['hey'], responses: ['b'] },
        ],
      };
      expect(classifier.classify('hey', tied).tag).toBe('first');
    });

    it('always answers with a known tag and a bounded confidence', () => {
      const tags = catalog.intents.map((intent) => intent.tag);
      for (const text of ['', 'hi hi hi', 'budget', 'one two six', 'what now']) {
        const match = classifier.classify(text, catalog);
        expect(tags).toContain(match.tag);
        expect(match.confidence).toBeGreaterThanOrEqual(0);
        expect(match.confidence).toBeLessThanOrEqual(1);
      }
    });
  });

  describe('resolve', () => {
    it('lets goal phrasing override the overlap score', () => {
      expect(classifier.resolve('I want to save for a new laptop')).toEqual({ tag: 'goal_set', confidence: 0.9 });
      expect(classifier.resolve('show my goals')).toEqual({ tag: 'goal_query', confidence: 0.9 });
      expect(classifier.resolve('add money to the travel pot')).toEqual({ tag: 'goal_contribution', confidence: 0.9 });
    });

    it('separates budget questions from budget commands', () => {
      expect(classifier.resolve('show my food budget').tag).toBe('budget_query');
      expect(classifier.resolve('please set budget for food').tag).toBe('budget_set');
    });

    it('uses the catalog file for everything else', () => {
      expect(classifier.resolve('hello there')).toEqual({ tag: 'greeting', confidence: 1 });
    });
  });
});
