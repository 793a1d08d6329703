import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AppConfig } from '../config/app.config';
import { DEFAULT_INTENT_CATALOG, IntentCatalogService } from './intent-catalog.service';

describe('IntentCatalogService', () => {
  let dir: string;
  let intentsPath: string;
  let service: IntentCatalogService;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'catalog-'));
    intentsPath = path.join(dir, 'nested', 'intents.json');
    const config: AppConfig = { port: 3000, nodeEnv: 'test', storageDriver: 'memory', intentsPath };
    service = new IntentCatalogService(config);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes the default catalog when the file is missing', () => {
    expect(service.isLoaded()).toBe(false);
    expect(service.load()).toEqual(DEFAULT_INTENT_CATALOG);
    expect(service.isLoaded()).toBe(true);
    expect(JSON.parse(fs.readFileSync(intentsPath, 'utf-8'))).toEqual(DEFAULT_INTENT_CATALOG);
  });

  it('uses the defaults without overwriting a malformed file', () => {
    fs.mkdirSync(path.dirname(intentsPath), { recursive: true });
    fs.writeFileSync(intentsPath, '{not json');

    expect(service.load()).toEqual(DEFAULT_INTENT_CATALOG);
    expect(fs.readFileSync(intentsPath, 'utf-8')).toBe('{not json');
  });

  it('rejects a file with the wrong shape', () => {
    fs.mkdirSync(path.dirname(intentsPath), { recursive: true });
    fs.writeFileSync(intentsPath, JSON.stringify({ intents: [{ tag: 1, patterns: [], responses: [] }] }));

    expect(service.load()).toEqual(DEFAULT_INTENT_CATALOG);
  });

  describe('with a catalog on disk', () => {
    beforeEach(() => {
      fs.mkdirSync(path.dirname(intentsPath), { recursive: true });
      fs.writeFileSync(
        intentsPath,
        JSON.stringify({
          intents: [
            { tag: 'thanks', patterns: ['thanks'], responses: ["You're welcome!"] },
            { tag: 'budget_query', patterns: ['budget'], responses: { budgets: ['Your budgets:\n{budgets}'] } },
            { tag: 'silent', patterns: ['shh'], responses: [] },
          ],
        }),
      );
    });

    it('loads lazily on first use', () => {
      expect(service.findIntent('thanks')?.patterns).toEqual(['thanks']);
      expect(service.isLoaded()).toBe(true);
    });

    it('picks plain and structured responses', () => {
      expect(service.pickResponse('thanks')).toBe("You're welcome!");
      expect(service.pickResponse('budget_query')).toBe('Your budgets:\n{budgets}');
    });

    it('returns null for unknown tags and empty response lists', () => {
      expect(service.pickResponse('nope')).toBeNull();
      expect(service.pickResponse('silent')).toBeNull();
    });
  });
});
