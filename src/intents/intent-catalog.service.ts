import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { pickOne } from '../common/random';
import { FALLBACK_TAG, Intent, IntentCatalog, isIntentCatalog } from './intent.types';

export const DEFAULT_INTENT_CATALOG: IntentCatalog = {
  intents: [
    {
      tag: 'greeting',
      patterns: ['hi', 'hello', 'hey', 'good morning', 'good afternoon', 'good evening'],
      responses: [
        'Hello! How can I help with your finances today?',
        'Hi there! Ready to manage your money?',
        'Hello! What would you like to do with your finances today?',
      ],
    },
    {
      tag: 'expense_add',
      patterns: [
        'spent money on', 'i spent', 'spent', 'spend',
        'i paid', 'buy', 'bought', 'RM', 'purchased',
        'add expense', 'record expense', 'log expense',
        'track spending', 'paid for', 'cost me', 'cost',
      ],
      responses: [
        "I'll record that expense for you.",
        "Got it, I've recorded your expense.",
        'Your expense has been logged.',
      ],
    },
    {
      tag: FALLBACK_TAG,
      patterns: [],
      responses: ["I'm your personal finance assistant. Type 'help' to see what I can do."],
    },
  ],
};

@Injectable()
export class IntentCatalogService implements OnModuleInit {
  private readonly logger = new Logger(IntentCatalogService.name);
  private catalog: IntentCatalog = DEFAULT_INTENT_CATALOG;
  private loaded = false;

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  onModuleInit(): void {
    this.load();
  }

  /**
   * Reads the catalog file. A missing file is replaced by the default
   * catalog, which is written back; an unreadable one is left alone.
   */
  load(): IntentCatalog {
    const file = this.config.intentsPath;
    if (!fs.existsSync(file)) {
      this.logger.warn(`No intent catalog at ${file}, writing the default one`);
      this.catalog = DEFAULT_INTENT_CATALOG;
      this.save(this.catalog);
    } else {
      try {
        const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
        if (isIntentCatalog(parsed)) {
          this.catalog = parsed;
        } else {
          this.logger.error(`Intent catalog at ${file} has an unexpected shape, using defaults`);
          this.catalog = DEFAULT_INTENT_CATALOG;
        }
      } catch (error) {
        this.logger.error(`Could not read intent catalog at ${file}, using defaults`, error instanceof Error ? error.stack : String(error));
        this.catalog = DEFAULT_INTENT_CATALOG;
      }
    }

    this.loaded = true;
    this.logger.log(`Loaded ${this.catalog.intents.length} intents`);
    return this.catalog;
  }

  save(catalog: IntentCatalog): void {
    try {
      fs.mkdirSync(path.dirname(this.config.intentsPath), { recursive: true });
      fs.writeFileSync(this.config.intentsPath, JSON.stringify(catalog, null, 4), 'utf-8');
    } catch (error) {
      this.logger.error(`Could not write intent catalog to ${this.config.intentsPath}`, error instanceof Error ? error.stack : String(error));
    }
  }

  getCatalog(): IntentCatalog {
    if (!this.loaded) this.load();
    return this.catalog;
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  findIntent(tag: string): Intent | undefined {
    return this.getCatalog().intents.find((intent) => intent.tag === tag);
  }

  /**
   * A random response template for the tag. Structured responses use the
   * list under their first key. Null when the tag is unknown or has none.
   */
  pickResponse(tag: string): string | null {
    const intent = this.findIntent(tag);
    if (!intent) return null;

    const responses = Array.isArray(intent.responses)
      ? intent.responses
      : Object.values(intent.responses)[0] ?? [];
    return responses.length > 0 ? pickOne(responses) : null;
  }
}
