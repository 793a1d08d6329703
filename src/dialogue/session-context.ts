import { isStandardCategory } from '../classification/category.types';
import { ConversationState } from './conversation-state';

/**
 * Everything the dialogue remembers about one user between turns. A single
 * state field keeps at most one flow active.
 */
export class SessionContext {
  private current: ConversationState | null = null;
  private readonly custom: string[] = [];
  cancelCount = 0;

  constructor(readonly userId: string) {}

  get state(): ConversationState | null {
    return this.current;
  }

  get customCategories(): readonly string[] {
    return this.custom;
  }

  /** Replaces whatever flow was active. */
  start(state: ConversationState): void {
    this.current = state;
  }

  clear(): void {
    this.current = null;
  }

  /** Returns the normalized name, or null when it is empty or already standard. */
  addCustomCategory(name: string): string | null {
    const normalized = name.toLowerCase().trim().replace(/\s+/g, ' ');
    if (!normalized || isStandardCategory(normalized)) return null;
    if (!this.custom.includes(normalized)) this.custom.push(normalized);
    return normalized;
  }
}
