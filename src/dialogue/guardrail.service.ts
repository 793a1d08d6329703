import { Injectable, Logger } from '@nestjs/common';
import { pickOne } from '../common/random';

export type GuardrailKind = 'too_short' | 'gibberish' | 'profanity' | 'frustration';

export interface GuardrailVerdict {
  kind: GuardrailKind;
  reply: string;
}

const GIBBERISH_TOKENS = [
  'asdf', 'asdfg', 'asdfgh', 'asdfghjkl', 'qwerty', 'qwertyuiop', 'zxcv', 'zxcvbn',
  'test', 'testing', 'test123', 'abc', 'abcd', 'xyz', 'blah', 'blah blah', 'lol', 'hmm', 'zzz', 'jkl', 'sdf',
];

const PROFANITY = /\b(?:fuck(?:ing)?|shit|damn|crap|bitch|bastard|wtf|bodoh|sial|babi|celaka)\b/;

const FRUSTRATION = /\b(?:frustrat(?:ed|ing)|annoy(?:ed|ing)|useless|not working|doesn't work|does not work|this sucks|hate this|so hard|confusing|ugh+|stupid bot)\b/;

export const TOO_SHORT_RESPONSES = [
  "Could you tell me a bit more? For example, 'RM10 for lunch' or 'show my budget'.",
  "I need a little more to go on. Try something like 'spent RM25 on groceries'.",
  "That's a bit short for me! Type 'help' to see what I can do.",
];

export const GIBBERISH_RESPONSES = [
  "I couldn't make sense of that. Try recording an expense like 'RM12 for nasi lemak'.",
  "Hmm, that doesn't look like something I understand. Type 'help' to see what I can do.",
  "I'm not sure what that means. You can ask me things like 'show my spending' or 'set budget'.",
];

export const PROFANITY_RESPONSES = [
  "I can tell something's bothering you. Money stuff can be stressful! Let's sort it out together. What would you like to do?",
  "I hear you, finances can be frustrating. I'm here to help: try 'show my budget' to see where things stand.",
  "Let's keep it friendly 😊 I'm on your side. Tell me what you need help with and we'll work through it.",
];

export const FRUSTRATION_RESPONSES = [
  "Sorry this has been frustrating! Let's take it one step at a time. Try a simple one like 'RM10 for lunch'.",
  "I'm sorry about that. You can type 'help' to see exactly what I understand, and I'll do my best.",
  "I understand, and I want to make this easier. Tell me one expense or ask 'show my spending' and we'll go from there.",
];

/** Screens idle input before any routing. */
@Injectable()
export class GuardrailService {
  private readonly logger = new Logger(GuardrailService.name);

  check(rawText: string): GuardrailVerdict | null {
    const text = rawText.toLowerCase().trim();
    const kind = this.classify(text);
    if (!kind) return null;

    this.logger.debug(`Guardrail ${kind} for "${rawText}"`);
    return { kind, reply: pickOne(this.poolFor(kind)) };
  }

  private classify(text: string): GuardrailKind | null {
    if (text.length <= 2) return 'too_short';
    if (this.isGibberish(text)) return 'gibberish';
    if (PROFANITY.test(text)) return 'profanity';
    if (FRUSTRATION.test(text)) return 'frustration';
    return null;
  }

  private isGibberish(text: string): boolean {
    if (GIBBERISH_TOKENS.includes(text)) return true;

    const compact = text.replace(/\s+/g, '');
    if (/^(.)\1+$/.test(compact)) return true;

    return text
      .split(/\s+/)
      .some((token) => /^[a-z]{5,}$/.test(token) && !/[aeiouy]/.test(token));
  }

  private poolFor(kind: GuardrailKind): readonly string[] {
    switch (kind) {
      case 'too_short':
        return TOO_SHORT_RESPONSES;
      case 'gibberish':
        return GIBBERISH_RESPONSES;
      case 'profanity':
        return PROFANITY_RESPONSES;
      case 'frustration':
        return FRUSTRATION_RESPONSES;
    }
  }
}
