import {
  FRUSTRATION_RESPONSES,
  GIBBERISH_RESPONSES,
  GuardrailService,
  PROFANITY_RESPONSES,
  TOO_SHORT_RESPONSES,
} from './guardrail.service';

describe('GuardrailService', () => {
  const guardrails = new GuardrailService();

  it('catches very short input', () => {
    const verdict = guardrails.check('ok');
    expect(verdict?.kind).toBe('too_short');
    expect(TOO_SHORT_RESPONSES).toContain(verdict?.reply);
  });

  it('catches gibberish', () => {
    for (const text of ['asdf', 'hmm', 'aaaa', 'xkcdqzt ok']) {
      const verdict = guardrails.check(text);
      expect(verdict?.kind).toBe('gibberish');
      expect(GIBBERISH_RESPONSES).toContain(verdict?.reply);
    }
  });

  it('answers profanity and frustration calmly', () => {
    const rude = guardrails.check('what the fuck');
    expect(rude?.kind).toBe('profanity');
    expect(PROFANITY_RESPONSES).toContain(rude?.reply);

    const frustrated = guardrails.check('ugh this is useless');
    expect(frustrated?.kind).toBe('frustration');
    expect(FRUSTRATION_RESPONSES).toContain(frustrated?.reply);
  });

  it('lets ordinary input through', () => {
    expect(guardrails.check('RM10 for lunch')).toBeNull();
    expect(guardrails.check('hello')).toBeNull();
    expect(guardrails.check('rhythm')).toBeNull();
  });
});
