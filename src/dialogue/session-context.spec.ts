import { SessionContext } from './session-context';
import { SessionRegistryService } from './session-registry.service';

describe('SessionContext', () => {
  it('holds at most one flow', () => {
    const session = new SessionContext('u1');
    session.start({ flow: 'goal-wizard', stage: 'ask_goal_name', draft: { goalType: 'savings' } });
    session.start({ flow: 'budget-wizard', stage: 'ask_category', draft: {} });

    expect(session.state?.flow).toBe('budget-wizard');
    session.clear();
    expect(session.state).toBeNull();
  });

  it('normalizes custom categories and skips standard ones', () => {
    const session = new SessionContext('u1');
    expect(session.addCustomCategory('  Car   Wash ')).toBe('car wash');
    expect(session.addCustomCategory('car wash')).toBe('car wash');
    expect(session.addCustomCategory('Food')).toBeNull();
    expect(session.addCustomCategory('   ')).toBeNull();
    expect(session.customCategories).toEqual(['car wash']);
  });
});

describe('SessionRegistryService', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('keeps one session per user', () => {
    const registry = new SessionRegistryService();
    const first = registry.get('u1');

    expect(registry.get('u1')).toBe(first);
    expect(registry.get('u2')).not.toBe(first);

    registry.reset('u1');
    expect(registry.get('u1')).not.toBe(first);
  });

  it('runs turns for one user one after another', async () => {
    const registry = new SessionRegistryService();
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = registry.run('u1', async () => {
      order.push('first:start');
      await gate;
      order.push('first:end');
      return 1;
    });
    const second = registry.run('u1', async () => {
      order.push('second');
      return 2;
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);

    release();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('keeps the queue going after a failed turn', async () => {
    const registry = new SessionRegistryService();
    const failed = registry.run('u1', async () => {
      throw new Error('boom');
    });
    const next = registry.run('u1', async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('drops sessions that have been idle too long', () => {
    jest.useFakeTimers({ now: new Date('2025-01-01T00:00:00Z') });
    const registry = new SessionRegistryService();
    const idle = registry.get('u1');
    const active = registry.get('u2');

    jest.setSystemTime(new Date('2025-01-01T00:20:00Z'));
    expect(registry.get('u2')).toBe(active);

    jest.setSystemTime(new Date('2025-01-01T00:31:00Z'));
    expect(registry.get('u2')).toBe(active);
    expect(registry.get('u1')).not.toBe(idle);
  });
});
