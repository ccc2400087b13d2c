import { describe, expect, it } from 'vitest';
import { CallContext } from './call-context';

describe('CallContext', () => {
  it('marks a namespace active only while running', () => {
    const context = new CallContext();

    expect(context.isActive('hmcclient')).toBe(false);
    expect(context.run('hmcclient', () => context.isActive('hmcclient'))).toBe(true);
    expect(context.isActive('hmcclient')).toBe(false);
  });

  it('keeps the namespace across awaits', async () => {
    const context = new CallContext();

    const active = await context.run('hmcclient', async () => {
      await new Promise(resolve => setTimeout(resolve, 1));
      return context.isActive('hmcclient');
    });

    expect(active).toBe(true);
  });

  it('nests namespaces and re-enters without duplicates', () => {
    const context = new CallContext();

    const active = context.run('hmcclient', () =>
      context.run('storage', () => context.run('hmcclient', () => context.activeNamespaces())));

    expect(active).toEqual(['hmcclient', 'storage']);
  });

  it('leaves a namespace inside exit and restores it afterwards', () => {
    const context = new CallContext();

    const seen = context.run('hmcclient', () => {
      const inside = context.run('storage', () => context.exit('hmcclient', () => context.activeNamespaces()));
      return [inside, context.isActive('hmcclient')];
    });

    expect(seen).toEqual([['storage'], true]);
    expect(context.exit('hmcclient', () => context.isActive('hmcclient'))).toBe(false);
  });

  it('keeps separate contexts apart', () => {
    const first = new CallContext();
    const second = new CallContext();

    expect(first.run('hmcclient', () => second.isActive('hmcclient'))).toBe(false);
  });
});
