import { describe, expect, it } from 'vitest';
import { Action, privatePath } from '../../../src/action/action.js';
import { ActionChain, captureCount } from '../../../src/action/action-chain.js';
import { ActionContainer } from '../../../src/action/action-container.js';
import { Application } from '../../../src/app/application.js';

class Owner {}

function makeAction(
  name: string,
  namespace: string | null,
  attributes: Record<string, readonly string[]> = {}
): Action {
  return new Action({ name, namespace, owner: new Owner(), code: () => name, attributes });
}

describe('privatePath', () => {
  it('joins namespace and name', () => {
    expect(privatePath('blog', 'view')).toBe('blog/view');
    expect(privatePath('', 'index')).toBe('index');
    expect(privatePath(null, 'process')).toBe('process');
  });
});

describe('Action', () => {
  it('defaults reverse and className', () => {
    const action = makeAction('view', 'blog');

    expect(action.reverse).toBe('blog/view');
    expect(action.className).toBe('Owner');
    expect(action.slot).toBe('blog/view');
    expect(String(action)).toBe('blog/view');
  });

  it('freezes its attributes', () => {
    const action = makeAction('view', 'blog', { Args: ['1'] });

    expect(Object.isFrozen(action.attributes)).toBe(true);
    expect(Object.isFrozen(action.attributes.Args)).toBe(true);
    expect(action.attribute('Args')).toBe('1');
    expect(action.attribute('Path')).toBeUndefined();
  });

  describe('match', () => {
    const app = new Application({ config: {} });

    it('accepts any arguments without Args', () => {
      const ctx = app.createContext('x');
      ctx.request.arguments = ['a', 'b'];

      expect(makeAction('any', 'x').match(ctx)).toBe(true);
    });

    it('requires the exact count with Args', () => {
      const ctx = app.createContext('x');
      ctx.request.arguments = ['a'];

      expect(makeAction('one', 'x', { Args: ['1'] }).match(ctx)).toBe(true);
      expect(makeAction('two', 'x', { Args: ['2'] }).match(ctx)).toBe(false);
      expect(makeAction('free', 'x', { Args: [''] }).match(ctx)).toBe(true);
    });
  });

  it('executes its code with the request arguments', async () => {
    const app = new Application({ config: {} });
    const ctx = app.createContext('x');
    ctx.request.arguments = ['1', '2'];
    const action = new Action({
      name: 'sum',
      namespace: 'math',
      owner: new Owner(),
      code: (_ctx, a, b) => Number(a) + Number(b),
    });

    expect(await action.dispatch(ctx)).toBe(3);
    expect(ctx.state).toBe(3);
  });
});

describe('ActionChain', () => {
  it('takes its identity from the endpoint', () => {
    const base = makeAction('base', 'shop', { CaptureArgs: ['1'] });
    const item = makeAction('item', 'shop', { Args: ['0'] });
    const chain = ActionChain.fromChain([base, item]);

    expect(chain.reverse).toBe('shop/item');
    expect(chain.namespace).toBe('shop');
    expect(chain.chain).toEqual([base, item]);
    expect(captureCount(base)).toBe(1);
    expect(captureCount(item)).toBe(0);
  });

  it('rejects an empty chain', () => {
    expect(() => new ActionChain([])).toThrow('An action chain needs at least one action');
  });

  it('hands each link its share of the captures', async () => {
    const seen: string[] = [];
    const link = (name: string, captures: string) =>
      new Action({
        name,
        namespace: 'c',
        owner: new Owner(),
        code: (_ctx, ...args) => {
          seen.push(`${name}:${args.join(',')}`);
          return true;
        },
        attributes: captures ? { CaptureArgs: [captures] } : {},
      });
    const app = new Application({ config: {} });
    const ctx = app.createContext('x', { captures: ['1', '2', '3'] });
    ctx.request.arguments = ['end'];

    await ActionChain.fromChain([link('a', '1'), link('b', '2'), link('c', '')]).dispatch(ctx);

    expect(seen).toEqual(['a:1', 'b:2,3', 'c:end']);
    expect(ctx.request.arguments).toEqual(['end']);
  });
});

describe('ActionContainer', () => {
  it('replaces actions with the same name', () => {
    const container = new ActionContainer('blog');
    const first = makeAction('view', 'blog');
    const second = makeAction('view', 'blog');

    container.addAction(first);
    container.addAction(second);

    expect(container.getAction('view')).toBe(second);
    expect(container.actions.size).toBe(1);
    expect(String(container)).toBe('blog');
  });
});
