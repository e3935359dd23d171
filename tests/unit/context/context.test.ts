import { describe, expect, it } from 'vitest';
import { Action } from '../../../src/action/action.js';
import { Application } from '../../../src/app/application.js';
import { DispatchRequest } from '../../../src/context/request.js';
import { DetachSignal, isAbortSignal, JumpSignal } from '../../../src/dispatcher/signals.js';

class Owner {}

function action(name: string, code: Action['code']): Action {
  return new Action({ name, namespace: 'test', owner: new Owner(), code });
}

describe('DispatchRequest', () => {
  it('strips leading slashes and copies captures', () => {
    const captures = ['1'];
    const request = new DispatchRequest('//blog/view', { captures });
    captures.push('2');

    expect(request.path).toBe('blog/view');
    expect(request.captures).toEqual(['1']);
    expect(request.arguments).toEqual([]);
    expect(request.match).toBeNull();
  });
});

describe('RequestContext.execute', () => {
  const app = new Application({ config: {} });

  it('stores the result as the state and falsy results as 0', async () => {
    const ctx = app.createContext('x');

    expect(await ctx.execute(action('one', () => 'ok'))).toBe('ok');
    expect(await ctx.execute(action('two', () => undefined))).toBe(0);
    expect(ctx.depth).toBe(0);
  });

  it('records thrown errors', async () => {
    const ctx = app.createContext('x');
    const failing = action('fail', () => {
      throw new Error('nope');
    });

    expect(await ctx.execute(failing)).toBe(0);
    expect(ctx.errors).toEqual(['Caught exception in Owner->fail "nope"']);
  });

  it('records thrown non-errors', async () => {
    const ctx = app.createContext('x');

    await ctx.execute(
      action('odd', () => {
        throw 'plain';
      })
    );

    expect(ctx.errors).toEqual(['Caught exception in Owner->odd "plain"']);
  });

  it('absorbs a detach in the outermost two frames', async () => {
    const ctx = app.createContext('x');
    const inner = action('inner', () => {
      throw new DetachSignal();
    });
    const outer = action('outer', async (c) => {
      await c.execute(inner);
      return 'after';
    });

    // inner leaves one frame behind, so the detach stops there
    expect(await ctx.execute(outer)).toBe('after');
    expect(ctx.errors).toEqual([]);
  });

  it('passes a detach up from deeper frames', async () => {
    const ctx = app.createContext('x');
    const trail: string[] = [];
    const deepest = action('deepest', () => {
      throw new DetachSignal();
    });
    const middle = action('middle', async (c) => {
      await c.execute(deepest);
      trail.push('middle');
    });
    const top = action('top', async (c) => {
      await c.execute(middle);
      trail.push('top');
      return 'top';
    });

    expect(await ctx.execute(top)).toBe('top');
    expect(trail).toEqual(['top']);
  });

  it('passes a jump up to the outermost frame', async () => {
    const ctx = app.createContext('x');
    const trail: string[] = [];
    const inner = action('inner', () => {
      throw new JumpSignal();
    });
    const outer = action('outer', async (c) => {
      await c.execute(inner);
      trail.push('outer');
    });

    await ctx.execute(outer);

    expect(trail).toEqual([]);
    expect(ctx.depth).toBe(0);
  });
});

describe('signals', () => {
  it('are not errors', () => {
    expect(new DetachSignal()).not.toBeInstanceOf(Error);
    expect(isAbortSignal(new JumpSignal())).toBe(true);
    expect(isAbortSignal(new Error('x'))).toBe(false);
    expect(String(new DetachSignal())).toBe('ControlSignal(detach)');
  });
});
