/**
 * forward / detach / visit / jump tests.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Action } from '../../../src/action/action.js';
import type { Application } from '../../../src/app/application.js';
import type { RequestContext } from '../../../src/context/context.js';
import { DetachSignal, JumpSignal } from '../../../src/dispatcher/signals.js';
import type { DelegationFailedPayload } from '../../../src/events/event-emitter.js';
import { buildApp, Mailer } from '../../fixtures/controllers.js';

describe('delegation', () => {
  let trail: string[];
  let app: Application;
  let ctx: RequestContext;

  beforeEach(() => {
    trail = [];
    app = buildApp(trail);
    ctx = app.createContext('blog/archive/x');
    app.dispatcher.prepareAction(ctx);
  });

  describe('resolveCommand', () => {
    it('resolves absolute private paths', () => {
      const resolved = app.dispatcher.resolveCommand(ctx, '/blog/view', ['1']);

      expect(resolved?.action.reverse).toBe('blog/view');
      expect(resolved?.args).toEqual(['1']);
    });

    it('resolves relative paths against the current namespace', () => {
      expect(app.dispatcher.resolveCommand(ctx, 'view')?.action.reverse).toBe('blog/view');
    });

    it('defaults to a copy of the request arguments', () => {
      const resolved = app.dispatcher.resolveCommand(ctx, '/foo/bar');

      expect(resolved?.args).toEqual(['x']);
      expect(resolved?.args).not.toBe(ctx.request.arguments);
    });

    it('appends segments that do not name an action to the arguments', () => {
      const resolved = app.dispatcher.resolveCommand(ctx, '/foo/bar/one/two', ['zero']);

      expect(resolved?.action.reverse).toBe('foo/bar');
      expect(resolved?.args).toEqual(['zero', 'one', 'two']);
    });

    it('synthesizes an action for a component method', () => {
      const resolved = app.dispatcher.resolveCommand(ctx, 'Mailer', [], { method: 'send' });

      expect(resolved?.action.reverse).toBe('Mailer->send');
      expect(resolved?.action.namespace).toBeNull();
    });

    it('gives controller methods the controller namespace', () => {
      const blog = app.component('BlogController');
      const resolved = blog && app.dispatcher.resolveCommand(ctx, blog, [], { method: 'view' });

      expect(resolved?.action.namespace).toBe('blog');
      expect(resolved?.action.reverse).toBe('BlogController->view');
    });

    it('returns null for empty commands', () => {
      expect(app.dispatcher.resolveCommand(ctx, '')).toBeNull();
      expect(app.dispatcher.resolveCommand(ctx, null)).toBeNull();
    });
  });

  describe('forward', () => {
    it('runs the action and returns its state', async () => {
      const state = await ctx.forward('view', ['3']);

      expect(state).toBe('post 3');
      expect(trail).toEqual(['blog/view:3']);
    });

    it('restores the request arguments afterwards', async () => {
      await ctx.forward('view', ['3']);

      expect(ctx.request.arguments).toEqual(['x']);
    });

    it('calls process on a component', async () => {
      expect(await ctx.forward(new Mailer(), ['a', 'b'])).toBe('sent:a,b');
      expect(await ctx.forward('Mailer', ['c'])).toBe('sent:c');
    });

    it('records an error and returns false for an unknown command', async () => {
      const state = await ctx.forward('/nowhere');

      expect(state).toBe(false);
      expect(ctx.errors).toEqual([
        'Couldn\'t forward to command "/nowhere": Invalid action or component.',
      ]);
    });

    it('records a missing component method', async () => {
      const state = await ctx.forward('Mailer', [], { method: 'missing' });

      expect(state).toBe(false);
      expect(ctx.errors).toEqual([
        'Couldn\'t forward to "Mailer". Does not implement "missing"',
        'Couldn\'t forward to command "Mailer": Invalid action or component.',
      ]);
    });

    it('emits delegation.failed', async () => {
      const listener = vi.fn((_payload: DelegationFailedPayload) => undefined);
      app.dispatcher.events.on('delegation.failed', listener);

      await ctx.forward('/nowhere');

      expect(listener.mock.calls[0]?.[0]).toMatchObject({ verb: 'forward', command: '/nowhere' });
    });

    it('records exceptions thrown by the action', async () => {
      const state = await ctx.forward('/blog/broken');

      expect(state).toBe(0);
      expect(ctx.errors).toEqual(['Caught exception in BlogController->broken "boom"']);
    });
  });

  describe('detach', () => {
    it('records the error and still aborts for an unknown command', async () => {
      await expect(ctx.detach('/nowhere')).rejects.toBeInstanceOf(DetachSignal);

      expect(ctx.errors).toEqual([
        'Couldn\'t detach to command "/nowhere": Invalid action or component.',
      ]);
    });

    it('runs the command before aborting', async () => {
      await expect(ctx.detach('view', ['5'])).rejects.toBeInstanceOf(DetachSignal);

      expect(trail).toEqual(['blog/view:5']);
    });

    it('aborts without a command', async () => {
      await expect(ctx.detach()).rejects.toBeInstanceOf(DetachSignal);
      expect(ctx.errors).toEqual([]);
    });
  });

  describe('visit', () => {
    it('dispatches the action through its namespace', async () => {
      const state = await ctx.visit('/blog/view', ['5']);

      expect(state).toBe(true);
      expect(trail).toEqual(['root/auto', 'blog/auto', 'blog/view:5', 'root/end']);
    });

    it('restores the bound action, namespace and arguments', async () => {
      const action = ctx.action;

      await ctx.visit('/foo/bar', ['1']);

      expect(ctx.action).toBe(action);
      expect(ctx.namespace).toBe('blog');
      expect(ctx.request.arguments).toEqual(['x']);
      expect(ctx.request.captures).toEqual([]);
    });

    it('binds captures for chained actions', async () => {
      await ctx.visit('/store/item', [], { captures: ['42'] });

      expect(trail).toEqual(['root/auto', 'store/base:42', 'store/item', 'root/end']);
      expect(ctx.request.captures).toEqual([]);
    });

    it('refuses actions without a namespace', async () => {
      const action = ctx.action;
      const state = await ctx.visit(new Mailer());

      expect(state).toBe(false);
      expect(ctx.action).toBe(action);
      expect(ctx.request.arguments).toEqual(['x']);
      expect(ctx.errors).toEqual([
        'Couldn\'t visit("Mailer"): Action has no namespace: cannot visit() to a plain method ' +
          'or component, must be an action of some sort.',
      ]);
    });

    it('refuses actions whose owner cannot dispatch', async () => {
      app.dispatcher.register(
        app,
        new Action({ name: 'loose', namespace: 'misc', owner: {}, code: () => 'loose' })
      );

      const state = await ctx.visit('/misc/loose');

      expect(state).toBe(false);
      expect(ctx.errors).toEqual([
        'Couldn\'t visit("/misc/loose"): Action cannot _DISPATCH. Did you try to visit() a ' +
          'non-controller action?',
      ]);
    });

    it('refuses unknown commands', async () => {
      expect(await ctx.visit('/nowhere')).toBe(false);
      expect(ctx.errors).toEqual([
        'Couldn\'t visit("/nowhere"): Couldn\'t visit to command "/nowhere": Invalid action or component.',
      ]);
    });
  });

  describe('jump', () => {
    it('visits and then aborts the request', async () => {
      await expect(ctx.jump('/foo/bar', ['9'])).rejects.toBeInstanceOf(JumpSignal);

      expect(trail).toEqual(['root/auto', 'foo/bar:9', 'root/end']);
      expect(ctx.action?.reverse).toBe('blog/archive');
    });

    it('aborts even when the visit fails', async () => {
      await expect(ctx.jump('/nowhere')).rejects.toBeInstanceOf(JumpSignal);

      expect(ctx.errors).toHaveLength(1);
    });
  });
});
