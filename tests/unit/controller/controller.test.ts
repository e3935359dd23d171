import { describe, expect, it } from 'vitest';
import { Application } from '../../../src/app/application.js';
import {
  classToPrefix,
  Controller,
  INTERNAL_ACTIONS,
  parseDeclaration,
} from '../../../src/controller/controller.js';
import { DispatchError } from '../../../src/dispatcher/errors.js';
import { Mailer, RootController } from '../../fixtures/controllers.js';

class BlogPostsController extends Controller {}

class AdminUsersController extends Controller {
  static namespace = '/admin/users/';
}

describe('parseDeclaration', () => {
  it('joins relative paths onto the namespace', () => {
    expect(parseDeclaration('blog', 'list', { Path: 'all' })).toEqual({ Path: ['/blog/all'] });
    expect(parseDeclaration('blog', 'list', { Path: '' })).toEqual({ Path: ['/blog'] });
    expect(parseDeclaration('', 'list', { Path: '' })).toEqual({ Path: ['/'] });
  });

  it('keeps absolute paths', () => {
    expect(parseDeclaration('blog', 'list', { Path: ['/feed', 'rss'] })).toEqual({
      Path: ['/feed', '/blog/rss'],
    });
  });

  it('maps Local and Global to paths', () => {
    expect(parseDeclaration('blog', 'view', { Local: true, Args: 1 })).toEqual({
      Path: ['/blog/view'],
      Args: ['1'],
    });
    expect(parseDeclaration('', 'view', { Local: true })).toEqual({ Path: ['/view'] });
    expect(parseDeclaration('blog', 'feed', { Global: true })).toEqual({ Path: ['/feed'] });
  });

  it('anchors LocalRegex under the namespace', () => {
    expect(parseDeclaration('blog', 'x', { LocalRegex: '^(\\d+)$' })).toEqual({
      Regex: ['^blog/(\\d+)$'],
    });
    expect(parseDeclaration('blog', 'x', { LocalRegex: 'tag/(\\w+)' })).toEqual({
      Regex: ['^blog/(?:.*?)tag/(\\w+)'],
    });
    expect(parseDeclaration('', 'x', { LocalRegex: '^top$' })).toEqual({ Regex: ['^top$'] });
  });

  it('makes Chained parents absolute', () => {
    expect(parseDeclaration('shop', 'a', { Chained: '' })).toEqual({ Chained: ['/'] });
    expect(parseDeclaration('shop', 'a', { Chained: '.' })).toEqual({ Chained: ['/shop'] });
    expect(parseDeclaration('shop', 'a', { Chained: 'base' })).toEqual({ Chained: ['/shop/base'] });
    expect(parseDeclaration('shop', 'a', { Chained: '/cart/base' })).toEqual({
      Chained: ['/cart/base'],
    });
  });

  it('passes chain and custom attributes through', () => {
    expect(
      parseDeclaration('shop', 'a', {
        PathPart: 'items',
        CaptureArgs: 2,
        Private: true,
        attributes: { '+Health': ['/ping'] },
      })
    ).toEqual({
      PathPart: ['items'],
      CaptureArgs: ['2'],
      Private: [],
      '+Health': ['/ping'],
    });
  });
});

describe('Controller', () => {
  describe('actionNamespace', () => {
    it('derives the namespace from the class name', () => {
      expect(new BlogPostsController().actionNamespace()).toBe('blogposts');
      expect(new BlogPostsController().actionNamespace(true)).toBe('BlogPosts');
    });

    it('maps the root controller to the root namespace', () => {
      expect(new RootController([]).actionNamespace()).toBe('');
    });

    it('normalizes an explicit namespace', () => {
      expect(new AdminUsersController().actionNamespace()).toBe('admin/users');
    });
  });

  describe('classToPrefix', () => {
    it('returns null for components that are not controllers', () => {
      expect(classToPrefix(new Mailer())).toBeNull();
      expect(classToPrefix(new BlogPostsController())).toBe('blogposts');
    });
  });

  describe('registerActions', () => {
    it('registers the internal entry points privately', () => {
      const app = new Application({ config: {}, components: [new BlogPostsController()] }).setup();

      for (const name of INTERNAL_ACTIONS) {
        const action = app.dispatcher.getAction(name, 'blogposts');
        expect(action?.attributes).toEqual({ Private: [] });
      }
    });

    it('fails when a declared action has no method', () => {
      class BrokenController extends Controller {
        static actions = { missing: { Local: true } };
      }
      const app = new Application({ config: {}, components: [new BrokenController()] });

      expect(() => app.setup()).toThrow(DispatchError);
      expect(() => app.setup()).toThrow('BrokenController declares action "missing" but has no such method');
    });
  });
});
