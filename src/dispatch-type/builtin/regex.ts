/**
 * Regex dispatch type.
 *
 * Matches candidate paths against the patterns declared in `Regex`
 * attributes, in registration order, and binds the pattern's groups as
 * request captures.
 */

import type { Action } from '../../action/action.js';
import type { DispatchContext, SetupContext } from '../../types/context.js';
import { ActionRegistrationError } from '../../dispatcher/errors.js';
import { BaseDispatchType } from '../base-dispatch-type.js';
import type { DispatchTypeListing } from '../dispatch-type.js';

interface CompiledRegex {
  source: string;
  re: RegExp;
  action: Action;
}

/**
 * Index of the next unescaped '(' at or after `from`, or -1.
 */
function findGroupStart(source: string, from: number): number {
  for (let i = from; i < source.length; i++) {
    if (source[i] === '\\') {
      i++;
      continue;
    }
    if (source[i] === '(') {
      return i;
    }
  }
  return -1;
}

/**
 * Index of the ')' closing the group opened at `open`, or -1 when unbalanced.
 */
function findGroupEnd(source: string, open: number): number {
  let depth = 0;
  for (let i = open; i < source.length; i++) {
    const char = source[i];
    if (char === '\\') {
      i++;
    } else if (char === '(') {
      depth++;
    } else if (char === ')') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

/**
 * Whether the group opened at `open` captures. Non-capturing groups and
 * lookarounds do not; named groups do.
 */
function isCapturingGroup(source: string, open: number): boolean {
  if (source[open + 1] !== '?') {
    return true;
  }
  return source[open + 2] === '<' && source[open + 3] !== '=' && source[open + 3] !== '!';
}

/**
 * Substitute captures for the top-level groups of a pattern.
 *
 * Top-level groups that capture nothing match no text of their own in a
 * generated URI and are dropped. Returns null when the pattern has more
 * capturing groups than captures, fewer, or unbalanced parentheses.
 *
 * @example
 * fillPattern('^blog/(\\d+)/(\\w+)$', ['2024', 'hello']); // '/blog/2024/hello'
 */
export function fillPattern(pattern: string, captures: readonly string[]): string | null {
  let rest = pattern.replace(/^\^/, '').replace(/\$$/, '');
  const pending = [...captures];
  let result = '/';

  for (;;) {
    const open = findGroupStart(rest, 0);
    if (open === -1) {
      break;
    }
    const close = findGroupEnd(rest, open);
    if (close === -1) {
      return null;
    }

    if (!isCapturingGroup(rest, open)) {
      result += rest.slice(0, open);
      rest = rest.slice(close + 1);
      continue;
    }

    const capture = pending.shift();
    if (capture === undefined) {
      return null;
    }
    result += rest.slice(0, open) + capture;
    rest = rest.slice(close + 1);
  }

  if (pending.length > 0) {
    return null;
  }
  return result + rest;
}

export class RegexDispatchType extends BaseDispatchType {
  readonly name = 'Regex';

  private readonly compiled: CompiledRegex[] = [];

  match(ctx: DispatchContext, path: string): boolean {
    for (const entry of this.compiled) {
      const result = entry.re.exec(path);
      if (!result || !entry.action.match(ctx)) {
        continue;
      }

      this.bind(ctx, entry.action, {
        requestAction: entry.source,
        match: path,
        captures: result.slice(1).map((value) => value ?? ''),
      });
      return true;
    }
    return false;
  }

  register(_app: SetupContext, action: Action): boolean {
    const patterns = action.attributes.Regex;
    if (!patterns || patterns.length === 0) {
      return false;
    }

    for (const source of patterns) {
      this.registerRegex(source, action);
    }
    return true;
  }

  registerRegex(source: string, action: Action): void {
    let re: RegExp;
    try {
      re = new RegExp(source);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ActionRegistrationError(`Invalid Regex "${source}" (${reason})`, action.reverse);
    }
    this.compiled.push({ source, re, action });
  }

  uriForAction(action: Action, captures: readonly string[]): string | null {
    for (const pattern of action.attributes.Regex ?? []) {
      const uri = fillPattern(pattern, captures);
      if (uri !== null) {
        return uri;
      }
    }
    return null;
  }

  list(_app: SetupContext): DispatchTypeListing | null {
    if (this.compiled.length === 0) {
      return null;
    }

    return {
      title: 'Loaded Regex actions',
      columns: ['Regex', 'Private'],
      rows: this.compiled.map((entry) => [entry.source, `/${entry.action.reverse}`]),
    };
  }
}
