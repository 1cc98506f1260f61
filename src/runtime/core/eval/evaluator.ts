/**
 * Evaluator Class - Core
 *
 * Holds the active scope while a program runs. Statement, expression and
 * call evaluation are added via prototype extension from separate
 * modules, using TypeScript declaration merging for type safety.
 *
 * @internal
 */

import type { RuntimeContext } from '../types.js';

/**
 * Evaluator for one compilation.
 *
 * Methods are organized across multiple files:
 * - statements.ts: Statements, for loops, blocks
 * - expressions.ts: Literals, identifiers, assignment, operators
 * - calls.ts: Built-in function calls
 */
export class Evaluator {
  /** Innermost active scope */
  ctx: RuntimeContext;

  constructor(ctx: RuntimeContext) {
    this.ctx = ctx;
  }

  /**
   * Run `body` with `scope` as the innermost scope, restoring the previous
   * scope afterwards even when `body` throws.
   */
  inScope<T>(scope: RuntimeContext, body: () => T): T {
    const outer = this.ctx;
    this.ctx = scope;
    try {
      return body();
    } finally {
      this.ctx = outer;
    }
  }
}
