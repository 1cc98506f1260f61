/**
 * Runtime Context Factory
 *
 * Creates the global scope for script execution and the child scopes
 * used by loop bodies.
 * Public API for host applications.
 */

import { loadDefaultConfig } from '../../config.js';
import { ToolpathBuffer } from '../../gcode/index.js';
import { createMachineState } from './machine.js';
import type {
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './types.js';
import { formatValue, type GcadValue } from './values.js';

const defaultCallbacks: RuntimeCallbacks = {
  onLog: (value) => {
    console.log(formatValue(value));
  },
};

/**
 * Create a runtime context for script execution.
 * This is the main entry point for configuring the gcad runtime.
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const config = options.config ?? loadDefaultConfig();
  const variables = new Map<string, GcadValue>(
    Object.entries(options.variables ?? {})
  );

  return {
    parent: undefined,
    variables,
    machine: createMachineState(config),
    toolpath: new ToolpathBuffer(),
    limits: config.limits,
    callbacks: { ...defaultCallbacks, ...options.callbacks },
    observability: options.observability ?? {},
  };
}

/**
 * Create a child context for block scoping.
 * The child shares machine state, toolpath and callbacks with its parent
 * but has its own variables map. Variable lookups walk the parent chain.
 */
export function createChildContext(parent: RuntimeContext): RuntimeContext {
  return {
    parent,
    variables: new Map<string, GcadValue>(),
    machine: parent.machine,
    toolpath: parent.toolpath,
    limits: parent.limits,
    callbacks: parent.callbacks,
    observability: parent.observability,
  };
}

/**
 * Get a variable value, walking the parent chain.
 * Returns undefined if not found in any scope.
 */
export function getVariable(
  ctx: RuntimeContext,
  name: string
): GcadValue | undefined {
  if (ctx.variables.has(name)) {
    return ctx.variables.get(name);
  }
  if (ctx.parent) {
    return getVariable(ctx.parent, name);
  }
  return undefined;
}

/**
 * Check if a variable exists in any scope.
 */
export function hasVariable(ctx: RuntimeContext, name: string): boolean {
  if (ctx.variables.has(name)) {
    return true;
  }
  if (ctx.parent) {
    return hasVariable(ctx.parent, name);
  }
  return false;
}

/**
 * Bind a variable in this (innermost) scope. Outer bindings of the same
 * name are shadowed, never modified.
 */
export function setVariable(
  ctx: RuntimeContext,
  name: string,
  value: GcadValue
): void {
  ctx.variables.set(name, value);
}

/** Names visible from this scope, innermost first */
export function visibleNames(ctx: RuntimeContext): string[] {
  const names = new Set<string>();
  let scope: RuntimeContext | undefined = ctx;
  while (scope) {
    for (const name of scope.variables.keys()) names.add(name);
    scope = scope.parent;
  }
  return [...names];
}
