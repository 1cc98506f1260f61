/**
 * Compilation Pipeline
 *
 * Source text to G-code in one synchronous pass. The first error aborts
 * the compilation and no output is produced.
 */

import { loadDefaultConfig, type GcadConfig } from './config.js';
import { emitGcode, type ToolpathSegment } from './gcode/index.js';
import { parse } from './parser/index.js';
import {
  checkCalls,
  createRuntimeContext,
  execute,
  type GcadValue,
  type ObservabilityCallbacks,
  type RuntimeCallbacks,
} from './runtime/index.js';

export interface CompileOptions {
  /** Machine settings and materials (default: defaults.yaml) */
  readonly config?: GcadConfig | undefined;
  readonly callbacks?: Partial<RuntimeCallbacks> | undefined;
  readonly observability?: ObservabilityCallbacks | undefined;
}

export interface CompileResult {
  /** G-code program text, newline terminated */
  readonly gcode: string;
  /** Toolpath before serialization */
  readonly segments: readonly ToolpathSegment[];
  /** Global variables after evaluation */
  readonly variables: Record<string, GcadValue>;
}

/**
 * Compile a gcad program.
 *
 * @throws ParseError on malformed source
 * @throws RuntimeError on name, binding, type and machining errors
 * @throws ConfigError on unknown materials
 *
 * @example
 * ```typescript
 * const { gcode } = compile('drill(0mm, 0mm, 3mm);');
 * ```
 */
export function compile(
  source: string,
  options: CompileOptions = {}
): CompileResult {
  const config = options.config ?? loadDefaultConfig();
  const program = parse(source);
  checkCalls(program);

  const context = createRuntimeContext({
    config,
    callbacks: options.callbacks,
    observability: options.observability,
  });
  const result = execute(program, context);

  return {
    gcode: emitGcode(result.segments, { precision: config.machine.precision }),
    segments: result.segments,
    variables: result.variables,
  };
}
