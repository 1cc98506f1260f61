/**
 * gcad Built-ins
 * Machining operations, machine-state directives and sequence helpers
 */

export {
  BUILTINS,
  BUILTIN_NAMES,
  isBuiltinName,
  type BuiltinName,
} from './definitions.js';
export { linspace } from './linspace.js';
export { ToolpathWriter, depthPasses, stepCount } from './motion.js';
export { circlePocket, groovePocket, insetLoops, ringRadii } from './pocket.js';
export { drill } from './drill.js';
export { contourLine, groove } from './groove.js';
