/**
 * Built-in Functions
 *
 * The closed set of functions a script can call. Each entry declares its
 * parameters; arguments arrive bound and kind-checked.
 */

import type { SourceLocation } from '../../types.js';
import { GCAD_ERROR_CODES, RuntimeError } from '../../types.js';
import type {
  BuiltinContext,
  BuiltinDefinition,
  BuiltinParam,
} from '../core/callable.js';
import { findMaterial } from '../core/machine.js';
import { NULL_VALUE, unitless } from '../core/values.js';
import { drill } from './drill.js';
import { contourLine, groove } from './groove.js';
import { linspace } from './linspace.js';
import { ToolpathWriter, requirePositive } from './motion.js';
import { circlePocket, groovePocket } from './pocket.js';

// ============================================================
// HELPERS
// ============================================================

function writerFor(ctx: BuiltinContext): ToolpathWriter {
  return new ToolpathWriter(ctx.machine, ctx.toolpath);
}

function length(name: string, description?: string): BuiltinParam {
  return { name, kind: 'length', description };
}

function optionalLength(name: string, description?: string): BuiltinParam {
  return { name, kind: 'length', optional: true, description };
}

function bindingError(
  message: string,
  location?: SourceLocation
): RuntimeError {
  return new RuntimeError(
    GCAD_ERROR_CODES.RUNTIME_BINDING_ERROR,
    message,
    location
  );
}

function invalid(message: string, location?: SourceLocation): RuntimeError {
  return new RuntimeError(
    GCAD_ERROR_CODES.RUNTIME_INVALID_OPERATION,
    message,
    location
  );
}

// ============================================================
// MACHINE STATE
// ============================================================

const cutterDiameter: BuiltinDefinition = {
  description: 'Set the diameter of the current cutter',
  params: [length('diameter')],
  fn: (args, ctx, location) => {
    const diameter = args.length('diameter');
    requirePositive(diameter, 'Cutter diameter', location);
    ctx.machine.cutterDiameter = diameter;
    return NULL_VALUE;
  },
};

const material: BuiltinDefinition = {
  description: 'Select the material profile for feeds, speeds and stepdown',
  params: [{ name: 'name', kind: 'string' }],
  fn: (args, ctx, location) => {
    const name = args.string('name');
    ctx.machine.profile = findMaterial(ctx.machine.materials, name, location);
    ctx.machine.material = name;
    ctx.machine.rpmOverride = null;
    return NULL_VALUE;
  },
};

const defineMaterial: BuiltinDefinition = {
  description: 'Add or replace a material profile',
  params: [
    { name: 'name', kind: 'string' },
    {
      name: 'stepover',
      kind: 'unitless',
      description: 'Fraction of the cutter diameter',
    },
    length('depth_per_pass'),
    { name: 'feed_rate', kind: 'unitless', description: 'mm/min' },
    { name: 'plunge_rate', kind: 'unitless', description: 'mm/min' },
    { name: 'rpm', kind: 'unitless' },
  ],
  fn: (args, ctx, location) => {
    const name = args.string('name');
    const profile = {
      stepover: args.unitless('stepover'),
      depthPerPass: args.length('depth_per_pass'),
      feedRate: args.unitless('feed_rate'),
      plungeRate: args.unitless('plunge_rate'),
      rpm: args.unitless('rpm'),
    };

    if (!(profile.stepover > 0 && profile.stepover <= 1)) {
      throw invalid(
        `Material '${name}': stepover must be in (0, 1], got ${String(profile.stepover)}`,
        location
      );
    }
    for (const [field, value] of Object.entries(profile)) {
      if (!(value > 0)) {
        throw invalid(
          `Material '${name}': ${field} must be greater than zero`,
          location
        );
      }
    }

    ctx.machine.materials.set(name, profile);
    if (ctx.machine.material === name) {
      ctx.machine.profile = profile;
    }
    return NULL_VALUE;
  },
};

const rpm: BuiltinDefinition = {
  description: 'Override the spindle speed of the current material',
  params: [{ name: 'rpm', kind: 'unitless' }],
  fn: (args, ctx, location) => {
    const value = args.unitless('rpm');
    if (!(value > 0)) {
      throw invalid('Spindle speed must be greater than zero', location);
    }
    ctx.machine.rpmOverride = value;
    return NULL_VALUE;
  },
};

const scale: BuiltinDefinition = {
  description: 'Scale the X and Y coordinates of later operations',
  params: [
    { name: 'x', kind: 'unitless' },
    { name: 'y', kind: 'unitless' },
  ],
  fn: (args, ctx, location) => {
    const x = args.unitless('x');
    const y = args.unitless('y');
    if (x === 0 || y === 0) {
      throw invalid('Scale factors must not be zero', location);
    }
    ctx.machine.scale = { x, y };
    return NULL_VALUE;
  },
};

// ============================================================
// OUTPUT
// ============================================================

const comment: BuiltinDefinition = {
  description: 'Write a comment line into the program',
  params: [{ name: 'text', kind: 'string' }],
  fn: (args, ctx) => {
    writerFor(ctx).comment(args.string('text'));
    return NULL_VALUE;
  },
};

const log: BuiltinDefinition = {
  description: 'Report a value to the host',
  params: [{ name: 'value', kind: 'any' }],
  fn: (args, ctx) => {
    const value = args.value('value');
    ctx.callbacks.onLog(value);
    return value;
  },
};

// ============================================================
// MACHINING OPERATIONS
// ============================================================

const circlePocketFn: BuiltinDefinition = {
  description: 'Clear a round pocket centred on (x, y)',
  params: [
    length('x'),
    length('y'),
    optionalLength('radius'),
    length('depth'),
    optionalLength('diameter'),
  ],
  fn: (args, ctx, location) => {
    const radius = args.optionalLength('radius');
    const diameter = args.optionalLength('diameter');
    if ((radius === undefined) === (diameter === undefined)) {
      throw bindingError(
        "circle_pocket takes exactly one of 'radius' or 'diameter'",
        location
      );
    }

    circlePocket(
      writerFor(ctx),
      {
        x: args.length('x'),
        y: args.length('y'),
        radius: radius ?? (diameter ?? 0) / 2,
        depth: args.length('depth'),
      },
      location
    );
    return NULL_VALUE;
  },
};

const drillFn: BuiltinDefinition = {
  description: 'Peck drill a hole at (x, y)',
  params: [
    length('x'),
    length('y'),
    length('depth'),
    {
      name: 'dwell',
      kind: 'unitless',
      defaultValue: unitless(0),
      description: 'Seconds to pause at full depth',
    },
  ],
  fn: (args, ctx, location) => {
    const dwell = args.unitless('dwell');
    if (dwell < 0) {
      throw invalid('Dwell time must not be negative', location);
    }
    drill(
      writerFor(ctx),
      {
        x: args.length('x'),
        y: args.length('y'),
        depth: args.length('depth'),
        dwell,
      },
      location
    );
    return NULL_VALUE;
  },
};

const grooveFn: BuiltinDefinition = {
  description: 'Cut a straight slot between two points',
  params: [
    length('x1'),
    length('y1'),
    length('x2'),
    length('y2'),
    length('depth'),
  ],
  fn: (args, ctx, location) => {
    groove(
      writerFor(ctx),
      {
        x1: args.length('x1'),
        y1: args.length('y1'),
        x2: args.length('x2'),
        y2: args.length('y2'),
        depth: args.length('depth'),
      },
      location
    );
    return NULL_VALUE;
  },
};

const contourLineFn: BuiltinDefinition = {
  description: 'Cut a line from (x1, y1) to (x2, y2), or up by `up`',
  params: [
    length('x1'),
    length('y1'),
    optionalLength('x2'),
    optionalLength('y2'),
    length('depth'),
    optionalLength('up', 'Distance along +Y from (x1, y1)'),
  ],
  fn: (args, ctx, location) => {
    const x1 = args.length('x1');
    const y1 = args.length('y1');
    const x2 = args.optionalLength('x2');
    const y2 = args.optionalLength('y2');
    const up = args.optionalLength('up');

    let end: [number, number];
    if (up !== undefined) {
      if (x2 !== undefined || y2 !== undefined) {
        throw bindingError(
          "contour_line takes either 'x2' and 'y2' or 'up', not both",
          location
        );
      }
      end = [x1, y1 + up];
    } else {
      if (x2 === undefined || y2 === undefined) {
        throw bindingError(
          "contour_line requires 'x2' and 'y2', or 'up'",
          location
        );
      }
      end = [x2, y2];
    }

    contourLine(
      writerFor(ctx),
      { x1, y1, x2: end[0], y2: end[1], depth: args.length('depth') },
      location
    );
    return NULL_VALUE;
  },
};

const groovePocketFn: BuiltinDefinition = {
  description: 'Clear a rectangular pocket from its lower-left corner',
  params: [
    length('x'),
    length('y'),
    length('width'),
    length('height'),
    length('depth'),
  ],
  fn: (args, ctx, location) => {
    groovePocket(
      writerFor(ctx),
      {
        x: args.length('x'),
        y: args.length('y'),
        width: args.length('width'),
        height: args.length('height'),
        depth: args.length('depth'),
      },
      location
    );
    return NULL_VALUE;
  },
};

// ============================================================
// SEQUENCES
// ============================================================

const linspaceFn: BuiltinDefinition = {
  description: 'Evenly spaced values from start to stop inclusive',
  params: [
    { name: 'start', kind: 'number' },
    { name: 'stop', kind: 'number' },
    { name: 'count', kind: 'unitless' },
  ],
  fn: (args, ctx, location) =>
    linspace(
      args.number('start'),
      args.number('stop'),
      args.unitless('count'),
      ctx.limits.maxSequenceLength,
      location
    ),
};

// ============================================================
// REGISTRY
// ============================================================

export const BUILTINS = {
  cutter_diameter: cutterDiameter,
  material,
  define_material: defineMaterial,
  rpm,
  scale,
  comment,
  log,
  circle_pocket: circlePocketFn,
  drill: drillFn,
  groove: grooveFn,
  contour_line: contourLineFn,
  groove_pocket: groovePocketFn,
  linspace: linspaceFn,
} as const satisfies Record<string, BuiltinDefinition>;

/** Closed set of callable names */
export type BuiltinName = keyof typeof BUILTINS;

export const BUILTIN_NAMES: readonly BuiltinName[] = [
  'cutter_diameter',
  'material',
  'define_material',
  'rpm',
  'scale',
  'comment',
  'log',
  'circle_pocket',
  'drill',
  'groove',
  'contour_line',
  'groove_pocket',
  'linspace',
];

export function isBuiltinName(name: string): name is BuiltinName {
  return BUILTIN_NAMES.some((builtin) => builtin === name);
}
