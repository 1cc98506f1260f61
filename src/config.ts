/**
 * Configuration Loader for gcad
 * Loads machine settings and material profiles from YAML.
 *
 * The shipped defaults.yaml is always loaded first; a user file given
 * with --config is validated and merged over it.
 */

import { readFileSync } from 'node:fs';
import * as yaml from 'yaml';
import { ConfigError, GCAD_ERROR_CODES } from './types.js';

// ============================================================
// TYPES
// ============================================================

/** Feed and speed class for one material */
export interface MaterialProfile {
  /** Radial step as a fraction of the cutter diameter */
  readonly stepover: number;
  /** Maximum stepdown per depth pass (mm) */
  readonly depthPerPass: number;
  /** Cutting feed (mm/min) */
  readonly feedRate: number;
  /** Plunge feed (mm/min) */
  readonly plungeRate: number;
  readonly rpm: number;
}

export interface MachineSettings {
  /** Z height for travel moves (mm) */
  readonly safeHeight: number;
  /** Z height rapids descend to before plunging (mm) */
  readonly clearanceHeight: number;
  /** Maximum depth of one drilling peck (mm) */
  readonly peckDepth: number;
  /** Decimal places in emitted words */
  readonly precision: number;
}

export interface DefaultSettings {
  readonly material: string;
  /** mm */
  readonly cutterDiameter: number;
}

export interface LimitSettings {
  /** Largest count linspace accepts */
  readonly maxSequenceLength: number;
}

export interface GcadConfig {
  readonly machine: MachineSettings;
  readonly defaults: DefaultSettings;
  readonly limits: LimitSettings;
  readonly materials: Readonly<Record<string, MaterialProfile>>;
}

/** A validated user configuration; every section is optional */
export interface ConfigOverrides {
  readonly machine?: Partial<MachineSettings> | undefined;
  readonly defaults?: Partial<DefaultSettings> | undefined;
  readonly limits?: Partial<LimitSettings> | undefined;
  readonly materials?: Readonly<Record<string, MaterialProfile>> | undefined;
}

// ============================================================
// CONSTANTS
// ============================================================

const DEFAULTS_URL = new URL('../defaults.yaml', import.meta.url);

const MACHINE_KEYS = [
  'safeHeight',
  'clearanceHeight',
  'peckDepth',
  'precision',
] as const;

const PROFILE_KEYS = [
  'stepover',
  'depthPerPass',
  'feedRate',
  'plungeRate',
  'rpm',
] as const;

const SECTIONS = ['machine', 'defaults', 'limits', 'materials'] as const;

/** Keys defaults.yaml leaves out fall back to these */
const BASE_CONFIG: GcadConfig = {
  machine: {
    safeHeight: 5,
    clearanceHeight: 0.25,
    peckDepth: 2,
    precision: 3,
  },
  defaults: { material: 'default', cutterDiameter: 3.175 },
  limits: { maxSequenceLength: 100000 },
  materials: {},
};

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(
  keys: readonly T[],
  key: string
): key is T {
  return keys.some((k) => k === key);
}

function invalid(source: string, reason: string): ConfigError {
  return new ConfigError(`Invalid configuration (${source}): ${reason}`);
}

function section(
  data: Record<string, unknown>,
  name: string,
  source: string
): Record<string, unknown> | undefined {
  const value = data[name];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) throw invalid(source, `${name} must be a mapping`);
  return value;
}

function positiveNumber(value: unknown, path: string, source: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw invalid(source, `${path} must be a positive number`);
  }
  return value;
}

function validateMachine(
  data: Record<string, unknown>,
  source: string
): Partial<MachineSettings> {
  const machine: { -readonly [K in keyof MachineSettings]?: number } = {};

  for (const [key, value] of Object.entries(data)) {
    if (!isOneOf(MACHINE_KEYS, key)) {
      throw invalid(source, `unknown key machine.${key}`);
    }
    if (key === 'precision') {
      if (
        typeof value !== 'number' ||
        !Number.isInteger(value) ||
        value < 0 ||
        value > 6
      ) {
        throw invalid(source, 'machine.precision must be an integer 0-6');
      }
      machine.precision = value;
    } else if (key === 'clearanceHeight') {
      if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
        throw invalid(source, 'machine.clearanceHeight must be 0 or more');
      }
      machine.clearanceHeight = value;
    } else {
      machine[key] = positiveNumber(value, `machine.${key}`, source);
    }
  }

  return machine;
}

function validateDefaults(
  data: Record<string, unknown>,
  source: string
): Partial<DefaultSettings> {
  const defaults: { material?: string; cutterDiameter?: number } = {};

  for (const [key, value] of Object.entries(data)) {
    if (key === 'material') {
      if (typeof value !== 'string' || value.length === 0) {
        throw invalid(source, 'defaults.material must be a material name');
      }
      defaults.material = value;
    } else if (key === 'cutterDiameter') {
      defaults.cutterDiameter = positiveNumber(
        value,
        'defaults.cutterDiameter',
        source
      );
    } else {
      throw invalid(source, `unknown key defaults.${key}`);
    }
  }

  return defaults;
}

function validateLimits(
  data: Record<string, unknown>,
  source: string
): Partial<LimitSettings> {
  const limits: { maxSequenceLength?: number } = {};

  for (const [key, value] of Object.entries(data)) {
    if (key !== 'maxSequenceLength') {
      throw invalid(source, `unknown key limits.${key}`);
    }
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      throw invalid(
        source,
        'limits.maxSequenceLength must be a positive integer'
      );
    }
    limits.maxSequenceLength = value;
  }

  return limits;
}

/**
 * Validate one material profile. All fields are required; stepover must
 * lie in (0, 1].
 */
export function validateProfile(
  data: unknown,
  path: string,
  source: string
): MaterialProfile {
  if (!isRecord(data)) throw invalid(source, `${path} must be a mapping`);

  for (const key of Object.keys(data)) {
    if (!isOneOf(PROFILE_KEYS, key)) {
      throw invalid(source, `unknown key ${path}.${key}`);
    }
  }

  const profile: MaterialProfile = {
    stepover: positiveNumber(data['stepover'], `${path}.stepover`, source),
    depthPerPass: positiveNumber(
      data['depthPerPass'],
      `${path}.depthPerPass`,
      source
    ),
    feedRate: positiveNumber(data['feedRate'], `${path}.feedRate`, source),
    plungeRate: positiveNumber(
      data['plungeRate'],
      `${path}.plungeRate`,
      source
    ),
    rpm: positiveNumber(data['rpm'], `${path}.rpm`, source),
  };

  if (profile.stepover > 1) {
    throw invalid(source, `${path}.stepover must not exceed 1`);
  }

  return profile;
}

/**
 * Validate parsed YAML as a configuration file.
 * Throws ConfigError naming the first offending key.
 */
export function validateConfig(
  data: unknown,
  source = '<config>'
): ConfigOverrides {
  if (data === null || data === undefined) return {};
  if (!isRecord(data)) throw invalid(source, 'must be a mapping');

  for (const key of Object.keys(data)) {
    if (!isOneOf(SECTIONS, key)) {
      throw invalid(source, `unknown key ${key}`);
    }
  }

  const machine = section(data, 'machine', source);
  const defaults = section(data, 'defaults', source);
  const limits = section(data, 'limits', source);
  const materials = section(data, 'materials', source);

  return {
    machine: machine && validateMachine(machine, source),
    defaults: defaults && validateDefaults(defaults, source),
    limits: limits && validateLimits(limits, source),
    materials:
      materials &&
      Object.fromEntries(
        Object.entries(materials).map(([name, profile]) => [
          name,
          validateProfile(profile, `materials.${name}`, source),
        ])
      ),
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Parse YAML text into validated overrides.
 *
 * @throws ConfigError if the YAML is malformed or fails validation
 */
export function parseConfig(
  text: string,
  source = '<config>'
): ConfigOverrides {
  let parsed: unknown;
  try {
    parsed = yaml.parse(text);
  } catch (err) {
    throw new ConfigError(
      `Invalid configuration (${source}): invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }
  return validateConfig(parsed, source);
}

/** Merge overrides over a base configuration and check the result */
export function mergeConfig(
  base: GcadConfig,
  overrides: ConfigOverrides
): GcadConfig {
  const merged: GcadConfig = {
    machine: { ...base.machine, ...overrides.machine },
    defaults: { ...base.defaults, ...overrides.defaults },
    limits: { ...base.limits, ...overrides.limits },
    materials: { ...base.materials, ...overrides.materials },
  };

  if (merged.machine.clearanceHeight >= merged.machine.safeHeight) {
    throw new ConfigError(
      'Invalid configuration: machine.clearanceHeight must be below machine.safeHeight'
    );
  }

  if (!Object.hasOwn(merged.materials, merged.defaults.material)) {
    throw new ConfigError(
      `Unknown default material: ${merged.defaults.material}`,
      undefined,
      { material: merged.defaults.material },
      GCAD_ERROR_CODES.CONFIG_UNKNOWN_MATERIAL
    );
  }

  return merged;
}

let cachedDefaults: GcadConfig | undefined;

/**
 * Load the built-in configuration shipped in defaults.yaml.
 * The file is read once per process.
 */
export function loadDefaultConfig(): GcadConfig {
  if (cachedDefaults) return cachedDefaults;

  const overrides = parseConfig(
    readFileSync(DEFAULTS_URL, 'utf-8'),
    'defaults.yaml'
  );
  cachedDefaults = mergeConfig(BASE_CONFIG, overrides);
  return cachedDefaults;
}

/**
 * Load the defaults and, when given, a user configuration file over them.
 *
 * @throws ConfigError if the file cannot be read or is invalid
 */
export function loadConfig(path?: string): GcadConfig {
  const defaults = loadDefaultConfig();
  if (path === undefined) return defaults;

  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Invalid configuration (${path}): failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return mergeConfig(defaults, parseConfig(text, path));
}
