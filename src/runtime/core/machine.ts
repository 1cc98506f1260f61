/**
 * Machine State
 *
 * The mutable record every machining operation reads and updates: tool,
 * material, spindle, XY scale and last known tool position. One instance
 * lives for one compilation and is passed explicitly to each operation.
 */

import type {
  GcadConfig,
  MachineSettings,
  MaterialProfile,
} from '../../config.js';
import type { SourceLocation } from '../../types.js';
import { ConfigError, GCAD_ERROR_CODES } from '../../types.js';

/** Absolute machine position in mm (after scaling); null until the axis is first commanded */
export interface Position {
  x: number | null;
  y: number | null;
  z: number | null;
}

/** XY factors set by scale(); programmed coordinates are multiplied by them */
export interface Scale {
  x: number;
  y: number;
}

export interface MachineState {
  /** mm */
  cutterDiameter: number;
  material: string;
  profile: MaterialProfile;
  /** Set by rpm(); replaces the material's spindle speed */
  rpmOverride: number | null;
  /** Speed last written to the toolpath; null while the spindle is off */
  spindleRpm: number | null;
  readonly position: Position;
  scale: Scale;
  readonly materials: Map<string, MaterialProfile>;
  readonly settings: MachineSettings;
}

/** Look up a material profile or fail with CONFIG_UNKNOWN_MATERIAL */
export function findMaterial(
  materials: ReadonlyMap<string, MaterialProfile>,
  name: string,
  location?: SourceLocation
): MaterialProfile {
  const profile = materials.get(name);
  if (!profile) {
    throw new ConfigError(
      `Unknown material: ${name}`,
      location,
      { material: name, available: [...materials.keys()] },
      GCAD_ERROR_CODES.CONFIG_UNKNOWN_MATERIAL
    );
  }
  return profile;
}

export function createMachineState(config: GcadConfig): MachineState {
  const materials = new Map(Object.entries(config.materials));
  const material = config.defaults.material;

  return {
    cutterDiameter: config.defaults.cutterDiameter,
    material,
    profile: findMaterial(materials, material),
    rpmOverride: null,
    spindleRpm: null,
    position: { x: null, y: null, z: null },
    scale: { x: 1, y: 1 },
    materials,
    settings: config.machine,
  };
}

/** Spindle speed operations should run at */
export function effectiveRpm(machine: MachineState): number {
  return machine.rpmOverride ?? machine.profile.rpm;
}
