/**
 * Toolpath Writer
 *
 * Appends segments for one machining operation while keeping the machine
 * state's position and spindle in step with what was written.
 *
 * Motion methods take machine coordinates. Operations map their programmed
 * geometry through place() first and generate passes in machine space, so
 * step-over and cutter checks apply to the scaled result.
 */

import type { MaterialProfile, MachineSettings } from '../../config.js';
import type { ArcDirection, ToolpathBuffer } from '../../gcode/index.js';
import type { SourceLocation } from '../../types.js';
import { GCAD_ERROR_CODES, RuntimeError } from '../../types.js';
import { effectiveRpm, type MachineState } from '../core/machine.js';

/** Guards against ceil(3 / 0.3) becoming 11 through rounding */
const EPSILON = 1e-9;

/**
 * Number of equal steps needed so none exceeds maxStep.
 * Zero for a zero distance.
 */
export function stepCount(distance: number, maxStep: number): number {
  return Math.max(0, Math.ceil(distance / maxStep - EPSILON));
}

/**
 * Z level reached by each depth pass: pass i of n cuts to -depth*i/n, so
 * the last pass lands exactly on -depth.
 */
export function depthPasses(depth: number, depthPerPass: number): number[] {
  const n = Math.max(1, stepCount(depth, depthPerPass));
  const levels: number[] = [];
  for (let i = 1; i <= n; i++) {
    levels.push(i === n ? -depth : (-depth * i) / n);
  }
  return levels;
}

/** Reject non-positive dimensions such as a zero depth */
export function requirePositive(
  value: number,
  what: string,
  location?: SourceLocation
): void {
  if (!(value > 0)) {
    throw new RuntimeError(
      GCAD_ERROR_CODES.RUNTIME_INVALID_OPERATION,
      `${what} must be greater than zero, got ${String(value)}mm`,
      location,
      { value }
    );
  }
}

export class ToolpathWriter {
  constructor(
    readonly machine: MachineState,
    private readonly out: ToolpathBuffer
  ) {}

  get settings(): MachineSettings {
    return this.machine.settings;
  }

  get profile(): MaterialProfile {
    return this.machine.profile;
  }

  /** Tool radius in mm */
  get radius(): number {
    return this.machine.cutterDiameter / 2;
  }

  /**
   * Map a programmed XY point through the active scale() factors.
   *
   * @throws RuntimeError when the scaled point is not a finite number
   */
  place(x: number, y: number, location?: SourceLocation): [number, number] {
    const point: [number, number] = [
      x * this.machine.scale.x,
      y * this.machine.scale.y,
    ];
    if (!point.every(Number.isFinite)) {
      throw new RuntimeError(
        GCAD_ERROR_CODES.RUNTIME_INVALID_OPERATION,
        'Scaled coordinate is out of range',
        location,
        { x, y, scale: { ...this.machine.scale } }
      );
    }
    return point;
  }

  /**
   * Factor applied to radii. Circles stay circles only when both axes
   * scale by the same magnitude; a mirrored axis is allowed.
   *
   * @throws RuntimeError under non-uniform scaling
   */
  uniformScale(operation: string, location?: SourceLocation): number {
    const { x, y } = this.machine.scale;
    if (Math.abs(x) !== Math.abs(y)) {
      throw new RuntimeError(
        GCAD_ERROR_CODES.RUNTIME_INVALID_OPERATION,
        `${operation} cannot be cut under non-uniform scale(${String(x)}, ${String(y)})`,
        location,
        { scale: { x, y } }
      );
    }
    return Math.abs(x);
  }

  /** Start or re-speed the spindle if the required rpm is not set yet */
  spindle(): void {
    const rpm = effectiveRpm(this.machine);
    if (this.machine.spindleRpm !== rpm) {
      this.out.append({ kind: 'spindle', rpm });
      this.machine.spindleRpm = rpm;
    }
  }

  rapid(x?: number, y?: number, z?: number): void {
    this.out.append({ kind: 'rapid', x, y, z });
    this.track(x, y, z);
  }

  /** Cutting move at the material feed rate */
  cut(x?: number, y?: number, z?: number): void {
    this.out.append({ kind: 'linear', x, y, z, feed: this.profile.feedRate });
    this.track(x, y, z);
  }

  /** Vertical feed move at the material plunge rate */
  plunge(z: number): void {
    this.out.append({ kind: 'linear', z, feed: this.profile.plungeRate });
    this.track(undefined, undefined, z);
  }

  /** Arc in the XY plane from the current position around (cx, cy) */
  arc(
    direction: ArcDirection,
    x: number,
    y: number,
    cx: number,
    cy: number
  ): void {
    const { x: fromX, y: fromY } = this.machine.position;
    if (fromX === null || fromY === null) {
      throw new Error('Arc start position is unknown');
    }
    this.out.append({
      kind: 'arc',
      direction,
      x,
      y,
      i: cx - fromX,
      j: cy - fromY,
      feed: this.profile.feedRate,
    });
    this.track(x, y, undefined);
  }

  dwell(seconds: number): void {
    this.out.append({ kind: 'dwell', seconds });
  }

  comment(text: string): void {
    this.out.append({ kind: 'comment', text });
  }

  /** Rapid up to safe height */
  retract(): void {
    this.rapid(undefined, undefined, this.settings.safeHeight);
  }

  /**
   * Travel to (x, y) at safe height, then drop to clearance height ready
   * to plunge. Retracts first when the tool is known to be lower.
   */
  approach(x: number, y: number): void {
    const { safeHeight, clearanceHeight } = this.settings;
    const z = this.machine.position.z;
    if (z !== null && z < safeHeight) {
      this.retract();
    }
    this.rapid(x, y, safeHeight);
    this.rapid(undefined, undefined, clearanceHeight);
  }

  private track(x?: number, y?: number, z?: number): void {
    const position = this.machine.position;
    if (x !== undefined) position.x = x;
    if (y !== undefined) position.y = y;
    if (z !== undefined) position.z = z;
  }
}
