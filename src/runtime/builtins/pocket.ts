/**
 * Pocket Clearing
 *
 * circle_pocket clears a round pocket with concentric rings; groove_pocket
 * clears a rectangle with inset loops. Both cut from the inside out and
 * keep every radial step within the material's step-over. A scaled round
 * pocket must keep its aspect ratio; a rectangle may scale per axis.
 */

import type { SourceLocation } from '../../types.js';
import { GCAD_ERROR_CODES, RuntimeError } from '../../types.js';
import {
  depthPasses,
  requirePositive,
  stepCount,
  type ToolpathWriter,
} from './motion.js';

export interface CirclePocket {
  readonly x: number;
  readonly y: number;
  readonly radius: number;
  readonly depth: number;
}

export interface RectPocket {
  /** Lower-left corner */
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  readonly depth: number;
}

function cutterTooLarge(
  pocket: string,
  location?: SourceLocation
): RuntimeError {
  return new RuntimeError(
    GCAD_ERROR_CODES.RUNTIME_INVALID_OPERATION,
    `Cutter diameter is larger than the ${pocket}`,
    location
  );
}

/**
 * Tool-centre ring radii, innermost first. With R the pocket radius and
 * r the tool radius, ring k of n sits at (R - r) * k / n.
 */
export function ringRadii(
  radius: number,
  toolRadius: number,
  maxStep: number
): number[] {
  const reach = radius - toolRadius;
  const n = stepCount(reach, maxStep);
  return Array.from({ length: n }, (_, k) => (reach * (k + 1)) / n);
}

export function circlePocket(
  writer: ToolpathWriter,
  pocket: CirclePocket,
  location?: SourceLocation
): void {
  requirePositive(pocket.radius, 'Pocket radius', location);
  requirePositive(pocket.depth, 'Pocket depth', location);
  const radius =
    pocket.radius * writer.uniformScale('circle_pocket', location);
  const [x, y] = writer.place(pocket.x, pocket.y, location);
  const { depth } = pocket;
  if (writer.radius > radius) {
    throw cutterTooLarge('pocket', location);
  }

  const { stepover, depthPerPass } = writer.profile;
  const rings = ringRadii(
    radius,
    writer.radius,
    stepover * writer.machine.cutterDiameter
  );
  const passes = depthPasses(depth, depthPerPass);

  writer.spindle();
  writer.approach(x, y);

  for (const [index, z] of passes.entries()) {
    writer.plunge(z);

    for (const rho of rings) {
      writer.cut(x + rho, y);
      writer.arc('ccw', x - rho, y, x, y);
      writer.arc('ccw', x + rho, y, x, y);
    }

    if (index === passes.length - 1) {
      writer.retract();
    } else {
      writer.rapid(undefined, undefined, z + writer.settings.clearanceHeight);
      writer.rapid(x, y);
    }
  }
}

/**
 * Corner loops of a rectangular pocket, innermost first. Each loop is a
 * closed path of five points starting at its lower-left corner.
 */
export function insetLoops(
  pocket: RectPocket,
  toolRadius: number,
  maxStep: number
): [number, number][][] {
  const left = pocket.x + toolRadius;
  const bottom = pocket.y + toolRadius;
  const right = pocket.x + pocket.width - toolRadius;
  const top = pocket.y + pocket.height - toolRadius;
  const half = Math.min(right - left, top - bottom) / 2;
  const n = stepCount(half, maxStep);

  const loops: [number, number][][] = [];
  for (let k = n; k >= 0; k--) {
    const inset = n === 0 ? 0 : (half * k) / n;
    const x0 = left + inset;
    const y0 = bottom + inset;
    const x1 = right - inset;
    const y1 = top - inset;
    loops.push([
      [x0, y0],
      [x1, y0],
      [x1, y1],
      [x0, y1],
      [x0, y0],
    ]);
  }
  return loops;
}

/** The pocket rectangle in machine coordinates, lower-left corner first */
function placeRect(
  writer: ToolpathWriter,
  pocket: RectPocket,
  location?: SourceLocation
): RectPocket {
  const [ax, ay] = writer.place(pocket.x, pocket.y, location);
  const [bx, by] = writer.place(
    pocket.x + pocket.width,
    pocket.y + pocket.height,
    location
  );
  return {
    x: Math.min(ax, bx),
    y: Math.min(ay, by),
    width: Math.abs(bx - ax),
    height: Math.abs(by - ay),
    depth: pocket.depth,
  };
}

export function groovePocket(
  writer: ToolpathWriter,
  pocket: RectPocket,
  location?: SourceLocation
): void {
  requirePositive(pocket.width, 'Pocket width', location);
  requirePositive(pocket.height, 'Pocket height', location);
  requirePositive(pocket.depth, 'Pocket depth', location);
  const rect = placeRect(writer, pocket, location);
  const diameter = writer.machine.cutterDiameter;
  if (diameter > rect.width || diameter > rect.height) {
    throw cutterTooLarge('pocket', location);
  }

  const loops = insetLoops(
    rect,
    writer.radius,
    writer.profile.stepover * diameter
  );
  const passes = depthPasses(rect.depth, writer.profile.depthPerPass);
  const [start] = loops[0] ?? [];
  if (!start) return;
  const [startX, startY] = start;

  writer.spindle();
  writer.approach(startX, startY);

  for (const [index, z] of passes.entries()) {
    writer.plunge(z);

    for (const loop of loops) {
      for (const [px, py] of loop) {
        writer.cut(px, py);
      }
    }

    if (index === passes.length - 1) {
      writer.retract();
    } else {
      writer.rapid(undefined, undefined, z + writer.settings.clearanceHeight);
      writer.rapid(startX, startY);
    }
  }
}
