/**
 * Peck Drilling
 *
 * Each peck plunges deeper than the last, then lifts to clearance height
 * to clear chips. Re-entry rapids back down to just above the previous
 * peck's depth before feeding on.
 */

import type { SourceLocation } from '../../types.js';
import { depthPasses, requirePositive, type ToolpathWriter } from './motion.js';

export interface DrillHole {
  readonly x: number;
  readonly y: number;
  readonly depth: number;
  /** Pause at the bottom of the hole, in seconds */
  readonly dwell: number;
}

export function drill(
  writer: ToolpathWriter,
  hole: DrillHole,
  location?: SourceLocation
): void {
  requirePositive(hole.depth, 'Drill depth', location);

  const { clearanceHeight, peckDepth } = writer.settings;
  const pecks = depthPasses(hole.depth, peckDepth);

  const [x, y] = writer.place(hole.x, hole.y, location);

  writer.spindle();
  writer.approach(x, y);

  let previous: number | null = null;
  for (const [index, z] of pecks.entries()) {
    if (previous !== null) {
      writer.rapid(undefined, undefined, previous + clearanceHeight);
    }
    writer.plunge(z);

    if (index < pecks.length - 1) {
      writer.rapid(undefined, undefined, clearanceHeight);
    }
    previous = z;
  }

  if (hole.dwell > 0) {
    writer.dwell(hole.dwell);
  }
  writer.retract();
}
