/**
 * Straight Cuts
 *
 * groove cuts a slot back and forth between two points, one stroke per
 * depth pass. contour_line always cuts from the first point to the
 * second, returning above the cut between passes.
 */

import type { SourceLocation } from '../../types.js';
import { depthPasses, requirePositive, type ToolpathWriter } from './motion.js';

export interface Line {
  readonly x1: number;
  readonly y1: number;
  readonly x2: number;
  readonly y2: number;
  readonly depth: number;
}

/** The line's endpoints in machine coordinates */
function placeLine(
  writer: ToolpathWriter,
  line: Line,
  location?: SourceLocation
): Line {
  const [x1, y1] = writer.place(line.x1, line.y1, location);
  const [x2, y2] = writer.place(line.x2, line.y2, location);
  return { x1, y1, x2, y2, depth: line.depth };
}

export function groove(
  writer: ToolpathWriter,
  programmed: Line,
  location?: SourceLocation
): void {
  requirePositive(programmed.depth, 'Groove depth', location);
  const line = placeLine(writer, programmed, location);
  const passes = depthPasses(line.depth, writer.profile.depthPerPass);

  writer.spindle();
  writer.approach(line.x1, line.y1);

  for (const [index, z] of passes.entries()) {
    writer.plunge(z);
    if (index % 2 === 0) {
      writer.cut(line.x2, line.y2);
    } else {
      writer.cut(line.x1, line.y1);
    }
  }

  writer.retract();
}

export function contourLine(
  writer: ToolpathWriter,
  programmed: Line,
  location?: SourceLocation
): void {
  requirePositive(programmed.depth, 'Cut depth', location);
  const line = placeLine(writer, programmed, location);
  const passes = depthPasses(line.depth, writer.profile.depthPerPass);

  writer.spindle();
  writer.approach(line.x1, line.y1);

  for (const [index, z] of passes.entries()) {
    writer.plunge(z);
    writer.cut(line.x2, line.y2);

    if (index === passes.length - 1) {
      writer.retract();
    } else {
      writer.rapid(undefined, undefined, z + writer.settings.clearanceHeight);
      writer.rapid(line.x1, line.y1);
    }
  }
}
