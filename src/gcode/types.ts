/**
 * Toolpath Segment Types
 *
 * One segment is one machine directive. Coordinates are absolute
 * millimeters; an omitted axis keeps its previous value.
 */

// ============================================================
// MOTION
// ============================================================

/** G0 rapid traverse */
export interface RapidSegment {
  readonly kind: 'rapid';
  readonly x?: number | undefined;
  readonly y?: number | undefined;
  readonly z?: number | undefined;
}

/** G1 feed move */
export interface LinearSegment {
  readonly kind: 'linear';
  readonly x?: number | undefined;
  readonly y?: number | undefined;
  readonly z?: number | undefined;
  /** mm/min */
  readonly feed: number;
}

export type ArcDirection = 'cw' | 'ccw';

/** G2/G3 arc in the XY plane */
export interface ArcSegment {
  readonly kind: 'arc';
  readonly direction: ArcDirection;
  readonly x: number;
  readonly y: number;
  /** Centre offset from the arc's start point */
  readonly i: number;
  readonly j: number;
  readonly feed: number;
}

/** G4 pause */
export interface DwellSegment {
  readonly kind: 'dwell';
  readonly seconds: number;
}

// ============================================================
// DIRECTIVES
// ============================================================

export interface CommentSegment {
  readonly kind: 'comment';
  readonly text: string;
}

/** M03 spindle on, clockwise */
export interface SpindleSegment {
  readonly kind: 'spindle';
  readonly rpm: number;
}

export interface SpindleStopSegment {
  readonly kind: 'spindleStop';
}

/** G21 */
export interface UnitsSegment {
  readonly kind: 'units';
}

/** G90 */
export interface AbsoluteSegment {
  readonly kind: 'absolute';
}

/** M02 */
export interface ProgramEndSegment {
  readonly kind: 'programEnd';
}

export type ToolpathSegment =
  | RapidSegment
  | LinearSegment
  | ArcSegment
  | DwellSegment
  | CommentSegment
  | SpindleSegment
  | SpindleStopSegment
  | UnitsSegment
  | AbsoluteSegment
  | ProgramEndSegment;

export type SegmentKind = ToolpathSegment['kind'];

/** Motion segments: those that move the tool */
export type MotionSegment = RapidSegment | LinearSegment | ArcSegment;

export function isMotion(segment: ToolpathSegment): segment is MotionSegment {
  return (
    segment.kind === 'rapid' ||
    segment.kind === 'linear' ||
    segment.kind === 'arc'
  );
}
