/**
 * gcad G-code
 */

export { ToolpathBuffer } from './buffer.js';
export { emitGcode, type EmitOptions } from './emitter.js';
export { formatNumber } from './format.js';
export {
  isMotion,
  type AbsoluteSegment,
  type ArcDirection,
  type ArcSegment,
  type CommentSegment,
  type DwellSegment,
  type LinearSegment,
  type MotionSegment,
  type ProgramEndSegment,
  type RapidSegment,
  type SegmentKind,
  type SpindleSegment,
  type SpindleStopSegment,
  type ToolpathSegment,
  type UnitsSegment,
} from './types.js';
