/**
 * Toolpath Buffer
 *
 * Append-only, order-preserving store of segments. Written by the
 * evaluator during generation and handed whole to the emitter.
 */

import type { ToolpathSegment } from './types.js';

export class ToolpathBuffer {
  private readonly entries: ToolpathSegment[] = [];

  append(...segments: ToolpathSegment[]): void {
    this.entries.push(...segments);
  }

  get length(): number {
    return this.entries.length;
  }

  /** Snapshot of the segments in program order */
  get segments(): readonly ToolpathSegment[] {
    return [...this.entries];
  }
}
