/**
 * G-code Emitter
 *
 * Serializes a toolpath in a single pass. Modal words are suppressed:
 * the motion mode is written only when it changes, and X, Y, Z, F and S
 * only when their formatted value differs from the last one written.
 */

import { formatMWord, formatNumber } from './format.js';
import type { ToolpathSegment } from './types.js';
import { isMotion } from './types.js';

export interface EmitOptions {
  /** Decimal places for coordinates and rates (default: 3) */
  readonly precision?: number | undefined;
}

type Letter = 'G' | 'M' | 'X' | 'Y' | 'Z' | 'I' | 'J' | 'F' | 'S' | 'P';

interface Word {
  readonly letter: Letter;
  readonly value: number;
}

/** Letters whose last written value carries over to later lines */
const MODAL_REGISTERS: ReadonlySet<Letter> = new Set([
  'X',
  'Y',
  'Z',
  'F',
  'S',
]);

/** G0 to G3 select the motion mode */
const MOTION_MODES: ReadonlySet<number> = new Set([0, 1, 2, 3]);

function word(letter: Letter, value: number | undefined): Word[] {
  return value === undefined ? [] : [{ letter, value }];
}

function toWords(segment: ToolpathSegment): Word[] {
  switch (segment.kind) {
    case 'rapid':
      return [
        ...word('G', 0),
        ...word('X', segment.x),
        ...word('Y', segment.y),
        ...word('Z', segment.z),
      ];
    case 'linear':
      return [
        ...word('G', 1),
        ...word('X', segment.x),
        ...word('Y', segment.y),
        ...word('Z', segment.z),
        ...word('F', segment.feed),
      ];
    case 'arc':
      return [
        ...word('G', segment.direction === 'cw' ? 2 : 3),
        ...word('X', segment.x),
        ...word('Y', segment.y),
        ...word('I', segment.i),
        ...word('J', segment.j),
        ...word('F', segment.feed),
      ];
    case 'dwell':
      return [...word('G', 4), ...word('P', segment.seconds)];
    case 'spindle':
      return [...word('M', 3), ...word('S', segment.rpm)];
    case 'spindleStop':
      return word('M', 5);
    case 'units':
      return word('G', 21);
    case 'absolute':
      return word('G', 90);
    case 'programEnd':
      return word('M', 2);
    case 'comment':
      return [];
  }
}

/** Tracks what the machine already knows so repeated words can be dropped */
class ModalState {
  private motion: number | null = null;
  private readonly registers = new Map<Letter, string>();

  constructor(private readonly precision: number) {}

  render(w: Word): string {
    switch (w.letter) {
      case 'G':
        return `G${String(w.value)}`;
      case 'M':
        return formatMWord(w.value);
      default:
        return `${w.letter}${formatNumber(w.value, this.precision)}`;
    }
  }

  /** Words of the segment that change machine state */
  pending(words: readonly Word[]): Word[] {
    return words.filter((w) => {
      if (w.letter === 'G' && MOTION_MODES.has(w.value)) {
        return w.value !== this.motion;
      }
      if (MODAL_REGISTERS.has(w.letter)) {
        return this.registers.get(w.letter) !== this.render(w);
      }
      return true;
    });
  }

  commit(words: readonly Word[]): void {
    for (const w of words) {
      if (w.letter === 'G' && MOTION_MODES.has(w.value)) {
        this.motion = w.value;
      } else if (MODAL_REGISTERS.has(w.letter)) {
        this.registers.set(w.letter, this.render(w));
      }
    }
  }
}

function hasCoordinate(words: readonly Word[]): boolean {
  return words.some(
    (w) => w.letter === 'X' || w.letter === 'Y' || w.letter === 'Z'
  );
}

/**
 * Serialize a toolpath into G-code text.
 *
 * The program is framed by `G90`/`G21` and `M05`/`M02`. Motion lines
 * that would carry no coordinate after suppression are dropped.
 *
 * @example
 * ```typescript
 * emitGcode([{ kind: 'rapid', x: 1, y: 2, z: 5 }]);
 * // 'G90\nG21\nG0 X1 Y2 Z5\nM05\nM02\n'
 * ```
 */
export function emitGcode(
  segments: readonly ToolpathSegment[],
  options: EmitOptions = {}
): string {
  const state = new ModalState(options.precision ?? 3);
  const program: ToolpathSegment[] = [
    { kind: 'absolute' },
    { kind: 'units' },
    ...segments,
    { kind: 'spindleStop' },
    { kind: 'programEnd' },
  ];
  const lines: string[] = [];

  for (const segment of program) {
    if (segment.kind === 'comment') {
      lines.push(`(${segment.text})`);
      continue;
    }

    const words = state.pending(toWords(segment));
    if (isMotion(segment) && !hasCoordinate(words)) {
      continue;
    }

    lines.push(words.map((w) => state.render(w)).join(' '));
    state.commit(words);
  }

  return `${lines.join('\n')}\n`;
}
