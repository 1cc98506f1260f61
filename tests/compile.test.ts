/**
 * gcad Compile Tests
 * Whole programs through the shipped configuration
 */

import { describe, expect, it } from 'vitest';
import {
  compile,
  ConfigError,
  GcadError,
  ParseError,
  unitless,
} from '../src/index.js';
import { testConfig } from './helpers/runtime.js';

function lines(source: string): string[] {
  return compile(source).gcode.trimEnd().split('\n');
}

function compileError(source: string): GcadError {
  try {
    compile(source);
  } catch (err) {
    if (err instanceof GcadError) return err;
    throw err;
  }
  throw new Error('Expected compilation to fail');
}

/** One peck drill cycle to 5mm after the approach to the hole */
const PECKS_TO_5MM = [
  'Z0.25',
  'G1 Z-1.667',
  'G0 Z0.25',
  'Z-1.417',
  'G1 Z-3.333',
  'G0 Z0.25',
  'Z-3.083',
  'G1 Z-5',
  'G0 Z5',
];

describe('gcad compile', () => {
  describe('circle pocket with the default cutter and material', () => {
    const output = lines('circle_pocket(10mm, 10mm, radius=5mm, depth=3mm);');

    it('starts the spindle and moves over the centre at safe height', () => {
      expect(output.slice(0, 6)).toEqual([
        'G90',
        'G21',
        'M03 S12000',
        'G0 X10 Y10 Z5',
        'Z0.25',
        'G1 Z-1 F200',
      ]);
    });

    it('steps down 1mm per pass to exactly 3mm', () => {
      const plunges = output.filter((line) => /^G1 Z-\d/.test(line));
      expect(plunges).toEqual(['G1 Z-1 F200', 'G1 Z-2 F200', 'G1 Z-3 F200']);
    });

    it('clears three rings of two arcs in every pass', () => {
      const arcs = output.filter((line) => / J0$/.test(line));
      expect(arcs).toHaveLength(18);
    });

    it('ends at safe height with the spindle stopped', () => {
      expect(output.slice(-3)).toEqual(['G0 Z5', 'M05', 'M02']);
    });
  });

  describe('drilling along a linspace', () => {
    it('drills three holes to 5mm in increasing pecks', () => {
      const output = lines(
        'for y in linspace(0mm, 10mm, 3) { drill(0mm, y, 5mm); }'
      );

      expect(output).toEqual([
        'G90',
        'G21',
        'M03 S12000',
        'G0 X0 Y0 Z5',
        'Z0.25',
        'G1 Z-1.667 F200',
        ...PECKS_TO_5MM.slice(2),
        'Y5',
        ...PECKS_TO_5MM,
        'Y10',
        ...PECKS_TO_5MM,
        'M05',
        'M02',
      ]);
    });
  });

  describe('results', () => {
    it('returns the toolpath and global variables', () => {
      const result = compile("comment('setup'); n = 2;", {
        config: testConfig(),
      });

      expect(result.segments).toEqual([{ kind: 'comment', text: 'setup' }]);
      expect(result.variables).toEqual({ n: unitless(2) });
      expect(result.gcode).toBe('G90\nG21\n(setup)\nM05\nM02\n');
    });

    it('writes very large coordinates in plain decimal', () => {
      const output = lines(
        'x = 10m * 100000000000000000; drill(x, 0mm, 1mm);'
      );
      expect(output[3]).toBe('G0 X1000000000000000000000 Y0 Z5');
    });

    it('uses the configured precision', () => {
      const config = testConfig();
      const result = compile('drill(0mm, 0mm, 5mm);', {
        config: { ...config, machine: { ...config.machine, precision: 1 } },
      });

      expect(result.gcode.split('\n')).toContain('G1 Z-1.7 F100');
    });
  });

  describe('errors', () => {
    it('rejects an unterminated call before running anything', () => {
      const err = compileError('circle_pocket(10mm, 10mm;');
      expect(err).toBeInstanceOf(ParseError);
      expect(err.kind).toBe('SyntaxError');
    });

    it('rejects an unknown function before running anything', () => {
      const logs: string[] = [];
      expect(() =>
        compile("log('ran'); pockett(1mm);", {
          callbacks: { onLog: () => logs.push('ran') },
        })
      ).toThrow("Unknown function 'pockett'");
      expect(logs).toEqual([]);
    });

    it('names an unknown material', () => {
      const err = compileError(
        "material('UNOBTAINIUM'); drill(0mm, 0mm, 1mm);"
      );
      expect(err).toBeInstanceOf(ConfigError);
      expect(err.message).toBe('Unknown material: UNOBTAINIUM at 1:1');
    });
  });
});
