/**
 * gcad AST Tests
 * Lowering of operator chains, literals, calls and loops
 */

import { describe, expect, it } from 'vitest';
import {
  buildAst,
  GCAD_ERROR_CODES,
  parse,
  ParseError,
  visitNode,
  type ExpressionNode,
} from '../src/index.js';

/** Fully parenthesized rendering of an expression */
function render(node: ExpressionNode): string {
  switch (node.type) {
    case 'NumberLiteral':
      return `${node.value}${node.unit ?? ''}`;
    case 'StringLiteral':
      return `'${node.value}'`;
    case 'Identifier':
      return node.name;
    case 'Assignment':
      return `${node.target.name} = ${render(node.value)}`;
    case 'BinaryExpr':
      return `(${render(node.left)} ${node.op} ${render(node.right)})`;
    case 'UnaryExpr':
      return `(-${render(node.operand)})`;
    case 'FactorialExpr':
      return `(${render(node.operand)}!)`;
    case 'FunctionCall':
      return `${node.callee.name}(${node.args
        .map((arg) =>
          arg.type === 'NamedArg'
            ? `${arg.name.name}=${render(arg.value)}`
            : render(arg)
        )
        .join(', ')})`;
  }
}

function expression(source: string): string {
  const [statement] = parse(source).statements;
  if (statement?.type !== 'Statement') {
    throw new Error('Expected an expression statement');
  }
  return render(statement.expression);
}

describe('gcad AST', () => {
  describe('operator folding', () => {
    it('folds subtraction to the left', () => {
      expect(expression('1 - 2 - 3;')).toBe('((1 - 2) - 3)');
    });

    it('folds division to the left', () => {
      expect(expression('8 / 4 / 2;')).toBe('((8 / 4) / 2)');
    });

    it('binds multiplication tighter than addition', () => {
      expect(expression('1 + 2 * 3 - 4;')).toBe('((1 + (2 * 3)) - 4)');
    });

    it('makes exponentiation right-associative', () => {
      expect(expression('2^3^2;')).toBe('(2 ^ (3 ^ 2))');
    });

    it('binds power tighter than negation', () => {
      expect(expression('-2^2;')).toBe('(-(2 ^ 2))');
    });

    it('allows a negative exponent', () => {
      expect(expression('2^-1;')).toBe('(2 ^ (-1))');
    });

    it('binds factorial tighter than power', () => {
      expect(expression('2^3!;')).toBe('(2 ^ (3!))');
    });

    it('nests repeated factorials', () => {
      expect(expression('3!!;')).toBe('((3!)!)');
    });

    it('drops grouping parentheses', () => {
      expect(expression('(1 + 2) * 3;')).toBe('((1 + 2) * 3)');
    });

    it('nests assignments to the right', () => {
      expect(expression('a = b = 2mm;')).toBe('a = b = 2mm');
    });
  });

  describe('literals and calls', () => {
    it('keeps the written unit on number literals', () => {
      expect(expression('2.5in;')).toBe('2.5in');
    });

    it('lowers strings', () => {
      expect(expression("comment('a''b');")).toBe("comment('a'b')");
    });

    it('keeps argument order with named arguments', () => {
      const source = 'circle_pocket(1mm, 2mm, depth=3mm, radius=4mm);';
      expect(expression(source)).toBe(
        'circle_pocket(1mm, 2mm, depth=3mm, radius=4mm)'
      );
    });

    it('spans a binary expression from operand to operand', () => {
      const [statement] = parse('x + y;').statements;
      if (statement?.type !== 'Statement') {
        throw new Error('Expected a statement');
      }
      expect(statement.expression.span).toEqual({
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 6, offset: 5 },
      });
    });
  });

  describe('statements', () => {
    it('lowers a for loop', () => {
      const source = 'for y in linspace(0mm, 1mm, 2) { drill(0mm, y, 1mm); }';
      const [loop] = parse(source).statements;
      expect(loop?.type).toBe('ForLoop');
      if (loop?.type !== 'ForLoop') return;
      expect(loop.variable.name).toBe('y');
      expect(render(loop.source)).toBe('linspace(0mm, 1mm, 2)');
      expect(loop.body.statements).toHaveLength(1);
    });

    it('lowers nested loops', () => {
      const source = 'for a in xs { for b in ys { log(b); } }';
      const [outer] = parse(source).statements;
      if (outer?.type !== 'ForLoop') throw new Error('Expected a loop');
      expect(outer.body.statements[0]?.type).toBe('ForLoop');
    });
  });

  describe('malformed trees', () => {
    it('rejects a tree that is not a program', () => {
      const node = {
        rule: 'statement' as const,
        span: {
          start: { line: 1, column: 1, offset: 0 },
          end: { line: 1, column: 1, offset: 0 },
        },
        children: [],
      };
      expect(() => buildAst(node)).toThrow(ParseError);
      expect(() => buildAst(node)).toThrow(
        "Malformed 'statement' node: expected 'program'"
      );
    });

    it('marks malformed trees with their own code', () => {
      const span = {
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 1, offset: 0 },
      };
      try {
        buildAst({
          rule: 'program',
          span,
          children: [{ rule: 'statement', span, children: [] }],
        });
        expect.unreachable('buildAst should throw');
      } catch (err) {
        expect(err).toBeInstanceOf(ParseError);
        if (!(err instanceof ParseError)) return;
        expect(err.code).toBe(GCAD_ERROR_CODES.PARSE_MALFORMED_TREE);
        expect(err.toData().message).toBe(
          "Malformed 'statement' node: missing child 0"
        );
      }
    });
  });

  describe('visitNode', () => {
    it('visits every node in prefix order', () => {
      const types: string[] = [];
      visitNode(parse('x = f(a = 1);'), (node) => {
        types.push(node.type);
      });
      expect(types).toEqual([
        'Program',
        'Statement',
        'Assignment',
        'Identifier',
        'FunctionCall',
        'Identifier',
        'NamedArg',
        'Identifier',
        'NumberLiteral',
      ]);
    });
  });
});
