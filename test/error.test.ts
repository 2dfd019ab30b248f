// test/error.test.ts

import { describe, it, expect } from 'vitest';
import { parse } from '../src/parser/index.ts';
import { compileQuery } from '../src/query/compile.ts';
import { evaluate } from '../src/query/evaluator.ts';
import { ParseError, EvaluationError, ResumeqError } from '../src/errors/errors.ts';
import type { ExprNode } from '../src/query/types.ts';

function parseErrorOf(input: string): ParseError {
  const outcome = compileQuery(input);
  if (outcome.ok) throw new Error(`expected a parse error for: ${input}`);
  return outcome.error;
}

describe('Error Handling', () => {
  describe('Parser (ParseError)', () => {
    it('E_PARSE_UNEXPECTED_TOKEN: 閉じられていない引用符で失敗する', () => {
      const e = parseErrorOf('Python AND "Django');
      expect(e).toBeInstanceOf(ParseError);
      expect(e).toBeInstanceOf(ResumeqError);
      expect(e.code).toBe('E_PARSE_UNEXPECTED_TOKEN');
      expect(e.message).toContain('unexpected character');
      expect(e.snippet).toBe('"');
    });

    it('E_PARSE_UNEXPECTED_TOKEN: 演算子なしで語が続くと失敗する', () => {
      const e = parseErrorOf('Python Django AND Go');
      expect(e.code).toBe('E_PARSE_UNEXPECTED_TOKEN');
      expect(e.snippet).toBe('Django');
      expect(e.message).toContain('Redundant input');
    });

    it('E_PARSE_UNEXPECTED_TOKEN: 余分な閉じ括弧で失敗する', () => {
      const e = parseErrorOf('Python OR Java)');
      expect(e.code).toBe('E_PARSE_UNEXPECTED_TOKEN');
      expect(e.message).toContain("Unexpected token ')' at 1:15.");
      expect(e.line).toBe(1);
      expect(e.column).toBe(15);
    });

    it('E_PARSE_GENERIC: 閉じ括弧がない場合に失敗する', () => {
      const e = parseErrorOf('(Python OR Java');
      expect(e.code).toBe('E_PARSE_GENERIC');
      expect(e.message).toContain('Expecting token of type --> RParen');
    });

    it('E_PARSE_GENERIC: 末尾の演算子を宙ぶらりんとして報告する', () => {
      const e = parseErrorOf('Python AND');
      expect(e.code).toBe('E_PARSE_GENERIC');
      expect(e.message.startsWith("Dangling operator 'AND'.")).toBe(true);
    });

    it('E_PARSE_GENERIC: NOT 単独で失敗する', () => {
      const e = parseErrorOf('NOT');
      expect(e.code).toBe('E_PARSE_GENERIC');
      expect(e.message.startsWith("Dangling operator 'NOT'.")).toBe(true);
    });

    it('E_PARSE_EMPTY: 空のクエリで失敗する', () => {
      expect(parseErrorOf('   ').code).toBe('E_PARSE_EMPTY');
      expect(() => parse('')).toThrow(ParseError);
      expect(() => parse('')).toThrow('Query is empty.');
    });

    it('parse は例外で、compileQuery は結果型で返す', () => {
      expect(() => parse('(A')).toThrow(ParseError);
      expect(compileQuery('(A OR B').ok).toBe(false);
    });
  });

  describe('Evaluator (EvaluationError)', () => {
    it('E_EVAL_UNSUPPORTED_NODE: 式ツリー外のノードで失敗する', () => {
      const bogus: ExprNode = JSON.parse('{"type":"Near","child":{"type":"Term","text":"a"}}');
      try {
        evaluate({ type: 'Not', child: bogus }, 'a');
        expect.fail('EvaluationError was not thrown');
      } catch (e) {
        expect(e).toBeInstanceOf(EvaluationError);
        if (e instanceof EvaluationError) {
          expect(e.code).toBe('E_EVAL_UNSUPPORTED_NODE');
          expect(e.nodeType).toBe('Near');
        }
      }
    });
  });
});
