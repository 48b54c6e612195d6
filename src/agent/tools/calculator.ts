import { Type } from '@sinclair/typebox';
import { defineCapability } from './types.js';

/** Digits, arithmetic operators, parentheses, dots and whitespace only */
const SAFE_PATTERN = /^[0-9+\-*/().\s]+$/;

class DivisionByZeroError extends Error {
  constructor() {
    super('division by zero');
    this.name = 'DivisionByZeroError';
  }
}

export const calculatorTool = defineCapability({
  name: 'calculator',
  description: 'Evaluate an arithmetic expression with + - * / ** // and parentheses',
  parameters: Type.Object({
    expression: Type.String({ description: "Arithmetic expression, e.g. '3*7+2' or '(10+5)/3'" }),
  }),
  execute: ({ expression }) => {
    if (!SAFE_PATTERN.test(expression)) {
      return 'Error: expression contains unsafe characters';
    }
    try {
      return `${expression} = ${formatNumber(evaluate(expression))}`;
    } catch (err) {
      if (err instanceof DivisionByZeroError) return 'Error: division by zero';
      return `Error: could not evaluate expression - ${err instanceof Error ? err.message : String(err)}`;
    }
  },
});

// =============================================================================
// Evaluator
// =============================================================================

type Token = { kind: 'number'; value: number } | { kind: 'op'; value: string };

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  const pattern = /\s*(?:(\d+(?:\.\d*)?|\.\d+)|(\*\*|\/\/|[+\-*/()]))/y;
  let index = 0;

  while (index < source.length) {
    if (source.slice(index).trim() === '') break;
    pattern.lastIndex = index;
    const match = pattern.exec(source);
    if (!match) throw new Error(`unexpected character at position ${index}`);
    if (match[1] !== undefined) {
      tokens.push({ kind: 'number', value: Number(match[1]) });
    } else {
      tokens.push({ kind: 'op', value: match[2] });
    }
    index = pattern.lastIndex;
  }
  return tokens;
}

/**
 * Recursive-descent evaluation with the usual precedence:
 *
 *   expr    := term (("+" | "-") term)*
 *   term    := unary (("*" | "/" | "//") unary)*
 *   unary   := ("+" | "-") unary | power
 *   power   := primary ("**" unary)?
 *   primary := number | "(" expr ")"
 */
export function evaluate(source: string): number {
  const tokens = tokenize(source);
  let pos = 0;

  const peekOp = (): string | undefined => {
    const token = tokens[pos];
    return token?.kind === 'op' ? token.value : undefined;
  };

  const expr = (): number => {
    let value = term();
    for (let op = peekOp(); op === '+' || op === '-'; op = peekOp()) {
      pos++;
      const right = term();
      value = op === '+' ? value + right : value - right;
    }
    return value;
  };

  const term = (): number => {
    let value = unary();
    for (let op = peekOp(); op === '*' || op === '/' || op === '//'; op = peekOp()) {
      pos++;
      const right = unary();
      if (op === '*') {
        value = value * right;
      } else {
        if (right === 0) throw new DivisionByZeroError();
        value = op === '/' ? value / right : Math.floor(value / right);
      }
    }
    return value;
  };

  const unary = (): number => {
    const op = peekOp();
    if (op === '+' || op === '-') {
      pos++;
      const value = unary();
      return op === '-' ? -value : value;
    }
    return power();
  };

  const power = (): number => {
    const base = primary();
    if (peekOp() === '**') {
      pos++;
      return base ** unary();
    }
    return base;
  };

  const primary = (): number => {
    const token = tokens[pos];
    if (!token) throw new Error('unexpected end of expression');
    if (token.kind === 'number') {
      pos++;
      return token.value;
    }
    if (token.value === '(') {
      pos++;
      const value = expr();
      if (peekOp() !== ')') throw new Error('missing closing parenthesis');
      pos++;
      return value;
    }
    throw new Error(`unexpected "${token.value}"`);
  };

  const result = expr();
  if (pos < tokens.length) throw new Error('unexpected trailing input');
  return result;
}

function formatNumber(value: number): string {
  if (!Number.isFinite(value)) throw new Error('result is not a finite number');
  return String(value);
}
