/**
 * metaprompt-lab - Arithmetic Expressions
 * Recursive-descent evaluator for + - * / (also × ÷), parentheses and unary signs
 */

import { ValidationError } from '../core/errors.js';

type Token =
  | { type: 'number'; value: number; text: string }
  | { type: 'operator'; value: '+' | '-' | '*' | '/' }
  | { type: 'paren'; value: '(' | ')' };

export function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < expression.length) {
    const char = expression[i];

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    const number = /^\d+(?:\.\d+)?|^\.\d+/.exec(expression.slice(i));
    if (number) {
      tokens.push({ type: 'number', value: Number(number[0]), text: number[0] });
      i += number[0].length;
      continue;
    }

    if (char === '+' || char === '-' || char === '*' || char === '/') {
      tokens.push({ type: 'operator', value: char });
    } else if (char === '×' || char === 'x') {
      tokens.push({ type: 'operator', value: '*' });
    } else if (char === '÷') {
      tokens.push({ type: 'operator', value: '/' });
    } else if (char === '(' || char === '[') {
      tokens.push({ type: 'paren', value: '(' });
    } else if (char === ')' || char === ']') {
      tokens.push({ type: 'paren', value: ')' });
    } else {
      throw new ValidationError(`Unexpected character "${char}" in expression`, 'expression');
    }
    i++;
  }

  return tokens;
}

class Parser {
  private position = 0;

  constructor(private tokens: Token[]) {}

  parse(): number {
    if (this.tokens.length === 0) {
      throw new ValidationError('Empty expression', 'expression');
    }
    const value = this.expression();
    if (this.position < this.tokens.length) {
      throw new ValidationError('Unexpected trailing input in expression', 'expression');
    }
    return value;
  }

  // expression := term (('+' | '-') term)*
  private expression(): number {
    let value = this.term();
    for (;;) {
      const token = this.tokens[this.position];
      if (token?.type !== 'operator' || (token.value !== '+' && token.value !== '-')) return value;
      this.position++;
      const right = this.term();
      value = token.value === '+' ? value + right : value - right;
    }
  }

  // term := factor (('*' | '/') factor)*
  private term(): number {
    let value = this.factor();
    for (;;) {
      const token = this.tokens[this.position];
      if (token?.type !== 'operator' || (token.value !== '*' && token.value !== '/')) return value;
      this.position++;
      const right = this.factor();
      if (token.value === '/' && right === 0) {
        throw new ValidationError('Division by zero', 'expression');
      }
      value = token.value === '*' ? value * right : value / right;
    }
  }

  // factor := ('+' | '-') factor | number | '(' expression ')'
  private factor(): number {
    const token = this.tokens[this.position];
    if (!token) {
      throw new ValidationError('Unexpected end of expression', 'expression');
    }
    this.position++;

    if (token.type === 'number') {
      return token.value;
    }
    if (token.type === 'operator' && (token.value === '+' || token.value === '-')) {
      const operand = this.factor();
      return token.value === '-' ? -operand : operand;
    }
    if (token.type === 'paren' && token.value === '(') {
      const value = this.expression();
      const closing = this.tokens[this.position];
      if (closing?.type !== 'paren' || closing.value !== ')') {
        throw new ValidationError('Missing closing parenthesis', 'expression');
      }
      this.position++;
      return value;
    }
    throw new ValidationError('Unexpected token in expression', 'expression');
  }
}

/**
 * Evaluate an arithmetic expression without eval(). Throws ValidationError.
 */
export function evaluateExpression(expression: string): number {
  return new Parser(tokenize(expression)).parse();
}

/**
 * Number literals in the order they appear
 */
export function expressionNumbers(expression: string): string[] {
  return tokenize(expression).flatMap(token => (token.type === 'number' ? [token.text] : []));
}
