/**
 * Integer expressions in configuration values.
 *
 * Configuration integers may be written as small arithmetic expressions such
 * as `(1|4)*0x10`. Only the characters in EXPRESSION_CHARS are accepted.
 * Evaluation uses bigint so intermediate results do not lose precision; the
 * final result must be a safe integer.
 *
 * Grammar, lowest precedence first:
 *   or    := and ('|' and)*
 *   and   := sum ('&' sum)*
 *   sum   := term (('+' | '-') term)*
 *   term  := unary (('*' | '/') unary)*
 *   unary := ('+' | '-') unary | power
 *   power := atom ('**' unary)?
 *   atom  := '(' or ')' | literal
 *
 * `**` is right associative and binds tighter than a sign on its left, so
 * `-2**2` is -4.
 */

import { PropertyError } from '../errors.js';

/**
 * Strings matching this may be evaluated as expressions.
 */
export const EXPRESSION_CHARS = /^[()|&!+,-./*x0-9]+$/;

const LITERAL = /^(0x[0-9]+|[0-9]+)/;

class ExpressionParser {
  private pos = 0;

  constructor(private readonly text: string) {}

  parse(): bigint {
    const value = this.or();
    if (this.pos !== this.text.length) {
      this.fail(`unexpected '${this.text[this.pos]}'`);
    }
    return value;
  }

  private or(): bigint {
    let value = this.and();
    while (this.accept('|')) {
      value |= this.and();
    }
    return value;
  }

  private and(): bigint {
    let value = this.sum();
    while (this.accept('&')) {
      value &= this.sum();
    }
    return value;
  }

  private sum(): bigint {
    let value = this.term();
    for (;;) {
      if (this.accept('+')) {
        value += this.term();
      } else if (this.accept('-')) {
        value -= this.term();
      } else {
        return value;
      }
    }
  }

  private term(): bigint {
    let value = this.unary();
    for (;;) {
      if (this.accept('*')) {
        value *= this.unary();
      } else if (this.accept('/')) {
        const divisor = this.unary();
        if (divisor === 0n) {
          this.fail('division by zero');
        }
        value /= divisor;
      } else {
        return value;
      }
    }
  }

  private unary(): bigint {
    if (this.accept('-')) {
      return -this.unary();
    }
    if (this.accept('+')) {
      return this.unary();
    }
    return this.power();
  }

  private power(): bigint {
    const base = this.atom();
    if (!this.accept('**')) {
      return base;
    }
    const exponent = this.unary();
    if (exponent < 0n) {
      this.fail('negative exponent');
    }
    if (exponent > 64n && base !== 0n && base !== 1n && base !== -1n) {
      this.fail('exponent too large');
    }
    return base ** exponent;
  }

  private atom(): bigint {
    if (this.accept('(')) {
      const value = this.or();
      if (!this.accept(')')) {
        this.fail("missing ')'");
      }
      return value;
    }
    const match = LITERAL.exec(this.text.slice(this.pos));
    if (match === null) {
      this.fail(this.pos < this.text.length ? `unexpected '${this.text[this.pos]}'` : 'unexpected end');
    }
    this.pos += match[0].length;
    return BigInt(match[0]);
  }

  private accept(op: string): boolean {
    if (this.text.startsWith(op, this.pos)) {
      this.pos += op.length;
      return true;
    }
    return false;
  }

  private fail(reason: string): never {
    throw new PropertyError(`cannot evaluate '${this.text}': ${reason}`);
  }
}

/**
 * Evaluate an integer expression.
 */
export function evaluateIntegerExpression(text: string): number {
  if (!EXPRESSION_CHARS.test(text)) {
    throw new PropertyError(`'${text}' is not an integer expression`);
  }
  const value = new ExpressionParser(text).parse();
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new PropertyError(`'${text}' evaluates outside the safe integer range`);
  }
  return Number(value);
}
