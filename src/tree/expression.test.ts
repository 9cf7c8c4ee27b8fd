import { describe, it, expect } from 'vitest';
import { evaluateIntegerExpression } from './expression.js';
import { PropertyError } from '../errors.js';

describe('evaluateIntegerExpression', () => {
  it('reads decimal and hex literals', () => {
    expect(evaluateIntegerExpression('42')).toBe(42);
    expect(evaluateIntegerExpression('0x10')).toBe(16);
  });

  it('applies precedence and parentheses', () => {
    expect(evaluateIntegerExpression('1+2*3')).toBe(7);
    expect(evaluateIntegerExpression('(1+2)*3')).toBe(9);
    expect(evaluateIntegerExpression('1|2&3')).toBe(3);
    expect(evaluateIntegerExpression('(1|4)*0x10')).toBe(80);
  });

  it('truncates division toward zero', () => {
    expect(evaluateIntegerExpression('7/2')).toBe(3);
    expect(evaluateIntegerExpression('-7/2')).toBe(-3);
  });

  it('handles unary signs', () => {
    expect(evaluateIntegerExpression('-5+-2')).toBe(-7);
    expect(evaluateIntegerExpression('+(3)')).toBe(3);
  });

  it('raises to a power', () => {
    expect(evaluateIntegerExpression('2**10')).toBe(1024);
    expect(evaluateIntegerExpression('2**3**2')).toBe(512);
    expect(evaluateIntegerExpression('-2**2')).toBe(-4);
    expect(evaluateIntegerExpression('3*2**2')).toBe(12);
    expect(evaluateIntegerExpression('1**1000')).toBe(1);
  });

  it('rejects negative and oversized exponents', () => {
    expect(() => evaluateIntegerExpression('2**-1')).toThrow("cannot evaluate '2**-1': negative exponent");
    expect(() => evaluateIntegerExpression('2**100')).toThrow("cannot evaluate '2**100': exponent too large");
    expect(() => evaluateIntegerExpression('2***3')).toThrow("cannot evaluate '2***3': unexpected '*'");
  });

  it('rejects operators outside the grammar', () => {
    expect(() => evaluateIntegerExpression('!1')).toThrow(PropertyError);
    expect(() => evaluateIntegerExpression('1,2')).toThrow(PropertyError);
    expect(() => evaluateIntegerExpression('1.5')).toThrow(PropertyError);
  });

  it('rejects characters outside the expression set', () => {
    expect(() => evaluateIntegerExpression('0xff')).toThrow("'0xff' is not an integer expression");
    expect(() => evaluateIntegerExpression('1 + 2')).toThrow(PropertyError);
  });

  it('rejects malformed expressions', () => {
    expect(() => evaluateIntegerExpression('(1+2')).toThrow("missing ')'");
    expect(() => evaluateIntegerExpression('1/0')).toThrow('division by zero');
    expect(() => evaluateIntegerExpression('1+')).toThrow('unexpected end');
  });

  it('rejects results outside the safe range', () => {
    expect(() => evaluateIntegerExpression('9007199254740992')).toThrow(PropertyError);
  });
});
