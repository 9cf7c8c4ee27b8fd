/**
 * Tests for identifier helpers.
 */

import { describe, it, expect } from 'vitest';
import { pathIdentifier, str2ident, strAsToken } from './identifiers.js';

describe('strAsToken', () => {
  it('replaces every non-word character', () => {
    expect(strAsToken('low-power mode.2')).toBe('low_power_mode_2');
    expect(strAsToken('Already_OK9')).toBe('Already_OK9');
  });
});

describe('str2ident', () => {
  it('lowercases and replaces separators', () => {
    expect(str2ident('Vendor,Part-1.0@2/x+y')).toBe('vendor_part_1_0_2_x_y');
  });
});

describe('pathIdentifier', () => {
  it('names the root N', () => {
    expect(pathIdentifier('/')).toBe('N');
  });

  it('joins path components', () => {
    expect(pathIdentifier('/soc')).toBe('N_S_soc');
    expect(pathIdentifier('/soc/uart@1000')).toBe('N_S_soc_S_uart_1000');
  });
});
