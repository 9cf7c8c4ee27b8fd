/**
 * Identifier helpers for code generators consuming the merged tree.
 */

const NOT_ALPHANUM_OR_UNDERSCORE = /[^A-Za-z0-9_]/g;
const IDENT_SEPARATORS = /[-,.@/+]/g;

/**
 * A string as a token: every character other than [A-Za-z0-9_] becomes `_`.
 */
export function strAsToken(value: string): string {
  return value.replace(NOT_ALPHANUM_OR_UNDERSCORE, '_');
}

/**
 * A string lowercased and made usable as part of an identifier.
 */
export function str2ident(value: string): string {
  return value.toLowerCase().replace(IDENT_SEPARATORS, '_');
}

/**
 * Path identifier of a node: "N" for the root, "N_S_soc_S_uart_1000" for
 * "/soc/uart@1000".
 */
export function pathIdentifier(path: string): string {
  if (path === '/') {
    return 'N';
  }
  const components = path.split('/').slice(1).map(component => `S_${str2ident(component)}`);
  return ['N', ...components].join('_');
}
