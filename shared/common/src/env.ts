/**
 * True when the bundle was built for production.
 *
 * Bundlers replace `process.env.NODE_ENV` at build time; the `typeof` guard keeps
 * unbundled browser code from throwing on the missing global.
 */
export function isProductionBuild(): boolean {
  return typeof process !== 'undefined' && process.env.NODE_ENV === 'production';
}
