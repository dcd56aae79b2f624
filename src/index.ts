export * from './tree/index.js';
export * from './types.js';
export { Fraction, gcd, lcm } from './fraction.js';
export { strings } from './strings.js';
