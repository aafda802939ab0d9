export * from './constants';
export * from './shift';
export * from './frequency';
export * from './scorer';
export * from './breaker';
export * from './generator';
export * from './plugin';
export { default } from './plugin';

export {
  breakBruteForce as decodeBruteForce,
  breakFrequencyAnalysis as decodeFrequencyGuided,
} from './breaker';
