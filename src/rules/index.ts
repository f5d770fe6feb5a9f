export * from './types';
export { getDefaultRules, loadRules, parseRules } from './loader';
export { bestCategory, scoreCategory } from './scoring';
