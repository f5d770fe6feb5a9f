export * from './types';
export { create } from './resolver';
export type { DateResolverInstance } from './resolver';
export { DATE_KEYWORDS, DATE_PATTERNS } from './patterns';
