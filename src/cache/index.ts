export type { ResolutionCache, ResolutionEntry } from './resolution-cache';
export { createResolutionCache } from './resolution-cache';
