export { BaseReleaseSearcher } from './base-searcher.js';
export { ProwlarrSearcher } from './prowlarr-searcher.js';
export type { ProwlarrSearcherOptions } from './prowlarr-searcher.js';
