export { LayoutEngine, layoutSlide, splitEvenly, countBoxes } from './LayoutEngine.js';

export { LayoutCache } from './LayoutCache.js';
