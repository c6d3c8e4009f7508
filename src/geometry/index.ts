export { Range } from './range.js';
export { BBox } from './bbox.js';
