export { buildDefaultValidators } from './default-validators.js';
export type { PolicySettings } from './default-validators.js';
