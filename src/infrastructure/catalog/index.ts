export { loadIntentCatalog, loadResponseCatalog, parseIntentCatalog, parseResponseCatalog } from './catalog-loader.js';
