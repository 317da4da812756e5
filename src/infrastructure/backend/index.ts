export { OllamaBackend } from './ollama-backend.js';
export type { OllamaBackendOptions } from './ollama-backend.js';
