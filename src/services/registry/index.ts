export { DocumentRegistry } from './document-registry.js';
export type { RegisterOptions } from './document-registry.js';
