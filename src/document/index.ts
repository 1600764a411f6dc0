export { loadPoliciesFromYAML, loadPoliciesFromFile } from './loader.js';
export type { LoadOptions } from './loader.js';
export { decodePolicy, decodeRule } from './decoder.js';
export { PolicyDocumentError, PolicyDecodeError, PolicyLoadError } from './errors.js';
