// Types
export * from './types/index.js';

// Anchors
export { classifyKey, isExistingAnchor, isAnchor, ANCHOR_KINDS } from './anchor/anchor.js';
export type { AnchorKind, AnchorClassification } from './anchor/anchor.js';

// Validation
export * from './validation/index.js';

// Documents
export * from './document/index.js';
