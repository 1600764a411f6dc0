/**
 * Error hierarchy for loading and decoding policy documents.
 *
 * Every error raised while turning text into a policy derives from
 * {@link PolicyDocumentError}, so callers can catch them all at once.
 *
 * @module
 */

export class PolicyDocumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PolicyDocumentError';
  }
}

/** Document structure does not match the policy schema. */
export class PolicyDecodeError extends PolicyDocumentError {
  readonly path: string;

  constructor(message: string, path: string) {
    super(`${path}: ${message}`);
    this.name = 'PolicyDecodeError';
    this.path = path;
  }
}

/** Text could not be read or parsed. */
export class PolicyLoadError extends PolicyDocumentError {
  constructor(message: string, readonly filePath?: string | undefined) {
    super(filePath ? `${filePath}: ${message}` : message);
    this.name = 'PolicyLoadError';
  }
}
