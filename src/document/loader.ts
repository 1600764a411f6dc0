/**
 * Policy document loader.
 *
 * Reads one or many policy documents from YAML text. JSON is a subset of
 * YAML and loads the same way. Several documents in one text are separated
 * by `---`; empty documents are skipped.
 *
 * @example
 * ```typescript
 * import { loadPoliciesFromYAML, loadPoliciesFromFile } from 'policy-validator';
 *
 * const [policy] = loadPoliciesFromYAML(`
 *   metadata:
 *     name: require-labels
 *   spec:
 *     rules:
 *       - name: check-labels
 *         match:
 *           resources:
 *             kinds: [Pod]
 *         validate:
 *           pattern:
 *             metadata:
 *               labels:
 *                 app: "?*"
 * `);
 *
 * const fromFile = await loadPoliciesFromFile('./policies/labels.yaml');
 * ```
 *
 * @module
 */

import { readFile } from 'node:fs/promises';
import { parseAllDocuments } from 'yaml';
import type { Policy } from '../types/policy.js';
import { DEFAULT_MAX_DEPTH, toValueTree, ValueTreeError } from '../types/value-tree.js';
import { decodePolicy } from './decoder.js';
import { PolicyDocumentError, PolicyLoadError } from './errors.js';

export interface LoadOptions {
  /** Maximum document nesting depth (default 100). */
  maxDepth?: number;
}

/**
 * Parses YAML text and decodes every document in it.
 *
 * Mappings are read as `Map`s so the key order written in the document is the
 * order the validator walks.
 *
 * @throws {PolicyLoadError} On a YAML syntax error, an input without
 *   documents, or a document that cannot be turned into a tree.
 * @throws {PolicyDecodeError} When a document does not have the policy shape.
 */
export function loadPoliciesFromYAML(content: string, options: LoadOptions = {}): Policy[] {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const documents = parseAllDocuments(content);
  const policies: Policy[] = [];

  for (const [index, doc] of documents.entries()) {
    const [firstError] = doc.errors;
    if (firstError !== undefined) {
      throw new PolicyLoadError(`YAML syntax error in document ${index + 1}: ${firstError.message}`);
    }

    const data: unknown = doc.toJS({ mapAsMap: true });
    if (data === null || data === undefined) {
      continue;
    }

    try {
      policies.push(decodePolicy(toValueTree(data, { maxDepth })));
    } catch (err) {
      if (err instanceof ValueTreeError) {
        throw new PolicyLoadError(`document ${index + 1}: ${err.message}`);
      }
      throw err;
    }
  }

  if (policies.length === 0) {
    throw new PolicyLoadError('no policy documents found');
  }

  return policies;
}

/**
 * Loads policies from a YAML or JSON file.
 *
 * @throws {PolicyLoadError} On read, syntax or decode errors, prefixed with
 *   the file path.
 */
export async function loadPoliciesFromFile(
  filePath: string,
  options: LoadOptions = {},
): Promise<Policy[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new PolicyLoadError(
      `Failed to read file: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }

  try {
    return loadPoliciesFromYAML(content, options);
  } catch (err) {
    if (err instanceof PolicyDocumentError) {
      throw new PolicyLoadError(err.message, filePath);
    }
    throw err;
  }
}
