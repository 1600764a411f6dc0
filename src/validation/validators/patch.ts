/**
 * JSON patch validation.
 *
 * @module
 */

import type { Patch } from '../../types/policy.js';
import type { PolicyValidationIssue } from '../types.js';
import { issue } from '../types.js';

export interface PatchContext {
  rule?: string;
  field?: string;
}

/** Checks that every mandatory field of a patch is present for its operation. */
export function validatePatch(
  patch: Patch,
  context: PatchContext = {},
): PolicyValidationIssue | undefined {
  if (patch.path === '') {
    return issue('MissingPatchPath', `JSONPatch field 'path' is mandatory`, context);
  }

  switch (patch.operation) {
    case 'add':
    case 'replace':
      if (patch.value === undefined) {
        return issue(
          'MissingPatchValue',
          `JSONPatch field 'value' is mandatory for operation '${patch.operation}'`,
          context,
        );
      }
      return undefined;
    case 'remove':
      return undefined;
    default:
      return issue(
        'UnsupportedPatchOperation',
        `unsupported JSONPatch operation '${patch.operation}'`,
        context,
      );
  }
}
