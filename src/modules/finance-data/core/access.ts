import { compareStrings } from '../../../common/utils/compare.js';

import type { AccessScope, AccessSummary, Entitlement } from './types.js';

/**
 * Summarizes a user's entitlements for display.
 */
export const summarizeAccess = (
  username: string,
  entitlements: readonly Entitlement[]
): AccessSummary => {
  const departments = entitlements
    .map((e) => e.department_name)
    .filter((name): name is string => name !== null)
    .sort(compareStrings);

  let scope: AccessScope = 'none';
  if (departments.length > 1) {
    scope = 'multiple';
  } else if (departments.length === 1) {
    scope = 'single';
  }

  return {
    username,
    accessLevel: entitlements[0]?.access_level ?? null,
    departments,
    scope,
  };
};
