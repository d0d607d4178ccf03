/**
 * Startup validation checks for the warehouse catalog.
 *
 * Runs after config load and migrations. Emits warnings (non-fatal)
 * when stored warehouses cannot be decoded: dangling project references,
 * unparseable profiles, unknown statuses.
 */

import type { Connection } from '../db/client';
import { findWarehouseIntegrityIssues } from '../repos/warehouses';

/**
 * Run startup checks and emit warnings to stderr.
 * Returns the number of integrity issues found. Never throws.
 */
export function runStartupChecks(db: Connection): number {
  try {
    const issues = findWarehouseIntegrityIssues(db);

    if (issues.length > 0) {
      console.error(`[warehouse-catalog] WARNING: Found ${issues.length} warehouse(s) failing integrity checks:`);
      for (const issue of issues) {
        console.error(`  - ${issue.message}`);
      }
      console.error('[warehouse-catalog] Reads touching these warehouses will fail with a 500 until they are repaired.');
    }

    return issues.length;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[warehouse-catalog] WARNING: Startup checks could not run: ${reason}`);
    return 0;
  }
}
