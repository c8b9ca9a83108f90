/**
 * Vitest Global Teardown
 *
 * Cleans up leaked temporary directories from test runs.
 * Test cleanup hooks don't execute when processes are killed,
 * so this ensures temp dirs are cleaned up after all tests complete.
 *
 * @module tests/global-teardown
 */

import { readdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { TEMP_DIR_PREFIX } from './unit/helpers.js';

export default function globalTeardown(): void {
  const tmp = tmpdir();
  let cleaned = 0;

  for (const entry of readdirSync(tmp)) {
    if (!entry.startsWith(TEMP_DIR_PREFIX)) continue;
    try {
      rmSync(join(tmp, entry), { recursive: true, force: true });
      cleaned++;
    } catch (error) {
      console.error(
        `[global-teardown] Could not remove ${entry}:`,
        error instanceof Error ? error.message : String(error)
      );
    }
  }

  if (cleaned > 0) {
    console.error(`[global-teardown] Cleaned ${cleaned} leaked temp directories`);
  }
}
