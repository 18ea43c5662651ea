/**
 * Centralized Vitest Setup for netmeta-mcp
 *
 * Keeps the stderr logger quiet unless a run asks for it explicitly
 * (NETMETA_LOG_LEVEL=debug vitest run).
 */

import { afterEach, vi } from 'vitest';

if (!process.env.NETMETA_LOG_LEVEL) {
  process.env.NETMETA_LOG_LEVEL = 'silent';
}

afterEach(() => {
  vi.restoreAllMocks();
});
