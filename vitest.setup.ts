/**
 * Vitest Global Setup
 *
 * Runs before each test file. Resets the config cache so tests can use
 * vi.stubEnv() to set environment variables picked up by the config module.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

// Keep test output readable; the logger reads LOG_LEVEL when first imported.
process.env.LOG_LEVEL = process.env.LOG_LEVEL || "silent";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
