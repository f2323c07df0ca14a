import { afterEach, beforeEach } from "vitest";

// =============================================================================
// ENV ISOLATION
// =============================================================================

const ISOLATED_ENV_KEYS = ["WAYPOINT_HOME", "WAYPOINT_NO_DEPLOY", "WAYPOINT_MOCK_AGENT"] as const;

let savedEnv: Partial<Record<(typeof ISOLATED_ENV_KEYS)[number], string>> = {};

beforeEach(() => {
  savedEnv = {};
  for (const key of ISOLATED_ENV_KEYS) {
    const value = process.env[key];
    if (value !== undefined) {
      savedEnv[key] = value;
    }
    delete process.env[key];
  }
});

afterEach(() => {
  for (const key of ISOLATED_ENV_KEYS) {
    const value = savedEnv[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});
