import { afterEach, vi } from "vitest";

// Tests that touch the live environment go through vi.stubEnv.
afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});
