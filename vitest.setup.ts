/**
 * Vitest Global Setup
 *
 * Keeps the developer's environment out of the tests: PHASEFLOW_*
 * variables would otherwise be merged into every loaded config.
 */
import { beforeEach } from "vitest";

const PREFIX = "PHASEFLOW_";

for (const key of Object.keys(process.env)) {
  if (key.startsWith(PREFIX)) {
    delete process.env[key];
  }
}

process.env.NO_COLOR = "1";
process.setMaxListeners(0);

beforeEach(() => {
  for (const key of Object.keys(process.env)) {
    if (key.startsWith(PREFIX)) {
      delete process.env[key];
    }
  }
});
