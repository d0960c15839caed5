/**
 * Command context for handler tests
 */

import type { CommandContext, TransportSettings } from "../../src/cli/context.js";
import { DEFAULT_SETTINGS, type Settings } from "../../src/config.js";
import { silentLogger } from "../../src/logger.js";
import type { FakeTransport } from "./fake-transport.js";

export interface TestContext extends CommandContext {
  transportSettings: TransportSettings[];
}

export function createTestContext(
  cwd: string,
  transport: FakeTransport,
  overrides: { env?: NodeJS.ProcessEnv; settings?: Partial<Settings> } = {}
): TestContext {
  const transportSettings: TransportSettings[] = [];
  return {
    appname: "restcall",
    settings: { ...DEFAULT_SETTINGS, ...overrides.settings },
    logger: silentLogger,
    env: overrides.env ?? {},
    cwd,
    transportSettings,
    createTransport(settings) {
      transportSettings.push(settings);
      return transport;
    },
  };
}
