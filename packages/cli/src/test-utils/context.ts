import type { StorageResolver } from "@/lib/auth/storage";
import type { Config } from "@/lib/config";
import { type AppContext, setAppContext } from "@/lib/context";

/** Installs a global context for command tests */
export function installTestContext(
  storage: StorageResolver,
  config: Partial<Config> = {}
): AppContext {
  const context: AppContext = {
    config: { site: "beaconhq.com", ...config },
    site: config.site ?? "beaconhq.com",
    storage,
    version: "0.0.0-test",
  };
  setAppContext(context);
  return context;
}
