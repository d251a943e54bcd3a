// utils/loadSharedCfg.ts
import { existsSync } from "fs";
import path from "path";
import { ZodError } from "zod";
import { loadConfig, SharedConfigSchema, type SharedConfig } from "./config.js";
import { ConfigLoadError } from "./errors.js";
import { logger } from "./logger.js";

export const SHARED_CONFIG_NAMES = [
   "gatekeeper.config.js",
   "gatekeeper.config.mjs",
   "gatekeeper.config.cjs",
];

/** ---------------- shared-config loader ---------------- */
export async function loadSharedConfig(root: string): Promise<SharedConfig> {
   const envOverride = process.env.GATEKEEPER_CFG;
   const cfgPath = envOverride
      ? path.resolve(root, envOverride)
      : SHARED_CONFIG_NAMES.map(n => path.join(root, n)).find(p => existsSync(p));

   if (!cfgPath) return SharedConfigSchema.parse({});
   if (!existsSync(cfgPath)) throw new ConfigLoadError(cfgPath, "file does not exist");

   logger.debug(`Loading shared config from ${cfgPath}`);

   try {
      return SharedConfigSchema.parse(await loadConfig(cfgPath, root));
   } catch (err) {
      const reason = err instanceof ZodError
         ? err.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ")
         : err instanceof Error ? err.message : String(err);
      throw new ConfigLoadError(cfgPath, reason);
   }
}
