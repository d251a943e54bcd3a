import { existsSync, readFileSync } from "fs";
import path from "path";
import { loadSharedConfig } from "../../utils/loadSharedCfg.js";
import { camelize } from "../../utils/utils.js";
import type { InstallEnvironment } from "../../types/installer.js";

/** `app: :my_app` in mix.exs → `MyApp` */
export function inferBaseFromMix(mixSource: string): string | undefined {
   const m = /\bapp:\s*:([a-z_][a-z0-9_]*)/.exec(mixSource);
   return m ? camelize(m[1]) : undefined;
}

/**
 * Gather the facts the builder needs from the project on disk:
 * shared config first, then mix.exs for the namespace.
 */
export async function loadEnvironment(root: string, now = new Date()): Promise<InstallEnvironment> {
   const shared = await loadSharedConfig(root);

   let base = shared.base;
   const mixPath = path.join(root, "mix.exs");
   if (!base && existsSync(mixPath)) {
      base = inferBaseFromMix(readFileSync(mixPath, "utf-8"));
   }

   return {
      root,
      base,
      repo: shared.repo,
      migrationPath: shared.migrationPath,
      stubs: { stubDir: shared.stubDir, groups: shared.groups },
      overwriteExisting: shared.overwriteExisting,
      now,
   };
}
