import { existsSync, readdirSync, readFileSync } from "fs";
import path from "path";
import { Minimatch } from "minimatch";
import type { ModelProbe } from "../generator/collaborators.js";
import { logger } from "./logger.js";

const SOURCE_GLOB = new Minimatch("*.{ex,exs}");

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/** `defmodule MyApp.User do` but not `defmodule MyApp.UserToken do` */
export const declarationPattern = (qualifiedName: string): RegExp =>
   new RegExp(`defmodule\\s+${escapeRegExp(qualifiedName)}(?![\\w.])`);

/** Contents of `file`, or "" when it cannot be read (dangling link, permissions). */
function readable(file: string): string {
   try {
      return readFileSync(file, "utf-8");
   } catch (err) {
      logger.debug(`Skipping unreadable ${file}: ${err instanceof Error ? err.message : String(err)}`);
      return "";
   }
}

function listRecursive(dir: string): string[] {
   if (!existsSync(dir)) return [];
   const out: string[] = [];
   const stack: string[] = [dir];
   for (let d = stack.pop(); d !== undefined; d = stack.pop()) {
      for (const entry of readdirSync(d, { withFileTypes: true })) {
         const full = path.join(d, entry.name);
         if (entry.isDirectory()) stack.push(full);
         else out.push(full);
      }
   }
   return out;
}

/**
 * Looks for a model in the host project: a compiled
 * `_build/<env>/lib/<app>/ebin/Elixir.<Module>.beam`, then any `.ex`/`.exs`
 * source under the search path declaring the module.
 */
export class FsModelProbe implements ModelProbe {
   constructor(private root: string) { }

   public exists(qualifiedName: string, searchPath: string): boolean {
      return this.isCompiled(qualifiedName) || this.isDeclared(qualifiedName, searchPath);
   }

   private isCompiled(qualifiedName: string): boolean {
      const build = path.join(this.root, "_build");
      if (!existsSync(build)) return false;

      const beam = `Elixir.${qualifiedName}.beam`;
      for (const env of readdirSync(build)) {
         const lib = path.join(build, env, "lib");
         if (!existsSync(lib)) continue;
         for (const app of readdirSync(lib)) {
            if (existsSync(path.join(lib, app, "ebin", beam))) return true;
         }
      }
      return false;
   }

   private isDeclared(qualifiedName: string, searchPath: string): boolean {
      const pattern = declarationPattern(qualifiedName);
      return listRecursive(path.resolve(this.root, searchPath))
         .filter(f => SOURCE_GLOB.match(path.basename(f)))
         .some(f => pattern.test(readable(f)));
   }
}
