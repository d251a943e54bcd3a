import path from 'path';
import { existsSync } from 'fs';
import { Minimatch } from 'minimatch';
import type { StubGroupConfig } from './config.js';
import type { StubConfig } from './utils.js';

/** helper ── does `name` satisfy pattern? */
const hit = (name: string, pattern: RegExp | string) =>
   pattern instanceof RegExp
      ? pattern.test(name)
      : pattern === '*' // wildcard
         ? true
         : new Minimatch(pattern).match(name);

/**
 * Resolve a user override stub for one generated output.
 *
 * Layout convention:
 *   <stubDir>/
 *     migration/
 *       index.stub
 *       create_gatekeeper_user.stub
 *     views/
 *       session_view.ex.stub
 *     templates/
 *       session/new.html.eex.stub
 *
 * Returns `undefined` when no override exists; the caller then falls back
 * to the stub shipped with the package.
 */
export function resolveStub(
   cfg: StubConfig | undefined,
   root: string,
   set: string,
   name: string,
   useIndex = false
): string | undefined {
   // no stubDir configured → no resolution possible
   if (!cfg?.stubDir) return;

   // root: <stubDir>/<set>
   const dir = path.resolve(root, cfg.stubDir, set);

   // A) direct per-output override: <dir>/<name>.stub
   const direct = path.join(dir, `${name}.stub`);
   if (existsSync(direct)) return direct;

   // B) apply groups (optional)
   const groups: StubGroupConfig[] = cfg.groups ?? [];

   for (const g of groups) {
      const stubPath = path.join(dir, g.stubFile);

      // skip if group stub file itself doesn't exist
      if (!existsSync(stubPath)) continue;

      // 1. explicit list of names
      if (g.names?.includes(name)) return stubPath;

      // 2. include / exclude with globs or regex
      if (g.include) {
         const inc =
            g.include === '*' || g.include.some((p) => hit(name, p));

         const exc = g.exclude?.some((p) => hit(name, p)) ?? false;

         if (inc && !exc) return stubPath;
      }

      // 3. standalone pattern(s)
      if (!g.include && g.pattern) {
         const pats = Array.isArray(g.pattern) ? g.pattern : [g.pattern];
         if (pats.some((p) => hit(name, p))) return stubPath;
      }
   }

   // C) fallback: <dir>/index.stub
   if (!useIndex) return;
   const fallback = path.join(dir, 'index.stub');
   return existsSync(fallback) ? fallback : undefined;
}
