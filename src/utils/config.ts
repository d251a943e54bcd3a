// loaders/config.ts
import fs from "fs";
import { readFile } from "fs/promises";
import { createRequire } from "module";
import { extname, dirname, resolve } from "path";
import { pathToFileURL } from "url";
import { z } from "zod";

/* ------------------------------------------------------------
 *  Shared config schema (gatekeeper.config.js)
 * ---------------------------------------------------------- */

/**
 * Stub grouping: one override stub shared by several outputs.
 * Supply EITHER `names` *or* (`include` / `exclude` / `pattern`).
 */
export const StubGroupSchema = z.object({
   /** Path relative to stubDir/<set>/, e.g. "auth.stub" */
   stubFile: z.string(),
   /** Explicit white-list of output names */
   names: z.array(z.string()).optional(),
   /** Include list ('*' means every output) */
   include: z.union([z.array(z.string()), z.literal("*")]).optional(),
   /** Blacklist applied after include / pattern */
   exclude: z.array(z.string()).optional(),
   /** RegExp OR minimatch glob(s) */
   pattern: z
      .union([z.instanceof(RegExp), z.string(), z.array(z.union([z.instanceof(RegExp), z.string()]))])
      .optional(),
});

export type StubGroupConfig = z.infer<typeof StubGroupSchema>;

export const SharedConfigSchema = z.object({
   /** Base namespace, e.g. "MyApp" (overrides mix.exs) */
   base: z.string().min(1).optional(),
   /** Repo module (default "<base>.Repo") */
   repo: z.string().min(1).optional(),
   /** Where migrations are written (default "priv/repo/migrations") */
   migrationPath: z.string().min(1).optional(),
   /** Root folder for override stubs */
   stubDir: z.string().optional(),
   groups: z.array(StubGroupSchema).default([]),
   /** Merge into existing boilerplate files instead of skipping them */
   overwriteExisting: z.boolean().default(true),
});

export type SharedConfig = z.infer<typeof SharedConfigSchema>;

/* ------------------------------------------------------------
 *  Universal JS config loader
 * ---------------------------------------------------------- */
function nearestPkgType(fromPath: string): "module" | "commonjs" {
   let dir = dirname(fromPath);
   for (; ;) {
      const pj = resolve(dir, "package.json");
      if (fs.existsSync(pj)) {
         const parsed: unknown = JSON.parse(fs.readFileSync(pj, "utf8"));
         const type = typeof parsed === "object" && parsed !== null && "type" in parsed ? parsed.type : undefined;
         return type === "module" ? "module" : "commonjs";
      }
      const up = dirname(dir);
      if (up === dir) break;
      dir = up;
   }
   return "commonjs";
}

const defaultExport = (mod: unknown): unknown =>
   typeof mod === "object" && mod !== null && "default" in mod ? mod.default : mod;

const cache = new Map<string, Promise<unknown>>();

async function loadConfigUniversal(absPath: string): Promise<unknown> {
   const cached = cache.get(absPath);
   if (cached) return cached;

   const p = (async (): Promise<unknown> => {
      const ext = extname(absPath).toLowerCase();
      const asUrl = pathToFileURL(absPath).href;
      const req = createRequire(import.meta.url);

      // Explicit extensions
      if (ext === ".cjs") return defaultExport(req(absPath));
      if (ext === ".mjs") return defaultExport(await import(asUrl));

      // .js is ambiguous; read the file to decide
      const code = await readFile(absPath, "utf8");
      const looksCJS = /\bmodule\.exports\b|\bexports\s*=/.test(code);
      const projType = nearestPkgType(absPath);

      if (projType === "commonjs" && looksCJS) {
         // CJS project, CJS code → require
         return defaultExport(req(absPath));
      }

      if (projType === "module" && looksCJS) {
         // ESM project but CJS code → wrap on the fly via data URL
         const wrapped =
            `const module = { exports: {} }; const exports = module.exports;\n` +
            code +
            `\nexport default module.exports;`;
         const dataUrl =
            "data:text/javascript;base64," +
            Buffer.from(wrapped, "utf8").toString("base64");
         return defaultExport(await import(dataUrl));
      }

      // Otherwise: treat as ESM
      return defaultExport(await import(asUrl));
   })();

   cache.set(absPath, p);
   return p;
}

export async function loadConfig(configPath: string, root = process.cwd()): Promise<unknown> {
   return await loadConfigUniversal(resolve(root, configPath));
}
