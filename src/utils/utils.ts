import { fileURLToPath } from "url";
import type { StubGroupConfig } from "./config.js";

export interface StubConfig {
   /** Root folder holding per-set override stubs (`<stubDir>/<set>/...`). */
   stubDir?: string;
   groups?: StubGroupConfig[];
}

/**
 * Escape a stub's contents so it can be safely wrapped in a JS template literal.
 * This will:
 *  - Escape all backslashes
 *  - Escape all backticks
 * `${...}` placeholders are left intact.
 */
export function formatStub(stub: string): string {
   return stub.replace(/\\/g, "\\\\").replace(/`/g, "\\`");
}

/** `create_gatekeeper_user` → `CreateGatekeeperUser` */
export function camelize(name: string): string {
   return name
      .split(/[_\s-]+/)
      .filter(Boolean)
      .map(part => part[0].toUpperCase() + part.slice(1))
      .join("");
}

/** Last segment of a dotted module name: `MyApp.Accounts.User` → `User` */
export function moduleToString(module: string): string {
   const parts = module.split(".");
   return parts[parts.length - 1];
}

/**
 * Format a Date into a migration prefix: YYYYMMDDHHMMSS (UTC) as an integer.
 */
export function migrationTimestamp(date: Date): number {
   const pad = (n: number) => n.toString().padStart(2, "0");
   const Y = date.getUTCFullYear();
   const M = pad(date.getUTCMonth() + 1);
   const D = pad(date.getUTCDate());
   const h = pad(date.getUTCHours());
   const m = pad(date.getUTCMinutes());
   const s = pad(date.getUTCSeconds());
   return Number(`${Y}${M}${D}${h}${m}${s}`);
}

export { resolveStub } from "./stubResolver.js";

/** Stubs shipped with the package (`<package>/stubs`). */
export const PACKAGE_STUB_DIR = fileURLToPath(new URL("../../stubs/", import.meta.url));
