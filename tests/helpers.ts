import { resolveOptions } from "../src/generator/options/resolver.js";
import { buildConfig } from "../src/generator/options/builder.js";
import type { InstallConfig, InstallEnvironment, RequestedOption } from "../src/types/installer.js";

/** 2026-10-18 12:30:45 UTC */
export const NOW = new Date(Date.UTC(2026, 9, 18, 12, 30, 45));
export const T0 = 20261018123045;

export const on = (...names: string[]): RequestedOption[] => names.map(name => ({ name, value: true }));

export function makeEnv(overrides: Partial<InstallEnvironment> = {}): InstallEnvironment {
   return { root: "/project", base: "MyApp", now: NOW, ...overrides };
}

/** Resolve + build in one go. */
export function makeConfig(
   requested: RequestedOption[] = on("authenticatable"),
   env: Partial<InstallEnvironment> = {},
   overrides: Partial<InstallConfig> = {}
): InstallConfig {
   return { ...buildConfig(resolveOptions(requested), makeEnv(env)), ...overrides };
}
