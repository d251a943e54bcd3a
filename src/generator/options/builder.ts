import {
   isStageSwitch,
   isStringOption,
   requiresEmail,
   type StageSwitch,
   type StringOption,
} from "../catalog.js";
import { InvalidModelSpecError, MissingBaseNamespaceError } from "../../utils/errors.js";
import { migrationTimestamp } from "../../utils/utils.js";
import type { InstallConfig, InstallEnvironment, Resolution, StageSwitches } from "../../types/installer.js";

/**
 * Parse `"Account accounts"` into a qualified module and a table name.
 * The module is prefixed with `base.` unless it already starts with it.
 */
export function parseModelSpec(spec: string, base: string): { userSchema: string; userTableName: string } {
   const parts = spec.split(/\s+/).filter(Boolean);
   if (parts.length !== 2) throw new InvalidModelSpecError(spec);

   const [model, table] = parts;
   const userSchema = model === base || model.startsWith(`${base}.`) ? model : `${base}.${model}`;
   return { userSchema, userTableName: table };
}

/**
 * Combine the resolved capabilities with environment facts into the
 * configuration every stage receives. Pure: no I/O.
 */
export function buildConfig(resolution: Resolution, env: InstallEnvironment): InstallConfig {
   // last value wins for every control
   const flags = new Map<StageSwitch, boolean>();
   const strings = new Map<StringOption, string>();
   for (const { name, value } of resolution.controls) {
      if (isStageSwitch(name) && typeof value === "boolean") flags.set(name, value);
      else if (isStringOption(name) && typeof value === "string") strings.set(name, value);
   }

   const base = strings.get("module") ?? env.base;
   if (!base) throw new MissingBaseNamespaceError(env.root);

   const repo = strings.get("repo") ?? env.repo ?? `${base}.Repo`;
   const modelSpec = strings.get("model");
   const { userSchema, userTableName } = modelSpec !== undefined
      ? parseModelSpec(modelSpec, base)
      : { userSchema: `${base}.User`, userTableName: "users" };

   const on = (s: StageSwitch) => flags.get(s) ?? true;
   const off = (s: StageSwitch) => flags.get(s) ?? false;
   const stages: StageSwitches = {
      config: on("config"),
      web: on("web"),
      views: on("views"),
      migrations: on("migrations"),
      templates: on("templates"),
      models: on("models"),
      emails: on("emails"),
      boilerplate: on("boilerplate"),
      controllers: off("controllers"),
      log_only: off("log_only"),
   };

   return {
      root: env.root,
      capabilities: resolution.capabilities,
      useEmail: requiresEmail(resolution.capabilities),
      base,
      userSchema,
      userTableName,
      repo,
      stages,
      migrationPath: strings.get("migration_path") ?? env.migrationPath,
      timestamp: migrationTimestamp(env.now),
      modelFound: false,
      instructions: "",
      written: [],
      stubs: env.stubs,
      overwriteExisting: env.overwriteExisting ?? true,
   };
}
