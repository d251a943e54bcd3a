// src/index.ts

// Types
export type * from "./types/installer.js";
export type * from "./generator/collaborators.js";

// Catalog
export {
   CAPABILITIES,
   PRESETS,
   EMAIL_CAPABILITIES,
   SCHEMA_FIELDS,
   type Capability,
   type PresetName,
   type StageSwitch,
} from "./generator/catalog.js";

// Core
export { resolveOptions } from "./generator/options/resolver.js";
export { buildConfig, parseModelSpec } from "./generator/options/builder.js";
export { loadEnvironment } from "./generator/options/environment.js";
export {
   planMainMigration,
   planInvitationMigration,
   planRememberMigration,
} from "./generator/migrator/planner.js";
export { emitMigration, FsMigrationSink } from "./generator/migrator/index.js";
export { planBoilerplate, templateBindings } from "./generator/boilerplate.js";
export { patchConfigFile } from "./generator/config/patcher.js";
export { runInstall, createStages } from "./generator/pipeline.js";
export { appendInstructions } from "./generator/collaborators.js";

// Printers
export { printConfigBlock } from "./printer/config.js";
export { StubMigrationPrinter, printChange } from "./printer/migrations.js";
export { StubTemplateRenderer } from "./printer/templates.js";

// Utilities
export { FsModelProbe } from "./utils/probe.js";
export { AutoPrompter, ReadlinePrompter } from "./utils/prompt.js";
export { writeWithMerge } from "./diff-writer/writer.js";
export * from "./utils/errors.js";
