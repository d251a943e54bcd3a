import { existsSync, utimesSync } from "fs";
import path from "path";
import { planBoilerplate, templateBindings, type TemplateSetId } from "./boilerplate.js";
import { appendInstructions, recordWritten, type Collaborators } from "./collaborators.js";
import { patchConfigFile } from "./config/patcher.js";
import { emitMigration } from "./migrator/index.js";
import { planInvitationMigration, planMainMigration, planRememberMigration } from "./migrator/planner.js";
import { CONFIG_FILE, printConfigBlock } from "../printer/config.js";
import {
   configInstructions,
   migrateInstructions,
   routerInstructions,
   schemaInstructions,
   seedsInstructions,
} from "../printer/instructions.js";
import { StubMigrationPrinter } from "../printer/migrations.js";
import { PipelineStageError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import type { InstallConfig, InstallReport, MigrationPlan, PlannedMigration } from "../types/installer.js";

/** Where the textual model scan looks. */
export const MODEL_SEARCH_PATH = "web/models";

export type Stage = (config: InstallConfig) => InstallConfig | Promise<InstallConfig>;

export interface NamedStage {
   name: string;
   run: Stage;
}

/**
 * Build the ordered stage list. Stages share nothing but the config they
 * pass along; `migrations` collects the plans emitted for the report.
 */
export function createStages(deps: Collaborators, migrations: MigrationPlan[]): NamedStage[] {
   const emit = (planned: PlannedMigration | undefined, config: InstallConfig): InstallConfig => {
      if (!planned) return config;
      const printer = new StubMigrationPrinter(config.root, config.stubs);
      const { plan, file, config: next } = emitMigration(planned, deps.sink, printer);
      migrations.push(plan);
      logger.success(`Created ${file}`);
      return next;
   };

   const migrationsOn = (c: InstallConfig) => c.stages.migrations && c.stages.boilerplate;

   const renderSet = (id: TemplateSetId): Stage => async config => {
      const job = planBoilerplate(config).find(j => j.templateSetId === id);
      if (!job || !job.outputs.length) return config;
      const written = await deps.renderer.render(id, templateBindings(config), job.outputs);
      written.forEach(f => logger.success(`Created ${f}`));
      return recordWritten(config, written);
   };

   return [
      {
         name: "probe-model",
         run: config => ({
            ...config,
            modelFound: deps.probe.exists(config.userSchema, MODEL_SEARCH_PATH),
         }),
      },
      {
         name: "config",
         run: async config => {
            const block = printConfigBlock(config);
            const withBlock = { ...config, configBlock: block };

            if (!config.stages.config || config.stages.log_only) {
               return appendInstructions(withBlock, configInstructions(block));
            }

            const target = path.join(config.root, CONFIG_FILE);
            const result = await patchConfigFile(block, target, deps.prompter);
            if (result.applied) {
               logger.info(`Your ${CONFIG_FILE} file was updated.`);
               return recordWritten(withBlock, [CONFIG_FILE]);
            }

            if (result.error) logger.warn(result.message);
            return appendInstructions(withBlock, configInstructions(block));
         },
      },
      {
         name: "migration",
         run: config => (migrationsOn(config) ? emit(planMainMigration(config), config) : config),
      },
      { name: "model", run: renderSet("model") },
      {
         name: "invitable-migration",
         run: config => (migrationsOn(config) ? emit(planInvitationMigration(config), config) : config),
      },
      {
         name: "rememberable-migration",
         run: config => (migrationsOn(config) ? emit(planRememberMigration(config), config) : config),
      },
      { name: "web", run: renderSet("web") },
      { name: "views", run: renderSet("views") },
      { name: "templates", run: renderSet("templates") },
      { name: "mailer", run: renderSet("mailer") },
      { name: "controllers", run: renderSet("controllers") },
      {
         // bump the mtime so Mix recompiles the config
         name: "touch-config",
         run: config => {
            const target = path.join(config.root, CONFIG_FILE);
            if (existsSync(target)) {
               const now = new Date();
               utimesSync(target, now, now);
            }
            return config;
         },
      },
      {
         name: "instructions",
         run: config =>
            [routerInstructions, schemaInstructions, seedsInstructions, migrateInstructions]
               .reduce((c, fn) => appendInstructions(c, fn(c)), config),
      },
   ];
}

/**
 * Run every stage in order. A failing stage aborts the rest and surfaces as
 * `PipelineStageError`; files written by earlier stages are left in place.
 */
export async function runInstall(config: InstallConfig, deps: Collaborators): Promise<InstallReport> {
   const migrations: MigrationPlan[] = [];
   let current = config;

   for (const stage of createStages(deps, migrations)) {
      logger.debug(`stage ${stage.name}`);
      try {
         current = await stage.run(current);
      } catch (err) {
         throw new PipelineStageError(stage.name, err);
      }
   }

   return {
      config: current,
      migrations,
      written: current.written,
      instructions: current.instructions,
   };
}
