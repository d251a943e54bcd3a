import { existsSync, mkdirSync, writeFileSync } from "fs";
import path from "path";
import { recordWritten, type MigrationSink } from "../collaborators.js";
import { migrationFileName, StubMigrationPrinter } from "../../printer/migrations.js";
import type { InstallConfig, MigrationPlan, PlannedMigration } from "../../types/installer.js";

export const DEFAULT_MIGRATION_PATH = "priv/repo/migrations";

/** Writes migration files under the project root, creating directories as needed. */
export class FsMigrationSink implements MigrationSink {
   constructor(private root: string) { }

   public createFile(file: string, content: string): void {
      const abs = path.resolve(this.root, file);
      const dir = path.dirname(abs);
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
      writeFileSync(abs, content, "utf-8");
   }
}

export interface EmittedMigration {
   plan: MigrationPlan;
   /** Path relative to the project root. */
   file: string;
   config: InstallConfig;
}

/**
 * Render a planned migration and hand it to the sink.
 * The returned config carries the advanced timestamp and the written file.
 */
export function emitMigration(
   planned: PlannedMigration,
   sink: MigrationSink,
   printer = new StubMigrationPrinter(planned.config.root, planned.config.stubs)
): EmittedMigration {
   const { plan, config } = planned;
   const dir = config.migrationPath ?? DEFAULT_MIGRATION_PATH;
   const file = path.posix.join(dir.split(path.sep).join("/"), migrationFileName(plan));

   const { fullContent } = printer.printMigration(plan, config.repo);
   sink.createFile(file, fullContent);

   return { plan, file, config: recordWritten(config, [file]) };
}

export { planMainMigration, planInvitationMigration, planRememberMigration } from "./planner.js";
