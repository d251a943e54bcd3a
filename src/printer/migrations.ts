import fs from "fs";
import path from "path";
import type { MigrationPlan } from "../types/installer.js";
import {
   camelize,
   formatStub,
   resolveStub,
   PACKAGE_STUB_DIR,
   type StubConfig,
} from "../utils/utils.js";

/**
 * Build the body of `def change`: the table block followed by its
 * constraints, indented to sit inside the migration module.
 */
export function printChange(plan: MigrationPlan): string {
   const lines = [`    ${plan.verb} table(:${plan.table}) do`];
   lines.push(...plan.fields.map(f => `      ${f}`));
   if (plan.timestamps) lines.push("", "      timestamps()");
   lines.push("    end");
   lines.push(...plan.constraints.map(c => `    ${c}`));
   return lines.join("\n");
}

/** `MyApp.Repo.Migrations.CreateGatekeeperUser` */
export const migrationModule = (repo: string, plan: MigrationPlan): string =>
   `${repo}.Migrations.${camelize(plan.name)}`;

export const migrationFileName = (plan: MigrationPlan): string =>
   `${plan.timestamp}_${plan.name}.exs`;

export class StubMigrationPrinter {
   #currentStubPath = "";
   private tmplFn!: (mod: string, change: string) => string;

   private static textCache = new Map<string, string>();

   constructor(
      private root: string,
      /** base config for per-migration stub resolution */
      private cfg?: StubConfig,
      /** stub used when no override matches */
      private globalStubPath = path.join(PACKAGE_STUB_DIR, "migration.stub")
   ) { }

   /** Switch to the correct stub for this migration (or reuse the last one) */
   private ensureStub(name: string) {
      /* 1) choose stub path */
      const stubPath = resolveStub(this.cfg, this.root, "migration", name, true) ?? this.globalStubPath;

      if (stubPath === this.#currentStubPath) return;

      /* 2) compile template */
      let raw = StubMigrationPrinter.textCache.get(stubPath);

      if (!raw) {
         raw = fs.readFileSync(stubPath, "utf-8");
         StubMigrationPrinter.textCache.set(stubPath, raw);
      }

      this.tmplFn = new Function(
         "mod",
         "change",
         `return \`${formatStub(raw)}\`;`
      ) as typeof this.tmplFn;

      this.#currentStubPath = stubPath;
   }

   /**
    * Render a single migration.
    * Returns both the full file and the raw change block.
    */
   public printMigration(plan: MigrationPlan, repo: string) {
      this.ensureStub(plan.name);

      const change = printChange(plan);
      const fullContent = this.tmplFn(migrationModule(repo, plan), change);

      return { fullContent, change };
   }
}
