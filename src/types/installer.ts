import type { Capability, StageSwitch } from "../generator/catalog.js";
import type { StubConfig } from "../utils/utils.js";

/* ------------------------------------------------------------
 *  Input
 * ---------------------------------------------------------- */

/** A single `--name` / `--no-name` / `--name=value` from the caller, in argv order. */
export interface RequestedOption {
   name: string;
   value: boolean | string;
}

/** What the resolver hands to the builder. */
export interface Resolution {
   /** Enabled capabilities in catalog order. */
   capabilities: Capability[];
   /** Everything that was not a capability toggle or an enabled preset, untouched. */
   controls: RequestedOption[];
}

/* ------------------------------------------------------------
 *  Environment facts gathered outside the pure core
 * ---------------------------------------------------------- */
export interface InstallEnvironment {
   /** Project root; every relative path is resolved against it. */
   root: string;
   /** Base namespace, e.g. `MyApp`. */
   base?: string;
   repo?: string;
   migrationPath?: string;
   stubs?: StubConfig;
   /** Merge into files that already exist (default true). */
   overwriteExisting?: boolean;
   now: Date;
}

/* ------------------------------------------------------------
 *  Resolved configuration threaded through every stage
 * ---------------------------------------------------------- */
export type StageSwitches = Readonly<Record<StageSwitch, boolean>>;

export interface InstallConfig {
   readonly root: string;
   readonly capabilities: readonly Capability[];
   readonly useEmail: boolean;
   readonly base: string;
   /** Fully qualified user model module, e.g. `MyApp.User`. */
   readonly userSchema: string;
   readonly userTableName: string;
   readonly repo: string;
   readonly stages: StageSwitches;
   readonly migrationPath?: string;
   /** Next migration timestamp (`YYYYMMDDHHMMSS`); only ever increases. */
   readonly timestamp: number;
   readonly modelFound: boolean;
   readonly configBlock?: string;
   readonly instructions: string;
   /** Files produced so far, relative to `root`. */
   readonly written: readonly string[];
   readonly stubs?: StubConfig;
   readonly overwriteExisting: boolean;
}

/* ------------------------------------------------------------
 *  Migrations
 * ---------------------------------------------------------- */
export type MigrationVerb = "create" | "alter";

/** Pure data describing one migration file; rendering happens in the printer. */
export interface MigrationPlan {
   verb: MigrationVerb;
   /** Snake-case migration name, e.g. `create_gatekeeper_user`. */
   name: string;
   table: string;
   /** `add ...` lines in output order. */
   fields: string[];
   /** `create index(...)` lines emitted after the table block. */
   constraints: string[];
   /** Append `timestamps()` to the table block. */
   timestamps: boolean;
   timestamp: number;
}

export interface PlannedMigration {
   plan: MigrationPlan;
   /** Input config with the timestamp advanced past `plan.timestamp`. */
   config: InstallConfig;
}

/* ------------------------------------------------------------
 *  Outputs
 * ---------------------------------------------------------- */
export interface PatchResult {
   applied: boolean;
   message: string;
   error?: Error;
}

export interface InstallReport {
   config: InstallConfig;
   migrations: MigrationPlan[];
   written: readonly string[];
   instructions: string;
}
