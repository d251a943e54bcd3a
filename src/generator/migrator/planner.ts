import { CAPABILITIES, SCHEMA_FIELDS } from "../catalog.js";
import { moduleToString } from "../../utils/utils.js";
import type { InstallConfig, MigrationPlan, PlannedMigration } from "../../types/installer.js";

export const INVITATIONS_TABLE = "invitations";
export const REMEMBERABLES_TABLE = "rememberables";

/** Lower-cased last segment of the user schema: `MyApp.User` → `user` */
export const modelName = (config: InstallConfig): string =>
   moduleToString(config.userSchema).toLowerCase();

/** Fields contributed by the enabled capabilities, in catalog order. */
export function capabilityFields(config: InstallConfig): string[] {
   const enabled = new Set(config.capabilities);
   return CAPABILITIES
      .filter(c => enabled.has(c))
      .flatMap(c => SCHEMA_FIELDS[c] ?? []);
}

/** Consume one timestamp: the plan gets the current value, the config the next. */
function withTimestamp(config: InstallConfig, plan: Omit<MigrationPlan, "timestamp">): PlannedMigration {
   return {
      plan: { ...plan, timestamp: config.timestamp },
      config: { ...config, timestamp: config.timestamp + 1 },
   };
}

/**
 * The user-table migration. Creates the table with `name`/`email` and a
 * unique email index when no model exists yet, otherwise only adds the
 * capability columns to the existing table.
 */
export function planMainMigration(config: InstallConfig): PlannedMigration {
   const name = modelName(config);
   const table = config.userTableName;
   const contributed = capabilityFields(config);

   if (config.modelFound) {
      return withTimestamp(config, {
         verb: "alter",
         name: `add_gatekeeper_to_${name}`,
         table,
         fields: contributed,
         constraints: [],
         timestamps: false,
      });
   }

   return withTimestamp(config, {
      verb: "create",
      name: `create_gatekeeper_${name}`,
      table,
      fields: ["add :name, :string", "add :email, :string", ...contributed],
      constraints: [`create unique_index(:${table}, [:email])`],
      timestamps: true,
   });
}

export function planInvitationMigration(config: InstallConfig): PlannedMigration | undefined {
   if (!config.capabilities.includes("invitable")) return;

   return withTimestamp(config, {
      verb: "create",
      name: "create_gatekeeper_invitable",
      table: INVITATIONS_TABLE,
      fields: [
         "add :name, :string",
         "add :email, :string",
         "add :token, :string",
      ],
      constraints: [
         `create unique_index(:${INVITATIONS_TABLE}, [:email])`,
         `create index(:${INVITATIONS_TABLE}, [:token])`,
      ],
      timestamps: true,
   });
}

export function planRememberMigration(config: InstallConfig): PlannedMigration | undefined {
   if (!config.capabilities.includes("rememberable")) return;

   const t = REMEMBERABLES_TABLE;
   return withTimestamp(config, {
      verb: "create",
      name: "create_gatekeeper_rememberable",
      table: t,
      fields: [
         "add :series_hash, :string",
         "add :token_hash, :string",
         "add :token_created_at, :utc_datetime",
         `add :user_id, references(:${config.userTableName}, on_delete: :delete_all)`,
      ],
      constraints: [
         `create index(:${t}, [:user_id])`,
         `create index(:${t}, [:series_hash])`,
         `create index(:${t}, [:token_hash])`,
         `create unique_index(:${t}, [:user_id, :series_hash, :token_hash])`,
      ],
      timestamps: true,
   });
}
