/**
 * Static knowledge about the Gatekeeper feature set: capabilities, presets,
 * email-dependent capabilities, the schema fields each capability adds, and
 * the control flags the installer accepts.
 *
 * Everything here is frozen at module load and never mutated.
 */

/* ------------------------------------------------------------
 *  Capabilities (declaration order is the canonical order)
 * ---------------------------------------------------------- */
export const CAPABILITIES = [
   "authenticatable",
   "recoverable",
   "lockable",
   "trackable",
   "rememberable",
   "unlockable_with_token",
   "confirmable",
   "invitable",
   "registerable",
] as const;

export type Capability = (typeof CAPABILITIES)[number];

/* ------------------------------------------------------------
 *  Presets
 * ---------------------------------------------------------- */
export const PRESET_NAMES = ["default", "full", "full_confirmable", "full_invitable"] as const;

export type PresetName = (typeof PRESET_NAMES)[number];

const without = (...drop: Capability[]): readonly Capability[] =>
   Object.freeze(CAPABILITIES.filter(c => !drop.includes(c)));

export const PRESETS: Readonly<Record<PresetName, readonly Capability[]>> = Object.freeze({
   default: Object.freeze<Capability[]>(["authenticatable"]),
   full: without("confirmable", "invitable", "rememberable"),
   full_confirmable: without("invitable", "rememberable"),
   full_invitable: without("confirmable", "rememberable"),
});

export const DEFAULT_CAPABILITIES: readonly Capability[] = PRESETS.default;

/** Capabilities that need a mailer configured. */
export const EMAIL_CAPABILITIES: ReadonlySet<Capability> = new Set<Capability>([
   "recoverable",
   "unlockable_with_token",
   "confirmable",
   "invitable",
]);

/* ------------------------------------------------------------
 *  Schema fields contributed to the user table
 * ---------------------------------------------------------- */
export const SCHEMA_FIELDS: Readonly<Partial<Record<Capability, readonly string[]>>> = Object.freeze({
   authenticatable: ["add :password_hash, :string"],
   recoverable: [
      "add :reset_password_token, :string",
      "add :reset_password_sent_at, :utc_datetime",
   ],
   lockable: [
      "add :failed_attempts, :integer, default: 0",
      "add :locked_at, :utc_datetime",
   ],
   trackable: [
      "add :sign_in_count, :integer, default: 0",
      "add :current_sign_in_at, :utc_datetime",
      "add :last_sign_in_at, :utc_datetime",
      "add :current_sign_in_ip, :string",
      "add :last_sign_in_ip, :string",
   ],
   unlockable_with_token: ["add :unlock_token, :string"],
   confirmable: [
      "add :confirmation_token, :string",
      "add :confirmed_at, :utc_datetime",
      "add :confirmation_sent_at, :utc_datetime",
   ],
});

/* ------------------------------------------------------------
 *  Control flags
 * ---------------------------------------------------------- */

/** Stage switches that are on unless disabled with `--no-<name>`. */
export const DEFAULT_ON_SWITCHES = [
   "config",
   "web",
   "views",
   "migrations",
   "templates",
   "models",
   "emails",
   "boilerplate",
] as const;

/** Stage switches that are off unless enabled explicitly. */
export const DEFAULT_OFF_SWITCHES = ["controllers", "log_only"] as const;

export type StageSwitch =
   | (typeof DEFAULT_ON_SWITCHES)[number]
   | (typeof DEFAULT_OFF_SWITCHES)[number];

/** Options carrying a string value. */
export const STRING_OPTIONS = ["repo", "model", "module", "migration_path"] as const;

export type StringOption = (typeof STRING_OPTIONS)[number];

/* ------------------------------------------------------------
 *  Guards
 * ---------------------------------------------------------- */
const capabilitySet: ReadonlySet<string> = new Set(CAPABILITIES);
const presetSet: ReadonlySet<string> = new Set(PRESET_NAMES);
const switchSet: ReadonlySet<string> = new Set([...DEFAULT_ON_SWITCHES, ...DEFAULT_OFF_SWITCHES]);
const stringOptionSet: ReadonlySet<string> = new Set(STRING_OPTIONS);

export const isCapability = (name: string): name is Capability => capabilitySet.has(name);
export const isPreset = (name: string): name is PresetName => presetSet.has(name);
export const isStageSwitch = (name: string): name is StageSwitch => switchSet.has(name);
export const isStringOption = (name: string): name is StringOption => stringOptionSet.has(name);

/** Every name the installer accepts on its command line. */
export const isKnownOption = (name: string): boolean =>
   isCapability(name) || isPreset(name) || isStageSwitch(name) || isStringOption(name);

/** Sort capabilities into catalog order, dropping duplicates. */
export function canonicalOrder(caps: Iterable<Capability>): Capability[] {
   const wanted = new Set(caps);
   return CAPABILITIES.filter(c => wanted.has(c));
}

/** True when any capability needs the mailer. */
export function requiresEmail(caps: Iterable<Capability>): boolean {
   for (const c of caps) if (EMAIL_CAPABILITIES.has(c)) return true;
   return false;
}
