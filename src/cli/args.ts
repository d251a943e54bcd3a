import { Command, Option } from "commander";
import {
   CAPABILITIES,
   DEFAULT_OFF_SWITCHES,
   DEFAULT_ON_SWITCHES,
   PRESET_NAMES,
} from "../generator/catalog.js";
import { InvalidArgumentsError } from "../utils/errors.js";
import type { RequestedOption } from "../types/installer.js";

const flag = (name: string) => name.replace(/_/g, "-");

const STRING_FLAGS: ReadonlyArray<[string, string, string]> = [
   ["repo", "<module>", "Override the default Repo module"],
   ["model", "<spec>", 'Override the user model, e.g. "Account accounts"'],
   ["module", "<base>", "Override the base module"],
   ["migration_path", "<dir>", "Directory the migrations are written to"],
];

export interface ParsedArgs {
   requested: RequestedOption[];
   yes: boolean;
   verbose: boolean;
}

/**
 * Declare every preset, capability and switch on `cmd`, then record each one
 * the moment commander parses it so the resulting list keeps argv order.
 */
export function defineInstallOptions(cmd: Command, requested: RequestedOption[]): Command {
   const booleans: ReadonlyArray<[string, string]> = [
      ...PRESET_NAMES.map((n): [string, string] => [n, `Enable the "${n}" preset`]),
      ...CAPABILITIES.map((n): [string, string] => [n, `Enable ${n}`]),
      ...DEFAULT_ON_SWITCHES.map((n): [string, string] => [n, `Generate ${n} (default)`]),
      ...DEFAULT_OFF_SWITCHES.map((n): [string, string] => [n, `Enable ${n}`]),
   ];

   for (const [name, description] of booleans) {
      cmd.addOption(new Option(`--${flag(name)}`, description));
      cmd.addOption(new Option(`--no-${flag(name)}`).hideHelp());
      cmd.on(`option:${flag(name)}`, () => requested.push({ name, value: true }));
      cmd.on(`option:no-${flag(name)}`, () => requested.push({ name, value: false }));
   }

   for (const [name, arg, description] of STRING_FLAGS) {
      cmd.addOption(new Option(`--${flag(name)} ${arg}`, description));
      cmd.on(`option:${flag(name)}`, (value: string) => requested.push({ name, value }));
   }

   return cmd;
}

/** `--foo-bar` → foo_bar/true, `--no-foo` → foo/false, `--foo=x` → foo/"x" */
export function toRequestedOption(arg: string): RequestedOption {
   const body = arg.replace(/^--?/, "");
   const eq = body.indexOf("=");
   if (eq >= 0) return { name: body.slice(0, eq), value: body.slice(eq + 1) };
   if (body.startsWith("no-")) return { name: body.slice(3), value: false };
   return { name: body, value: true };
}

/** The installer command with every option declared; `requested` fills as argv is parsed. */
export function createInstallCommand(requested: RequestedOption[]): Command {
   return defineInstallOptions(new Command("gatekeeper-install"), requested)
      .description("Configure Gatekeeper for your Phoenix application")
      .version("0.1.0")
      .option("-y, --yes", "Answer yes to every confirmation")
      .option("--verbose", "Verbose logging")
      .allowUnknownOption()
      .allowExcessArguments();
}

/**
 * Turn what commander left over into requested options. Unknown `--flags`
 * are passed on for the resolver to reject; stray positional arguments are
 * an error here.
 */
export function collectArgs(cmd: Command, requested: RequestedOption[]): ParsedArgs {
   const all = [...requested];
   const positional: string[] = [];
   for (const arg of cmd.args) {
      if (arg.startsWith("-")) all.push(toRequestedOption(arg));
      else positional.push(arg);
   }
   if (positional.length) throw new InvalidArgumentsError(positional);

   const opts = cmd.opts<{ yes?: boolean; verbose?: boolean }>();
   return { requested: all, yes: !!opts.yes, verbose: !!opts.verbose };
}

/** Parse installer arguments (without the node/script prefix). */
export function parseInstallArgs(argv: string[]): ParsedArgs {
   const requested: RequestedOption[] = [];
   const cmd = createInstallCommand(requested).exitOverride();
   cmd.parse(argv, { from: "user" });
   return collectArgs(cmd, requested);
}
