import type { InstallConfig } from "../types/installer.js";

export const CONFIG_FILE = "config/config.exs";
export const CONFIG_MARKER_START = "%% Gatekeeper Configuration %%";
export const CONFIG_MARKER_END = "%% End Gatekeeper Configuration %%";

type BlockInput = Pick<InstallConfig, "userSchema" | "repo" | "base" | "useEmail" | "capabilities">;

/** Elixir keyword list of atoms: `[:authenticatable, :lockable]` */
const atomList = (names: readonly string[]) => `[${names.map(n => `:${n}`).join(", ")}]`;

/**
 * The block appended to config/config.exs, wrapped in the start/end marker
 * comments the patcher looks for.
 */
export function printConfigBlock(config: BlockInput): string {
   let out =
      `# ${CONFIG_MARKER_START}   Don't remove this line\n` +
      `config :gatekeeper,\n` +
      `  user_schema: ${config.userSchema},\n` +
      `  repo: ${config.repo},\n` +
      `  module: ${config.base},\n` +
      `  logged_out_url: "/",\n`;

   if (config.useEmail) {
      out += `  email_from: {"Your Name", "yourname@example.com"},\n`;
   }

   out += `  opts: ${atomList(config.capabilities)}\n`;

   if (config.useEmail) {
      out +=
         `\n` +
         `config :gatekeeper, ${config.base}.Gatekeeper.Mailer,\n` +
         `  adapter: Swoosh.Adapters.Sendgrid,\n` +
         `  api_key: "your api key here"\n`;
   }

   return out + `# ${CONFIG_MARKER_END}\n`;
}
