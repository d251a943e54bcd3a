import { existsSync, readFileSync, writeFileSync } from "fs";
import type { Prompter } from "../collaborators.js";
import { CONFIG_MARKER_START } from "../../printer/config.js";
import { DuplicateConfigDeclinedError, MissingTargetFileError } from "../../utils/errors.js";
import type { PatchResult } from "../../types/installer.js";

export const DUPLICATE_PROMPT =
   "Your config file already contains Gatekeeper configuration. Are you sure you want to add another?";

/**
 * Append a generated config block to `targetFile`.
 *
 *  - missing file       → not applied, `MissingTargetFileError` (file is not created)
 *  - marker present     → ask first; declined → not applied, file untouched
 *  - otherwise          → append and report applied
 *
 * A confirmed second run appends a second block; the earlier one is never
 * replaced.
 */
export async function patchConfigFile(
   block: string,
   targetFile: string,
   prompter: Prompter
): Promise<PatchResult> {
   if (!existsSync(targetFile)) {
      const error = new MissingTargetFileError(targetFile);
      return { applied: false, message: error.message, error };
   }

   const source = readFileSync(targetFile, "utf-8");

   if (source.includes(CONFIG_MARKER_START) && !(await prompter.yes(DUPLICATE_PROMPT))) {
      const error = new DuplicateConfigDeclinedError(targetFile);
      return { applied: false, message: error.message, error };
   }

   writeFileSync(targetFile, source + "\n" + block, "utf-8");
   return { applied: true, message: `Your ${targetFile} file was updated.` };
}
