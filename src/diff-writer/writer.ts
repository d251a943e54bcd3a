import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import path from "path";
import * as diff3 from "node-diff3";
import { backupPathFor } from "./backupPath.js";
import { logger } from "../utils/logger.js";

export type WriteOutcome = "created" | "unchanged" | "kept" | "updated" | "merged" | "conflict" | "skipped";

export interface WriteOptions {
   /** Project root; backups live under it. */
   root: string;
   /** Skip writing when false & file exists */
   overwrite?: boolean;
}

/**
 * Git-style 3-way merge writer.
 *
 * `mine` is the file on disk, `base` the last generated text (kept as a
 * backup), `theirs` the freshly generated text.
 */
export function writeWithMerge(filePath: string, theirs: string, opts: WriteOptions): WriteOutcome {
   const { root, overwrite = true } = opts;
   const target = path.resolve(root, filePath);
   if (!overwrite && existsSync(target)) return "skipped";

   const bak = backupPathFor(root, target);
   const base = existsSync(bak) ? readFileSync(bak, "utf-8") : null;
   const mine = existsSync(target) ? readFileSync(target, "utf-8") : null;

   const write = (text: string) => {
      mkdirSync(path.dirname(target), { recursive: true });
      writeFileSync(target, text, "utf-8");
   };

   // 1) First run: no existing file
   if (mine == null) {
      write(theirs);
      writeFileSync(bak, theirs, "utf-8");
      return "created";
   }

   // 2) Up-to-date
   if (mine === theirs) {
      writeFileSync(bak, theirs, "utf-8");
      return "unchanged";
   }

   // 3) Generator unchanged, user edited → keep user edits
   if (theirs === base) return "kept";

   // 4) User untouched, generator updated
   if (mine === base) {
      write(theirs);
      writeFileSync(bak, theirs, "utf-8");
      return "updated";
   }

   // 5) Real divergence: diff3 merge
   const mergedLines = diff3.merge(
      mine.split(/\r?\n/),
      (base ?? "").split(/\r?\n/),
      theirs.split(/\r?\n/),
      { stringSeparator: "\n" }
   ).result;

   const mergedText = mergedLines.join("\n");
   write(mergedText);
   writeFileSync(bak, theirs, "utf-8");

   if (/^(<{7}|={7}|>{7})/m.test(mergedText)) {
      logger.warn(`⚠️  Merge conflicts in ${path.relative(root, target)}: resolve the <<< >>> markers.`);
      return "conflict";
   }
   return "merged";
}
