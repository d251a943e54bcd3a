import path from "path";
import { mkdirSync, existsSync } from "fs";

/** project-level hidden folder */
export const BACKUP_DIR = path.join(".gatekeeper", "backups");

/** Returns `<root>/.gatekeeper/backups/<relative-to-root>.bak` */
export function backupPathFor(root: string, targetFile: string): string {
   const rel = path.relative(root, path.resolve(root, targetFile));
   const full = path.join(root, BACKUP_DIR, rel + ".bak");
   const dir = path.dirname(full);
   if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
   return full;
}
