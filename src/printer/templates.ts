import fs from "fs";
import path from "path";
import type { TemplateBindings, TemplateOutput, TemplateRenderer } from "../generator/collaborators.js";
import { writeWithMerge } from "../diff-writer/writer.js";
import { logger } from "../utils/logger.js";
import { formatStub, resolveStub, PACKAGE_STUB_DIR, type StubConfig } from "../utils/utils.js";

type TemplateFn = (...values: unknown[]) => string;

export interface StubTemplateRendererOptions {
   root: string;
   stubs?: StubConfig;
   overwrite?: boolean;
   /** Where the built-in stubs live (default: the package's `stubs/`). */
   stubRoot?: string;
}

/**
 * Renders boilerplate from `.stub` files. A stub is a template literal body:
 * `${base}`, `${userSchema}` … are replaced by the bindings, everything else
 * (including EEx tags) is copied verbatim.
 */
export class StubTemplateRenderer implements TemplateRenderer {
   private static textCache = new Map<string, string>();

   constructor(private opts: StubTemplateRendererOptions) { }

   /** Pick the user override for an output, or the built-in stub. */
   public stubFor(templateSetId: string, source: string): string {
      const override = resolveStub(this.opts.stubs, this.opts.root, templateSetId, source);
      return override ?? path.join(this.opts.stubRoot ?? PACKAGE_STUB_DIR, templateSetId, `${source}.stub`);
   }

   public renderOne(stubPath: string, bindings: TemplateBindings): string {
      let raw = StubTemplateRenderer.textCache.get(stubPath);
      if (!raw) {
         raw = fs.readFileSync(stubPath, "utf-8");
         StubTemplateRenderer.textCache.set(stubPath, raw);
      }

      const keys = Object.keys(bindings);
      const fn = new Function(...keys, `return \`${formatStub(raw)}\`;`) as TemplateFn;
      return fn(...keys.map(k => bindings[k]));
   }

   public async render(
      templateSetId: string,
      bindings: TemplateBindings,
      outputs: TemplateOutput[]
   ): Promise<string[]> {
      const written: string[] = [];

      for (const { source, destination } of outputs) {
         const content = this.renderOne(this.stubFor(templateSetId, source), bindings);
         const outcome = writeWithMerge(destination, content, {
            root: this.opts.root,
            overwrite: this.opts.overwrite,
         });

         logger.debug(`${outcome} ${destination}`);
         if (outcome !== "skipped" && outcome !== "kept" && outcome !== "unchanged") {
            written.push(destination);
         }
      }

      return written;
   }
}
