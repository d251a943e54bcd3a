#!/usr/bin/env node
import { collectArgs, createInstallCommand } from "./args.js";
import { resolveOptions } from "../generator/options/resolver.js";
import { buildConfig } from "../generator/options/builder.js";
import { loadEnvironment } from "../generator/options/environment.js";
import { runInstall } from "../generator/pipeline.js";
import { FsMigrationSink } from "../generator/migrator/index.js";
import { StubTemplateRenderer } from "../printer/templates.js";
import { FsModelProbe } from "../utils/probe.js";
import { AutoPrompter, ReadlinePrompter } from "../utils/prompt.js";
import { logger } from "../utils/logger.js";
import type { RequestedOption } from "../types/installer.js";

const requested: RequestedOption[] = [];
const cli = createInstallCommand(requested);

cli.action(async () => {
   const args = collectArgs(cli, requested);
   if (args.verbose) logger.setLevel("debug");

   const root = process.cwd();

   try {
      // validation happens before anything touches the project
      const resolution = resolveOptions(args.requested);
      const env = await loadEnvironment(root);
      const config = buildConfig(resolution, env);

      logger.debug("resolved", { capabilities: config.capabilities, stages: config.stages });

      const report = await runInstall(config, {
         probe: new FsModelProbe(root),
         renderer: new StubTemplateRenderer({
            root,
            stubs: config.stubs,
            overwrite: config.overwriteExisting,
         }),
         sink: new FsMigrationSink(root),
         prompter: args.yes ? new AutoPrompter(true) : new ReadlinePrompter(),
      });

      logger.info(report.instructions);
      logger.success("Gatekeeper install complete.");
   } catch (e) {
      logger.error(`❌ Install failed: ${e instanceof Error ? e.message : String(e)}`, e);
      process.exit(1);
   }
});

cli.parseAsync(process.argv).catch((e: unknown) => {
   logger.error(`❌ ${e instanceof Error ? e.message : String(e)}`, e);
   process.exit(1);
});
