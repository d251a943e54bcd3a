import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { MODEL_SEARCH_PATH, runInstall } from "../../../src/generator/pipeline.js";
import { DUPLICATE_PROMPT } from "../../../src/generator/config/patcher.js";
import { printConfigBlock } from "../../../src/printer/config.js";
import { configInstructions } from "../../../src/printer/instructions.js";
import { AutoPrompter } from "../../../src/utils/prompt.js";
import { PipelineStageError } from "../../../src/utils/errors.js";
import { logger } from "../../../src/utils/logger.js";
import type { MigrationSink } from "../../../src/generator/collaborators.js";
import type { RequestedOption } from "../../../src/types/installer.js";
import { FakeProbe, FakeRenderer, FakeSink } from "../../fakes.js";
import { T0, makeConfig, on } from "../../helpers.js";

const CONFIG_SOURCE = "use Mix.Config\n";

describe("runInstall", () => {
   let root: string;
   const configPath = () => path.join(root, "config", "config.exs");

   const install = (
      requested: RequestedOption[],
      { found = false, answer = true, sink = new FakeSink() }: { found?: boolean; answer?: boolean; sink?: MigrationSink } = {}
   ) => {
      const deps = {
         probe: new FakeProbe(found),
         renderer: new FakeRenderer(),
         sink,
         prompter: new AutoPrompter(answer),
      };
      const config = makeConfig(requested, { root });
      return { deps, config, run: () => runInstall(config, deps) };
   };

   beforeAll(() => logger.setLevel("silent"));
   afterAll(() => logger.setLevel("info"));

   beforeEach(() => {
      root = mkdtempSync(path.join(tmpdir(), "gk-pipeline-"));
      mkdirSync(path.join(root, "config"));
      writeFileSync(configPath(), CONFIG_SOURCE);
   });

   afterEach(() => {
      rmSync(root, { recursive: true, force: true });
   });

   it("installs the default feature set into a fresh project", async () => {
      const sink = new FakeSink();
      const { deps, config, run } = install(on("default"), { sink });
      const report = await run();

      expect(deps.probe.calls).toEqual([["MyApp.User", MODEL_SEARCH_PATH]]);
      expect(report.config.modelFound).toBe(false);

      const migration = `priv/repo/migrations/${T0}_create_gatekeeper_user.exs`;
      expect([...sink.files.keys()]).toEqual([migration]);
      expect(sink.files.get(migration)?.split("\n")[0]).toBe("defmodule MyApp.Repo.Migrations.CreateGatekeeperUser do");
      expect(report.migrations.map(m => [m.verb, m.name, m.timestamp])).toEqual([["create", "create_gatekeeper_user", T0]]);

      expect(deps.renderer.calls.map(c => c.id)).toEqual(["model", "web", "views", "templates"]);

      const block = printConfigBlock(config);
      expect(report.config.configBlock).toBe(block);
      expect(readFileSync(configPath(), "utf-8")).toBe(CONFIG_SOURCE + "\n" + block);

      expect(report.written.slice(0, 4)).toEqual([
         "config/config.exs",
         migration,
         "web/models/gatekeeper/user.ex",
         "web/gatekeeper_web.ex",
      ]);
      expect(report.written).toHaveLength(11);

      expect(report.instructions).not.toContain("should be added to your config/config.exs");
      expect(report.instructions).toContain("Add the following to your router.ex file.");
      expect(report.instructions).not.toContain("Add the following items to your MyApp.User model.");
      expect(report.instructions).toContain("$ mix ecto.setup");
   });

   it("alters an existing model and adds the invitation table", async () => {
      const sink = new FakeSink();
      const { deps, run } = install(on("full", "invitable"), { found: true, sink });
      const report = await run();

      expect(report.config.capabilities).toEqual([
         "authenticatable",
         "recoverable",
         "lockable",
         "trackable",
         "unlockable_with_token",
         "invitable",
         "registerable",
      ]);
      expect(report.config.useEmail).toBe(true);
      expect(report.migrations.map(m => [m.verb, m.name, m.timestamp])).toEqual([
         ["alter", "add_gatekeeper_to_user", T0],
         ["create", "create_gatekeeper_invitable", T0 + 1],
      ]);
      expect([...sink.files.keys()]).toEqual([
         `priv/repo/migrations/${T0}_add_gatekeeper_to_user.exs`,
         `priv/repo/migrations/${T0 + 1}_create_gatekeeper_invitable.exs`,
      ]);
      expect(deps.renderer.calls.map(c => c.id)).toEqual(["web", "views", "templates", "mailer"]);
      expect(report.instructions).toContain("Add the following items to your MyApp.User model.");
   });

   it("gives every migration its own timestamp", async () => {
      const { run } = install(on("authenticatable", "invitable", "rememberable"));
      const report = await run();

      expect(report.migrations.map(m => m.timestamp)).toEqual([T0, T0 + 1, T0 + 2]);
      expect(report.migrations.map(m => m.name)).toEqual([
         "create_gatekeeper_user",
         "create_gatekeeper_invitable",
         "create_gatekeeper_rememberable",
      ]);
   });

   it("writes migrations to the configured path", async () => {
      const sink = new FakeSink();
      const { run } = install([{ name: "migration_path", value: "db/migrations" }], { sink });
      await run();
      expect([...sink.files.keys()]).toEqual([`db/migrations/${T0}_create_gatekeeper_user.exs`]);
   });

   it("falls back to instructions when the config file is missing", async () => {
      rmSync(configPath());
      const { config, run } = install(on("default"));
      const report = await run();

      expect(report.written).not.toContain("config/config.exs");
      expect(report.instructions.startsWith(configInstructions(printConfigBlock(config)))).toBe(true);
   });

   it("only logs the block with log_only", async () => {
      const { config, run } = install([{ name: "log_only", value: true }]);
      const report = await run();

      expect(readFileSync(configPath(), "utf-8")).toBe(CONFIG_SOURCE);
      expect(report.instructions).toContain(configInstructions(printConfigBlock(config)));
   });

   it("leaves the config alone with --no-config", async () => {
      const { run } = install([{ name: "config", value: false }]);
      const report = await run();

      expect(readFileSync(configPath(), "utf-8")).toBe(CONFIG_SOURCE);
      expect(report.written).not.toContain("config/config.exs");
   });

   it("keeps the config untouched when a duplicate is declined", async () => {
      const existing = CONFIG_SOURCE + "\n" + printConfigBlock(makeConfig());
      writeFileSync(configPath(), existing);

      const { deps, run } = install(on("default"), { answer: false });
      const report = await run();

      expect(deps.prompter.asked).toEqual([DUPLICATE_PROMPT]);
      expect(readFileSync(configPath(), "utf-8")).toBe(existing);
      expect(report.instructions).toContain("should be added to your config/config.exs");
   });

   it("skips migrations with --no-migrations", async () => {
      const sink = new FakeSink();
      const { deps, run } = install([{ name: "migrations", value: false }], { sink });
      const report = await run();

      expect(sink.files.size).toBe(0);
      expect(report.migrations).toEqual([]);
      expect(report.instructions).not.toContain("mix ecto.setup");
      expect(deps.renderer.calls.map(c => c.id)).toEqual(["model", "web", "views", "templates"]);
   });

   it("generates no files with --no-boilerplate", async () => {
      const sink = new FakeSink();
      const { deps, run } = install([{ name: "boilerplate", value: false }], { sink });
      const report = await run();

      expect(sink.files.size).toBe(0);
      expect(deps.renderer.calls).toEqual([]);
      expect(report.written).toEqual(["config/config.exs"]);
      expect(report.instructions).toContain("Add the following items to your MyApp.User model.");
   });

   it("passes the config values to the renderer", async () => {
      const { deps, run } = install([{ name: "model", value: "Account accounts" }]);
      await run();

      expect(deps.renderer.calls[0].bindings).toMatchObject({
         userSchema: "MyApp.Account",
         userTableName: "accounts",
         modelName: "account",
      });
   });

   it("stops at the failing stage and keeps earlier work", async () => {
      const failure = new Error("disk full");
      const sink: MigrationSink = {
         createFile: () => {
            throw failure;
         },
      };
      const { deps, config, run } = install(on("default"), { sink });

      const err = await run().then(() => undefined, (e: unknown) => e);

      expect(err).toBeInstanceOf(PipelineStageError);
      if (err instanceof PipelineStageError) {
         expect(err.stage).toBe("migration");
         expect(err.failure).toBe(failure);
      }
      expect(readFileSync(configPath(), "utf-8")).toBe(CONFIG_SOURCE + "\n" + printConfigBlock(config));
      expect(deps.renderer.calls).toEqual([]);
   });
});
