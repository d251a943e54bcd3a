import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { loadSharedConfig } from "../../../src/utils/loadSharedCfg.js";
import { inferBaseFromMix, loadEnvironment } from "../../../src/generator/options/environment.js";
import { ConfigLoadError } from "../../../src/utils/errors.js";
import { NOW } from "../../helpers.js";

const MIX = `defmodule MyApp.Mixfile do
  use Mix.Project

  def project do
    [app: :my_app,
     version: "0.0.1"]
  end
end
`;

describe("shared config", () => {
   let root: string;
   const savedEnv = process.env.GATEKEEPER_CFG;

   beforeEach(() => {
      delete process.env.GATEKEEPER_CFG;
      root = mkdtempSync(path.join(tmpdir(), "gk-config-"));
   });

   afterEach(() => {
      rmSync(root, { recursive: true, force: true });
      if (savedEnv === undefined) delete process.env.GATEKEEPER_CFG;
      else process.env.GATEKEEPER_CFG = savedEnv;
   });

   it("returns defaults when no config file exists", async () => {
      expect(await loadSharedConfig(root)).toEqual({ groups: [], overwriteExisting: true });
   });

   it("loads a CommonJS config file", async () => {
      writeFileSync(
         path.join(root, "gatekeeper.config.cjs"),
         'module.exports = { base: "Shop", migrationPath: "db/migrations", overwriteExisting: false };\n'
      );
      expect(await loadSharedConfig(root)).toEqual({
         base: "Shop",
         migrationPath: "db/migrations",
         groups: [],
         overwriteExisting: false,
      });
   });

   it("honours GATEKEEPER_CFG", async () => {
      writeFileSync(path.join(root, "custom.cjs"), 'module.exports = { stubDir: "my-stubs" };\n');
      process.env.GATEKEEPER_CFG = "custom.cjs";
      expect((await loadSharedConfig(root)).stubDir).toBe("my-stubs");
   });

   it("fails when GATEKEEPER_CFG points nowhere", async () => {
      process.env.GATEKEEPER_CFG = "nowhere.cjs";
      await expect(loadSharedConfig(root)).rejects.toThrow(
         `Failed to load config from ${path.join(root, "nowhere.cjs")}: file does not exist`
      );
   });

   it("rejects values of the wrong type", async () => {
      writeFileSync(path.join(root, "gatekeeper.config.cjs"), "module.exports = { repo: 42 };\n");
      await expect(loadSharedConfig(root)).rejects.toBeInstanceOf(ConfigLoadError);
   });

   describe("loadEnvironment", () => {
      it("infers the base module from mix.exs", async () => {
         writeFileSync(path.join(root, "mix.exs"), MIX);
         const env = await loadEnvironment(root, NOW);

         expect(env).toEqual({
            root,
            base: "MyApp",
            repo: undefined,
            migrationPath: undefined,
            stubs: { stubDir: undefined, groups: [] },
            overwriteExisting: true,
            now: NOW,
         });
      });

      it("lets the shared config override mix.exs", async () => {
         writeFileSync(path.join(root, "mix.exs"), MIX);
         writeFileSync(path.join(root, "gatekeeper.config.cjs"), 'module.exports = { base: "Shop" };\n');
         expect((await loadEnvironment(root, NOW)).base).toBe("Shop");
      });

      it("leaves the base unset without mix.exs", async () => {
         expect((await loadEnvironment(root, NOW)).base).toBeUndefined();
      });
   });
});

describe("inferBaseFromMix", () => {
   it("camelizes the app name", () => {
      expect(inferBaseFromMix(MIX)).toBe("MyApp");
      expect(inferBaseFromMix("[app: :blog]")).toBe("Blog");
      expect(inferBaseFromMix("defmodule X do end")).toBeUndefined();
   });
});
