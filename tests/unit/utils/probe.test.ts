import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { FsModelProbe, declarationPattern } from "../../../src/utils/probe.js";

describe("FsModelProbe", () => {
   let root: string;

   const put = (rel: string, content = "") => {
      const full = path.join(root, rel);
      mkdirSync(path.dirname(full), { recursive: true });
      writeFileSync(full, content);
   };

   beforeEach(() => {
      root = mkdtempSync(path.join(tmpdir(), "gk-probe-"));
   });

   afterEach(() => {
      rmSync(root, { recursive: true, force: true });
   });

   it("finds nothing in an empty project", () => {
      expect(new FsModelProbe(root).exists("MyApp.User", "web/models")).toBe(false);
   });

   it("finds a compiled module", () => {
      put("_build/dev/lib/my_app/ebin/Elixir.MyApp.User.beam");
      expect(new FsModelProbe(root).exists("MyApp.User", "web/models")).toBe(true);
   });

   it("finds a declaration in a nested source file", () => {
      put("web/models/accounts/user.ex", "defmodule MyApp.User do\n  use MyApp.Web, :model\nend\n");
      expect(new FsModelProbe(root).exists("MyApp.User", "web/models")).toBe(true);
   });

   it("ignores longer module names and non-source files", () => {
      put("web/models/user_token.ex", "defmodule MyApp.UserToken do\nend\n");
      put("web/models/nested.ex", "defmodule MyApp.User.Nested do\nend\n");
      put("web/models/notes.txt", "defmodule MyApp.User do\nend\n");
      expect(new FsModelProbe(root).exists("MyApp.User", "web/models")).toBe(false);
   });

   it("skips files it cannot read", () => {
      put("web/models/user.ex", "defmodule MyApp.User do\nend\n");
      symlinkSync(path.join(root, "missing.ex"), path.join(root, "web/models/aaa_broken.ex"));
      expect(new FsModelProbe(root).exists("MyApp.User", "web/models")).toBe(true);
      expect(new FsModelProbe(root).exists("MyApp.Other", "web/models")).toBe(false);
   });

   it("only scans the search path", () => {
      put("lib/my_app/user.ex", "defmodule MyApp.User do\nend\n");
      const probe = new FsModelProbe(root);
      expect(probe.exists("MyApp.User", "web/models")).toBe(false);
      expect(probe.exists("MyApp.User", "lib")).toBe(true);
   });
});

describe("declarationPattern", () => {
   it("escapes the dots in the module name", () => {
      expect(declarationPattern("MyApp.User").test("defmodule MyAppXUser do")).toBe(false);
      expect(declarationPattern("MyApp.User").test("defmodule   MyApp.User do")).toBe(true);
   });
});
