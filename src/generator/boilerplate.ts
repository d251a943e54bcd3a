import type { Capability } from "./catalog.js";
import type { TemplateBindings, TemplateOutput } from "./collaborators.js";
import { modelName } from "./migrator/planner.js";
import type { InstallConfig } from "../types/installer.js";

/** Guard for a boilerplate file: always, when mail is configured, or per capability. */
type Requirement = "all" | "use_email" | Capability;

export type TemplateSetId = "model" | "web" | "views" | "templates" | "mailer" | "controllers";

export interface BoilerplateJob {
   templateSetId: TemplateSetId;
   outputs: TemplateOutput[];
}

export const VIEW_FILES: ReadonlyArray<[Requirement, string]> = [
   ["all", "gatekeeper_view.ex"],
   ["confirmable", "confirmation_view.ex"],
   ["use_email", "email_view.ex"],
   ["invitable", "invitation_view.ex"],
   ["all", "layout_view.ex"],
   ["all", "gatekeeper_view_helpers.ex"],
   ["recoverable", "password_view.ex"],
   ["registerable", "registration_view.ex"],
   ["authenticatable", "session_view.ex"],
   ["unlockable_with_token", "unlock_view.ex"],
];

export const TEMPLATE_FILES: ReadonlyArray<[string, Requirement, string[]]> = [
   ["email", "use_email", ["confirmation", "invitation", "password", "unlock"]],
   ["invitation", "invitable", ["edit", "new"]],
   ["layout", "all", ["app", "email"]],
   ["password", "recoverable", ["edit", "new"]],
   ["registration", "registerable", ["new"]],
   ["session", "authenticatable", ["new"]],
   ["unlock", "unlockable_with_token", ["new"]],
];

export const MAILER_FILES = ["gatekeeper_mailer.ex", "user_email.ex"];

export const CONTROLLER_FILES: ReadonlyArray<[Requirement, string]> = [
   ["confirmable", "confirmation_controller.ex"],
   ["invitable", "invitation_controller.ex"],
   ["recoverable", "password_controller.ex"],
   ["registerable", "registration_controller.ex"],
   ["authenticatable", "session_controller.ex"],
   ["unlockable_with_token", "unlock_controller.ex"],
];

const satisfies = (config: InstallConfig, req: Requirement): boolean =>
   req === "all" ? true : req === "use_email" ? config.useEmail : config.capabilities.includes(req);

const into = (dir: string, files: string[]): TemplateOutput[] =>
   files.map(f => ({ source: f, destination: `${dir}/${f}` }));

/** Values exposed to every stub. */
export function templateBindings(config: InstallConfig): TemplateBindings {
   return {
      base: config.base,
      userSchema: config.userSchema,
      userTableName: config.userTableName,
      repo: config.repo,
      modelName: modelName(config),
      webModule: `${config.base}.Web`,
      useEmail: config.useEmail,
      opts: config.capabilities,
   };
}

/**
 * Decide which boilerplate files the enabled capabilities and switches call
 * for. Pure; rendering is left to the `TemplateRenderer`.
 */
export function planBoilerplate(config: InstallConfig): BoilerplateJob[] {
   const { stages } = config;
   if (!stages.boilerplate) return [];

   const jobs: BoilerplateJob[] = [];

   if (stages.models && !config.modelFound) {
      jobs.push({
         templateSetId: "model",
         outputs: [{ source: "user.ex", destination: `web/models/gatekeeper/${modelName(config)}.ex` }],
      });
   }

   if (stages.web) {
      jobs.push({ templateSetId: "web", outputs: into("web", ["gatekeeper_web.ex"]) });
   }

   if (stages.views) {
      const files = VIEW_FILES.filter(([req]) => satisfies(config, req)).map(([, f]) => f);
      jobs.push({ templateSetId: "views", outputs: into("web/views/gatekeeper", files) });
   }

   if (stages.templates) {
      const outputs = TEMPLATE_FILES
         .filter(([, req]) => satisfies(config, req))
         .flatMap(([group, , names]) =>
            into(`web/templates/gatekeeper/${group}`, names.map(n => `${n}.html.eex`))
               .map(o => ({ ...o, source: `${group}/${o.source}` }))
         );
      jobs.push({ templateSetId: "templates", outputs });
   }

   if (stages.emails && config.useEmail) {
      jobs.push({ templateSetId: "mailer", outputs: into("web/emails/gatekeeper", MAILER_FILES) });
   }

   if (stages.controllers) {
      const files = CONTROLLER_FILES.filter(([req]) => satisfies(config, req)).map(([, f]) => f);
      jobs.push({ templateSetId: "controllers", outputs: into("web/controllers/gatekeeper", files) });
   }

   return jobs;
}
