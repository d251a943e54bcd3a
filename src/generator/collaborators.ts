import type { InstallConfig } from "../types/installer.js";

/**
 * Does a module with this qualified name already exist in the project?
 * Checks compiled output first, then scans sources under `searchPath`.
 */
export interface ModelProbe {
   exists(qualifiedName: string, searchPath: string): boolean;
}

export type TemplateBindings = Readonly<Record<string, string | boolean | readonly string[]>>;

export interface TemplateOutput {
   /** Stub path relative to the template set, without `.stub`. */
   source: string;
   /** Destination relative to the project root. */
   destination: string;
}

/** Renders one template set; resolves to the destinations actually written. */
export interface TemplateRenderer {
   render(templateSetId: string, bindings: TemplateBindings, outputs: TemplateOutput[]): Promise<string[]>;
}

/** Receives fully rendered migration files. */
export interface MigrationSink {
   createFile(path: string, content: string): void;
}

export interface Prompter {
   yes(question: string): Promise<boolean>;
}

export interface Collaborators {
   probe: ModelProbe;
   renderer: TemplateRenderer;
   sink: MigrationSink;
   prompter: Prompter;
}

/** Instruction log: returns a copy with `text` appended. */
export function appendInstructions(config: InstallConfig, text: string): InstallConfig {
   return text ? { ...config, instructions: config.instructions + text } : config;
}

/** Record generated files (relative to root) on the config. */
export function recordWritten(config: InstallConfig, files: readonly string[]): InstallConfig {
   return files.length ? { ...config, written: [...config.written, ...files] } : config;
}
