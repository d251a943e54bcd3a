/**
 * Error types raised by the installer.
 * Every error carries a stable `code` so callers can branch without
 * matching on messages.
 */

export class InstallerError extends Error {
   constructor(
      public readonly code: string,
      message: string,
      public readonly details?: Record<string, unknown>
   ) {
      super(message);
      this.name = "InstallerError";
      Error.captureStackTrace(this, this.constructor);
   }

   toJSON(): Record<string, unknown> {
      return {
         name: this.name,
         code: this.code,
         message: this.message,
         details: this.details,
      };
   }
}

/** One or more requested names match no preset, capability or control flag. */
export class UnknownOptionError extends InstallerError {
   constructor(public readonly names: string[]) {
      super(
         "UNKNOWN_OPTION",
         `The following option(s) are not supported: ${names.map(n => `--${n.replace(/_/g, "-")}`).join(", ")}`,
         { names }
      );
      this.name = "UnknownOptionError";
   }
}

/** `--model` must be given as `"Name table"`. */
export class InvalidModelSpecError extends InstallerError {
   constructor(spec: string) {
      super(
         "INVALID_MODEL_SPEC",
         `The --model option expects both a module name and a table name, e.g. --model="Account accounts" (got "${spec}")`,
         { spec }
      );
      this.name = "InvalidModelSpecError";
   }
}

export class MissingBaseNamespaceError extends InstallerError {
   constructor(root: string) {
      super(
         "MISSING_BASE_NAMESPACE",
         `Could not determine the project namespace in ${root}. Pass --module or add mix.exs.`,
         { root }
      );
      this.name = "MissingBaseNamespaceError";
   }
}

/** Non-fatal: the config file to patch does not exist. */
export class MissingTargetFileError extends InstallerError {
   constructor(public readonly file: string) {
      super("MISSING_TARGET_FILE", `Could not find ${file}. Configuration was not added!`, { file });
      this.name = "MissingTargetFileError";
   }
}

/** Non-fatal: the user refused to append a second config block. */
export class DuplicateConfigDeclinedError extends InstallerError {
   constructor(public readonly file: string) {
      super("DUPLICATE_CONFIG_DECLINED", "Configuration was not added!", { file });
      this.name = "DuplicateConfigDeclinedError";
   }
}

export class ConfigLoadError extends InstallerError {
   constructor(path: string, reason: string) {
      super("CONFIG_LOAD_ERROR", `Failed to load config from ${path}: ${reason}`, { path, reason });
      this.name = "ConfigLoadError";
   }
}

export class InvalidArgumentsError extends InstallerError {
   constructor(args: string[]) {
      super("INVALID_ARGUMENTS", `Invalid arguments: ${args.join(" ")}`, { args });
      this.name = "InvalidArgumentsError";
   }
}

/** Wraps any failure raised while a pipeline stage runs. */
export class PipelineStageError extends InstallerError {
   constructor(public readonly stage: string, public readonly failure: unknown) {
      const reason = failure instanceof Error ? failure.message : String(failure);
      super("PIPELINE_STAGE_FAILED", `Stage "${stage}" failed: ${reason}`, { stage, reason });
      this.name = "PipelineStageError";
   }
}
