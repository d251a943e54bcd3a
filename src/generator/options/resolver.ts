import {
   DEFAULT_CAPABILITIES,
   PRESETS,
   canonicalOrder,
   isCapability,
   isKnownOption,
   isPreset,
   type Capability,
} from "../catalog.js";
import { UnknownOptionError } from "../../utils/errors.js";
import type { RequestedOption, Resolution } from "../../types/installer.js";

/** `full-confirmable` → `full_confirmable` */
export const normalizeOptionName = (name: string): string =>
   name.trim().replace(/^-+/, "").replace(/-/g, "_");

/**
 * Fold the requested options, in order, into the set of enabled capabilities.
 *
 *  - preset `true`        → union its expansion
 *  - capability `true`    → add
 *  - capability `false`   → remove, even when an earlier preset added it
 *  - anything else        → kept verbatim in `controls`
 *
 * Throws `UnknownOptionError` listing every name that is not recognised.
 */
export function resolveOptions(requested: readonly RequestedOption[]): Resolution {
   const enabled = new Set<Capability>();
   const controls: RequestedOption[] = [];
   const unknown: string[] = [];

   for (const raw of requested) {
      const opt = { ...raw, name: normalizeOptionName(raw.name) };

      if (!isKnownOption(opt.name)) {
         if (!unknown.includes(opt.name)) unknown.push(opt.name);
         continue;
      }

      if (isPreset(opt.name) && opt.value === true) {
         PRESETS[opt.name].forEach(c => enabled.add(c));
      } else if (isCapability(opt.name) && opt.value === true) {
         enabled.add(opt.name);
      } else if (isCapability(opt.name) && opt.value === false) {
         enabled.delete(opt.name);
      } else {
         controls.push(opt);
      }
   }

   if (unknown.length) throw new UnknownOptionError(unknown);

   const capabilities = enabled.size ? canonicalOrder(enabled) : [...DEFAULT_CAPABILITIES];
   return { capabilities, controls };
}
