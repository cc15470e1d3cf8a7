/**
 * src/options/export.ts
 * Raw option string → OptionsExport (machine-readable counterpart of the report).
 */

import type { OptionsExport, RawOptionString } from "../types/options.js";
import { canonicalize } from "../utils/canonical.js";
import { buildOptionIndex } from "./optionIndex.js";
import { resolveConfiguration, unrecognizedCodes } from "./resolver.js";

export interface ExportOptions {
  vin?: string;
  generatedAt?: string;   // override timestamp for deterministic output
}

export function buildOptionsExport(raw: RawOptionString, opts: ExportOptions = {}): OptionsExport {
  const index = buildOptionIndex(raw);
  return {
    ...(opts.vin ? { vin: opts.vin } : {}),
    option_codes: raw ?? null,
    generated_ts: opts.generatedAt || new Date().toISOString(),
    configuration: resolveConfiguration(index),
    unrecognized: unrecognizedCodes(index),
  };
}

/** Key-sorted, pretty-printed JSON. */
export function serializeExport(doc: OptionsExport): string {
  return canonicalize(doc, 2);
}
