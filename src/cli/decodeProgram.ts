/**
 * src/cli/decodeProgram.ts
 * Option definitions for the decode CLI. `--json` defaults from
 * OPTION_CODES_OUTPUT and `--no-json` forces the text report either way.
 */

import { Command } from "commander";
import type { OutputFormat } from "../config.js";

// type literal: commander's OptionValues needs an index signature
export type DecodeOptions = {
  codes?: string;
  in?: string;
  json: boolean;
  generatedAt?: string;
  unrecognized: boolean;
};

export function createDecodeProgram(defaultFormat: OutputFormat): Command {
  return new Command()
    .name("option-codes")
    .description("Decode a vehicle option-code string")
    .option("-c, --codes <string>", "comma-separated option codes")
    .option("-i, --in <file>", "vehicle record JSON (bare or { response } envelope)")
    .option("--json", "print the JSON export", defaultFormat === "json")
    .option("--no-json", "print the text report")
    .option("--generated-at <iso>", "override export timestamp (ISO8601)")
    .option("--unrecognized", "list codes that could not be interpreted", false);
}
