#!/usr/bin/env node
/**
 * src/cli/decode.ts
 * Decode an option-code string (or a saved vehicle record) and print the
 * configuration report or its JSON export.
 *
 * Usage:
 *   tsx src/cli/decode.ts --codes "RENA,TM00,DRLH,PF01,BT85,PPSW,WTSG,X001"
 *   tsx src/cli/decode.ts --in test/fixtures/vehicle-record.json --json
 * Options:
 *   --json               Print the JSON export instead of the text report
 *                        (default from OPTION_CODES_OUTPUT)
 *   --no-json            Print the text report even when the default is json
 *   --generated-at ISO   Pin the export timestamp (useful for diffs)
 *   --unrecognized       Also list codes this version cannot interpret
 */

import "dotenv/config";
import { loadConfig } from "../config.js";
import { buildOptionsExport, serializeExport } from "../options/export.js";
import { buildOptionIndex } from "../options/optionIndex.js";
import { renderOptionsReport } from "../options/report.js";
import { unrecognizedCodes } from "../options/resolver.js";
import { validateOptionsExport, formatSchemaErrors } from "../schema/index.js";
import { loadVehicleRecord } from "../vehicle/loaders.js";
import { logger, serializeError } from "../utils/logger.js";
import { createDecodeProgram, type DecodeOptions } from "./decodeProgram.js";

const config = loadConfig();

const program = createDecodeProgram(config.outputFormat);
program.parse(process.argv);
const opts = program.opts<DecodeOptions>();

async function main() {
  if ((opts.codes === undefined) === (opts.in === undefined)) {
    console.error("Provide exactly one of --codes or --in.");
    program.help({ error: true });
  }

  let raw: string | null | undefined = opts.codes;
  let vin: string | undefined;
  if (opts.in !== undefined) {
    const record = await loadVehicleRecord(opts.in);
    raw = record.option_codes;
    vin = record.vin;
    logger.info("Loaded vehicle record", { id: record.id, vin, state: record.state });
  }

  if (opts.json) {
    const doc = buildOptionsExport(raw, { vin, generatedAt: opts.generatedAt });
    if (!validateOptionsExport(doc)) {
      // only reachable with a bad --generated-at
      console.error("[decode] export failed schema validation:");
      console.error(formatSchemaErrors(validateOptionsExport.errors));
      process.exitCode = 2;
      return;
    }
    console.log(serializeExport(doc));
    return;
  }

  const index = buildOptionIndex(raw);
  process.stdout.write(renderOptionsReport(index));
  if (opts.unrecognized) {
    const codes = unrecognizedCodes(index);
    console.log(`    Unrecognized: [${codes.join(", ")}]`);
  }
}

main().catch((e) => {
  logger.error("decode failed", { error: serializeError(e) });
  process.exitCode = 1;
});
