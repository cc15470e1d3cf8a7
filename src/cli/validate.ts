#!/usr/bin/env node
/**
 * src/cli/validate.ts
 * Small helper to validate a JSON file against our schemas.
 *
 * Usage:
 *   tsx src/cli/validate.ts record test/fixtures/vehicle-record.json
 *   tsx src/cli/validate.ts export out/options.json
 */

import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import { formatSchemaErrors, validateOptionsExport } from "../schema/index.js";
import { parseVehicleRecord } from "../vehicle/loaders.js";
import { extractErrorMessage } from "../utils/logger.js";

type Kind = "record" | "export";

const isKind = (value: string): value is Kind => value === "record" || value === "export";

const kind = (process.argv[2] || "").toLowerCase();
const file = process.argv[3];

if (!isKind(kind) || !file) {
  console.log("Usage: tsx src/cli/validate.ts <record|export> <file.json>");
  process.exit(1);
}

let json: unknown;
try {
  json = JSON.parse(fs.readFileSync(path.resolve(file), "utf8"));
} catch (e) {
  console.error(`[validate] cannot read ${file}: ${extractErrorMessage(e)}`);
  process.exit(2);
}

if (kind === "record") {
  try {
    parseVehicleRecord(json);
    console.log("record valid? true");
    process.exitCode = 0;
  } catch (e) {
    console.log("record valid? false");
    console.error(extractErrorMessage(e));
    process.exitCode = 2;
  }
} else {
  const ok = validateOptionsExport(json);
  console.log(`export valid?`, ok);
  if (!ok) {
    console.error("Errors:", formatSchemaErrors(validateOptionsExport.errors));
  }
  process.exitCode = ok ? 0 : 2;
}
