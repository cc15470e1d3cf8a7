/**
 * src/schema/index.ts
 * AJV (2020-12) validators for VehicleRecord & OptionsExport.
 */

import Ajv2020Import from "ajv/dist/2020.js";
import addFormatsImport from "ajv-formats";
import type { ErrorObject } from "ajv";
import vehicleRecord from "./vehicleRecord.schema.json" with { type: "json" };
import optionsExport from "./optionsExport.schema.json" with { type: "json" };
import type { OptionsExport } from "../types/options.js";
import type { VehicleRecord } from "../types/vehicle.js";

// Both packages are CommonJS; under NodeNext the default import is module.exports.
const Ajv2020 = Ajv2020Import.default;
const addFormats = addFormatsImport.default;

export const ajv = new Ajv2020({
  allErrors: true,
  strict: "log",
  allowUnionTypes: true,
});

addFormats(ajv);

export const validateVehicleRecord = ajv.compile<VehicleRecord>(vehicleRecord);

export const validateOptionsExport = ajv.compile<OptionsExport>(optionsExport);

/** Compact one-line-per-error rendering of the last validation failure. */
export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return "";
  return errors
    .map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`)
    .join("\n");
}
