/**
 * src/vehicle/loaders.ts
 * Vehicle record JSON → VehicleRecord.
 *
 * Accepts either the bare record or the backend's `{ "response": … }`
 * envelope. Unlike the option decoder this is a boundary: bad input throws.
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { VehicleRecord } from "../types/vehicle.js";
import { formatSchemaErrors, validateVehicleRecord } from "../schema/index.js";

function unwrapEnvelope(json: unknown): unknown {
  if (json && typeof json === "object" && !Array.isArray(json) && "response" in json) {
    return json.response;
  }
  return json;
}

export function parseVehicleRecord(json: unknown): VehicleRecord {
  const candidate = unwrapEnvelope(json);
  if (!validateVehicleRecord(candidate)) {
    const errs = formatSchemaErrors(validateVehicleRecord.errors);
    throw new Error(`Vehicle record failed schema validation.\n${errs}`);
  }
  return candidate;
}

export async function loadVehicleRecord(filePath: string): Promise<VehicleRecord> {
  const resolved = path.resolve(filePath);
  const raw = await fs.readFile(resolved, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new Error(`Vehicle record is not valid JSON: ${resolved} (${reason})`);
  }
  return parseVehicleRecord(json);
}
