export * from './types/options.js';
export type { VehicleRecord } from './types/vehicle.js';
export * from './options/index.js';
export { parseVehicleRecord, loadVehicleRecord } from './vehicle/loaders.js';
export type { ChargeCommand, CommandResult, CommandTransport } from './commands/chargeController.js';
export {
  ChargeController,
  MAX_CHARGE_PERCENT,
  MIN_CHARGE_PERCENT,
  OUT_OF_RANGE_MESSAGE,
  buildCommand,
  isValidChargePercent,
} from './commands/chargeController.js';
export { validateOptionsExport, validateVehicleRecord } from './schema/index.js';
export { loadConfig } from './config.js';
export type { AppConfig, LogLevel, OutputFormat } from './config.js';
export { logger, setLogLevel, serializeError, extractErrorMessage } from './utils/logger.js';
