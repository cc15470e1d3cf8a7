/**
 * src/options/index.ts
 * Barrel exports for option decoding (preprocess + index + categories + resolver + report).
 */

export type { OptionStringCorrection } from "./preprocess.js";
export { OPTION_STRING_CORRECTIONS, applyCorrections } from "./preprocess.js";

export {
  LEGACY_FLAG_PREFIX,
  buildOptionIndex,
  emptyOptionIndex,
  isLegacyFlagKey,
  lookupToken,
} from "./optionIndex.js";

export {
  ADAPTER_TYPE,
  ALL_CATEGORIES,
  BATTERY_TYPE,
  DECOR_TYPE,
  DRIVE_SIDE,
  PAINT_COLOR,
  REGION,
  ROOF_TYPE,
  SEAT_TYPE,
  TRIM_LEVEL,
  UNKNOWN_DESCRIPTION,
  WHEEL_TYPE,
  unknownOption,
} from "./categories.js";

export {
  OPTION_FLAGS,
  adapterType,
  batteryType,
  decorType,
  driveSide,
  hasAirSuspension,
  hasAudioUpgrade,
  hasColdWeather,
  hasHPWC,
  hasHomeLink,
  hasLightingPackage,
  hasNavSystem,
  hasOption,
  hasPaintArmor,
  hasParcelShelf,
  hasParkingSensors,
  hasPerfExterior,
  hasPerfPowertrain,
  hasPowerLiftgate,
  hasPremiumLighting,
  hasSatRadio,
  hasSecurityPackage,
  hasSupercharger,
  hasTechPackage,
  hasThirdRow,
  hasTwinCharger,
  isPerfPlus,
  isPerformance,
  optionToCategory,
  paintColor,
  region,
  resolveConfiguration,
  roofType,
  seatType,
  trimLevel,
  unrecognizedCodes,
  wheelType,
} from "./resolver.js";

export { formatOptionsReport, renderOptionsReport } from "./report.js";

export type { ExportOptions } from "./export.js";
export { buildOptionsExport, serializeExport } from "./export.js";
