/**
 * src/options/resolver.ts
 * Typed queries over an OptionIndex. None of them throw: a missing or
 * unrecognized code resolves to `false` or to the category's Unknown variant.
 */

import type {
  AdapterType,
  BatteryType,
  CategoryValue,
  DecorType,
  DriveSide,
  OptionCategory,
  OptionIndex,
  PaintColor,
  Region,
  RoofType,
  SeatType,
  TrimLevel,
  VehicleConfiguration,
  WheelType,
} from '../types/options.js';
import {
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
  WHEEL_TYPE,
  unknownOption,
} from './categories.js';
import { isLegacyFlagKey, lookupToken } from './optionIndex.js';
import { logger } from '../utils/logger.js';

/** Variant suffix that marks a standard option as fitted. */
const ENABLED_SUFFIX = '01';

/** Wheels that only ship on Performance+ cars. */
const PERF_PLUS_WHEEL = 'WTSG';

/**
 * `X…` keys are flags: present means fitted.
 * Any other key is fitted only when its stored token is `<key>01`.
 */
export function hasOption(index: OptionIndex, name: string): boolean {
  const token = lookupToken(index, name);
  if (token === undefined) return false;
  if (name.startsWith('X')) return true;
  return token === name + ENABLED_SUFFIX;
}

/** Resolve a category from the first of its prefixes that is present. */
export function optionToCategory<C extends string>(
  index: OptionIndex,
  category: OptionCategory<C>,
): CategoryValue<C> {
  for (const prefix of category.prefixes) {
    const token = index.tokenFor(prefix);
    if (token === undefined) continue;
    const value = category.fromCode(token);
    if (value.kind === 'unknown') {
      logger.debug('Unrecognized option code', { category: category.name, code: token });
    }
    return value;
  }
  return unknownOption();
}

export const region = (index: OptionIndex): Region => optionToCategory(index, REGION);
export const trimLevel = (index: OptionIndex): TrimLevel => optionToCategory(index, TRIM_LEVEL);
export const driveSide = (index: OptionIndex): DriveSide => optionToCategory(index, DRIVE_SIDE);
export const batteryType = (index: OptionIndex): BatteryType => optionToCategory(index, BATTERY_TYPE);
export const roofType = (index: OptionIndex): RoofType => optionToCategory(index, ROOF_TYPE);
export const wheelType = (index: OptionIndex): WheelType => optionToCategory(index, WHEEL_TYPE);
export const decorType = (index: OptionIndex): DecorType => optionToCategory(index, DECOR_TYPE);
export const adapterType = (index: OptionIndex): AdapterType => optionToCategory(index, ADAPTER_TYPE);
export const paintColor = (index: OptionIndex): PaintColor => optionToCategory(index, PAINT_COLOR);
export const seatType = (index: OptionIndex): SeatType => optionToCategory(index, SEAT_TYPE);

/**
 * Boolean options by key. Two-letter keys follow the `01` convention,
 * `X0…` keys are legacy flags.
 */
export const OPTION_FLAGS = {
  performance: 'PF',
  performancePlus: 'PX',
  performanceExterior: 'X019',
  performancePowertrain: 'X024',
  airSuspension: 'SU',
  techPackage: 'TP',
  powerLiftgate: 'X001',
  premiumLighting: 'X007',
  homeLink: 'X011',
  navigation: 'X003',
  audioUpgrade: 'AU',
  satRadio: 'X013',
  supercharger: 'SC',
  twinChargers: 'CH',
  hpwc: 'HP',
  parcelShelf: 'PS',
  paintArmor: 'PA',
  thirdRow: 'TR',
  parkingSensors: 'PK',
  lightingPackage: 'LP',
  securityPackage: 'SP',
  coldWeather: 'CW',
} as const;

export const isPerformance = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.performance);
export const hasPerfExterior = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.performanceExterior);
export const hasPerfPowertrain = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.performancePowertrain);
export const hasAirSuspension = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.airSuspension);
export const hasTechPackage = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.techPackage);
export const hasPowerLiftgate = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.powerLiftgate);
export const hasPremiumLighting = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.premiumLighting);
export const hasHomeLink = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.homeLink);
export const hasNavSystem = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.navigation);
export const hasAudioUpgrade = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.audioUpgrade);
export const hasSatRadio = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.satRadio);
export const hasSupercharger = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.supercharger);
export const hasTwinCharger = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.twinChargers);
export const hasHPWC = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.hpwc);
export const hasParcelShelf = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.parcelShelf);
export const hasPaintArmor = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.paintArmor);
export const hasThirdRow = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.thirdRow);
export const hasParkingSensors = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.parkingSensors);
export const hasLightingPackage = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.lightingPackage);
export const hasSecurityPackage = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.securityPackage);
export const hasColdWeather = (index: OptionIndex) => hasOption(index, OPTION_FLAGS.coldWeather);

/** Performance+ is either flagged directly or implied by its wheels. */
export function isPerfPlus(index: OptionIndex): boolean {
  if (hasOption(index, OPTION_FLAGS.performancePlus)) return true;
  const wheels = wheelType(index);
  return wheels.kind === 'known' && wheels.code === PERF_PLUS_WHEEL;
}

/** Evaluate every query once. */
export function resolveConfiguration(index: OptionIndex): VehicleConfiguration {
  return {
    region: region(index),
    trimLevel: trimLevel(index),
    driveSide: driveSide(index),
    batteryType: batteryType(index),
    paintColor: paintColor(index),
    roofType: roofType(index),
    wheelType: wheelType(index),
    seatType: seatType(index),
    decorType: decorType(index),
    adapterType: adapterType(index),

    performance: isPerformance(index),
    performancePlus: isPerfPlus(index),
    performanceExterior: hasPerfExterior(index),
    performancePowertrain: hasPerfPowertrain(index),
    airSuspension: hasAirSuspension(index),
    techPackage: hasTechPackage(index),
    powerLiftgate: hasPowerLiftgate(index),
    premiumLighting: hasPremiumLighting(index),
    homeLink: hasHomeLink(index),
    navigation: hasNavSystem(index),
    audioUpgrade: hasAudioUpgrade(index),
    satRadio: hasSatRadio(index),
    supercharger: hasSupercharger(index),
    twinChargers: hasTwinCharger(index),
    hpwc: hasHPWC(index),
    parcelShelf: hasParcelShelf(index),
    paintArmor: hasPaintArmor(index),
    thirdRow: hasThirdRow(index),

    parkingSensors: hasParkingSensors(index),
    lightingPackage: hasLightingPackage(index),
    securityPackage: hasSecurityPackage(index),
    coldWeather: hasColdWeather(index),
  };
}

const FLAG_KEYS: ReadonlySet<string> = new Set(Object.values(OPTION_FLAGS));

const CATEGORY_BY_PREFIX: ReadonlyMap<string, (code: string) => boolean> = new Map(
  ALL_CATEGORIES.flatMap((category) =>
    category.prefixes.map((prefix) => [prefix, (code: string) => category.fromCode(code).kind === 'known'] as const),
  ),
);

/**
 * Tokens this version cannot interpret: unlisted legacy flags, unknown
 * prefixes, and category codes missing from their table.
 */
export function unrecognizedCodes(index: OptionIndex): string[] {
  const out: string[] = [];
  for (const token of index.tokens) {
    if (out.includes(token)) continue;
    if (isLegacyFlagKey(token)) {
      if (!FLAG_KEYS.has(token)) out.push(token);
      continue;
    }
    const prefix = token.substring(0, 2);
    const isKnownCode = CATEGORY_BY_PREFIX.get(prefix);
    if (isKnownCode) {
      if (!isKnownCode(token)) out.push(token);
    } else if (!FLAG_KEYS.has(prefix)) {
      out.push(token);
    }
  }
  return out;
}
