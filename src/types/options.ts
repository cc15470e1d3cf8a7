export type RawOptionString = string | null | undefined;

/**
 * Decoded option codes for one vehicle snapshot.
 * Standard tokens are keyed by their 2-character prefix; legacy `X0…` tokens
 * are whole-token flags kept apart. The backing storage is not reachable from
 * the outside, so an index never changes after it is built.
 */
export interface OptionIndex {
  /** Token stored under a 2-character prefix (last seen wins). */
  tokenFor(prefix: string): string | undefined;
  hasLegacyFlag(token: string): boolean;
  /** Prefix/token pairs in first-seen prefix order; a fresh copy per call. */
  entries(): Array<[string, string]>;
  /** Legacy flags in input order; a fresh copy per call. */
  legacyFlags(): string[];
  /** Accepted tokens, in input order. */
  readonly tokens: readonly string[];
}

export interface KnownOption<C extends string> {
  kind: 'known';
  code: C;
  description: string;
}

export interface UnknownOption {
  kind: 'unknown';
  code?: string;          // observed but unrecognized token, if any
  description: 'Unknown';
}

export type CategoryValue<C extends string> = KnownOption<C> | UnknownOption;

export interface OptionCategory<C extends string> {
  /** Shown in logs when a present code is missing from the table. */
  name: string;
  /** Probed in order; the first prefix present wins. */
  prefixes: readonly string[];
  fromCode(code: string | undefined): CategoryValue<C>;
}

export type RegionCode = 'RENA' | 'RENC' | 'REEU';
export type TrimLevelCode = 'TM00' | 'TM02';
export type DriveSideCode = 'DRLH' | 'DRRH';
export type BatteryTypeCode = 'BT85' | 'BT60' | 'BT40';
export type RoofTypeCode = 'RFBC' | 'RFPO' | 'RFBK';
export type WheelTypeCode = 'WT1P' | 'WTX1' | 'WT19' | 'WT21' | 'WTSP' | 'WTSG' | 'WTAE' | 'WTTB';
export type DecorTypeCode = 'IDCF' | 'IDLW' | 'IDOM' | 'IDOG' | 'IDPB';
export type AdapterTypeCode = 'AD02';
export type PaintColorCode =
  | 'PBSB'
  | 'PBCW'
  | 'PMSS'
  | 'PMTG'
  | 'PMAB'
  | 'PMMB'
  | 'PMSG'
  | 'PPSW'
  | 'PPMR'
  | 'PPSR';
export type SeatTypeCode =
  | 'IBMB'
  | 'IPMB'
  | 'IPMG'
  | 'IPMT'
  | 'IZZW'
  | 'QZMB'
  | 'IZMB'
  | 'IZMG'
  | 'IZMT'
  | 'ISZW'
  | 'ISZT'
  | 'ISZB';

export type Region = CategoryValue<RegionCode>;
export type TrimLevel = CategoryValue<TrimLevelCode>;
export type DriveSide = CategoryValue<DriveSideCode>;
export type BatteryType = CategoryValue<BatteryTypeCode>;
export type RoofType = CategoryValue<RoofTypeCode>;
export type WheelType = CategoryValue<WheelTypeCode>;
export type DecorType = CategoryValue<DecorTypeCode>;
export type AdapterType = CategoryValue<AdapterTypeCode>;
export type PaintColor = CategoryValue<PaintColorCode>;
export type SeatType = CategoryValue<SeatTypeCode>;

export interface VehicleConfiguration {
  region: Region;
  trimLevel: TrimLevel;
  driveSide: DriveSide;
  batteryType: BatteryType;
  paintColor: PaintColor;
  roofType: RoofType;
  wheelType: WheelType;
  seatType: SeatType;
  decorType: DecorType;
  adapterType: AdapterType;

  performance: boolean;
  performancePlus: boolean;
  performanceExterior: boolean;
  performancePowertrain: boolean;
  airSuspension: boolean;
  techPackage: boolean;
  powerLiftgate: boolean;
  premiumLighting: boolean;
  homeLink: boolean;
  navigation: boolean;
  audioUpgrade: boolean;
  satRadio: boolean;
  supercharger: boolean;
  twinChargers: boolean;
  hpwc: boolean;
  parcelShelf: boolean;
  paintArmor: boolean;
  thirdRow: boolean;

  // speculative, seen on newer vehicles
  parkingSensors: boolean;
  lightingPackage: boolean;
  securityPackage: boolean;
  coldWeather: boolean;
}

export interface OptionsExport {
  vin?: string;
  option_codes: string | null;
  generated_ts: string;   // ISO8601
  configuration: VehicleConfiguration;
  unrecognized: string[];
}
