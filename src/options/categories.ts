/**
 * src/options/categories.ts
 * Known option codes per category, with their display names.
 *
 * Every category falls back to the Unknown variant, so a code the backend
 * adds later still decodes; it just reports as "Unknown" until it is added
 * to the table below.
 */

import type {
  AdapterTypeCode,
  BatteryTypeCode,
  CategoryValue,
  DecorTypeCode,
  DriveSideCode,
  OptionCategory,
  PaintColorCode,
  RegionCode,
  RoofTypeCode,
  SeatTypeCode,
  TrimLevelCode,
  UnknownOption,
  WheelTypeCode,
} from '../types/options.js';

export const UNKNOWN_DESCRIPTION = 'Unknown';

export function unknownOption(code?: string): UnknownOption {
  return code === undefined
    ? { kind: 'unknown', description: UNKNOWN_DESCRIPTION }
    : { kind: 'unknown', code, description: UNKNOWN_DESCRIPTION };
}

function defineCategory<C extends string>(
  name: string,
  prefixes: readonly string[],
  descriptions: Readonly<Record<C, string>>,
): OptionCategory<C> {
  const isCode = (code: string): code is C =>
    Object.prototype.hasOwnProperty.call(descriptions, code);

  const known = new Map<string, C>();
  for (const code of Object.keys(descriptions)) {
    if (isCode(code)) known.set(code, code);
  }

  return {
    name,
    prefixes,
    fromCode(code: string | undefined): CategoryValue<C> {
      if (code === undefined) return unknownOption();
      const match = known.get(code);
      return match === undefined
        ? unknownOption(code)
        : { kind: 'known', code: match, description: descriptions[match] };
    },
  };
}

export const REGION = defineCategory<RegionCode>('Region', ['RE'], {
  RENA: 'United States',
  RENC: 'Canada',
  REEU: 'Europe',
});

export const TRIM_LEVEL = defineCategory<TrimLevelCode>('TrimLevel', ['TM'], {
  TM00: 'Standard Production Trim',
  TM02: 'Signature Performance Trim',
});

export const DRIVE_SIDE = defineCategory<DriveSideCode>('DriveSide', ['DR'], {
  DRLH: 'Left Hand',
  DRRH: 'Right Hand',
});

export const BATTERY_TYPE = defineCategory<BatteryTypeCode>('BatteryType', ['BT'], {
  BT85: '85kWh',
  BT60: '60kWh',
  BT40: '40kWh (Software Limited)',
});

export const ROOF_TYPE = defineCategory<RoofTypeCode>('RoofType', ['RF'], {
  RFBC: 'Body Color',
  RFPO: 'Panoramic',
  RFBK: 'Black',
});

export const WHEEL_TYPE = defineCategory<WheelTypeCode>('WheelType', ['WT'], {
  WT1P: 'Silver 19"',
  WTX1: 'Silver 19"',
  WT19: 'Silver 19"',
  WT21: 'Silver 21"',
  WTSP: 'Gray 21"',
  WTSG: 'Gray Perf+ 21"',
  WTAE: 'Aero 19"',
  WTTB: 'Cyclone 19"',
});

export const DECOR_TYPE = defineCategory<DecorTypeCode>('DecorType', ['ID'], {
  IDCF: 'Carbon Fiber',
  IDLW: 'Lacewood',
  IDOM: 'Obeche Matte',
  IDOG: 'Obeche Gloss',
  IDPB: 'Piano Black',
});

export const ADAPTER_TYPE = defineCategory<AdapterTypeCode>('AdapterType', ['AD'], {
  AD02: 'NEMA 14-50',
});

// Paint moved between prefixes across model years (base, metallic, premium).
export const PAINT_COLOR = defineCategory<PaintColorCode>('PaintColor', ['PB', 'PM', 'PP'], {
  PBSB: 'Black',
  PBCW: 'Solid White',
  PMSS: 'Silver',
  PMTG: 'Metallic Dolphin Gray',
  PMAB: 'Metallic Brown',
  PMMB: 'Metallic Blue',
  PMSG: 'Metallic Green',
  PPSW: 'Pearl White',
  PPMR: 'Premium Multicoat Red',
  PPSR: 'Premium Signature Red',
});

// QZMB has been observed but QZ is not probed; it only resolves via fromCode.
export const SEAT_TYPE = defineCategory<SeatTypeCode>('SeatType', ['IB', 'IP', 'IZ', 'IS'], {
  IBMB: 'Base Textile, Black',
  IPMB: 'Leather, Black',
  IPMG: 'Leather, Gray',
  IPMT: 'Leather, Tan',
  IZZW: 'Perf Leather with Grey Piping, White',
  QZMB: 'Perf Leather with Piping, Black',
  IZMB: 'Perf Leather with Piping, Black',
  IZMG: 'Perf Leather with Piping, Gray',
  IZMT: 'Perf Leather with Piping, Tan',
  ISZW: 'Signature Perforated Leather, White',
  ISZT: 'Signature Perforated Leather, Tan',
  ISZB: 'Signature Perforated Leather, Black',
});

export const ALL_CATEGORIES = [
  REGION,
  TRIM_LEVEL,
  DRIVE_SIDE,
  BATTERY_TYPE,
  ROOF_TYPE,
  WHEEL_TYPE,
  DECOR_TYPE,
  ADAPTER_TYPE,
  PAINT_COLOR,
  SEAT_TYPE,
] as const;
