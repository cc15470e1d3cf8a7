import { afterEach, describe, it, expect, vi } from "vitest";
import { setLogLevel } from "../src/utils/logger.js";
import { buildOptionIndex } from "../src/options/optionIndex.js";
import { PAINT_COLOR, REGION, SEAT_TYPE } from "../src/options/categories.js";
import {
  batteryType,
  hasOption,
  isPerfPlus,
  paintColor,
  region,
  resolveConfiguration,
  seatType,
  trimLevel,
  unrecognizedCodes,
  wheelType,
} from "../src/options/resolver.js";

const idx = (raw: string | null) => buildOptionIndex(raw);

describe("hasOption", () => {
  it("is false for an absent key", () => {
    expect(hasOption(idx("RENA"), "TP")).toBe(false);
    expect(hasOption(idx(null), "X001")).toBe(false);
  });

  it("is true only for the 01 variant of a standard option", () => {
    expect(hasOption(idx("TP01"), "TP")).toBe(true);
    expect(hasOption(idx("TP00"), "TP")).toBe(false);
    expect(hasOption(idx("TP02"), "TP")).toBe(false);
  });

  it("treats legacy flags as present/absent", () => {
    const index = idx("X001,X003");
    expect(hasOption(index, "X001")).toBe(true);
    expect(hasOption(index, "X003")).toBe(true);
    expect(hasOption(index, "X004")).toBe(false);
  });

  it("treats any present X key as true regardless of suffix", () => {
    expect(hasOption(idx("XP07"), "XP")).toBe(true);
  });
});

describe("category queries", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("resolves battery type through the PBT correction", () => {
    expect(batteryType(idx("PBT85"))).toEqual({ kind: "known", code: "BT85", description: "85kWh" });
  });

  it("probes paint prefixes in order PB, PM, PP", () => {
    expect(paintColor(idx("PPSW"))).toEqual({ kind: "known", code: "PPSW", description: "Pearl White" });
    expect(paintColor(idx("PPSW,PMSS")).description).toBe("Silver");
    expect(paintColor(idx("PPSW,PBSB")).description).toBe("Black");
  });

  it("falls back to Unknown when no paint prefix is present", () => {
    expect(paintColor(idx("RENA"))).toEqual({ kind: "unknown", description: "Unknown" });
  });

  it("stops at the first prefix found, even if its code is unrecognized", () => {
    expect(paintColor(idx("PMZZ,PPSW"))).toEqual({ kind: "unknown", code: "PMZZ", description: "Unknown" });
  });

  it("logs the category name for a present but unlisted code", () => {
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("debug");
    region(idx("RE99"));
    region(idx("RENA"));
    expect(err).toHaveBeenCalledTimes(1);
    expect(String(err.mock.calls[0][0])).toMatch(
      /\[DEBUG\] Unrecognized option code \{"category":"Region","code":"RE99"\}$/,
    );
  });

  it("maps an unrecognized region to Unknown without throwing", () => {
    expect(region(idx("RE99"))).toEqual({ kind: "unknown", code: "RE99", description: "Unknown" });
  });

  it("resolves seats under the IZ prefix", () => {
    expect(seatType(idx("IZMT")).description).toBe("Perf Leather with Piping, Tan");
  });

  it("knows QZMB in the table but never probes QZ", () => {
    expect(SEAT_TYPE.fromCode("QZMB").kind).toBe("known");
    expect(seatType(idx("QZMB"))).toEqual({ kind: "unknown", description: "Unknown" });
  });

  it("does not match object prototype keys", () => {
    expect(REGION.fromCode("constructor")).toEqual({ kind: "unknown", code: "constructor", description: "Unknown" });
    expect(PAINT_COLOR.fromCode(undefined)).toEqual({ kind: "unknown", description: "Unknown" });
  });

  it("resolves trim and wheels", () => {
    const index = idx("TM02,WTAE");
    expect(trimLevel(index).description).toBe("Signature Performance Trim");
    expect(wheelType(index).description).toBe('Aero 19"');
  });
});

describe("isPerfPlus", () => {
  const cases: Array<[string, boolean]> = [
    ["PX01", true],
    ["WTSG", true],
    ["PX01,WTSG", true],
    ["PX00,WTSG", true],
    ["PX00,WT21", false],
    ["WTSP", false],
    ["RENA", false],
  ];

  it.each(cases)("%s -> %s", (raw, expected) => {
    const index = idx(raw);
    expect(isPerfPlus(index)).toBe(expected);
    const viaWheels = wheelType(index).kind === "known" && wheelType(index).code === "WTSG";
    expect(isPerfPlus(index)).toBe(hasOption(index, "PX") || viaWheels);
  });
});

describe("resolveConfiguration", () => {
  it("is all Unknown / false for absent input", () => {
    const config = resolveConfiguration(idx(null));
    for (const value of Object.values(config)) {
      if (typeof value === "boolean") {
        expect(value).toBe(false);
      } else {
        expect(value).toEqual({ kind: "unknown", description: "Unknown" });
      }
    }
    expect(Object.keys(config)).toHaveLength(32);
  });

  it("maps legacy flags onto their named fields", () => {
    const config = resolveConfiguration(idx("X001,X003,X007,X011,X013,X019,X024"));
    expect(config.powerLiftgate).toBe(true);
    expect(config.navigation).toBe(true);
    expect(config.premiumLighting).toBe(true);
    expect(config.homeLink).toBe(true);
    expect(config.satRadio).toBe(true);
    expect(config.performanceExterior).toBe(true);
    expect(config.performancePowertrain).toBe(true);
    expect(config.performance).toBe(false);
  });
});

describe("unrecognizedCodes", () => {
  it("lists unknown prefixes, flags and codes once, in input order", () => {
    const index = idx("MS01,RENA,TP00,X001,X099,PMZZ,MS01");
    expect(unrecognizedCodes(index)).toEqual(["MS01", "X099", "PMZZ"]);
  });

  it("is empty for a fully known string", () => {
    expect(unrecognizedCodes(idx("RENA,BT85,PF01,X001,AD02"))).toEqual([]);
  });
});
