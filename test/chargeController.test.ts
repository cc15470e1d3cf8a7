import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  ChargeController,
  OUT_OF_RANGE_MESSAGE,
  buildCommand,
  isValidChargePercent,
  type CommandTransport,
} from "../src/commands/chargeController.js";

function fakeTransport() {
  const setAndRefresh = vi.fn<CommandTransport["setAndRefresh"]>(async () => ({ success: true, message: "" }));
  return { setAndRefresh };
}

describe("ChargeController", () => {
  let transport: ReturnType<typeof fakeTransport>;
  let controller: ChargeController;

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    transport = fakeTransport();
    controller = new ChargeController(1234, transport);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("builds command identifiers from the vehicle id", () => {
    expect(buildCommand("42", "charge_start")).toBe("vehicles/42/command/charge_start");
  });

  const toggles: Array<["startCharging" | "stopCharging", string]> = [
    ["startCharging", "charge_start"],
    ["stopCharging", "charge_stop"],
  ];

  it.each(toggles)("%s sends %s", async (method, name) => {
    const result = await controller[method]();
    expect(result).toEqual({ success: true, message: "" });
    expect(transport.setAndRefresh).toHaveBeenCalledTimes(1);
    expect(transport.setAndRefresh).toHaveBeenCalledWith(`vehicles/1234/command/${name}`);
  });

  it("switches range mode", async () => {
    await controller.setChargeRange(true);
    await controller.setChargeRange(false);
    expect(transport.setAndRefresh.mock.calls).toEqual([
      ["vehicles/1234/command/charge_max_range"],
      ["vehicles/1234/command/charge_standard"],
    ]);
  });

  it.each([0, 101, -5, 50.5, Number.NaN])("rejects %s locally", async (percent) => {
    const result = await controller.setChargePercent(percent);
    expect(result).toEqual({ success: false, message: OUT_OF_RANGE_MESSAGE });
    expect(transport.setAndRefresh).not.toHaveBeenCalled();
  });

  it.each([1, 100, 80])("forwards %s", async (percent) => {
    const result = await controller.setChargePercent(percent);
    expect(result.success).toBe(true);
    expect(transport.setAndRefresh).toHaveBeenCalledTimes(1);
    expect(transport.setAndRefresh).toHaveBeenCalledWith(
      `vehicles/1234/command/set_charge_limit?percent=${percent}`,
    );
  });

  it("passes a remote failure through unchanged", async () => {
    transport.setAndRefresh.mockResolvedValueOnce({ success: false, message: "vehicle asleep" });
    const result = await controller.startCharging();
    expect(result).toEqual({ success: false, message: "vehicle asleep" });
  });

  it("turns a transport error into a failed result", async () => {
    transport.setAndRefresh.mockRejectedValueOnce(new Error("timeout"));
    const result = await controller.stopCharging();
    expect(result).toEqual({ success: false, message: "timeout" });
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("dispatches issue() by command kind", async () => {
    await controller.issue({ kind: "start" });
    await controller.issue({ kind: "stop" });
    await controller.issue({ kind: "maxRange" });
    await controller.issue({ kind: "standardRange" });
    await controller.issue({ kind: "setLimit", percent: 90 });
    const rejected = await controller.issue({ kind: "setLimit", percent: 0 });

    expect(rejected.success).toBe(false);
    expect(transport.setAndRefresh.mock.calls.map(([c]) => c)).toEqual([
      "vehicles/1234/command/charge_start",
      "vehicles/1234/command/charge_stop",
      "vehicles/1234/command/charge_max_range",
      "vehicles/1234/command/charge_standard",
      "vehicles/1234/command/set_charge_limit?percent=90",
    ]);
  });
});

describe("isValidChargePercent", () => {
  it("accepts integers 1..100 only", () => {
    expect(isValidChargePercent(1)).toBe(true);
    expect(isValidChargePercent(100)).toBe(true);
    expect(isValidChargePercent(0)).toBe(false);
    expect(isValidChargePercent(101)).toBe(false);
    expect(isValidChargePercent(99.9)).toBe(false);
  });
});
