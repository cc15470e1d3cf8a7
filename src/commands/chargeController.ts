/**
 * src/commands/chargeController.ts
 * Start/stop charging, switch range mode, set the charge limit.
 *
 * Sending and refreshing vehicle state is the transport's job (auth, HTTP,
 * retries all live there); this module only picks the command string and
 * rejects a bad charge limit before anything is sent.
 */

import { extractErrorMessage, logger } from "../utils/logger.js";

export interface CommandResult {
  success: boolean;
  message: string;
}

/** Supplied by the caller: send one command, refresh vehicle state, report. */
export interface CommandTransport {
  setAndRefresh(command: string): Promise<CommandResult>;
}

export type ChargeCommand =
  | { kind: "start" }
  | { kind: "stop" }
  | { kind: "maxRange" }
  | { kind: "standardRange" }
  | { kind: "setLimit"; percent: number };

export const MIN_CHARGE_PERCENT = 1;
export const MAX_CHARGE_PERCENT = 100;
export const OUT_OF_RANGE_MESSAGE = "value out of range";

export function buildCommand(vehicleId: string | number, name: string): string {
  return `vehicles/${vehicleId}/command/${name}`;
}

export function isValidChargePercent(percent: number): boolean {
  return Number.isInteger(percent) && percent >= MIN_CHARGE_PERCENT && percent <= MAX_CHARGE_PERCENT;
}

export class ChargeController {
  private readonly startCommand: string;
  private readonly stopCommand: string;
  private readonly maxRangeCommand: string;
  private readonly stdRangeCommand: string;

  constructor(
    private readonly vehicleId: string | number,
    private readonly transport: CommandTransport,
  ) {
    this.startCommand = buildCommand(vehicleId, "charge_start");
    this.stopCommand = buildCommand(vehicleId, "charge_stop");
    this.maxRangeCommand = buildCommand(vehicleId, "charge_max_range");
    this.stdRangeCommand = buildCommand(vehicleId, "charge_standard");
  }

  setChargeState(charging: boolean): Promise<CommandResult> {
    return this.send(charging ? this.startCommand : this.stopCommand);
  }

  startCharging(): Promise<CommandResult> {
    return this.setChargeState(true);
  }

  stopCharging(): Promise<CommandResult> {
    return this.setChargeState(false);
  }

  setChargeRange(max: boolean): Promise<CommandResult> {
    return this.send(max ? this.maxRangeCommand : this.stdRangeCommand);
  }

  async setChargePercent(percent: number): Promise<CommandResult> {
    if (!isValidChargePercent(percent)) {
      logger.warn("Rejected charge limit", { vehicleId: this.vehicleId, percent });
      return { success: false, message: OUT_OF_RANGE_MESSAGE };
    }
    return this.send(buildCommand(this.vehicleId, `set_charge_limit?percent=${percent}`));
  }

  issue(command: ChargeCommand): Promise<CommandResult> {
    switch (command.kind) {
      case "start":
        return this.startCharging();
      case "stop":
        return this.stopCharging();
      case "maxRange":
        return this.setChargeRange(true);
      case "standardRange":
        return this.setChargeRange(false);
      case "setLimit":
        return this.setChargePercent(command.percent);
    }
  }

  private async send(command: string): Promise<CommandResult> {
    logger.debug("Sending vehicle command", { command });
    try {
      const result = await this.transport.setAndRefresh(command);
      if (!result.success) {
        logger.warn("Vehicle command failed", { command, message: result.message });
      }
      return result;
    } catch (error) {
      const message = extractErrorMessage(error);
      logger.error("Vehicle command transport error", { command, error });
      return { success: false, message };
    }
  }
}
