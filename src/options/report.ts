/**
 * src/options/report.ts
 * Human-readable configuration summary.
 *
 * Line order, labels and indentation are consumed by existing tooling and
 * must not change; note the 7-space indent in the performance block.
 */

import type { OptionIndex, VehicleConfiguration } from '../types/options.js';
import { resolveConfiguration } from './resolver.js';

const bool = (value: boolean) => (value ? 'true' : 'false');

export function formatOptionsReport(c: VehicleConfiguration): string {
  const lines = [
    `    Region: ${c.region.description}`,
    `    Trim: ${c.trimLevel.description}`,
    `    Drive Side: ${c.driveSide.description}`,
    '    Performance Options: [',
    `       Performance: ${bool(c.performance)}`,
    `       Performance+: ${bool(c.performancePlus)}`,
    `       Performance Exterior: ${bool(c.performanceExterior)}`,
    `       Performance Powertrain: ${bool(c.performancePowertrain)}`,
    '    ]',
    `    Battery: ${c.batteryType.description}`,
    `    Color: ${c.paintColor.description}`,
    `    Roof: ${c.roofType.description}`,
    `    Wheels: ${c.wheelType.description}`,
    `    Seats: ${c.seatType.description}`,
    `    Decor: ${c.decorType.description}`,
    `    Air Suspension: ${bool(c.airSuspension)}`,
    '    Tech Upgrades: [',
    `        Tech Package: ${bool(c.techPackage)}`,
    `        Power Liftgate: ${bool(c.powerLiftgate)}`,
    `        Premium Lighting: ${bool(c.premiumLighting)}`,
    `        HomeLink: ${bool(c.homeLink)}`,
    `        Navigation: ${bool(c.navigation)}`,
    '    ]',
    '    Audio: [',
    `        Upgraded: ${bool(c.audioUpgrade)}`,
    `        Sat Radio: ${bool(c.satRadio)}`,
    '    ]',
    '    Charging: [',
    `        Supercharger: ${bool(c.supercharger)}`,
    `        Twin Chargers: ${bool(c.twinChargers)}`,
    `        HPWC: ${bool(c.hpwc)}`,
    '    ]',
    '    Options: [',
    `        Parcel Shelf: ${bool(c.parcelShelf)}`,
    `        Paint Armor: ${bool(c.paintArmor)}`,
    `        Third Row Seating: ${bool(c.thirdRow)}`,
    '    ]',
    '    Newer Options: [',
    `        Parking Sensors: ${bool(c.parkingSensors)}`,
    `        Lighting Package: ${bool(c.lightingPackage)}`,
    `        Security Package: ${bool(c.securityPackage)}`,
    `        Cold Weather Package: ${bool(c.coldWeather)}`,
    '    ]',
  ];
  return lines.map((l) => `${l}\n`).join('');
}

export function renderOptionsReport(index: OptionIndex): string {
  return formatOptionsReport(resolveConfiguration(index));
}
