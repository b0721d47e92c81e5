/**
 * Part-number rules: independent, named extractors over a vendor part number.
 * Each returns a value or an empty/null result; none throws on a miss.
 *
 *   C2M0025120D
 *   ^^^            family
 *          ^^^     voltage code (120 → 1200 V)
 *             ^    package suffix (D → TO-247-3)
 */
import type { Material } from "./types/device.js";

// ============ Tables ============

/** Trailing voltage code → rated blocking voltage (V) */
export const VOLTAGE_CODES: Readonly<Record<number, number>> = {
  120: 1200,
  65: 650,
  60: 600,
  170: 1700,
  75: 750,
};

/** Leading letter of the package suffix → package name, checked in this order */
export const PACKAGE_SUFFIXES: ReadonlyArray<readonly [string, string]> = [
  ["D", "TO-247-3"],
  ["J", "TO-247-4"],
  ["K", "TO-247-4"],
  ["L", "TO-263-7"],
  ["E", "TO-247-3"],
  ["A", "TO-220"],
  ["F", "TO-220F"],
  ["G", "D2PAK-7"],
  ["H", "TO-247-3"],
  ["P", "TO-247-PLUS"],
];

// ============ Rules ============

/** Leading letter-digit-letter prefix (C2M, C3M, E4M…), or "" */
export function extractFamily(partNumber: string): string {
  const match = /^([A-Z]\d[A-Z])/.exec(partNumber);
  return match ? match[1] : "";
}

/** Rated voltage from the 3-digit code before the trailing letter; null for unknown codes */
export function extractVoltageRating(partNumber: string): number | null {
  const match = /(\d{3})[A-Z]$/.exec(partNumber);
  if (!match) return null;
  return VOLTAGE_CODES[parseInt(match[1], 10)] ?? null;
}

/** Trailing package suffix: one letter, optionally followed by one digit */
export function extractPackageCode(partNumber: string): string {
  const match = /([A-Z]\d?)$/.exec(partNumber);
  return match ? match[1] : "";
}

/** Package name for the V2 classification */
export function mapPackageType(sourcePackageType: string, partNumber: string): string {
  if (sourcePackageType === "power module") return "module";
  const suffix = extractPackageCode(partNumber);
  const hit = PACKAGE_SUFFIXES.find(([letter]) => suffix.startsWith(letter));
  return hit ? hit[1] : "discrete";
}

export function integrationLevel(sourcePackageType: string): "discrete" | "module" {
  return sourcePackageType === "power module" ? "module" : "discrete";
}

/** `<material>_<MOSFET|IGBT|Diode>`; SiC_MOSFET when the material is unknown */
export function classifyTechnology(material: Material, deviceType: string): string {
  if (material === "Unknown") return "SiC_MOSFET";
  const type = deviceType.toLowerCase();
  if (type.includes("igbt")) return `${material}_IGBT`;
  if (type.includes("diode") && !type.includes("mosfet")) return `${material}_Diode`;
  return `${material}_MOSFET`;
}

/** Deterministic slug: `<manufacturer>_<part_number>`, lower-cased */
export function generateDeviceId(manufacturer: string, partNumber: string): string {
  const mfr = manufacturer.toLowerCase().replace(/ /g, "_");
  const pn = partNumber.toLowerCase().replace(/-/g, "_");
  return `${mfr}_${pn}`;
}
