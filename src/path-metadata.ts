/**
 * Path metadata: guesses material / manufacturer / package type from the
 * folder names a vendor XML file sits under. Kept behind one function so a
 * manifest lookup can replace it without touching the mapper.
 */
import type { Material, PackageType } from "./types/device.js";

export interface PartialMetadata {
  material: Material;
  manufacturer: string;
  package_type: PackageType;
}

export const MATERIALS: readonly Material[] = ["Si", "SiC", "GaN"];

/** Vendor folder names as they appear on disk (underscores become spaces). */
export const MANUFACTURER_FOLDERS: readonly string[] = [
  "Wolfspeed",
  "Infineon",
  "STMicroelectronics",
  "ON_Semiconductor",
  "Vishay",
  "Littelfuse",
  "Microchip",
  "ROHM",
  "Mitsubishi_Electric",
  "GaN_Systems",
  "Navitas",
  "Power_Integrations",
  "Transphorm",
  "EPC",
];

export function pathParts(filePath: string): string[] {
  return filePath.split(/[\\/]+/).filter(Boolean);
}

function isMaterial(part: string): part is Material {
  return MATERIALS.some((m) => m === part);
}

export function inferMaterial(filePath: string): Material {
  return pathParts(filePath).find(isMaterial) ?? "Unknown";
}

export function inferManufacturer(filePath: string): string {
  const folder = pathParts(filePath).find((p) => MANUFACTURER_FOLDERS.includes(p));
  return folder ? folder.replace(/_/g, " ") : "Unknown";
}

export function inferPackageType(filePath: string): PackageType {
  const lower = filePath.toLowerCase();
  if (lower.includes("module")) return "power module";
  // mosfets / diodes folders are discrete, and so is everything unrecognised
  return "discrete";
}

export function inferMetadataFromPath(filePath: string): PartialMetadata {
  return {
    material: inferMaterial(filePath),
    manufacturer: inferManufacturer(filePath),
    package_type: inferPackageType(filePath),
  };
}
