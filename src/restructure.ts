/**
 * Restructure: Standard Record → V2 Record
 *
 * Pure function of the record plus an explicit clock. Identity and
 * classification come from part-number rules, static parameters from the
 * comment lines, and loss tables are regrouped by test condition (vdc, vgs)
 * with data keyed by temperature.
 */
import { extractDatasheetInfo } from "./comment-mining.js";
import {
  classifyTechnology,
  extractFamily,
  extractVoltageRating,
  generateDeviceId,
  integrationLevel,
  mapPackageType,
} from "./part-number-rules.js";
import {
  conductionBlocks,
  type ConductionLoss,
  type DeviceVariable,
  type LossBlock,
  type StandardRecord,
  type ThermalModel,
} from "./types/device.js";
import type {
  ConductionCurve,
  EnergyUnit,
  SwitchingCondition,
  SwitchingCurves,
  V2Record,
  V2Thermal,
  V2Variable,
} from "./types/device-v2.js";
import { formatDate } from "./utils/dates.js";

/** Temperatures at or above this are simulator convergence aids, not operating points */
export const SIM_TEMPERATURE_LIMIT = 500;
/** Gate drive assumed for every switching condition */
export const DEFAULT_VGS = 15;
export const DEFAULT_TJ_MAX = 175;
export const DEFAULT_COMPUTATION_METHOD = "Table only";

export interface RestructureOptions {
  now: Date;
}

export function isPhysicalTemperature(t: number): boolean {
  return t < SIM_TEMPERATURE_LIMIT;
}

/** `data_by_temperature` key: integral temperatures keep a `.0` (25 → "25.0"). */
export function temperatureKey(t: number): string {
  return Number.isInteger(t) ? `${t}.0` : String(t);
}

/**
 * Display unit for a stored energy scale. Only the two exact constants get a
 * named unit with the values left as stored; every other scale is applied as
 * a multiplier and labelled J.
 */
export function energyUnitForScale(scale: number): { unit: EnergyUnit; factor: number } {
  if (scale === 0.001) return { unit: "mJ", factor: 1 };
  if (scale === 1e-6) return { unit: "uJ", factor: 1 };
  return { unit: "J", factor: scale };
}

// ======================================================
//  LOSS CURVES
// ======================================================

export function convertLossData(loss: LossBlock): SwitchingCurves {
  const result: SwitchingCurves = {
    computation_method: loss.computation_method ?? DEFAULT_COMPUTATION_METHOD,
    data: [],
  };
  if (loss.formula !== undefined) result.formula = loss.formula;
  if (!loss.energy) return result;

  const currentAxis = loss.current_axis ?? [];
  const voltageAxis = loss.voltage_axis ?? [];
  const temperatureAxis = loss.temperature_axis ?? [];
  const validTemps = temperatureAxis.filter(isPhysicalTemperature);
  const { unit, factor } = energyUnitForScale(loss.energy.scale);
  const raw = loss.energy.data;

  voltageAxis.forEach((vdc, vIdx) => {
    // zero / negative bias is not a usable test condition
    if (vdc <= 0) return;

    const condition: SwitchingCondition = {
      conditions: { vdc, vgs: DEFAULT_VGS },
      current_axis: { values: currentAxis, unit: "A" },
      temperature_axis: { values: validTemps, unit: "C" },
      energy: { unit, data_by_temperature: {} },
      quality: "original",
      source_ref: "plecs_model",
    };

    // rows are indexed by position in the unfiltered axis
    temperatureAxis.forEach((temp, tIdx) => {
      if (!isPhysicalTemperature(temp)) return;
      const row = raw[tIdx]?.[vIdx];
      if (!row) return;
      condition.energy.data_by_temperature[temperatureKey(temp)] =
        factor !== 1 ? row.map((v) => v * factor) : row;
    });

    result.data.push(condition);
  });

  return result;
}

export function convertConductionLoss(loss: ConductionLoss): ConductionCurve[] {
  return conductionBlocks(loss).map((block) => {
    const temperatureAxis = block.temperature_axis ?? [];
    const curve: ConductionCurve = {
      gate: block.gate ?? "on",
      computation_method: block.computation_method ?? DEFAULT_COMPUTATION_METHOD,
      current_axis: { values: block.current_axis ?? [], unit: "A" },
      temperature_axis: { values: temperatureAxis.filter(isPhysicalTemperature), unit: "C" },
      voltage_drop: {
        unit: "V",
        scale: block.voltage_drop?.scale ?? 1,
        data_by_temperature: {},
      },
      quality: "original",
      source_ref: "plecs_model",
    };
    if (block.formula !== undefined) curve.formula = block.formula;

    const raw = block.voltage_drop?.data ?? [];
    temperatureAxis.forEach((temp, tIdx) => {
      if (!isPhysicalTemperature(temp) || tIdx >= raw.length) return;
      curve.voltage_drop.data_by_temperature[temperatureKey(temp)] = raw[tIdx];
    });
    return curve;
  });
}

// ======================================================
//  THERMAL & VARIABLES
// ======================================================

export function round4(x: number): number {
  return Math.round(x * 1e4) / 1e4;
}

export function convertThermalModel(thermal: ThermalModel): V2Thermal {
  const rcElements = (thermal.rc_elements ?? []).map((rc) => ({
    R: rc.R ?? 0,
    C: rc.C ?? 0,
    R_unit: "K/W" as const,
    C_unit: "J/K" as const,
  }));
  const total = rcElements.reduce((sum, rc) => sum + rc.R, 0);
  return {
    model_type: thermal.type ?? "Cauer",
    rc_elements: rcElements,
    rth_jc_total: { value: round4(total), unit: "K/W" },
  };
}

/** Keyed by lower-cased name; a later duplicate replaces an earlier one. */
export function convertVariables(variables: readonly DeviceVariable[]): Record<string, V2Variable> {
  const result: Record<string, V2Variable> = {};
  for (const v of variables) {
    result[(v.name ?? "").toLowerCase()] = {
      description: v.description ?? "",
      default: v.default_value ?? null,
      min: v.min_value ?? null,
      max: v.max_value ?? null,
      unit: "ohm",
    };
  }
  return result;
}

// ======================================================
//  DEVICE
// ======================================================

export function restructureDevice(record: StandardRecord, options: RestructureOptions): V2Record {
  const { metadata, library } = record;
  const pkg = record.package;
  const semi = pkg?.semiconductor_data;
  const thermal = pkg?.thermal_model;
  const ds = extractDatasheetInfo(pkg?.comment ?? []);

  const partNumber = metadata.part_number;
  const manufacturer = metadata.manufacturer;
  const vRating = extractVoltageRating(partNumber);

  const v2: V2Record = {
    device_id: generateDeviceId(manufacturer, partNumber),

    identity: {
      manufacturer,
      part_number: partNumber,
      family: extractFamily(partNumber),
      aliases: [],
      datasheet_url: null,
      lifecycle: "active",
    },

    classification: {
      technology: classifyTechnology(metadata.material, metadata.type),
      device_type: metadata.type || "MOSFET with Diode",
      polarity: "N",
      package_type: mapPackageType(metadata.package_type, partNumber),
      integration_level: integrationLevel(metadata.package_type),
    },

    ratings: {
      vds_max: vRating !== null ? { value: vRating, unit: "V" } : null,
      id_max: null,
      tj_max: { value: DEFAULT_TJ_MAX, unit: "C" },
      pd_max: null,
    },

    static: {
      rds_on: ds.ron
        ? [{ value: ds.ron * 1000, unit: "mohm", conditions: { tj: 25, vgs: DEFAULT_VGS }, typ_max: "typ" }]
        : null,
      vf_body_diode: ds.vf
        ? [{ value: ds.vf, unit: "V", conditions: { tj: 25 }, typ_max: "typ" }]
        : null,
      vgs_th: null,
    },

    switching: { qg_total: null, ciss: null, coss: null, crss: null },

    loss_curves: {},
    thermal: {},
    variables: {},

    models: {
      plecs: {
        available: true,
        version: library.version || "1.4",
        source: `${manufacturer} official`,
      },
      ltspice: { available: false },
      spice: { available: false },
    },

    sources: {
      plecs_model: {
        file: metadata.source_file,
        path: metadata.source_path,
        version: library.version,
      },
      datasheet: { revision: ds.revision, date: ds.date, url: null },
    },

    revision: {
      version: "2.0",
      author: metadata.author,
      date: formatDate(options.now),
      notes: "Restructured from PLECS XML model",
    },
  };

  if (semi?.turn_on_loss) v2.loss_curves.eon = convertLossData(semi.turn_on_loss);
  if (semi?.turn_off_loss) v2.loss_curves.eoff = convertLossData(semi.turn_off_loss);
  if (semi?.conduction_loss) v2.loss_curves.vf = convertConductionLoss(semi.conduction_loss);

  if (thermal && Object.keys(thermal).length > 0) v2.thermal = convertThermalModel(thermal);
  if (pkg?.variables?.length) v2.variables = convertVariables(pkg.variables);

  return v2;
}
