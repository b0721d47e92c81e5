/**
 * V2 Record: field-grouped schema derived one way from a Standard Record.
 * Fields that cannot be extracted are null, never missing.
 */
import type { VariableValue } from './device.js';

export interface Quantity {
  value: number;
  unit: string;
}

export interface RatedValue extends Quantity {
  conditions: Record<string, number>;
  typ_max: 'typ' | 'max';
}

export interface AxisValues {
  values: number[];
  unit: string;
}

export interface SwitchingCondition {
  conditions: { vdc: number; vgs: number };
  current_axis: AxisValues;
  temperature_axis: AxisValues;
  energy: {
    unit: EnergyUnit;
    data_by_temperature: Record<string, number[]>;
  };
  quality: 'original';
  source_ref: 'plecs_model';
}

export type EnergyUnit = 'mJ' | 'uJ' | 'J';

export interface SwitchingCurves {
  computation_method: string;
  formula?: string;
  data: SwitchingCondition[];
}

export interface ConductionCurve {
  gate: string;
  computation_method: string;
  formula?: string;
  current_axis: AxisValues;
  temperature_axis: AxisValues;
  voltage_drop: {
    unit: 'V';
    scale: number;
    data_by_temperature: Record<string, number[]>;
  };
  quality: 'original';
  source_ref: 'plecs_model';
}

export interface V2RcElement {
  R: number;
  C: number;
  R_unit: 'K/W';
  C_unit: 'J/K';
}

export interface V2Thermal {
  model_type: string;
  rc_elements: V2RcElement[];
  rth_jc_total: Quantity;
}

export interface V2Variable {
  description: string;
  default: VariableValue | null;
  min: VariableValue | null;
  max: VariableValue | null;
  unit: string;
}

export interface V2Record {
  device_id: string;
  identity: {
    manufacturer: string;
    part_number: string;
    family: string;
    aliases: string[];
    datasheet_url: string | null;
    lifecycle: string;
  };
  classification: {
    technology: string;
    device_type: string;
    polarity: 'N' | 'P';
    package_type: string;
    integration_level: 'discrete' | 'module';
  };
  ratings: {
    vds_max: Quantity | null;
    id_max: Quantity | null;
    tj_max: Quantity;
    pd_max: Quantity | null;
  };
  static: {
    rds_on: RatedValue[] | null;
    vf_body_diode: RatedValue[] | null;
    vgs_th: RatedValue[] | null;
  };
  switching: {
    qg_total: Quantity | null;
    ciss: Quantity | null;
    coss: Quantity | null;
    crss: Quantity | null;
  };
  loss_curves: {
    eon?: SwitchingCurves;
    eoff?: SwitchingCurves;
    vf?: ConductionCurve[];
  };
  /** Empty object when the source has no thermal model. */
  thermal: V2Thermal | Record<string, never>;
  variables: Record<string, V2Variable>;
  models: {
    plecs: { available: true; version: string; source: string };
    ltspice: { available: boolean };
    spice: { available: boolean };
  };
  sources: {
    plecs_model: { file: string; path: string; version: string };
    datasheet: { revision: string | null; date: string | null; url: string | null };
  };
  revision: {
    version: string;
    author: string;
    date: string;
    notes: string;
  };
}
