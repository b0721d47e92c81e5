/**
 * Standard Record: canonical device form produced directly from vendor XML.
 * Energy / voltage-drop values are stored pre-scale.
 */

export type Material = 'Si' | 'SiC' | 'GaN' | 'Unknown';
export type PackageType = 'discrete' | 'power module';

export interface DeviceMetadata {
  manufacturer: string;
  type: string;
  material: Material;
  package_type: PackageType;
  part_number: string;
  author: string;
  date: string;
  source_file: string;
  source_path: string;
}

export interface LibraryInfo {
  xmlns: string;
  version: string;
}

/** Numeric when the XML text parses as a number, else the trimmed literal. */
export type VariableValue = number | string;

export interface DeviceVariable {
  name?: string;
  description?: string;
  default_value?: VariableValue;
  min_value?: VariableValue;
  max_value?: VariableValue;
}

/** [temperature][voltage][current] */
export type Rank3Data = number[][][];
/** [temperature][current] */
export type Rank2Data = number[][];

export interface ScaledTable<D> {
  scale: number;
  data: D;
}

export interface LossBlock {
  computation_method?: string;
  formula?: string;
  current_axis?: number[];
  voltage_axis?: number[];
  temperature_axis?: number[];
  energy?: ScaledTable<Rank3Data>;
  /** Rare on switching blocks; carried for round trips */
  voltage_drop?: ScaledTable<Rank2Data>;
}

export interface ConductionBlock {
  gate?: string;
  computation_method?: string;
  formula?: string;
  current_axis?: number[];
  voltage_axis?: number[];
  temperature_axis?: number[];
  voltage_drop?: ScaledTable<Rank2Data>;
  /** Rare on conduction blocks; carried for round trips */
  energy?: ScaledTable<Rank3Data>;
}

export type ConductionLoss =
  | { kind: 'single'; block: ConductionBlock }
  | { kind: 'multiple'; blocks: ConductionBlock[] };

export interface SemiconductorData {
  type: string;
  turn_on_loss?: LossBlock;
  turn_off_loss?: LossBlock;
  conduction_loss?: ConductionLoss;
}

export interface RcElement {
  R?: number;
  C?: number;
}

export interface ThermalModel {
  type?: string;
  rc_elements?: RcElement[];
}

export interface DevicePackage {
  class: string;
  vendor: string;
  partnumber: string;
  variables?: DeviceVariable[];
  semiconductor_data?: SemiconductorData;
  thermal_model?: ThermalModel;
  comment?: string[];
}

export interface StandardRecord {
  metadata: DeviceMetadata;
  library: LibraryInfo;
  package?: DevicePackage;
}

// ── Conduction-loss variant helpers ──

/** One node collapses to `single`, two or more stay `multiple`. */
export function conductionLossOf(blocks: ConductionBlock[]): ConductionLoss | undefined {
  if (blocks.length === 0) return undefined;
  if (blocks.length === 1) return { kind: 'single', block: blocks[0] };
  return { kind: 'multiple', blocks };
}

/** Uniform sequence view of either variant. */
export function conductionBlocks(loss: ConductionLoss | undefined): ConductionBlock[] {
  if (!loss) return [];
  return loss.kind === 'single' ? [loss.block] : loss.blocks;
}
