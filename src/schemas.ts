/**
 * Zod schemas for Standard Record JSON
 *
 * Standalone module so tests can import them without side effects.
 * On disk `conduction_loss` is an object (one gate state) or an array (several);
 * in memory it becomes the tagged ConductionLoss variant.
 */
import { z } from "zod";
import type {
  ConductionBlock,
  ConductionLoss,
  DevicePackage,
  SemiconductorData,
  StandardRecord,
} from "./types/device.js";

// ── Building blocks ───────────────────────────────────────

const axis = z.array(z.number());
const variableValue = z.union([z.number(), z.string()]);

export const VariableSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  default_value: variableValue.optional(),
  min_value: variableValue.optional(),
  max_value: variableValue.optional(),
});

const energyTable = z.object({ scale: z.number(), data: z.array(z.array(axis)) });
const voltageDropTable = z.object({ scale: z.number(), data: z.array(axis) });

export const LossBlockSchema = z.object({
  computation_method: z.string().optional(),
  formula: z.string().optional(),
  current_axis: axis.optional(),
  voltage_axis: axis.optional(),
  temperature_axis: axis.optional(),
  energy: energyTable.optional(),
  voltage_drop: voltageDropTable.optional(),
});

export const ConductionBlockSchema = z.object({
  computation_method: z.string().optional(),
  formula: z.string().optional(),
  current_axis: axis.optional(),
  voltage_axis: axis.optional(),
  temperature_axis: axis.optional(),
  voltage_drop: voltageDropTable.optional(),
  energy: energyTable.optional(),
  gate: z.string().optional(),
});

export const ConductionLossSchema = z
  .union([ConductionBlockSchema, z.array(ConductionBlockSchema)])
  .transform((v): ConductionLoss =>
    Array.isArray(v) ? { kind: "multiple", blocks: v } : { kind: "single", block: v },
  );

// ── Record ────────────────────────────────────────────────

export const StandardRecordSchema = z.object({
  metadata: z.object({
    manufacturer: z.string().default(""),
    type: z.string().default(""),
    material: z.enum(["Si", "SiC", "GaN", "Unknown"]).default("Unknown"),
    package_type: z.enum(["discrete", "power module"]).default("discrete"),
    part_number: z.string().default(""),
    author: z.string().default(""),
    date: z.string().default(""),
    source_file: z.string().default(""),
    source_path: z.string().default(""),
  }),
  library: z
    .object({ xmlns: z.string().default(""), version: z.string().default("") })
    .default({}),
  package: z
    .object({
      class: z.string().default(""),
      vendor: z.string().default(""),
      partnumber: z.string().default(""),
      variables: z.array(VariableSchema).optional(),
      semiconductor_data: z
        .object({
          type: z.string().default(""),
          turn_on_loss: LossBlockSchema.optional(),
          turn_off_loss: LossBlockSchema.optional(),
          conduction_loss: ConductionLossSchema.optional(),
        })
        .optional(),
      thermal_model: z
        .object({
          type: z.string().optional(),
          rc_elements: z.array(z.object({ R: z.number().optional(), C: z.number().optional() })).optional(),
        })
        .optional(),
      comment: z.array(z.string()).optional(),
    })
    .optional(),
});

/** Validate parsed JSON as a Standard Record; throws ZodError on mismatch. */
export function parseStandardRecord(json: unknown): StandardRecord {
  return StandardRecordSchema.parse(json);
}

// ── Wire form ─────────────────────────────────────────────

export type SemiconductorDataJson = Omit<SemiconductorData, "conduction_loss"> & {
  conduction_loss?: ConductionBlock | ConductionBlock[];
};

export type StandardRecordJson = Omit<StandardRecord, "package"> & {
  package?: Omit<DevicePackage, "semiconductor_data"> & {
    semiconductor_data?: SemiconductorDataJson;
  };
};

type DevicePackageJson = NonNullable<StandardRecordJson["package"]>;

function semiconductorJson(semi: SemiconductorData): SemiconductorDataJson {
  const out: SemiconductorDataJson = { type: semi.type };
  if (semi.turn_on_loss) out.turn_on_loss = semi.turn_on_loss;
  if (semi.turn_off_loss) out.turn_off_loss = semi.turn_off_loss;
  const loss = semi.conduction_loss;
  if (loss) out.conduction_loss = loss.kind === "single" ? loss.block : loss.blocks;
  return out;
}

function packageJson(pkg: DevicePackage): DevicePackageJson {
  const out: DevicePackageJson = { class: pkg.class, vendor: pkg.vendor, partnumber: pkg.partnumber };
  if (pkg.variables) out.variables = pkg.variables;
  if (pkg.semiconductor_data) out.semiconductor_data = semiconductorJson(pkg.semiconductor_data);
  if (pkg.thermal_model) out.thermal_model = pkg.thermal_model;
  if (pkg.comment) out.comment = pkg.comment;
  return out;
}

/** Plain JSON shape of a record, in the stable key order written to disk. */
export function toStandardJson(record: StandardRecord): StandardRecordJson {
  const out: StandardRecordJson = { metadata: record.metadata, library: record.library };
  if (record.package) out.package = packageJson(record.package);
  return out;
}
