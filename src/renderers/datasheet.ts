/**
 * Datasheet layout shared by the HTML and PDF renderers: a title, sections of
 * key/value pairs, grids and verbatim lines, and a generation footer.
 */
import { conductionBlocks, type StandardRecord } from "../types/device.js";
import { formatDateTime } from "../utils/dates.js";

export type Cell = string | number | undefined;

export type DatasheetBlock =
  | { kind: "pairs"; rows: [string, Cell][] }
  | { kind: "grid"; headers: string[]; rows: Cell[][] }
  | { kind: "lines"; lines: string[] };

export interface DatasheetSection {
  /** null for the untitled metadata block under the page title */
  heading: string | null;
  blocks: DatasheetBlock[];
}

export interface Datasheet {
  title: string;
  sections: DatasheetSection[];
  footer: string;
}

export function buildDatasheet(record: StandardRecord, now: Date): Datasheet {
  const { metadata } = record;
  const pkg = record.package;
  const sections: DatasheetSection[] = [{
    heading: null,
    blocks: [{
      kind: "pairs",
      rows: [
        ["Manufacturer", metadata.manufacturer],
        ["Part Number", metadata.part_number],
        ["Type", metadata.type],
        ["Material", metadata.material],
        ["Package Type", metadata.package_type],
        ["Author", metadata.author],
        ["Date", metadata.date],
      ],
    }],
  }];

  if (pkg) {
    sections.push({
      heading: "Package Information",
      blocks: [{ kind: "pairs", rows: [["Class", pkg.class], ["Vendor", pkg.vendor], ["Part Number", pkg.partnumber]] }],
    });

    if (pkg.variables?.length) {
      sections.push({
        heading: "Variables",
        blocks: [{
          kind: "grid",
          headers: ["Name", "Description", "Default", "Min", "Max"],
          rows: pkg.variables.map((v) => [v.name, v.description, v.default_value, v.min_value, v.max_value]),
        }],
      });
    }

    const semi = pkg.semiconductor_data;
    if (semi) {
      const gates = conductionBlocks(semi.conduction_loss).map((b) => b.gate ?? "on");
      sections.push({
        heading: "Semiconductor Data",
        blocks: [{
          kind: "pairs",
          rows: [
            ["Type", semi.type],
            ["Turn-On Loss Method", semi.turn_on_loss?.computation_method],
            ["Turn-Off Loss Method", semi.turn_off_loss?.computation_method],
            ["Conduction Loss Gates", gates.length ? gates.join(", ") : undefined],
          ],
        }],
      });
    }

    const thermal = pkg.thermal_model;
    if (thermal) {
      const blocks: DatasheetBlock[] = [{ kind: "pairs", rows: [["Type", thermal.type]] }];
      const rc = thermal.rc_elements ?? [];
      if (rc.length) {
        blocks.push({ kind: "grid", headers: ["#", "R (K/W)", "C (J/K)"], rows: rc.map((e, i) => [i + 1, e.R, e.C]) });
      }
      sections.push({ heading: "Thermal Model", blocks });
    }

    if (pkg.comment?.length) {
      sections.push({ heading: "Comment", blocks: [{ kind: "lines", lines: pkg.comment }] });
    }
  }

  return {
    title: `${metadata.part_number || "Device"} Datasheet`,
    sections,
    footer: `Generated on ${formatDateTime(now)}`,
  };
}

export function cellText(value: Cell, missing: string): string {
  return value === undefined ? missing : String(value);
}
