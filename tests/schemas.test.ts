/**
 * Standard Record JSON schema
 */
import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { parseStandardRecord, toStandardJson } from "../src/schemas.js";

const METADATA = {
  manufacturer: "Wolfspeed",
  type: "MOSFET with Diode",
  material: "SiC",
  package_type: "discrete",
  part_number: "C3M0015065K",
  author: "test-author",
  date: "2024-03-05 09:07:03",
  source_file: "C3M0015065K.xml",
  source_path: "SiC/Wolfspeed/mosfets/C3M0015065K.xml",
};

const DROP = { scale: 1, data: [[0, 0.5]] };

describe("parseStandardRecord", () => {
  it("turns a conduction_loss object into the single variant", () => {
    const record = parseStandardRecord({
      metadata: METADATA,
      library: { xmlns: "", version: "1" },
      package: { class: "", vendor: "", partnumber: "", semiconductor_data: { type: "MOSFET", conduction_loss: { gate: "on", voltage_drop: DROP } } },
    });
    expect(record.package?.semiconductor_data?.conduction_loss).toEqual({
      kind: "single",
      block: { gate: "on", voltage_drop: DROP },
    });
  });

  it("turns a conduction_loss array into the multiple variant", () => {
    const record = parseStandardRecord({
      metadata: METADATA,
      package: { semiconductor_data: { conduction_loss: [{ gate: "on" }, { gate: "off" }] } },
    });
    expect(record.package?.semiconductor_data?.conduction_loss).toEqual({
      kind: "multiple",
      blocks: [{ gate: "on" }, { gate: "off" }],
    });
  });

  it("keeps the less common tables on both block kinds", () => {
    const energy = { scale: 0.001, data: [[[0, 0.2]]] };
    const record = parseStandardRecord({
      metadata: METADATA,
      package: {
        semiconductor_data: {
          turn_off_loss: { voltage_drop: DROP },
          conduction_loss: { voltage_axis: [0, 400], energy },
        },
      },
    });
    expect(record.package?.semiconductor_data?.turn_off_loss).toEqual({ voltage_drop: DROP });
    expect(record.package?.semiconductor_data?.conduction_loss).toEqual({
      kind: "single",
      block: { voltage_axis: [0, 400], energy },
    });
  });

  it("fills defaults for missing fields", () => {
    const record = parseStandardRecord({ metadata: { part_number: "X1" } });
    expect(record.metadata.material).toBe("Unknown");
    expect(record.metadata.package_type).toBe("discrete");
    expect(record.metadata.manufacturer).toBe("");
    expect(record.library).toEqual({ xmlns: "", version: "" });
    expect(record.package).toBeUndefined();
  });

  it("rejects a record without metadata", () => {
    expect(() => parseStandardRecord({ library: {} })).toThrow(ZodError);
  });

  it("rejects an unknown material", () => {
    expect(() => parseStandardRecord({ metadata: { ...METADATA, material: "Diamond" } })).toThrow(ZodError);
  });

  it("rejects non-numeric table data", () => {
    const json = {
      metadata: METADATA,
      package: { semiconductor_data: { turn_on_loss: { current_axis: [0, "10"] } } },
    };
    expect(() => parseStandardRecord(json)).toThrow(ZodError);
  });
});

describe("toStandardJson", () => {
  it("writes back the JSON it was read from", () => {
    const json = {
      metadata: METADATA,
      library: { xmlns: "urn:test", version: "1.1" },
      package: {
        class: "MOSFET with Diode",
        vendor: "Wolfspeed",
        partnumber: "C3M0015065K",
        variables: [{ name: "Rgon", default_value: 2.5 }],
        semiconductor_data: {
          type: "MOSFET with Diode",
          turn_on_loss: { computation_method: "Table only", current_axis: [0, 10], energy: { scale: 0.001, data: [[[0, 1]]] } },
          conduction_loss: [
            { gate: "on", voltage_drop: DROP },
            { gate: "off", voltage_drop: DROP },
          ],
        },
        thermal_model: { type: "Foster", rc_elements: [{ R: 0.1, C: 0.01 }] },
        comment: ["Datasheet Rev.1"],
      },
    };
    expect(toStandardJson(parseStandardRecord(json))).toEqual(json);
  });

  it("writes a single conduction block as an object", () => {
    const record = parseStandardRecord({
      metadata: METADATA,
      package: { semiconductor_data: { conduction_loss: { gate: "on" } } },
    });
    expect(toStandardJson(record).package?.semiconductor_data?.conduction_loss).toEqual({ gate: "on" });
  });

  it("keeps metadata, library and package in that key order", () => {
    const record = parseStandardRecord({ metadata: METADATA, package: {} });
    expect(Object.keys(toStandardJson(record))).toEqual(["metadata", "library", "package"]);
    expect(Object.keys(toStandardJson(record).package ?? {})).toEqual(["class", "vendor", "partnumber"]);
  });
});
