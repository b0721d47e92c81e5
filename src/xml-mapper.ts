/**
 * XML ↔ Standard Record mapper
 *
 * Reads `SemiconductorLibrary > Package > {Variables, SemiconductorData,
 * ThermalModel, Comment}` into a StandardRecord and builds the same tree back
 * from a record. Metadata the XML does not carry (material, manufacturer,
 * package type) comes from the file's folder names.
 *
 * Structural problems throw XmlParseError; the batch driver decides what to
 * do with the file.
 */
import { readFile } from "fs/promises";
import path from "path";
import {
  parseAxis,
  parseNumber,
  parseTemperatureTable,
  serializeAxis,
  serializeRank2Table,
  serializeRank3Table,
  toRank2Data,
  toRank3Data,
  tryParseNumber,
} from "./axis-codec.js";
import { XmlParseError } from "./errors.js";
import { inferMetadataFromPath } from "./path-metadata.js";
import {
  conductionBlocks,
  conductionLossOf,
  type ConductionBlock,
  type DevicePackage,
  type DeviceVariable,
  type LossBlock,
  type Rank2Data,
  type Rank3Data,
  type RcElement,
  type ScaledTable,
  type SemiconductorData,
  type StandardRecord,
  type ThermalModel,
  type VariableValue,
} from "./types/device.js";
import { formatDateTime } from "./utils/dates.js";
import {
  childNamed,
  childrenNamed,
  element,
  parseXml,
  xmlDocumentToString,
  type XmlNode,
} from "./xml-tree.js";

export const ROOT_TAG = "SemiconductorLibrary";

export interface XmlToRecordOptions {
  /** Path of the XML file; drives path inference and provenance. */
  sourcePath: string;
  /** Input root the provenance path is relative to. */
  rootDir?: string;
  author: string;
  now: Date;
}

// ======================================================
//  XML → RECORD
// ======================================================

/** Trimmed text of a child element, or undefined when missing / empty. */
function childText(node: XmlNode, tag: string): string | undefined {
  const child = childNamed(node, tag);
  return child && child.content ? child.content.trim() : undefined;
}

function childAxis(node: XmlNode, tag: string): number[] | undefined {
  const child = childNamed(node, tag);
  return child && child.content ? parseAxis(child.content) : undefined;
}

function childValue(node: XmlNode, tag: string): VariableValue | undefined {
  const text = childText(node, tag);
  if (text === undefined) return undefined;
  return tryParseNumber(text) ?? text;
}

function parseVariables(node: XmlNode): DeviceVariable[] {
  return childrenNamed(node, "Variable").map((v) => {
    const variable: DeviceVariable = {};
    const name = childText(v, "Name");
    const description = childText(v, "Description");
    const defaultValue = childValue(v, "DefaultValue");
    const minValue = childValue(v, "MinValue");
    const maxValue = childValue(v, "MaxValue");
    if (name !== undefined) variable.name = name;
    if (description !== undefined) variable.description = description;
    if (defaultValue !== undefined) variable.default_value = defaultValue;
    if (minValue !== undefined) variable.min_value = minValue;
    if (maxValue !== undefined) variable.max_value = maxValue;
    return variable;
  });
}

function readEnergy(node: XmlNode): ScaledTable<Rank3Data> | undefined {
  const energy = childNamed(node, "Energy");
  if (!energy) return undefined;
  const table = parseTemperatureTable(energy);
  return { scale: table.scale, data: toRank3Data(table.slices, `${node.tag}/Energy`) };
}

function readVoltageDrop(node: XmlNode): ScaledTable<Rank2Data> | undefined {
  const drop = childNamed(node, "VoltageDrop");
  if (!drop) return undefined;
  const table = parseTemperatureTable(drop);
  return { scale: table.scale, data: toRank2Data(table.slices, `${node.tag}/VoltageDrop`) };
}

function parseLossBlock(node: XmlNode): LossBlock {
  const block: LossBlock = {};
  const method = childText(node, "ComputationMethod");
  const formula = childText(node, "Formula");
  const currentAxis = childAxis(node, "CurrentAxis");
  const voltageAxis = childAxis(node, "VoltageAxis");
  const temperatureAxis = childAxis(node, "TemperatureAxis");
  if (method !== undefined) block.computation_method = method;
  if (formula !== undefined) block.formula = formula;
  if (currentAxis) block.current_axis = currentAxis;
  if (voltageAxis) block.voltage_axis = voltageAxis;
  if (temperatureAxis) block.temperature_axis = temperatureAxis;

  const energy = readEnergy(node);
  if (energy) block.energy = energy;
  const drop = readVoltageDrop(node);
  if (drop) block.voltage_drop = drop;
  return block;
}

function parseConductionBlock(node: XmlNode): ConductionBlock {
  const block: ConductionBlock = {};
  const method = childText(node, "ComputationMethod");
  const formula = childText(node, "Formula");
  const currentAxis = childAxis(node, "CurrentAxis");
  const voltageAxis = childAxis(node, "VoltageAxis");
  const temperatureAxis = childAxis(node, "TemperatureAxis");
  if (method !== undefined) block.computation_method = method;
  if (formula !== undefined) block.formula = formula;
  if (currentAxis) block.current_axis = currentAxis;
  if (voltageAxis) block.voltage_axis = voltageAxis;
  if (temperatureAxis) block.temperature_axis = temperatureAxis;

  const drop = readVoltageDrop(node);
  if (drop) block.voltage_drop = drop;
  const energy = readEnergy(node);
  if (energy) block.energy = energy;
  if (node.attributes.gate) block.gate = node.attributes.gate;
  return block;
}

function parseSemiconductorData(node: XmlNode): SemiconductorData {
  const data: SemiconductorData = { type: node.attributes.type ?? "" };
  const turnOn = childNamed(node, "TurnOnLoss");
  const turnOff = childNamed(node, "TurnOffLoss");
  if (turnOn) data.turn_on_loss = parseLossBlock(turnOn);
  if (turnOff) data.turn_off_loss = parseLossBlock(turnOff);

  const conduction = conductionLossOf(childrenNamed(node, "ConductionLoss").map(parseConductionBlock));
  if (conduction) data.conduction_loss = conduction;
  return data;
}

function parseThermalModel(node: XmlNode): ThermalModel {
  const branch = childNamed(node, "Branch");
  if (!branch) return {};
  return {
    type: branch.attributes.type ?? "",
    rc_elements: childrenNamed(branch, "RCElement").map((rc) => {
      const pair: RcElement = {};
      if (rc.attributes.R) pair.R = parseNumber(rc.attributes.R);
      if (rc.attributes.C) pair.C = parseNumber(rc.attributes.C);
      return pair;
    }),
  };
}

function parseComment(node: XmlNode): string[] {
  return childrenNamed(node, "Line").map((line) => line.content);
}

/** Source path relative to the input root, forward slashes; "" when outside it. */
export function relativeSourcePath(filePath: string, rootDir: string | undefined): string {
  if (!rootDir) return "";
  const rel = path.relative(path.resolve(rootDir), path.resolve(filePath));
  if (!rel || rel.startsWith("..") || path.isAbsolute(rel)) return "";
  return rel.split(path.sep).join("/");
}

/**
 * Convert the text of a vendor XML file into a Standard Record.
 * Throws XmlParseError on malformed XML or non-numeric table data.
 */
export function xmlToRecord(xmlText: string, options: XmlToRecordOptions): StandardRecord {
  const { root, prefix } = parseXml(xmlText);
  if (root.tag !== ROOT_TAG) {
    throw new XmlParseError("Unexpected root element", `<${root.tag}>, expected <${ROOT_TAG}>`);
  }

  const inferred = inferMetadataFromPath(options.sourcePath);
  const pkgNode = childNamed(root, "Package");
  const vendor = pkgNode?.attributes.vendor ?? "";
  const deviceClass = pkgNode?.attributes.class ?? "";
  const partnumber = pkgNode?.attributes.partnumber ?? "";

  const record: StandardRecord = {
    metadata: {
      manufacturer: vendor || inferred.manufacturer,
      type: deviceClass || "Unknown",
      material: inferred.material,
      package_type: inferred.package_type,
      part_number: partnumber,
      author: options.author,
      date: formatDateTime(options.now),
      source_file: path.basename(options.sourcePath),
      source_path: relativeSourcePath(options.sourcePath, options.rootDir),
    },
    library: {
      xmlns: (prefix ? root.attributes[`xmlns:${prefix}`] : root.attributes.xmlns) ?? "",
      version: root.attributes.version ?? "",
    },
  };

  if (pkgNode) {
    const pkg: DevicePackage = { class: deviceClass, vendor, partnumber };

    const variablesNode = childNamed(pkgNode, "Variables");
    if (variablesNode) {
      const variables = parseVariables(variablesNode);
      if (variables.length) pkg.variables = variables;
    }

    const semiNode = childNamed(pkgNode, "SemiconductorData");
    if (semiNode) pkg.semiconductor_data = parseSemiconductorData(semiNode);

    const thermalNode = childNamed(pkgNode, "ThermalModel");
    if (thermalNode) pkg.thermal_model = parseThermalModel(thermalNode);

    const commentNode = childNamed(pkgNode, "Comment");
    if (commentNode) pkg.comment = parseComment(commentNode);

    record.package = pkg;
  }

  return record;
}

/** Read a vendor XML file from disk and convert it. */
export async function readXmlRecord(
  filePath: string,
  options: Omit<XmlToRecordOptions, "sourcePath">,
): Promise<StandardRecord> {
  const text = await readFile(filePath, "utf-8");
  return xmlToRecord(text, { ...options, sourcePath: filePath });
}

// ======================================================
//  RECORD → XML
// ======================================================

/** Attributes with a non-empty value; absent / blank values are left out. */
function attrs(entries: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(entries)) {
    if (v) out[k] = v;
  }
  return out;
}

function textElement(tag: string, text: string | undefined): XmlNode[] {
  return text === undefined ? [] : [element(tag, {}, [], text)];
}

function axisElement(tag: string, values: number[] | undefined): XmlNode[] {
  return values === undefined ? [] : [element(tag, {}, [], serializeAxis(values))];
}

function valueElement(tag: string, value: VariableValue | undefined): XmlNode[] {
  return value === undefined ? [] : [element(tag, {}, [], String(value))];
}

function energyElement(table: ScaledTable<Rank3Data> | undefined): XmlNode[] {
  return table ? [element("Energy", { scale: String(table.scale) }, serializeRank3Table(table.data))] : [];
}

function voltageDropElement(table: ScaledTable<Rank2Data> | undefined): XmlNode[] {
  return table ? [element("VoltageDrop", { scale: String(table.scale) }, serializeRank2Table(table.data))] : [];
}

function lossBlockElement(tag: string, block: LossBlock): XmlNode {
  return element(tag, {}, [
    ...textElement("ComputationMethod", block.computation_method),
    ...textElement("Formula", block.formula),
    ...axisElement("CurrentAxis", block.current_axis),
    ...axisElement("VoltageAxis", block.voltage_axis),
    ...axisElement("TemperatureAxis", block.temperature_axis),
    ...energyElement(block.energy),
    ...voltageDropElement(block.voltage_drop),
  ]);
}

function conductionElement(block: ConductionBlock): XmlNode {
  return element("ConductionLoss", attrs({ gate: block.gate }), [
    ...textElement("ComputationMethod", block.computation_method),
    ...textElement("Formula", block.formula),
    ...axisElement("CurrentAxis", block.current_axis),
    ...axisElement("VoltageAxis", block.voltage_axis),
    ...axisElement("TemperatureAxis", block.temperature_axis),
    ...voltageDropElement(block.voltage_drop),
    ...energyElement(block.energy),
  ]);
}

function semiconductorElement(data: SemiconductorData): XmlNode {
  return element("SemiconductorData", attrs({ type: data.type }), [
    ...(data.turn_on_loss ? [lossBlockElement("TurnOnLoss", data.turn_on_loss)] : []),
    ...(data.turn_off_loss ? [lossBlockElement("TurnOffLoss", data.turn_off_loss)] : []),
    ...conductionBlocks(data.conduction_loss).map(conductionElement),
  ]);
}

function thermalElement(thermal: ThermalModel): XmlNode {
  if (thermal.type === undefined && thermal.rc_elements === undefined) {
    return element("ThermalModel");
  }
  const rcNodes = (thermal.rc_elements ?? []).map((rc) =>
    element("RCElement", attrs({
      R: rc.R === undefined ? undefined : String(rc.R),
      C: rc.C === undefined ? undefined : String(rc.C),
    })),
  );
  return element("ThermalModel", {}, [element("Branch", attrs({ type: thermal.type }), rcNodes)]);
}

function variablesElement(variables: DeviceVariable[]): XmlNode {
  return element(
    "Variables",
    {},
    variables.map((v) =>
      element("Variable", {}, [
        ...textElement("Name", v.name),
        ...textElement("Description", v.description),
        ...valueElement("DefaultValue", v.default_value),
        ...valueElement("MinValue", v.min_value),
        ...valueElement("MaxValue", v.max_value),
      ]),
    ),
  );
}

/**
 * Build the vendor XML tree for a record. Absent fields are omitted; sequences
 * that are present but empty still produce their parent element.
 */
export function recordToXml(record: StandardRecord): XmlNode {
  const { metadata, library } = record;
  const pkg = record.package;

  const children: XmlNode[] = [];
  if (pkg?.variables) children.push(variablesElement(pkg.variables));
  if (pkg?.semiconductor_data) children.push(semiconductorElement(pkg.semiconductor_data));
  if (pkg?.thermal_model) children.push(thermalElement(pkg.thermal_model));
  if (pkg?.comment) {
    children.push(element("Comment", {}, pkg.comment.map((line) => element("Line", {}, [], line))));
  }

  const packageNode = element(
    "Package",
    attrs({
      class: pkg?.class,
      vendor: pkg?.vendor || metadata.manufacturer,
      partnumber: pkg?.partnumber || metadata.part_number,
    }),
    children,
  );

  return element(ROOT_TAG, attrs({ xmlns: library.xmlns, version: library.version }), [packageNode]);
}

/** Full XML document text for a record. */
export function renderRecordXml(record: StandardRecord): string {
  return xmlDocumentToString(recordToXml(record));
}
