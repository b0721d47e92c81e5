/**
 * Axis / table codec for the whitespace-delimited numeric text used by the
 * vendor XML format.
 *
 *   <CurrentAxis>0 10 20 40</CurrentAxis>
 *   <Energy scale="0.001">
 *     <Temperature>                          ← rank 3: nested Voltage rows
 *       <Voltage>0 0.1 0.3 0.8</Voltage>
 *     </Temperature>
 *   </Energy>
 *   <VoltageDrop scale="1">
 *     <Temperature>0 0.5 0.9 1.6</Temperature> ← rank 2: direct text
 *   </VoltageDrop>
 *
 * Energy and VoltageDrop share the Temperature wrapper, so the rank of each
 * Temperature node is decided by whether it has Voltage children.
 */
import { XmlParseError } from "./errors.js";
import type { Rank2Data, Rank3Data } from "./types/device.js";
import { childrenNamed, element, type XmlNode } from "./xml-tree.js";

export type TemperatureSlice =
  | { rank: 3; rows: number[][] }
  | { rank: 2; row: number[] };

export interface ParsedTable {
  scale: number;
  slices: TemperatureSlice[];
}

/** Parse one numeric token; throws on anything that is not a number. */
export function parseNumber(token: string): number {
  const value = Number(token);
  if (token.trim() === "" || Number.isNaN(value)) {
    throw new XmlParseError("Non-numeric value", JSON.stringify(token));
  }
  return value;
}

/** Parse a number, or null when the text is not numeric. */
export function tryParseNumber(text: string): number | null {
  const value = Number(text);
  return text.trim() === "" || Number.isNaN(value) ? null : value;
}

export function parseAxis(text: string | null | undefined): number[] {
  if (!text || !text.trim()) return [];
  return text.trim().split(/\s+/).filter(Boolean).map(parseNumber);
}

export function serializeAxis(values: readonly number[]): string {
  return values.map((v) => String(v)).join(" ");
}

/** Read the `scale` attribute; absent or empty means 1. */
export function parseScale(node: XmlNode): number {
  const raw = node.attributes.scale;
  return raw ? parseNumber(raw) : 1;
}

export function parseTemperatureTable(node: XmlNode): ParsedTable {
  const slices: TemperatureSlice[] = childrenNamed(node, "Temperature").map((temp) => {
    const voltages = childrenNamed(temp, "Voltage");
    if (voltages.length > 0) {
      return { rank: 3, rows: voltages.map((v) => parseAxis(v.content)) };
    }
    return { rank: 2, row: parseAxis(temp.content) };
  });
  return { scale: parseScale(node), slices };
}

/** Narrow sniffed slices to [temperature][voltage][current]. An empty slice fits either rank. */
export function toRank3Data(slices: TemperatureSlice[], context: string): Rank3Data {
  return slices.map((slice, i) => {
    if (slice.rank === 3) return slice.rows;
    if (slice.row.length === 0) return [];
    throw new XmlParseError(`${context}: Temperature[${i}] has text but no Voltage rows`);
  });
}

/** Narrow sniffed slices to [temperature][current]. */
export function toRank2Data(slices: TemperatureSlice[], context: string): Rank2Data {
  return slices.map((slice, i) => {
    if (slice.rank === 2) return slice.row;
    throw new XmlParseError(`${context}: Temperature[${i}] has unexpected Voltage rows`);
  });
}

export function serializeRank3Table(data: Rank3Data, scale = 1): XmlNode[] {
  return data.map((perTemp) =>
    element(
      "Temperature",
      {},
      perTemp.map((row) => element("Voltage", {}, [], serializeAxis(row.map((v) => v * scale)))),
    ),
  );
}

export function serializeRank2Table(data: Rank2Data, scale = 1): XmlNode[] {
  return data.map((row) => element("Temperature", {}, [], serializeAxis(row.map((v) => v * scale))));
}
