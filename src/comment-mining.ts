/**
 * Comment mining: pulls datasheet facts out of free-text comment lines.
 *
 * Rules run independently on every line; a later matching line overwrites
 * an earlier one for the same field.
 */

export interface DatasheetInfo {
  revision: string | null;
  date: string | null;
  /** on-resistance in ohm */
  ron: number | null;
  /** forward voltage in V */
  vf: number | null;
}

export interface RevisionMatch {
  revision: string;
  date: string | null;
}

/** `Datasheet Rev.3, 2020-05-01` → { revision: "Rev.3", date: "2020-05-01" } */
export function matchRevision(line: string): RevisionMatch | null {
  if (!line.includes("Datasheet Rev")) return null;
  const match = /Rev\.?(\d+),?\s*(\d{4}-\d{2}-\d{2})?/.exec(line);
  if (!match) return null;
  return { revision: `Rev.${match[1]}`, date: match[2] ?? null };
}

/** `Ron = 0.025 ohm` → 0.025 */
export function matchRon(line: string): number | null {
  if (!line.includes("Ron = ")) return null;
  const match = /Ron\s*=\s*([\d.]+)\s*/.exec(line);
  return match ? parseDecimal(match[1]) : null;
}

/** `Vf = 1.2 V` → 1.2 */
export function matchVf(line: string): number | null {
  if (!line.includes("Vf = ")) return null;
  const match = /Vf\s*=\s*([\d.]+)\s*V/.exec(line);
  return match ? parseDecimal(match[1]) : null;
}

// "1.2.3" matches [\d.]+ but is not a number
function parseDecimal(text: string): number | null {
  const value = Number(text);
  return Number.isNaN(value) ? null : value;
}

export function extractDatasheetInfo(lines: readonly string[]): DatasheetInfo {
  const info: DatasheetInfo = { revision: null, date: null, ron: null, vf: null };

  for (const line of lines) {
    const rev = matchRevision(line);
    if (rev) {
      info.revision = rev.revision;
      // a revision without a date keeps the previously seen date
      if (rev.date) info.date = rev.date;
    }

    const ron = matchRon(line);
    if (ron !== null) info.ron = ron;

    const vf = matchVf(line);
    if (vf !== null) info.vf = vf;
  }

  return info;
}
