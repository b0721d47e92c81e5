import { describe, expect, it } from "vitest";
import { extractDatasheetInfo, matchRevision, matchRon, matchVf } from "../src/comment-mining.js";

describe("line rules", () => {
  it("reads revision and date", () => {
    expect(matchRevision("Datasheet Rev.3, 2020-05-01")).toEqual({ revision: "Rev.3", date: "2020-05-01" });
    expect(matchRevision("Datasheet Rev5")).toEqual({ revision: "Rev.5", date: null });
  });

  it("needs the Datasheet Rev marker", () => {
    expect(matchRevision("Rev.4 internal draft")).toBeNull();
  });

  it("reads Ron and Vf", () => {
    expect(matchRon("Ron = 0.025 Ohm")).toBe(0.025);
    expect(matchVf("Vf = 3.1V")).toBe(3.1);
  });

  it("ignores lines without the exact marker or with a malformed number", () => {
    expect(matchRon("Ron=0.025")).toBeNull();
    expect(matchRon("Ron = 1.2.3 Ohm")).toBeNull();
    expect(matchVf("Vf = 1.2 mV")).toBeNull();
  });
});

describe("extractDatasheetInfo", () => {
  it("collects every field", () => {
    expect(
      extractDatasheetInfo(["Datasheet Rev.3, 2020-05-01", "Ron = 0.025 Ohm at Tj = 25 C", "Vf = 1.2 V body diode"]),
    ).toEqual({ revision: "Rev.3", date: "2020-05-01", ron: 0.025, vf: 1.2 });
  });

  it("lets a later line win", () => {
    expect(extractDatasheetInfo(["Ron = 0.03 Ohm", "Ron = 0.02 Ohm"]).ron).toBe(0.02);
  });

  it("keeps an earlier date when a later revision has none", () => {
    expect(extractDatasheetInfo(["Datasheet Rev.2, 2019-01-01", "Datasheet Rev.3"])).toEqual({
      revision: "Rev.3",
      date: "2019-01-01",
      ron: null,
      vf: null,
    });
  });

  it("is all null for no lines", () => {
    expect(extractDatasheetInfo([])).toEqual({ revision: null, date: null, ron: null, vf: null });
  });
});
