import { describe, expect, it } from "@jest/globals";
import {
  DIRECTIONALS,
  isAddressTerm,
  lookup,
  STATES,
  SUFFIXES,
  UNITS,
} from "../src/lookup";

describe("lookup", () => {
  it("abbreviates known terms", () => {
    expect(lookup(SUFFIXES, "Avenue")).toBe("AVE");
    expect(lookup(DIRECTIONALS, "Southwest")).toBe("SW");
    expect(lookup(STATES, "Illinois")).toBe("IL");
    expect(lookup(UNITS, "Suite")).toBe("STE");
    expect(lookup(UNITS, "Apartment")).toBe("APT");
  });

  it("ignores case and periods", () => {
    expect(lookup(SUFFIXES, "ave.")).toBe("AVE");
    expect(lookup(DIRECTIONALS, "n.w.")).toBe("NW");
    expect(lookup(STATES, "new york")).toBe("NY");
  });

  it("returns unknown terms normalized but unmapped", () => {
    expect(lookup(SUFFIXES, "Unknownwordxyz")).toBe("UNKNOWNWORDXYZ");
    expect(lookup(STATES, " ontario. ")).toBe("ONTARIO");
  });

  it("leaves abbreviations as they are", () => {
    for (const table of [SUFFIXES, DIRECTIONALS, STATES, UNITS]) {
      for (const abbreviation of table.values()) {
        expect(lookup(table, abbreviation)).toBe(abbreviation);
      }
    }
  });

  it("maps all numbering words for units to #", () => {
    expect(lookup(UNITS, "No.")).toBe("#");
    expect(lookup(UNITS, "Number")).toBe("#");
    expect(lookup(UNITS, "#")).toBe("#");
  });
});

describe("isAddressTerm", () => {
  it("finds words from any table", () => {
    expect(isAddressTerm("street")).toBe(true);
    expect(isAddressTerm("North")).toBe(true);
    expect(isAddressTerm("Texas")).toBe(true);
    expect(isAddressTerm("suite")).toBe(true);
  });

  it("rejects other words", () => {
    expect(isAddressTerm("Yard")).toBe(false);
    expect(isAddressTerm("Seattle")).toBe(false);
  });
});
