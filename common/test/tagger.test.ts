/// <reference path="../src/parse-address.d.ts" />
import { beforeEach, describe, expect, it, jest } from "@jest/globals";
import { parseLocation } from "parse-address";
import { AddressType } from "../src/components";
import { ParseAddressTagger } from "../src/tagger";
import { tokens } from "./support/static-tagger";

jest.mock("parse-address");

const mockParseLocation = jest.mocked(parseLocation);

describe("ParseAddressTagger", () => {
  const tagger = new ParseAddressTagger();

  beforeEach(() => {
    mockParseLocation.mockReset();
  });

  it("labels the parts of a street address in order", () => {
    mockParseLocation.mockReturnValue({
      number: "1600",
      street: "Pennsylvania",
      type: "Ave",
      suffix: "NW",
      sec_unit_type: "Ste",
      sec_unit_num: "2",
      city: "Washington",
      state: "DC",
      zip: "20500",
    });

    expect(tagger.tag("1600 Pennsylvania Ave NW Ste 2, Washington, DC 20500")).toEqual({
      type: "parsed",
      mode: AddressType.STREET_ADDRESS,
      tokens: tokens(
        ["AddressNumber", "1600"],
        ["StreetName", "Pennsylvania"],
        ["StreetNamePostType", "Ave"],
        ["StreetNamePostDirectional", "NW"],
        ["OccupancyType", "Ste"],
        ["OccupancyIdentifier", "2"],
        ["PlaceName", "Washington"],
        ["StateName", "DC"],
        ["ZipCode", "20500"]
      ),
    });
  });

  it("labels both streets of an intersection", () => {
    mockParseLocation.mockReturnValue({
      street1: "Hollywood",
      type1: "Blvd",
      street2: "Vine",
      type2: "St",
      city: "Los Angeles",
      state: "CA",
    });

    expect(tagger.tag("Hollywood Blvd and Vine St, Los Angeles, CA")).toEqual({
      type: "parsed",
      mode: AddressType.INTERSECTION,
      tokens: tokens(
        ["StreetName", "Hollywood"],
        ["StreetNamePostType", "Blvd"],
        ["IntersectionSeparator", "and"],
        ["SecondStreetName", "Vine"],
        ["SecondStreetNamePostType", "St"],
        ["PlaceName", "Los Angeles"],
        ["StateName", "CA"]
      ),
    });
  });

  it("splits a house number out of an intersection's street name", () => {
    mockParseLocation.mockReturnValue({
      street1: "100 Main",
      type1: "St",
      street2: "Oak",
      type2: "St",
      city: "Los Angeles",
      state: "CA",
    });

    expect(tagger.tag("100 Main St & Oak St, Los Angeles, CA")).toEqual({
      type: "parsed",
      mode: AddressType.INTERSECTION,
      tokens: tokens(
        ["AddressNumber", "100"],
        ["StreetName", "Main"],
        ["StreetNamePostType", "St"],
        ["IntersectionSeparator", "&"],
        ["SecondStreetName", "Oak"],
        ["SecondStreetNamePostType", "St"],
        ["PlaceName", "Los Angeles"],
        ["StateName", "CA"]
      ),
    });
  });

  it("labels a PO box as a USPS box", () => {
    mockParseLocation.mockReturnValue({
      sec_unit_type: "P.O. Box",
      sec_unit_num: "12",
      city: "Austin",
      state: "TX",
      zip: "78701",
    });

    expect(tagger.tag("P.O. Box 12, Austin TX 78701")).toEqual({
      type: "parsed",
      mode: AddressType.STREET_ADDRESS,
      tokens: tokens(
        ["USPSBoxType", "P.O. Box"],
        ["USPSBoxID", "12"],
        ["PlaceName", "Austin"],
        ["StateName", "TX"],
        ["ZipCode", "78701"]
      ),
    });
  });

  it("labels an intersection with no last line word by word", () => {
    mockParseLocation.mockReturnValue(null);

    expect(tagger.tag("Hollywood Blvd and Vine St")).toEqual({
      type: "parsed",
      mode: AddressType.INTERSECTION,
      tokens: tokens(
        ["StreetName", "Hollywood"],
        ["StreetNamePostType", "Blvd"],
        ["IntersectionSeparator", "and"],
        ["SecondStreetName", "Vine"],
        ["SecondStreetNamePostType", "St"]
      ),
    });
  });

  it("labels directionals and a last line the parser couldn't place", () => {
    mockParseLocation.mockReturnValue(null);

    expect(
      tagger.tag("N Main St & Elm Ave E, Springfield, IL 62701-1234")
    ).toEqual({
      type: "parsed",
      mode: AddressType.INTERSECTION,
      tokens: tokens(
        ["StreetNamePreDirectional", "N"],
        ["StreetName", "Main"],
        ["StreetNamePostType", "St"],
        ["IntersectionSeparator", "&"],
        ["SecondStreetName", "Elm"],
        ["SecondStreetNamePostType", "Ave"],
        ["SecondStreetNamePostDirectional", "E"],
        ["PlaceName", "Springfield"],
        ["StateName", "IL"],
        ["ZipCode", "62701"],
        ["ZipPlus4", "1234"]
      ),
    });
  });

  it("leaves out a missing street when splitting on the connector", () => {
    mockParseLocation.mockReturnValue(null);

    expect(tagger.tag("& Vine St")).toEqual({
      type: "parsed",
      mode: AddressType.INTERSECTION,
      tokens: tokens(
        ["IntersectionSeparator", "&"],
        ["SecondStreetName", "Vine"],
        ["SecondStreetNamePostType", "St"]
      ),
    });
  });

  it("reports two house numbers as a repeated label", () => {
    mockParseLocation.mockReturnValue({
      number: "1810",
      street: "Main",
      type: "St",
    });

    expect(tagger.tag("1804 & 1810 Main St")).toEqual({
      type: "repeated_label",
      label: "AddressNumber",
      tokens: tokens(
        ["AddressNumber", "1804"],
        ["IntersectionSeparator", "&"],
        ["AddressNumber", "1810"],
        ["StreetName", "Main"],
        ["StreetNamePostType", "St"]
      ),
    });
    expect(mockParseLocation).toHaveBeenCalledWith("1810 Main St");
  });

  it("returns no tokens when nothing can be parsed", () => {
    mockParseLocation.mockReturnValue(null);

    expect(tagger.tag("not an address")).toEqual({
      type: "parsed",
      mode: AddressType.STREET_ADDRESS,
      tokens: [],
    });
  });

  it("returns no tokens when the parser throws", () => {
    mockParseLocation.mockImplementation(() => {
      throw new TypeError("Cannot read properties of undefined");
    });

    expect(tagger.tag("???")).toEqual({
      type: "parsed",
      mode: AddressType.STREET_ADDRESS,
      tokens: [],
    });
  });

  it("skips blank text", () => {
    expect(tagger.tag("  ")).toEqual({
      type: "parsed",
      mode: AddressType.STREET_ADDRESS,
      tokens: [],
    });
    expect(mockParseLocation).not.toHaveBeenCalled();
  });
});
