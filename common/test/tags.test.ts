import { describe, expect, it } from "@jest/globals";
import { mappingForLabel, mapTags, splitIntersection } from "../src/tags";
import { tokens } from "./support/static-tagger";

describe("mappingForLabel", () => {
  it("maps tagger labels to component names", () => {
    expect(mappingForLabel("PlaceName")).toEqual({
      kind: "field",
      name: "city",
    });
    expect(mappingForLabel("StreetNamePostType")).toEqual({
      kind: "field",
      name: "street_post_type",
    });
  });

  it("ignores unknown and non-address labels", () => {
    expect(mappingForLabel("Recipient")).toEqual({ kind: "ignored" });
    expect(mappingForLabel("SomeFutureLabel")).toEqual({ kind: "ignored" });
  });
});

describe("mapTags", () => {
  it("joins tokens that share a label", () => {
    const components = mapTags(
      tokens(
        ["AddressNumber", "400"],
        ["StreetName", "Martin"],
        ["StreetName", "Luther"],
        ["StreetName", "King"],
        ["StreetNamePostType", "Blvd"]
      )
    );
    expect(components).toEqual({
      address_number: "400",
      street_name: "Martin Luther King",
      street_post_type: "Blvd",
    });
  });

  it("drops unknown labels and blank tokens", () => {
    const components = mapTags(
      tokens(
        ["Recipient", "Jane Doe"],
        ["AddressNumber", "12"],
        ["SomeFutureLabel", "xyz"],
        ["StreetName", " "],
        ["StreetName", "Elm"]
      )
    );
    expect(components).toEqual({ address_number: "12", street_name: "Elm" });
  });

  it("joins two house numbers around a separator as a range", () => {
    const components = mapTags(
      tokens(
        ["AddressNumber", "1804"],
        ["IntersectionSeparator", "&"],
        ["AddressNumber", "1810"],
        ["StreetName", "Main"],
        ["StreetNamePostType", "St"]
      )
    );
    expect(components).toEqual({
      address_number: "1804-1810",
      street_name: "Main",
      street_post_type: "St",
    });
  });

  it("joins repeated house numbers without a separator with a space", () => {
    const components = mapTags(
      tokens(
        ["AddressNumber", "12"],
        ["StreetName", "Main"],
        ["AddressNumber", "14"]
      )
    );
    expect(components).toEqual({ address_number: "12 14", street_name: "Main" });
  });
});

describe("splitIntersection", () => {
  it("renames second street labels and keeps the location with the last street", () => {
    const [first, second] = splitIntersection(
      tokens(
        ["StreetName", "Hollywood"],
        ["StreetNamePostType", "Blvd"],
        ["IntersectionSeparator", "and"],
        ["SecondStreetName", "Vine"],
        ["SecondStreetNamePostType", "St"],
        ["PlaceName", "Los Angeles"],
        ["StateName", "CA"]
      )
    );

    expect(first).toEqual(
      tokens(["StreetName", "Hollywood"], ["StreetNamePostType", "Blvd"])
    );
    expect(second).toEqual(
      tokens(
        ["StreetName", "Vine"],
        ["StreetNamePostType", "St"],
        ["PlaceName", "Los Angeles"],
        ["StateName", "CA"]
      )
    );
  });

  it("keeps a location that comes before the separator with the first street", () => {
    const [first, second] = splitIntersection(
      tokens(
        ["StreetName", "Main"],
        ["PlaceName", "Springfield"],
        ["IntersectionSeparator", "&"],
        ["SecondStreetName", "Elm"]
      )
    );

    expect(first).toEqual(
      tokens(["StreetName", "Main"], ["PlaceName", "Springfield"])
    );
    expect(second).toEqual(tokens(["StreetName", "Elm"]));
  });
});
