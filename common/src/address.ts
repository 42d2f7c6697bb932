import { classify } from "./classify";
import {
  AddressType,
  ParsedAddress,
  StandardizedAddress,
} from "./components";
import { recoverUnitsFromCity } from "./recovery";
import { standardize } from "./standardize";
import { defaultTagger, Tagger } from "./tagger";
import { isSecondStreetLabel, mapTags, splitIntersection } from "./tags";

const PARENTHETICAL_PATTERN = /\([^)]*\)/g;
const STRAY_PARENTHESIS_PATTERN = /[()]/g;
const MULTIPLE_SPACE_PATTERN = /\s+/g;

/**
 * Remove notes in parentheses ("(back entrance)") and collapse whitespace so
 * they don't end up tagged as part of the address.
 */
export function cleanAddressText(text: string): string {
  return text
    .replace(PARENTHETICAL_PATTERN, " ")
    .replace(STRAY_PARENTHESIS_PATTERN, " ")
    .replace(MULTIPLE_SPACE_PATTERN, " ")
    .trim();
}

/**
 * Tag a free-form address and sort out whether it is a street address or an
 * intersection. Input the tagger can't make sense of is still returned, with
 * an ambiguous classification and a warning, rather than throwing.
 *
 * @example
 * parseAndClassify("Hollywood Blvd and Vine St")
 * // {
 * //   input: "Hollywood Blvd and Vine St",
 * //   classification: { type: "Intersection" },
 * //   components: [
 * //     { street_name: "Hollywood", street_post_type: "Blvd" },
 * //     { street_name: "Vine", street_post_type: "St" },
 * //   ],
 * // }
 */
export function parseAndClassify(
  input: string,
  tagger: Tagger = defaultTagger
): ParsedAddress {
  const text = cleanAddressText(input);
  if (!text) {
    return {
      input,
      classification: { type: AddressType.STREET_ADDRESS },
      components: {},
    };
  }

  const output = tagger.tag(text);
  const classification = classify(output);

  switch (classification.type) {
    case AddressType.INTERSECTION: {
      const [first, second] = splitIntersection(output.tokens);
      return {
        input,
        classification,
        components: [mapTags(first), mapTags(second)],
      };
    }
    case AddressType.STREET_ADDRESS:
      return {
        input,
        classification,
        components: recoverUnitsFromCity(mapTags(output.tokens)),
      };
    case AddressType.AMBIGUOUS: {
      const tokens = output.tokens.filter(
        ({ label }) => !isSecondStreetLabel(label)
      );
      return { input, classification, components: mapTags(tokens) };
    }
  }
}

/** Parse a free-form address and standardize whatever was found in it. */
export function standardizeAddress(
  input: string,
  tagger: Tagger = defaultTagger
): StandardizedAddress {
  return standardize(parseAndClassify(input, tagger).components);
}
