/// <reference path="./parse-address.d.ts" />
import { parseLocation, ParsedLocation } from "parse-address";
import { AddressType } from "./components";
import { DIRECTIONALS, STATES, SUFFIXES } from "./lookup";
import { normalizeComponent } from "./normalize";

export const INTERSECTION_SEPARATOR = "IntersectionSeparator";

/** A piece of an address and the label a tagger assigned to it. */
export interface TaggedToken {
  label: string;
  token: string;
}

/**
 * Output of an address tagger. A tagger that can't settle on one label per
 * field reports a `repeated_label` result (with its best-effort tokens)
 * instead of throwing.
 */
export type TaggerOutput =
  | {
      type: "parsed";
      mode: AddressType.STREET_ADDRESS | AddressType.INTERSECTION;
      tokens: TaggedToken[];
    }
  | {
      type: "repeated_label";
      label: string;
      tokens: TaggedToken[];
    };

/**
 * Splits a raw address string into labelled tokens. Labels are the ones
 * listed in `tags.ts` (`AddressNumber`, `StreetName`, `PlaceName`, ...).
 */
export interface Tagger {
  tag(text: string): TaggerOutput;
}

type FieldLabels = Array<[keyof ParsedLocation, string]>;

const STREET_ADDRESS_LABELS: FieldLabels = [
  ["number", "AddressNumber"],
  ["prefix", "StreetNamePreDirectional"],
  ["street", "StreetName"],
  ["type", "StreetNamePostType"],
  ["suffix", "StreetNamePostDirectional"],
  ["sec_unit_type", "OccupancyType"],
  ["sec_unit_num", "OccupancyIdentifier"],
];

// parse-address reports PO boxes as a secondary unit.
const PO_BOX_LABELS: FieldLabels = STREET_ADDRESS_LABELS.map(
  ([field, label]): [keyof ParsedLocation, string] => {
    if (field === "sec_unit_type") return [field, "USPSBoxType"];
    if (field === "sec_unit_num") return [field, "USPSBoxID"];
    return [field, label];
  }
);

const FIRST_STREET_LABELS: FieldLabels = [
  ["prefix1", "StreetNamePreDirectional"],
  ["street1", "StreetName"],
  ["type1", "StreetNamePostType"],
  ["suffix1", "StreetNamePostDirectional"],
];

const SECOND_STREET_LABELS: FieldLabels = [
  ["prefix2", "SecondStreetNamePreDirectional"],
  ["street2", "SecondStreetName"],
  ["type2", "SecondStreetNamePostType"],
  ["suffix2", "SecondStreetNamePostDirectional"],
];

const LOCATION_LABELS: FieldLabels = [
  ["city", "PlaceName"],
  ["state", "StateName"],
  ["zip", "ZipCode"],
  ["plus4", "ZipPlus4"],
];

// Two house numbers sharing one street, e.g. "1804 & 1810 Main St".
const DUAL_NUMBER_PATTERN = /^\s*(\d+[a-z]?)\s*(&|and)\s*(\d+[a-z]?\s+\S.*)$/i;
const CONNECTOR_PATTERN = /\b(?:and|at)\b|&|@/i;
const CONNECTOR_SPLIT_PATTERN = /\s+(?:and|at)\s+|\s*[&@]\s*/i;
const PO_BOX_PATTERN = /^p\.?\s*o\.?\s*box$/i;
const HOUSE_NUMBER_PATTERN = /^\d+\w?$/;
const LEADING_HOUSE_NUMBER_PATTERN = /^(\d+\w?)\s+(\S.*)$/;
const ZIP_PATTERN = /^(\d{5})(?:-(\d{4}))?$/;

function tokensFor(parsed: ParsedLocation, labels: FieldLabels): TaggedToken[] {
  const tokens: TaggedToken[] = [];
  for (const [field, label] of labels) {
    const token = parsed[field]?.trim();
    if (token) tokens.push({ label, token });
  }
  return tokens;
}

/**
 * parse-address leaves a house number at the start of an intersection's
 * street name ("100 Main"). Split it out so it can't pass as part of the name.
 */
function streetTokens(
  parsed: ParsedLocation,
  labels: FieldLabels
): TaggedToken[] {
  const numbers: TaggedToken[] = [];
  const tokens: TaggedToken[] = [];
  for (const token of tokensFor(parsed, labels)) {
    const match = token.label.endsWith("StreetName")
      ? token.token.match(LEADING_HOUSE_NUMBER_PATTERN)
      : null;
    if (match) {
      numbers.push({ label: "AddressNumber", token: match[1] });
      tokens.push({ label: token.label, token: match[2] });
    } else {
      tokens.push(token);
    }
  }
  return [...numbers, ...tokens];
}

function isIn(table: ReadonlyMap<string, string>, word: string): boolean {
  return table.has(normalizeComponent(word));
}

/** Label the words of one street, e.g. "N Main St" or "Vine Street". */
function tagStreetWords(text: string, labelPrefix: string): TaggedToken[] {
  const words = text.split(/\s+/).filter(Boolean);
  const label = (name: string) => `${labelPrefix}${name}`;

  const leading: TaggedToken[] = [];
  if (words.length > 1 && HOUSE_NUMBER_PATTERN.test(words[0])) {
    leading.push({ label: "AddressNumber", token: words[0] });
    words.shift();
  }

  const trailing: TaggedToken[] = [];
  if (words.length > 1 && isIn(DIRECTIONALS, words[words.length - 1])) {
    trailing.unshift({
      label: label("StreetNamePostDirectional"),
      token: words[words.length - 1],
    });
    words.pop();
  }
  if (words.length > 1 && isIn(SUFFIXES, words[words.length - 1])) {
    trailing.unshift({
      label: label("StreetNamePostType"),
      token: words[words.length - 1],
    });
    words.pop();
  }
  if (words.length > 1 && isIn(DIRECTIONALS, words[0])) {
    leading.push({ label: label("StreetNamePreDirectional"), token: words[0] });
    words.shift();
  }

  const name = words.join(" ");
  return [
    ...leading,
    ...(name ? [{ label: label("StreetName"), token: name }] : []),
    ...trailing,
  ];
}

/** Label a last line such as "Los Angeles, CA 90028". */
function tagLastLine(text: string): TaggedToken[] {
  const words = text.replace(/,/g, " ").split(/\s+/).filter(Boolean);
  const trailing: TaggedToken[] = [];

  const zip = words.length ? words[words.length - 1].match(ZIP_PATTERN) : null;
  if (zip) {
    words.pop();
    trailing.push({ label: "ZipCode", token: zip[1] });
    if (zip[2]) trailing.push({ label: "ZipPlus4", token: zip[2] });
  }

  for (const size of [2, 1]) {
    const state = words.slice(-size).join(" ");
    if (words.length >= size && isIn(STATES, state)) {
      words.splice(-size, size);
      trailing.unshift({ label: "StateName", token: state });
      break;
    }
  }

  const city = words.join(" ");
  return [...(city ? [{ label: "PlaceName", token: city }] : []), ...trailing];
}

/**
 * parse-address only recognizes an intersection that is followed by a city or
 * state, so "Hollywood Blvd and Vine St" on its own is split on its connector
 * and each street is labelled word by word.
 */
function tagBareIntersection(
  text: string
): Extract<TaggerOutput, { type: "parsed" }> | null {
  const connector = CONNECTOR_SPLIT_PATTERN.exec(text);
  if (!connector) return null;

  const firstStreet = text.slice(0, connector.index);
  const rest = text.slice(connector.index + connector[0].length);
  const comma = rest.indexOf(",");
  const secondStreet = comma === -1 ? rest : rest.slice(0, comma);
  const lastLine = comma === -1 ? "" : rest.slice(comma + 1);

  return {
    type: "parsed",
    mode: AddressType.INTERSECTION,
    tokens: [
      ...tagStreetWords(firstStreet, ""),
      { label: INTERSECTION_SEPARATOR, token: connector[0].trim() },
      ...tagStreetWords(secondStreet, "Second"),
      ...tagLastLine(lastLine),
    ],
  };
}

function parseOrNull(text: string): ParsedLocation | null {
  try {
    return parseLocation(text);
  } catch (error) {
    // parse-address throws on some malformed input; treat it as unparseable.
    return null;
  }
}

/**
 * Tags addresses with the `parse-address` library, which understands street
 * addresses, informal addresses and intersections.
 */
export class ParseAddressTagger implements Tagger {
  tag(text: string): TaggerOutput {
    const dualNumber = text.match(DUAL_NUMBER_PATTERN);
    if (dualNumber) {
      const [, firstNumber, connector, remainder] = dualNumber;
      return {
        type: "repeated_label",
        label: "AddressNumber",
        tokens: [
          { label: "AddressNumber", token: firstNumber },
          { label: INTERSECTION_SEPARATOR, token: connector },
          ...this.tagParsed(remainder).tokens,
        ],
      };
    }

    return this.tagParsed(text);
  }

  private tagParsed(text: string): Extract<TaggerOutput, { type: "parsed" }> {
    if (!text.trim()) {
      return { type: "parsed", mode: AddressType.STREET_ADDRESS, tokens: [] };
    }

    const parsed = parseOrNull(text);
    if (!parsed) {
      return (
        tagBareIntersection(text) ?? {
          type: "parsed",
          mode: AddressType.STREET_ADDRESS,
          tokens: [],
        }
      );
    }

    if (parsed.street1 || parsed.street2) {
      const connector = text.match(CONNECTOR_PATTERN)?.[0] ?? "&";
      return {
        type: "parsed",
        mode: AddressType.INTERSECTION,
        tokens: [
          ...streetTokens(parsed, FIRST_STREET_LABELS),
          { label: INTERSECTION_SEPARATOR, token: connector },
          ...streetTokens(parsed, SECOND_STREET_LABELS),
          ...tokensFor(parsed, LOCATION_LABELS),
        ],
      };
    }

    const isPoBox = PO_BOX_PATTERN.test(parsed.sec_unit_type?.trim() ?? "");
    return {
      type: "parsed",
      mode: AddressType.STREET_ADDRESS,
      tokens: [
        ...tokensFor(parsed, isPoBox ? PO_BOX_LABELS : STREET_ADDRESS_LABELS),
        ...tokensFor(parsed, LOCATION_LABELS),
      ],
    };
  }
}

export const defaultTagger: Tagger = new ParseAddressTagger();
