import type { AddressComponents, ComponentName } from "./components";
import { INTERSECTION_SEPARATOR, TaggedToken } from "./tagger";

export type TagMapping =
  | { kind: "field"; name: ComponentName }
  | { kind: "ignored" };

const IGNORED: TagMapping = { kind: "ignored" };

function field(name: ComponentName): TagMapping {
  return { kind: "field", name };
}

/**
 * Tagger labels and the component each one feeds. Labels that aren't listed
 * here are ignored, so new tagger vocabulary never breaks parsing.
 */
const TAG_MAPPINGS: ReadonlyMap<string, TagMapping> = new Map([
  ["AddressNumberPrefix", field("address_number_prefix")],
  ["AddressNumber", field("address_number")],
  ["AddressNumberSuffix", field("address_number_suffix")],
  ["StreetNamePreDirectional", field("street_predirectional")],
  ["StreetNamePreModifier", field("street_pre_modifier")],
  ["StreetNamePreType", field("street_pre_type")],
  ["StreetName", field("street_name")],
  ["StreetNamePostType", field("street_post_type")],
  ["StreetNamePostDirectional", field("street_postdirectional")],
  ["StreetNamePostModifier", field("street_post_modifier")],
  ["SubaddressType", field("subaddress_type")],
  ["SubaddressIdentifier", field("subaddress_identifier")],
  ["OccupancyType", field("occupancy_type")],
  ["OccupancyIdentifier", field("occupancy_identifier")],
  ["USPSBoxType", field("usps_box_type")],
  ["USPSBoxID", field("usps_box_id")],
  ["BuildingName", field("building_name")],
  ["LandmarkName", field("landmark_name")],
  ["PlaceName", field("city")],
  ["StateName", field("state")],
  ["ZipCode", field("zip_code")],
  ["ZipPlus4", field("zip_plus4")],
  ["Recipient", IGNORED],
  ["NotAddress", IGNORED],
  ["CornerOf", IGNORED],
  ["USPSBoxGroupType", IGNORED],
  ["USPSBoxGroupID", IGNORED],
  [INTERSECTION_SEPARATOR, IGNORED],
]);

const SECOND_STREET_PREFIX = "SecondStreet";
const SPLIT_LOCATION_LABELS = new Set([
  "PlaceName",
  "StateName",
  "ZipCode",
  "ZipPlus4",
]);

export function isSecondStreetLabel(label: string): boolean {
  return label.startsWith(SECOND_STREET_PREFIX);
}

/** Get the component a tagger label belongs to. */
export function mappingForLabel(label: string): TagMapping {
  return TAG_MAPPINGS.get(label) ?? IGNORED;
}

/**
 * Combine labelled tokens into address components. Tokens with the same label
 * are joined with a space in the order they appear, except that two house
 * numbers joined by a separator ("1804 & 1810") become a hyphenated range
 * (USPS Pub 28 §232).
 */
export function mapTags(tokens: readonly TaggedToken[]): AddressComponents {
  const components: AddressComponents = {};
  let previous: ComponentName | null = null;
  let numberRange = false;

  for (const { label, token } of tokens) {
    if (label === INTERSECTION_SEPARATOR) {
      numberRange = previous === "address_number";
      continue;
    }

    const mapping = mappingForLabel(label);
    const value = token.trim();
    if (mapping.kind === "ignored" || !value) {
      previous = null;
      numberRange = false;
      continue;
    }

    const existing = components[mapping.name];
    if (existing) {
      const joiner =
        mapping.name === "address_number" && numberRange ? "-" : " ";
      components[mapping.name] = `${existing}${joiner}${value}`;
    } else {
      components[mapping.name] = value;
    }

    previous = mapping.name;
    numberRange = false;
  }

  return components;
}

/**
 * Split the tokens of an intersection into one stream per street. Second
 * street labels are renamed to their first street equivalents, and city,
 * state and ZIP stay with whichever street they follow.
 */
export function splitIntersection(
  tokens: readonly TaggedToken[]
): [TaggedToken[], TaggedToken[]] {
  const first: TaggedToken[] = [];
  const second: TaggedToken[] = [];
  let current = first;

  for (const { label, token } of tokens) {
    if (isSecondStreetLabel(label)) {
      current = second;
      second.push({ label: label.slice("Second".length), token });
    } else if (label === INTERSECTION_SEPARATOR) {
      current = second;
    } else if (SPLIT_LOCATION_LABELS.has(label)) {
      current.push({ label, token });
    } else {
      first.push({ label, token });
    }
  }

  return [first, second];
}
