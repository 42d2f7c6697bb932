import {
  AddressComponents,
  COMPONENT_NAMES,
  ComponentName,
  IntersectionComponents,
  isIntersection,
  LOCATION_FIELDS,
  NUMBER_FIELDS,
  StandardizedAddress,
  STREET_FIELDS,
} from "./components";
import {
  DIRECTIONALS,
  lookup,
  LookupTable,
  STATES,
  SUFFIXES,
  UNITS,
} from "./lookup";
import { normalizeComponent } from "./normalize";

// Separates address line 1, address line 2 and the last line in the single
// line form of an address.
const LINE_SEPARATOR = "  ";

const INTERSECTION_JOINER = " & ";

const FIELD_TABLES: Partial<Record<ComponentName, LookupTable>> = {
  street_predirectional: DIRECTIONALS,
  street_pre_type: SUFFIXES,
  street_post_type: SUFFIXES,
  street_postdirectional: DIRECTIONALS,
  subaddress_type: UNITS,
  occupancy_type: UNITS,
  state: STATES,
};

const NINE_DIGIT_ZIP_PATTERN = /^(\d{5})\D*(\d{4})$/;
const LEADING_NUMBER_SIGN_PATTERN = /^#\s*/;

/**
 * Format a US ZIP code as 5 digits or ZIP+4 ("20500-1234"). Values that
 * don't have that shape are returned normalized but otherwise unchanged;
 * this only formats, it doesn't validate.
 */
export function formatZipCode(zipCode: string): string {
  const value = normalizeComponent(zipCode);
  const nineDigits = value.match(NINE_DIGIT_ZIP_PATTERN);
  return nineDigits ? `${nineDigits[1]}-${nineDigits[2]}` : value;
}

function joinPresent(
  values: ReadonlyArray<string | undefined>,
  separator = " "
): string {
  return values.filter((value) => value).join(separator);
}

function cleanComponents(
  components: AddressComponents,
  fields: readonly ComponentName[]
): AddressComponents {
  const cleaned: AddressComponents = {};
  for (const name of fields) {
    const raw = components[name];
    if (typeof raw !== "string") continue;

    const table = FIELD_TABLES[name];
    const value = table ? lookup(table, raw) : normalizeComponent(raw);
    if (value) cleaned[name] = value;
  }
  return cleaned;
}

/**
 * If a value starts with a unit designator ("STE 300"), get the designator's
 * abbreviation and the rest of the value.
 */
function splitUnitDesignator(value: string): [string, string] | null {
  const [first, ...rest] = value.split(" ");
  const designator = UNITS.get(first);
  if (!designator) return null;
  return [designator, rest.join(" ")];
}

/**
 * Settle the secondary unit fields, filling in the occupancy slot from
 * building/landmark names or from a subaddress when it is empty.
 */
function standardizeUnits(cleaned: AddressComponents): AddressComponents {
  let unitType = cleaned.occupancy_type ?? "";
  let unitId = cleaned.occupancy_identifier ?? "";
  let subType = cleaned.subaddress_type ?? "";
  let subId = cleaned.subaddress_identifier ?? "";

  // Taggers sometimes label units like "BLDG C" as building or landmark names.
  if (!unitType && !unitId && !subType && !subId) {
    for (const name of [cleaned.building_name, cleaned.landmark_name]) {
      const designator = name ? splitUnitDesignator(name) : null;
      if (designator) {
        [unitType, unitId] = designator;
        break;
      }
    }
  }

  if (!unitType && !unitId) {
    [unitType, unitId] = [subType, subId];
    [subType, subId] = ["", ""];
  }

  // An identifier with no designator gets "#" (e.g. "# 4B"), unless the
  // designator was folded into the identifier ("NO 16").
  if (unitId && !unitType) {
    unitId = unitId.replace(LEADING_NUMBER_SIGN_PATTERN, "");
    const designator = splitUnitDesignator(unitId);
    if (designator) {
      [unitType, unitId] = designator;
    } else {
      unitType = "#";
    }
  }

  const units: AddressComponents = {};
  if (subType) units.subaddress_type = subType;
  if (subId) units.subaddress_identifier = subId;
  if (unitType) units.occupancy_type = unitType;
  if (unitId) units.occupancy_identifier = unitId;
  return units;
}

/** Combine a ZIP code with its +4 extension and format the result. */
function standardizeLocation(cleaned: AddressComponents): AddressComponents {
  const location: AddressComponents = {};
  if (cleaned.city) location.city = cleaned.city;
  if (cleaned.state) location.state = cleaned.state;

  if (cleaned.zip_code) {
    const zip = cleaned.zip_plus4
      ? `${cleaned.zip_code}-${cleaned.zip_plus4}`
      : cleaned.zip_code;
    location.zip_code = formatZipCode(zip);
  }
  return location;
}

function pickFields(
  components: AddressComponents,
  fields: readonly ComponentName[]
): AddressComponents {
  const picked: AddressComponents = {};
  for (const name of fields) {
    const value = components[name];
    if (value) picked[name] = value;
  }
  return picked;
}

function streetLine(std: AddressComponents): string {
  return joinPresent(
    [...NUMBER_FIELDS, ...STREET_FIELDS].map((name) => std[name])
  );
}

function lastLine(std: AddressComponents): string {
  const cityState =
    std.city && std.state ? `${std.city}, ${std.state}` : std.city || std.state;
  return joinPresent([cityState, std.zip_code]);
}

function standardizeStreetAddress(
  components: AddressComponents
): StandardizedAddress {
  const cleaned = cleanComponents(components, COMPONENT_NAMES);
  const std: AddressComponents = {
    ...pickFields(cleaned, NUMBER_FIELDS),
    ...pickFields(cleaned, STREET_FIELDS),
    ...standardizeUnits(cleaned),
    ...pickFields(cleaned, ["usps_box_type", "usps_box_id"]),
    ...standardizeLocation(cleaned),
  };

  let line1 = streetLine(std);
  if (!line1) {
    line1 = joinPresent([std.usps_box_type, std.usps_box_id]);
  }

  // Larger containers come first, e.g. "BLDG C STE 120".
  const line2 = joinPresent([
    std.subaddress_type,
    std.subaddress_identifier,
    std.occupancy_type,
    std.occupancy_identifier,
  ]);

  return {
    address_line_1: line1,
    address_line_2: line2,
    city: std.city ?? "",
    state: std.state ?? "",
    zip_code: std.zip_code ?? "",
    standardized: joinPresent([line1, line2, lastLine(std)], LINE_SEPARATOR),
    components: std,
  };
}

function standardizeIntersection(
  streets: IntersectionComponents
): StandardizedAddress {
  const sides = streets.map((street) => {
    const cleaned = cleanComponents(street, [
      ...STREET_FIELDS,
      ...LOCATION_FIELDS,
    ]);
    return {
      ...pickFields(cleaned, STREET_FIELDS),
      ...standardizeLocation(cleaned),
    };
  });
  const [first, second] = sides;

  const location: AddressComponents = {
    city: first.city || second.city,
    state: first.state || second.state,
    zip_code: first.zip_code || second.zip_code,
  };
  const line1 = joinPresent(sides.map(streetLine), INTERSECTION_JOINER);

  return {
    address_line_1: line1,
    address_line_2: "",
    city: location.city ?? "",
    state: location.state ?? "",
    zip_code: location.zip_code ?? "",
    standardized: joinPresent([line1, lastLine(location)], LINE_SEPARATOR),
    components: [first, second],
  };
}

/**
 * Standardize address components per USPS Publication 28: uppercase,
 * abbreviated suffixes, directionals, states and unit designators, and a
 * formatted ZIP code. Standardizing the output's `components` again gives the
 * same result.
 *
 * @example
 * standardize({
 *   address_number: "350",
 *   street_name: "Fifth",
 *   street_post_type: "Avenue",
 *   occupancy_type: "Suite",
 *   occupancy_identifier: "3300",
 *   city: "New York",
 *   state: "NY",
 *   zip_code: "10118",
 * }).standardized
 * // "350 FIFTH AVE  STE 3300  NEW YORK, NY 10118"
 */
export function standardize(
  components: AddressComponents | IntersectionComponents
): StandardizedAddress {
  if (isIntersection(components)) {
    return standardizeIntersection(components);
  }
  return standardizeStreetAddress(components);
}
