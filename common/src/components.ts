/**
 * Canonical names for the parts of a US address, in the order they are
 * written on an address label.
 */
export const COMPONENT_NAMES = [
  "address_number_prefix",
  "address_number",
  "address_number_suffix",
  "street_predirectional",
  "street_pre_modifier",
  "street_pre_type",
  "street_name",
  "street_post_type",
  "street_postdirectional",
  "street_post_modifier",
  "subaddress_type",
  "subaddress_identifier",
  "occupancy_type",
  "occupancy_identifier",
  "usps_box_type",
  "usps_box_id",
  "building_name",
  "landmark_name",
  "city",
  "state",
  "zip_code",
  "zip_plus4",
] as const;

export type ComponentName = (typeof COMPONENT_NAMES)[number];

/** Fields that make up the house number, in display order. */
export const NUMBER_FIELDS = [
  "address_number_prefix",
  "address_number",
  "address_number_suffix",
] as const;

/** Fields that make up a street name, in display order. */
export const STREET_FIELDS = [
  "street_predirectional",
  "street_pre_modifier",
  "street_pre_type",
  "street_name",
  "street_post_type",
  "street_postdirectional",
  "street_post_modifier",
] as const;

/** Fields shared by both streets of an intersection. */
export const LOCATION_FIELDS = [
  "city",
  "state",
  "zip_code",
  "zip_plus4",
] as const;

/**
 * Labelled parts of a single address. Absent parts are left out rather than
 * set to an empty string.
 */
export type AddressComponents = Partial<Record<ComponentName, string>>;

/** The two streets that make up an intersection. */
export type IntersectionComponents = readonly [
  AddressComponents,
  AddressComponents,
];

export function isIntersection(
  components: AddressComponents | IntersectionComponents
): components is IntersectionComponents {
  return Array.isArray(components);
}

export enum AddressType {
  STREET_ADDRESS = "Street Address",
  INTERSECTION = "Intersection",
  AMBIGUOUS = "Ambiguous",
}

/**
 * How an input was interpreted. Only ambiguous results carry a warning, so
 * callers have to handle that case explicitly.
 */
export type Classification =
  | { type: AddressType.STREET_ADDRESS }
  | { type: AddressType.INTERSECTION }
  | { type: AddressType.AMBIGUOUS; warning: string };

export type ParsedAddress =
  | {
      input: string;
      classification:
        | { type: AddressType.STREET_ADDRESS }
        | { type: AddressType.AMBIGUOUS; warning: string };
      components: AddressComponents;
    }
  | {
      input: string;
      classification: { type: AddressType.INTERSECTION };
      components: IntersectionComponents;
    };

export interface StandardizedAddress {
  address_line_1: string;
  address_line_2: string;
  city: string;
  state: string;
  zip_code: string;
  standardized: string;
  components: AddressComponents | IntersectionComponents;
}
