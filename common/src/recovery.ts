import type { AddressComponents } from "./components";
import { isAddressTerm, UNITS } from "./lookup";
import { normalizeComponent } from "./normalize";

// Occupancy first, then subaddress.
const UNIT_SLOTS = [
  ["occupancy_type", "occupancy_identifier"],
  ["subaddress_type", "subaddress_identifier"],
] as const;

type UnitSlot = (typeof UNIT_SLOTS)[number];

// Designators that never take an identifier (USPS Pub 28 Appendix C2). Other
// designators (KEY, LOT, UNIT...) at the start of a city are more likely to be
// part of the name, as in "KEY WEST".
const NO_IDENTIFIER_DESIGNATORS = new Set([
  "BASEMENT",
  "BSMT",
  "FRONT",
  "FRNT",
  "LOBBY",
  "LBBY",
  "LOWER",
  "LOWR",
  "PENTHOUSE",
  "PH",
  "REAR",
  "SIDE",
  "UPPER",
  "UPPR",
]);

const IDENTIFIER_FRAGMENT_PATTERN = /^([a-z]) (.*\S.*)$/i;

function nextFreeSlot(components: AddressComponents): UnitSlot | undefined {
  return UNIT_SLOTS.find(
    ([typeKey, idKey]) => !components[typeKey] && !components[idKey]
  );
}

function splitFirstWord(text: string): [string, string] {
  const trimmed = text.trim();
  const index = trimmed.indexOf(" ");
  if (index === -1) return [trimmed, ""];
  return [trimmed.slice(0, index), trimmed.slice(index + 1).trim()];
}

/**
 * Move secondary unit designators that a tagger filed under the city back
 * into the occupancy or subaddress fields. For example, a city tagged as
 * "LOWR LEVEL, UNIT 5, SEATTLE" becomes "SEATTLE", with "LOWR LEVEL" and
 * "UNIT 5" stored as units.
 *
 * A single letter at the start of the city ("K WALLA WALLA") is usually the
 * tail of a unit identifier ("120 K"), so it is moved onto the identifier
 * when there is one.
 */
export function recoverUnitsFromCity(
  components: AddressComponents
): AddressComponents {
  const result = { ...components };
  let city = result.city;
  if (!city) return result;

  // Leading comma-separated segments.
  while (city.includes(",")) {
    const index = city.indexOf(",");
    const before = city.slice(0, index).trim();
    const after = city.slice(index + 1).trim();
    if (!before || !after) break;

    const [word, identifier] = splitFirstWord(before);
    if (UNITS.has(normalizeComponent(word))) {
      const slot = nextFreeSlot(result);
      if (slot) {
        result[slot[0]] = word;
        if (identifier) result[slot[1]] = identifier;
      }
      city = after;
      continue;
    }

    // A lone unknown word is most likely wayfinding text ("YARD", "GATE").
    if (!identifier && !isAddressTerm(word)) {
      city = after;
      continue;
    }

    break;
  }

  // A bare designator at the start of the city.
  const [first, rest] = splitFirstWord(city);
  if (rest) {
    const word = normalizeComponent(first);
    const slot = nextFreeSlot(result);
    if (NO_IDENTIFIER_DESIGNATORS.has(word)) {
      if (slot) result[slot[0]] = first;
      city = rest;
    } else if (UNITS.has(word) && !slot) {
      city = rest;
    }
  }

  const fragment = city.match(IDENTIFIER_FRAGMENT_PATTERN);
  if (fragment) {
    for (const key of ["occupancy_identifier", "subaddress_identifier"] as const) {
      const identifier = result[key];
      if (identifier) {
        result[key] = `${identifier} ${fragment[1]}`;
        city = fragment[2].trim();
        break;
      }
    }
  }

  result.city = city;
  return result;
}
