import { normalizeComponent } from "./normalize";
import directionalData from "./usps-data/directionals.json";
import stateData from "./usps-data/states.json";
import suffixData from "./usps-data/suffixes.json";
import unitData from "./usps-data/units.json";

/** Maps a normalized term to its USPS abbreviation. */
export type LookupTable = ReadonlyMap<string, string>;

function loadTable(data: Record<string, string>): LookupTable {
  return new Map(Object.entries(data));
}

// Each table also maps its abbreviations to themselves, so looking up a value
// that was already abbreviated always returns it unchanged.

/** Street suffixes (USPS Pub 28 Appendix C1), e.g. AVENUE -> AVE. */
export const SUFFIXES = loadTable(suffixData);
/** Directionals, e.g. SOUTHWEST -> SW. */
export const DIRECTIONALS = loadTable(directionalData);
/** States, territories and military regions, e.g. ILLINOIS -> IL. */
export const STATES = loadTable(stateData);
/** Secondary unit designators (Appendix C2), e.g. SUITE -> STE. */
export const UNITS = loadTable(unitData);

const ALL_TABLES = [SUFFIXES, DIRECTIONALS, STATES, UNITS];

/**
 * Get the USPS abbreviation for a term. Terms are compared without regard to
 * case or periods; anything not in the table comes back normalized but
 * otherwise unchanged.
 */
export function lookup(table: LookupTable, key: string): string {
  const normalized = normalizeComponent(key);
  return table.get(normalized) ?? normalized;
}

/** Determine whether a word appears in any of the lookup tables. */
export function isAddressTerm(word: string): boolean {
  const normalized = normalizeComponent(word);
  return ALL_TABLES.some((table) => table.has(normalized));
}
