import { AddressType, Classification } from "./components";
import { isSecondStreetLabel } from "./tags";
import type { TaggedToken, TaggerOutput } from "./tagger";

// Labels that only make sense on a single street address.
const STREET_ADDRESS_LABELS = new Set([
  "AddressNumberPrefix",
  "AddressNumber",
  "AddressNumberSuffix",
  "OccupancyType",
  "OccupancyIdentifier",
  "SubaddressType",
  "SubaddressIdentifier",
  "USPSBoxType",
  "USPSBoxID",
]);

function ambiguous(warning: string): Classification {
  return { type: AddressType.AMBIGUOUS, warning };
}

function findLabel(
  tokens: readonly TaggedToken[],
  predicate: (label: string) => boolean
): string | undefined {
  return tokens.find((token) => predicate(token.label))?.label;
}

/**
 * Decide whether tagger output describes a street address or an
 * intersection. Output that fits both, or that the tagger could not label
 * consistently, is classified as ambiguous instead of guessing.
 */
export function classify(output: TaggerOutput): Classification {
  if (output.type === "repeated_label") {
    return ambiguous(
      `Repeated label "${output.label}" detected; parse may be inaccurate.`
    );
  }

  if (output.mode === AddressType.INTERSECTION) {
    const label = findLabel(output.tokens, (l) => STREET_ADDRESS_LABELS.has(l));
    if (label) {
      return ambiguous(
        `Found "${label}" in an intersection; parse may be inaccurate.`
      );
    }
    const labels = output.tokens.map((token) => token.label);
    if (
      !labels.includes("StreetName") ||
      !labels.includes("SecondStreetName")
    ) {
      return ambiguous(
        "Intersection is missing a street name; parse may be inaccurate."
      );
    }
    return { type: AddressType.INTERSECTION };
  }

  const label = findLabel(output.tokens, isSecondStreetLabel);
  if (label) {
    return ambiguous(
      `Found "${label}" in a street address; parse may be inaccurate.`
    );
  }
  return { type: AddressType.STREET_ADDRESS };
}
