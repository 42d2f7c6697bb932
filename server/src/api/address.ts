import { Response } from "express";
import {
  AddressComponents,
  AddressType,
  IntersectionComponents,
  isIntersection,
  parseAndClassify,
  standardize,
  standardizeAddress,
} from "address-standardizer-common";
import { BadRequestError } from "../exceptions";
import type { ParseResponse } from "../interfaces";
import { logger } from "../logger";
import { AppRequest } from "../middleware";
import {
  validateParseRequest,
  validateStandardizeRequest,
} from "../validation";

function hasComponents(
  components: AddressComponents | IntersectionComponents
): boolean {
  const bags: readonly AddressComponents[] = isIntersection(components)
    ? components
    : [components];
  return bags.some((bag) => Object.keys(bag).length > 0);
}

/**
 * Split a free-form address into labelled components and say whether it's a
 * street address, an intersection, or ambiguous.
 */
export const parse = (req: AppRequest, res: Response): void => {
  const { address } = validateParseRequest(req.body);
  if (!address) {
    throw new BadRequestError("An address is required");
  }

  const parsed = parseAndClassify(address);
  const body: ParseResponse = {
    input: parsed.input,
    components: parsed.components,
    type: parsed.classification.type,
  };
  if (parsed.classification.type === AddressType.AMBIGUOUS) {
    body.warning = parsed.classification.warning;
    logger.info(`Ambiguous parse of "${address}": ${body.warning}`);
  }

  res.json(body);
};

/**
 * Standardize an address given as components or as free-form text. When both
 * are present, the components are used.
 */
export const standardizeRequest = (req: AppRequest, res: Response): void => {
  const { address, components } = validateStandardizeRequest(req.body);

  if (components && hasComponents(components)) {
    res.json(standardize(components));
  } else if (address) {
    res.json(standardizeAddress(address));
  } else {
    throw new BadRequestError("Either an address or components are required");
  }
};
