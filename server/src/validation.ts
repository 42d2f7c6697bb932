import Ajv, { SchemaObject } from "ajv";
import addTransform from "ajv-keywords/dist/keywords/transform";
import { COMPONENT_NAMES } from "address-standardizer-common";
import { MAX_ADDRESS_LENGTH } from "./config";
import { ValueError } from "./exceptions";
import type { ParseRequest, StandardizeRequest } from "./interfaces";

const ajv = new Ajv();
addTransform(ajv);

// Custom Validations ------------------------------------

// Deletes fields that are null or blank strings from an object.
ajv.addKeyword({
  keyword: "dropEmptyFields",
  type: "object",
  modifying: true,
  compile() {
    return (data: Record<string, unknown>) => {
      for (const [key, value] of Object.entries(data)) {
        if (value == null || (typeof value === "string" && !value.trim())) {
          delete data[key];
        }
      }
      return true;
    };
  },
});

function makeValidator<T>(schema: SchemaObject) {
  const coreValidator = ajv.compile<T>(schema);
  return (data: unknown, parentName?: string): T => {
    if (coreValidator(data)) return data;

    const error = coreValidator.errors?.[0];
    const message = error
      ? `${error.instancePath} ${error.message}`
      : " is invalid";
    throw new ValueError(`${parentName || "request"}${message}`);
  };
}

// Actual Schemas ----------------------------------------------------

const ADDRESS_SCHEMA = {
  type: "string",
  maxLength: MAX_ADDRESS_LENGTH,
  transform: ["trim"],
};

const COMPONENTS_SCHEMA = {
  type: "object",
  dropEmptyFields: true,
  propertyNames: { enum: COMPONENT_NAMES },
  additionalProperties: {
    type: "string",
    nullable: true,
    transform: ["trim"],
  },
};

export const validateParseRequest = makeValidator<ParseRequest>({
  type: "object",
  properties: {
    address: ADDRESS_SCHEMA,
  },
  required: ["address"],
  additionalProperties: false,
});

export const validateStandardizeRequest = makeValidator<StandardizeRequest>({
  type: "object",
  properties: {
    address: ADDRESS_SCHEMA,
    components: {
      anyOf: [
        COMPONENTS_SCHEMA,
        {
          type: "array",
          items: COMPONENTS_SCHEMA,
          minItems: 2,
          maxItems: 2,
        },
      ],
    },
  },
  additionalProperties: false,
});
