import type {
  AddressComponents,
  AddressType,
  IntersectionComponents,
} from "address-standardizer-common";
import type { ErrorJson } from "./exceptions";

export interface ParseRequest {
  address: string;
}

export interface StandardizeRequest {
  address?: string;
  components?: AddressComponents | IntersectionComponents;
}

export interface ParseResponse {
  input: string;
  components: AddressComponents | IntersectionComponents;
  type: AddressType;
  warning?: string;
}

export interface ErrorResponse {
  error: ErrorJson;
}
