declare module "parse-address" {
  /**
   * Parts of an address recognized by parse-address. Street addresses use the
   * unnumbered fields; intersections use `*1` for the first street and `*2`
   * for the second.
   */
  interface ParsedLocation {
    number?: string;
    prefix?: string;
    street?: string;
    type?: string;
    suffix?: string;
    sec_unit_type?: string;
    sec_unit_num?: string;
    prefix1?: string;
    street1?: string;
    type1?: string;
    suffix1?: string;
    prefix2?: string;
    street2?: string;
    type2?: string;
    suffix2?: string;
    city?: string;
    state?: string;
    zip?: string;
    plus4?: string;
  }

  function parseLocation(address: string): ParsedLocation | null;
}
