/**
 * Global constants for the dotver engine
 */

// Separator in the textual form: "1.2.3"
export const COMPONENT_SEPARATOR = ".";

// Separator in the storage form: "1_2_3"
export const SERIALIZED_SEPARATOR = "_";

export const WILDCARD = "*";

// Components are JavaScript numbers, so the safe integer range is the bound
export const MAX_COMPONENT = Number.MAX_SAFE_INTEGER;

export const DIGITS_REGEX = /^[0-9]+$/;
