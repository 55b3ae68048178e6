/**
 * Column selector parsing
 */

import type { ColumnSource } from "./types.js";
import { ConfigError } from "../../utils/errors.js";

/**
 * Parse a record-relative column selector: ".", "#document", "name",
 * "@attr", "name/@attr", "@*" or "name/@*"
 */
export function parseColumnSelector(selector: string): ColumnSource {
  if (selector === "") {
    throw new ConfigError("Column selector must not be empty");
  }
  if (selector === "#document") {
    return { kind: "document" };
  }
  if (selector === ".") {
    return { kind: "self" };
  }

  let element: string | null = null;
  let attribute = "";
  if (selector.startsWith("@")) {
    attribute = selector.slice(1);
  } else {
    // Element names may carry a namespace URI with slashes, so split on the last "/@"
    const split = selector.lastIndexOf("/@");
    if (split < 0) {
      return { kind: "element", element: selector };
    }
    element = selector.slice(0, split);
    attribute = selector.slice(split + 2);
  }

  if (attribute === "" || element === "") {
    throw new ConfigError(`Invalid column selector: ${selector}`, { selector });
  }
  return attribute === "*"
    ? { kind: "attributes", element }
    : { kind: "attribute", element, attribute };
}
