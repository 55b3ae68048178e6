/**
 * Recursive materialization of typed values from element nodes
 */

import {
  NULL_VALUE,
  isScalarType,
  type RecordEntry,
  type RecordType,
  type SemanticType,
  type TypedValue,
} from "../../types/data-model.js";
import { DEFAULT_SCHEMA_OPTIONS } from "../../types/config.js";
import type { TreeNode } from "../tree/types.js";
import type { ExtractionOptions } from "./types.js";
import { convertToValue } from "./value-converter.js";
import { ExtractionError } from "../../utils/errors.js";
import { cleanText } from "../../utils/text.js";

const DEFAULT_OPTIONS: ExtractionOptions = {
  emptyElements: DEFAULT_SCHEMA_OPTIONS.emptyElements,
  textContentKey: DEFAULT_SCHEMA_OPTIONS.textContentKey,
  maxRecursionDepth: DEFAULT_SCHEMA_OPTIONS.maxRecursionDepth,
};

export function childrenNamed(node: TreeNode, name: string): TreeNode[] {
  return node.children.filter((child) => child.name === name);
}

/**
 * All-NULL record with exactly the declared fields
 */
export function nullRecord(type: RecordType): TypedValue {
  return {
    type: "RECORD",
    fields: type.fields.map((field) => ({ name: field.name, value: NULL_VALUE })),
  };
}

/**
 * Value for a column whose source node is absent
 */
export function missingValue(type: SemanticType): TypedValue {
  switch (type.type) {
    case "RECORD":
      return nullRecord(type);
    case "LIST":
      return { type: "LIST", element: type.element, items: [] };
    default:
      return NULL_VALUE;
  }
}

function isEmptyElement(node: TreeNode): boolean {
  return node.children.length === 0 && cleanText(node.text) === "";
}

/**
 * Whether a single match of a LIST field is a container of the items
 * rather than one item itself
 */
export function looksLikeListContainer(node: TreeNode, elementType: SemanticType): boolean {
  const [first, ...rest] = node.children;
  if (!first || !rest.every((child) => child.name === first.name)) {
    return false;
  }
  if (elementType.type === "RECORD") {
    return !elementType.fields.some((field) => field.name === first.name);
  }
  return true;
}

/**
 * Materializes values against semantic types. Recursion deeper than
 * `maxRecursionDepth` throws ExtractionError.
 */
export class Materializer {
  private readonly options: ExtractionOptions;

  constructor(options: Partial<ExtractionOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  private enter(depth: number): number {
    const next = depth + 1;
    if (next > this.options.maxRecursionDepth) {
      throw new ExtractionError("Recursion limit exceeded during extraction", {
        reason: "RECURSION_LIMIT_EXCEEDED",
        maxRecursionDepth: this.options.maxRecursionDepth,
      });
    }
    return next;
  }

  private emptyValue(type: SemanticType): TypedValue {
    if (this.options.emptyElements === "empty-string" && type.type === "STRING") {
      return { type: "STRING", value: "" };
    }
    if (this.options.emptyElements === "empty-record" && type.type === "RECORD") {
      return nullRecord(type);
    }
    return NULL_VALUE;
  }

  /**
   * Value of `node` as `type`
   */
  extractValue(node: TreeNode, type: SemanticType, depth = 0): TypedValue {
    const level = this.enter(depth);

    switch (type.type) {
      case "LIST":
        return this.extractList(node, type.element, level);
      case "RECORD":
        return this.extractRecord(node, type, level);
      case "XML":
        return { type: "XML", value: node.outerXml() };
      case "XML_FRAGMENT":
        return { type: "XML_FRAGMENT", value: node.innerXml() };
      default:
        break;
    }

    if (node.children.length > 0) {
      return node.attributes.length === 0
        ? { type: "XML_FRAGMENT", value: node.innerXml() }
        : { type: "XML", value: node.outerXml() };
    }

    const text = cleanText(node.text);
    return text === "" ? this.emptyValue(type) : convertToValue(text, type);
  }

  /**
   * Exactly the declared fields of `type`, read from same-named children,
   * then same-named attributes; absent fields are NULL
   */
  extractRecord(node: TreeNode, type: RecordType, depth = 0): TypedValue {
    const level = this.enter(depth);

    if (isEmptyElement(node) && node.attributes.length === 0) {
      return this.emptyValue(type);
    }

    const fields: RecordEntry[] = type.fields.map((field) => {
      const matches = childrenNamed(node, field.name);
      if (field.type.type === "LIST") {
        return { name: field.name, value: this.extractListField(matches, field.type.element, level) };
      }
      const [first] = matches;
      if (first) {
        return { name: field.name, value: this.extractValue(first, field.type, level) };
      }
      const attribute = node.attribute(field.name);
      if (attribute !== undefined && isScalarType(field.type)) {
        return { name: field.name, value: convertToValue(attribute, field.type) };
      }
      if (field.name === this.options.textContentKey) {
        return { name: field.name, value: convertToValue(cleanText(node.text), field.type) };
      }
      return { name: field.name, value: missingValue(field.type) };
    });

    return { type: "RECORD", fields };
  }

  /**
   * Every element child of `node`, whatever its name, as `elementType`
   */
  extractList(node: TreeNode, elementType: SemanticType, depth = 0): TypedValue {
    const level = this.enter(depth);
    return {
      type: "LIST",
      element: elementType,
      items: node.children.map((child) => this.extractValue(child, elementType, level)),
    };
  }

  /**
   * Same-named siblings as list items
   */
  gatherList(matches: readonly TreeNode[], elementType: SemanticType, depth = 0): TypedValue {
    const level = this.enter(depth);
    return {
      type: "LIST",
      element: elementType,
      items: matches.map((match) => this.extractValue(match, elementType, level)),
    };
  }

  /**
   * LIST value from the matches of a field name: several matches are the
   * items; a single match is either a container of the items or one item.
   * A single childless, textless match is an empty container.
   */
  extractListField(
    matches: readonly TreeNode[],
    elementType: SemanticType,
    depth = 0,
  ): TypedValue {
    const [first, ...rest] = matches;
    if (first && rest.length === 0) {
      if (isEmptyElement(first)) {
        this.enter(depth);
        return { type: "LIST", element: elementType, items: [] };
      }
      if (looksLikeListContainer(first, elementType)) {
        return this.extractList(first, elementType, depth);
      }
    }
    return this.gatherList(matches, elementType, depth);
  }
}

export function extractValue(
  node: TreeNode,
  type: SemanticType,
  options: Partial<ExtractionOptions> = {},
): TypedValue {
  return new Materializer(options).extractValue(node, type);
}

export function extractRecord(
  node: TreeNode,
  type: RecordType,
  options: Partial<ExtractionOptions> = {},
): TypedValue {
  return new Materializer(options).extractRecord(node, type);
}

export function extractList(
  node: TreeNode,
  elementType: SemanticType,
  options: Partial<ExtractionOptions> = {},
): TypedValue {
  return new Materializer(options).extractList(node, elementType);
}
