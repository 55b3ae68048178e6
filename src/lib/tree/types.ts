/**
 * Tree adapter types - the node interface the inference core consumes
 */

import type { DocumentMode, NamespaceMode } from "../../types/config.js";

export interface TreeAttribute {
  readonly name: string;
  readonly value: string;
}

export interface NamespaceDeclaration {
  readonly prefix: string; // "" for the default namespace
  readonly uri: string;
}

/**
 * Read-only view of one element
 */
export interface TreeNode {
  readonly name: string;
  readonly attributes: readonly TreeAttribute[];
  /** Element children in document order */
  readonly children: readonly TreeNode[];
  /** Direct (non-descendant) text, entities decoded, not trimmed */
  readonly text: string;
  readonly line: number;
  readonly parent: TreeNode | null;
  readonly namespaceDeclarations: readonly NamespaceDeclaration[];
  attribute(name: string): string | undefined;
  /** Serialization including the element's own tag */
  outerXml(): string;
  /** Serialization of the content only */
  innerXml(): string;
}

/**
 * A parsed document. `root` is the synthetic "#document" node whose
 * children are the top-level elements.
 */
export interface TreeDocument {
  readonly root: TreeNode;
  readonly documentElement: TreeNode | null;
  readonly mode: DocumentMode;
  readonly sizeBytes: number;
}

export interface ParseOptions {
  mode: DocumentMode;
  namespaces: NamespaceMode;
}

export interface DocumentStats {
  elementCount: number;
  attributeCount: number;
  maxDepth: number;
  namespaceCount: number;
  sizeBytes: number;
}
