/**
 * Reader module types
 */

import type { DocumentMode, NamespaceMode } from "../../types/config.js";
import type { TreeDocument } from "../tree/types.js";

export interface ReaderOptions {
  maximumFileSize: number; // Bytes
  ignoreErrors: boolean;
  mode: DocumentMode;
  namespaces: NamespaceMode;
}

export interface LoadedDocument {
  path: string;
  tree: TreeDocument;
}

export interface ReaderResult {
  documents: LoadedDocument[];
  skipped: { path: string; reason: string }[];
}
