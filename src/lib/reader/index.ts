/**
 * Reader module - loads and parses documents from disk
 */

import { readFile, stat } from "fs/promises";
import type { LoadedDocument, ReaderOptions, ReaderResult } from "./types.js";
import { parseDocument } from "../tree/dom-adapter.js";
import { FileIOError, toXmlTabError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";

export const DEFAULT_MAXIMUM_FILE_SIZE = 16 * 1024 * 1024;

const DEFAULT_OPTIONS: ReaderOptions = {
  maximumFileSize: DEFAULT_MAXIMUM_FILE_SIZE,
  ignoreErrors: false,
  mode: "xml",
  namespaces: "strip",
};

async function loadDocument(path: string, options: ReaderOptions): Promise<LoadedDocument> {
  let size: number;
  try {
    size = (await stat(path)).size;
  } catch (error) {
    throw new FileIOError(`Failed to read file: ${path}`, { path }, { cause: error });
  }
  if (size > options.maximumFileSize) {
    throw new FileIOError(`File exceeds maximum size of ${options.maximumFileSize} bytes: ${path}`, {
      path,
      size,
      maximumFileSize: options.maximumFileSize,
    });
  }

  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read file: ${path}`, { path }, { cause: error });
  }

  return {
    path,
    tree: parseDocument(content, { mode: options.mode, namespaces: options.namespaces }),
  };
}

/**
 * Read and parse documents in order. With `ignoreErrors`, unreadable or
 * malformed files are logged and skipped; otherwise the first failure throws.
 */
export async function readDocuments(
  paths: readonly string[],
  options: Partial<ReaderOptions> = {},
): Promise<ReaderResult> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const result: ReaderResult = { documents: [], skipped: [] };

  for (const path of paths) {
    try {
      result.documents.push(await loadDocument(path, opts));
    } catch (error) {
      const wrapped = toXmlTabError(error);
      if (!opts.ignoreErrors) {
        throw wrapped;
      }
      logger.warn("Skipping document", { path, code: wrapped.code, message: wrapped.message });
      result.skipped.push({ path, reason: wrapped.message });
    }
  }

  logger.info("Documents loaded", {
    loaded: result.documents.length,
    skipped: result.skipped.length,
  });
  return result;
}
