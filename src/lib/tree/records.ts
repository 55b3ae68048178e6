/**
 * Anchor and record resolution shared by inference and extraction
 */

import type { SchemaOptions } from "../../types/config.js";
import type { TreeDocument, TreeNode } from "./types.js";
import { selectFirst, selectNodes } from "./selector.js";
import { logger } from "../../utils/logger.js";

export interface RecordSet {
  anchor: TreeNode;
  anchorName: string;
  records: TreeNode[];
}

/**
 * Resolve the anchor and the record nodes (one row each).
 *
 * The anchor is the first match of `rootSelector`, falling back to the
 * document element. Records are the anchor's element children, or every
 * match of `recordSelector` below the anchor when one is given.
 */
export function resolveRecords(
  tree: TreeDocument,
  options: Pick<SchemaOptions, "rootSelector" | "recordSelector">,
): RecordSet {
  const defaultAnchor = tree.documentElement ?? tree.root;
  let anchor = defaultAnchor;

  if (options.rootSelector) {
    const match = selectFirst(tree.root, options.rootSelector);
    if (match) {
      anchor = match;
    } else {
      logger.warn("Root selector matched nothing, using the document element", {
        rootSelector: options.rootSelector,
      });
    }
  }

  if (options.recordSelector) {
    const records = selectNodes(anchor, options.recordSelector);
    const parentName = records[0]?.parent?.name;
    return {
      anchor,
      anchorName: parentName ?? anchor.name,
      records,
    };
  }

  return { anchor, anchorName: anchor.name, records: [...anchor.children] };
}
