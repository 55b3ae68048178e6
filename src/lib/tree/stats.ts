/**
 * Document statistics
 */

import type { DocumentStats, TreeDocument, TreeNode } from "./types.js";

export function computeDocumentStats(tree: TreeDocument): DocumentStats {
  const stats: DocumentStats = {
    elementCount: 0,
    attributeCount: 0,
    maxDepth: 0,
    namespaceCount: 0,
    sizeBytes: tree.sizeBytes,
  };

  const visit = (node: TreeNode, depth: number): void => {
    stats.elementCount++;
    stats.attributeCount += node.attributes.length;
    stats.namespaceCount += node.namespaceDeclarations.length;
    stats.maxDepth = Math.max(stats.maxDepth, depth);
    for (const child of node.children) {
      visit(child, depth + 1);
    }
  };

  for (const element of tree.root.children) {
    visit(element, 1);
  }

  return stats;
}
