/**
 * Path selectors for anchors and records
 *
 * Supported forms:
 *   item        any descendant named "item" (same as //item)
 *   /rss/channel absolute path from the document
 *   channel/item descendant "channel", then its "item" children
 *   //a//b      descendant axis between steps
 *   *           any element name
 */

import type { TreeNode } from "./types.js";
import { ConfigError } from "../../utils/errors.js";

export interface SelectorStep {
  axis: "child" | "descendant";
  test: string;
}

export interface ParsedSelector {
  absolute: boolean;
  steps: SelectorStep[];
}

const NAME_TEST = /^[^\s@/[\]()='"]+$/;

export function parseSelector(selector: string): ParsedSelector {
  const source = selector.trim();
  if (source === "") {
    throw new ConfigError("Selector must not be empty");
  }
  if (source === ".") {
    return { absolute: false, steps: [] };
  }

  const absolute = source.startsWith("/");
  const parts = source.split("/");
  const steps: SelectorStep[] = [];
  let axis: SelectorStep["axis"] = absolute ? "child" : "descendant";

  for (let i = absolute ? 1 : 0; i < parts.length; i++) {
    const part = parts[i] ?? "";
    if (part === "") {
      if (i === parts.length - 1) {
        throw new ConfigError(`Selector must not end with "/": ${selector}`);
      }
      axis = "descendant";
      continue;
    }
    if (part === ".") {
      continue;
    }
    if (!NAME_TEST.test(part)) {
      throw new ConfigError(`Invalid selector step "${part}" in ${selector}`);
    }
    steps.push({ axis, test: part });
    axis = "child";
  }

  if (steps.length === 0) {
    throw new ConfigError(`Selector matches no element: ${selector}`);
  }
  return { absolute, steps };
}

function* descendants(node: TreeNode): Generator<TreeNode> {
  for (const child of node.children) {
    yield child;
    yield* descendants(child);
  }
}

function topmost(node: TreeNode): TreeNode {
  let current = node;
  while (current.parent) {
    current = current.parent;
  }
  return current;
}

/**
 * All nodes matching `selector`, in document order
 */
export function selectNodes(context: TreeNode, selector: string): TreeNode[] {
  const { absolute, steps } = parseSelector(selector);
  let current: TreeNode[] = [absolute ? topmost(context) : context];

  for (const step of steps) {
    const next: TreeNode[] = [];
    const seen = new Set<TreeNode>();
    for (const node of current) {
      const candidates = step.axis === "child" ? node.children : descendants(node);
      for (const candidate of candidates) {
        if ((step.test === "*" || candidate.name === step.test) && !seen.has(candidate)) {
          seen.add(candidate);
          next.push(candidate);
        }
      }
    }
    current = next;
  }

  return current;
}

export function selectFirst(context: TreeNode, selector: string): TreeNode | null {
  return selectNodes(context, selector)[0] ?? null;
}
