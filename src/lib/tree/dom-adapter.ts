/**
 * Tree adapter over htmlparser2 / domhandler
 *
 * XML documents are checked for well-formedness first (fast-xml-parser's
 * validator); HTML documents are parsed leniently and never rejected.
 * Entities are left encoded by the parser so that serialization returns the
 * source markup verbatim; text and attribute values are decoded on read.
 */

import { parseDocument as parseDom } from "htmlparser2";
import {
  type AnyNode,
  type Document,
  type Element,
  isCDATA,
  isTag,
  isText,
} from "domhandler";
import render from "dom-serializer";
import { decodeHTML, decodeXML } from "entities";
import { XMLValidator } from "fast-xml-parser";
import type {
  NamespaceDeclaration,
  ParseOptions,
  TreeAttribute,
  TreeDocument,
  TreeNode,
} from "./types.js";
import { DocumentParseError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const XML_NAMESPACE = "http://www.w3.org/XML/1998/namespace";

const DEFAULT_PARSE_OPTIONS: ParseOptions = {
  mode: "xml",
  namespaces: "strip",
};

/**
 * Maps character offsets to 1-based line numbers
 */
class LineIndex {
  private readonly lineStarts: number[] = [0];

  constructor(source: string) {
    for (let i = 0; i < source.length; i++) {
      if (source.charCodeAt(i) === 10) {
        this.lineStarts.push(i + 1);
      }
    }
  }

  lineAt(offset: number): number {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      const start = this.lineStarts[mid] ?? 0;
      if (start <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low + 1;
  }
}

interface AdapterContext {
  options: ParseOptions;
  lines: LineIndex;
  decode: (text: string) => string;
}

function splitQualifiedName(name: string): { prefix: string; local: string } {
  const colon = name.indexOf(":");
  return colon === -1
    ? { prefix: "", local: name }
    : { prefix: name.slice(0, colon), local: name.slice(colon + 1) };
}

function isNamespaceDeclaration(name: string): boolean {
  return name === "xmlns" || name.startsWith("xmlns:");
}

class DomTreeNode implements TreeNode {
  private childCache?: DomTreeNode[];
  private attributeCache?: TreeAttribute[];
  private nameCache?: string;

  constructor(
    private readonly node: Element | Document,
    readonly parent: DomTreeNode | null,
    private readonly context: AdapterContext,
  ) {}

  get name(): string {
    if (this.nameCache === undefined) {
      this.nameCache = isTag(this.node)
        ? this.qualify(this.node.name, true)
        : "#document";
    }
    return this.nameCache;
  }

  get line(): number {
    return this.node.startIndex === null
      ? 1
      : this.context.lines.lineAt(this.node.startIndex);
  }

  get children(): readonly TreeNode[] {
    if (!this.childCache) {
      this.childCache = this.node.children
        .filter(isTag)
        .map((child) => new DomTreeNode(child, this, this.context));
    }
    return this.childCache;
  }

  get text(): string {
    let text = "";
    for (const child of this.node.children) {
      if (isText(child)) {
        text += this.context.decode(child.data);
      } else if (isCDATA(child)) {
        for (const inner of child.children) {
          if (isText(inner)) {
            text += inner.data;
          }
        }
      }
    }
    return text;
  }

  get attributes(): readonly TreeAttribute[] {
    if (!this.attributeCache) {
      const { namespaces } = this.context.options;
      const raw = isTag(this.node) ? Object.entries(this.node.attribs) : [];
      this.attributeCache = raw
        .filter(([name]) => namespaces === "keep" || !isNamespaceDeclaration(name))
        .map(([name, value]) => ({
          name: this.qualify(name, false),
          value: this.context.decode(value),
        }));
    }
    return this.attributeCache;
  }

  get namespaceDeclarations(): readonly NamespaceDeclaration[] {
    if (!isTag(this.node)) {
      return [];
    }
    return Object.entries(this.node.attribs)
      .filter(([name]) => isNamespaceDeclaration(name))
      .map(([name, uri]) => ({
        prefix: name === "xmlns" ? "" : name.slice("xmlns:".length),
        uri,
      }));
  }

  attribute(name: string): string | undefined {
    return this.attributes.find((attr) => attr.name === name)?.value;
  }

  outerXml(): string {
    return render(this.node, this.renderOptions());
  }

  innerXml(): string {
    return render(this.node.children, this.renderOptions());
  }

  private renderOptions() {
    return { xmlMode: this.context.options.mode === "xml", encodeEntities: false };
  }

  /**
   * Apply the namespace mode to an element or attribute name. Unprefixed
   * attributes never take the default namespace.
   */
  private qualify(rawName: string, isElement: boolean): string {
    const { namespaces } = this.context.options;
    if (namespaces === "keep") {
      return rawName;
    }
    const { prefix, local } = splitQualifiedName(rawName);
    if (namespaces === "strip") {
      return local;
    }
    if (prefix === "" && !isElement) {
      return local;
    }
    const uri = this.lookupNamespace(prefix);
    if (uri === undefined || uri === "") {
      return rawName;
    }
    return `{${uri}}${local}`;
  }

  private lookupNamespace(prefix: string): string | undefined {
    if (prefix === "xml") {
      return XML_NAMESPACE;
    }
    const declaration = prefix === "" ? "xmlns" : `xmlns:${prefix}`;
    let current: AnyNode | null = this.node;
    while (current && isTag(current)) {
      const uri = current.attribs[declaration];
      if (uri !== undefined) {
        return uri;
      }
      current = current.parent;
    }
    return undefined;
  }
}

function ensureWellFormed(source: string): void {
  const result = XMLValidator.validate(source);
  if (result !== true) {
    const { code, msg, line, col } = result.err;
    throw new DocumentParseError(`Document is not well-formed XML: ${msg}`, {
      code,
      line,
      column: col,
    });
  }
}

/**
 * Parse raw markup into a TreeDocument
 *
 * @throws DocumentParseError when `mode` is "xml" and the source is not well-formed
 */
export function parseDocument(
  source: string,
  options: Partial<ParseOptions> = {},
): TreeDocument {
  const opts: ParseOptions = { ...DEFAULT_PARSE_OPTIONS, ...options };
  const xmlMode = opts.mode === "xml";

  if (xmlMode) {
    ensureWellFormed(source);
  }

  const dom = parseDom(source, {
    xmlMode,
    decodeEntities: false,
    withStartIndices: true,
  });

  const context: AdapterContext = {
    options: opts,
    lines: new LineIndex(source),
    decode: xmlMode ? decodeXML : decodeHTML,
  };

  const root = new DomTreeNode(dom, null, context);
  const topLevel = root.children;
  const documentElement = topLevel.length === 1 ? (topLevel[0] ?? null) : null;

  logger.debug("Parsed document", {
    mode: opts.mode,
    topLevelElements: topLevel.length,
  });

  return {
    root,
    documentElement,
    mode: opts.mode,
    sizeBytes: Buffer.byteLength(source, "utf-8"),
  };
}

export function isDocumentNode(node: TreeNode): boolean {
  return node.parent === null && node.name === "#document";
}
