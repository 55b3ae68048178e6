/**
 * XmlTab facade - parse, infer and extract over a source string
 */

import type { ExplicitColumn } from "../../types/data-model.js";
import type { DocumentMode, SchemaOptions } from "../../types/config.js";
import type { TreeDocument } from "../tree/types.js";
import type { InferencerResult } from "../inferencer/types.js";
import type { ExtractionResult } from "../extractor/types.js";
import { parseDocument } from "../tree/dom-adapter.js";
import { Inferencer } from "../inferencer/index.js";
import { Extractor } from "../extractor/index.js";
import { resolveSchemaOptions } from "../../utils/config-loader.js";

export interface XmlTabOptions extends Partial<SchemaOptions> {
  mode?: DocumentMode;
}

/**
 * @example
 * const xmltab = new XmlTab({ depthLimit: 3 });
 * const { columnNames, rows } = xmltab.extract("<feed><entry><id>1</id></entry></feed>");
 */
export class XmlTab {
  private readonly mode: DocumentMode;
  private readonly options: SchemaOptions;

  constructor({ mode = "xml", ...options }: XmlTabOptions = {}) {
    this.mode = mode;
    this.options = resolveSchemaOptions(options);
  }

  parse(source: string): TreeDocument {
    return parseDocument(source, { mode: this.mode, namespaces: this.options.namespaces });
  }

  infer(source: string): InferencerResult {
    return new Inferencer(this.options).infer(this.parse(source));
  }

  /**
   * Rows against `columns` when given, else against the inferred schema
   */
  extract(source: string, columns?: readonly ExplicitColumn[]): ExtractionResult {
    const tree = this.parse(source);
    const extractor = new Extractor(this.options);
    if (columns) {
      return extractor.extractWithSchema(tree, columns);
    }
    return extractor.extract(tree, new Inferencer(this.options).infer(tree).columns);
  }
}
