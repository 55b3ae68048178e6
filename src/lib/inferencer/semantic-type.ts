/**
 * Textual notation for semantic types, e.g.
 * `LIST<RECORD<title: STRING, views: INTEGER>>`
 */

import {
  listOf,
  recordOf,
  scalar,
  type RecordField,
  type ScalarTypeName,
  type SemanticType,
} from "../../types/data-model.js";
import { ConfigError } from "../../utils/errors.js";

const TYPE_ALIASES: ReadonlyMap<string, ScalarTypeName> = new Map([
  ["BOOLEAN", "BOOLEAN"],
  ["BOOL", "BOOLEAN"],
  ["INTEGER", "INTEGER"],
  ["INT", "INTEGER"],
  ["INT4", "INTEGER"],
  ["BIGINT", "BIGINT"],
  ["INT8", "BIGINT"],
  ["LONG", "BIGINT"],
  ["DOUBLE", "DOUBLE"],
  ["FLOAT", "DOUBLE"],
  ["REAL", "DOUBLE"],
  ["DATE", "DATE"],
  ["TIME", "TIME"],
  ["TIMESTAMP", "TIMESTAMP"],
  ["DATETIME", "TIMESTAMP"],
  ["STRING", "STRING"],
  ["VARCHAR", "STRING"],
  ["TEXT", "STRING"],
  ["XML", "XML"],
  ["XML_FRAGMENT", "XML_FRAGMENT"],
]);

const PLAIN_FIELD_NAME = /^[A-Za-z_][\w.-]*$/;

function formatFieldName(name: string): string {
  return PLAIN_FIELD_NAME.test(name) ? name : JSON.stringify(name);
}

/**
 * Render a semantic type in its canonical textual form
 */
export function formatSemanticType(type: SemanticType): string {
  switch (type.type) {
    case "LIST":
      return `LIST<${formatSemanticType(type.element)}>`;
    case "RECORD":
      return `RECORD<${type.fields
        .map((field) => `${formatFieldName(field.name)}: ${formatSemanticType(field.type)}`)
        .join(", ")}>`;
    default:
      return type.type;
  }
}

class SemanticTypeParser {
  private pos = 0;

  constructor(private readonly text: string) {}

  parse(): SemanticType {
    const type = this.parseType();
    this.skipWhitespace();
    if (this.pos < this.text.length) {
      this.fail(`Unexpected "${this.text.slice(this.pos)}"`);
    }
    return type;
  }

  private fail(message: string): never {
    throw new ConfigError(`Invalid type "${this.text}": ${message}`, {
      type: this.text,
      position: this.pos,
    });
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text.charAt(this.pos))) {
      this.pos++;
    }
  }

  private peek(): string {
    this.skipWhitespace();
    return this.text.charAt(this.pos);
  }

  private expect(char: string): void {
    if (this.peek() !== char) {
      this.fail(`expected "${char}" at position ${this.pos}`);
    }
    this.pos++;
  }

  private readIdentifier(): string {
    this.skipWhitespace();
    const match = /^[A-Za-z_][\w.-]*/.exec(this.text.slice(this.pos));
    if (!match) {
      this.fail(`expected a name at position ${this.pos}`);
    }
    this.pos += match[0].length;
    return match[0];
  }

  private readFieldName(): string {
    if (this.peek() !== '"') {
      return this.readIdentifier();
    }
    const match = /^"(?:[^"\\]|\\.)*"/.exec(this.text.slice(this.pos));
    if (!match) {
      this.fail(`unterminated field name at position ${this.pos}`);
    }
    this.pos += match[0].length;
    const decoded: unknown = JSON.parse(match[0]);
    return typeof decoded === "string" ? decoded : match[0];
  }

  private parseType(): SemanticType {
    let type = this.parseBase();
    while (this.text.startsWith("[]", this.pos)) {
      this.pos += 2;
      type = listOf(type);
    }
    return type;
  }

  private parseBase(): SemanticType {
    const keyword = this.readIdentifier().toUpperCase();

    if (keyword === "LIST") {
      const close = this.open();
      const element = this.parseType();
      this.expect(close);
      return listOf(element);
    }

    if (keyword === "RECORD" || keyword === "STRUCT") {
      const close = this.open();
      const fields: RecordField[] = [];
      if (this.peek() !== close) {
        do {
          const name = this.readFieldName();
          if (this.peek() === ":") {
            this.pos++;
          }
          fields.push({ name, type: this.parseType() });
        } while (this.consume(","));
      }
      this.expect(close);
      return recordOf(fields);
    }

    const name = TYPE_ALIASES.get(keyword);
    if (!name) {
      this.fail(`unknown type "${keyword}"`);
    }
    return scalar(name);
  }

  private open(): string {
    const char = this.peek();
    if (char === "<") {
      this.pos++;
      return ">";
    }
    if (char === "(") {
      this.pos++;
      return ")";
    }
    return this.fail(`expected "<" at position ${this.pos}`);
  }

  private consume(char: string): boolean {
    if (this.peek() === char) {
      this.pos++;
      return true;
    }
    return false;
  }
}

/**
 * Parse the textual form of a semantic type. Accepts aliases such as
 * VARCHAR, INT, FLOAT, BOOL and STRUCT, `T[]` for `LIST<T>`, and either
 * `<...>` or `(...)` around type arguments.
 *
 * @throws {ConfigError} On malformed input or an unknown type name
 */
export function parseSemanticType(text: string): SemanticType {
  return new SemanticTypeParser(text).parse();
}
