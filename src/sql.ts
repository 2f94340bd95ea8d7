// src/sql.ts
// SQL verb cheat sheet: verbs grouped by sub-language, loaded from a text file
// (one `VERB|CATEGORY|summary|example` line per verb).

import { promises as fs } from "fs";
import * as path from "path";
import { code, renderTable } from "./markdown.js";

export type SqlCategory = "DDL" | "DML" | "DQL" | "DCL" | "TCL";

export const SQL_CATEGORIES: readonly SqlCategory[] = ["DDL", "DML", "DQL", "DCL", "TCL"];

export const CATEGORY_INFO: Readonly<Record<SqlCategory, { expansion: string; mnemonic: string }>> = {
  DDL: { expansion: "Data Definition Language", mnemonic: "shapes the containers: CREATE, ALTER, DROP, TRUNCATE" },
  DML: { expansion: "Data Manipulation Language", mnemonic: "changes the contents: INSERT, UPDATE, DELETE, MERGE" },
  DQL: { expansion: "Data Query Language", mnemonic: "SELECT asks and never changes anything" },
  DCL: { expansion: "Data Control Language", mnemonic: "GRANT gives, REVOKE takes away" },
  TCL: { expansion: "Transaction Control Language", mnemonic: "BEGIN opens, COMMIT keeps, ROLLBACK forgets" },
};

export interface SqlVerb {
  verb: string;
  category: SqlCategory;
  summary: string;
  example: string;
}

function isCategory(s: string): s is SqlCategory {
  return SQL_CATEGORIES.some(c => c === s);
}

function isWord(token: string): boolean {
  return /^[A-Za-z_]/.test(token);
}

// index just past a parenthesized group opening at tokens[open]
function skipGroup(tokens: readonly string[], open: number): number {
  let depth = 0;
  for (let i = open; i < tokens.length; i++) {
    if (tokens[i] === "(") depth++;
    else if (tokens[i] === ")" && --depth === 0) return i + 1;
  }
  return tokens.length;
}

/**
 * Skip `[RECURSIVE] name [(columns)] AS [[NOT] MATERIALIZED] (body)`, comma
 * separated, starting just after WITH.
 * @returns index of the first token after the last CTE body
 */
function skipCommonTableExpressions(tokens: readonly string[], start: number): number {
  let i = start;
  if (tokens[i]?.toUpperCase() === "RECURSIVE") i++;
  for (;;) {
    i++; // name
    if (tokens[i] === "(") i = skipGroup(tokens, i);
    while (i < tokens.length && tokens[i] !== "(") i++; // AS, MATERIALIZED
    i = skipGroup(tokens, i);
    if (tokens[i] !== ",") return i;
    i++;
  }
}

/**
 * Immutable cheat sheet.
 *
 * AF: entries maps an uppercase verb to its row; iteration order is file order.
 * RI: every key equals its entry's verb; verbs match /^[A-Z]+( [A-Z]+)*$/.
 */
export class CheatSheet {
  private readonly entries: ReadonlyMap<string, SqlVerb>;
  // word count of the longest verb
  private readonly maxWords: number;

  private constructor(entries: ReadonlyMap<string, SqlVerb>) {
    this.entries = entries;
    this.maxWords = Math.max(1, ...[...entries.keys()].map(v => v.split(" ").length));
  }

  /**
   * Parse sheet text.
   * @param text file contents
   * @returns a new CheatSheet
   */
  public static parse(text: string): CheatSheet {
    const entries = new Map<string, SqlVerb>();
    const verbRe = /^[A-Z]+( [A-Z]+)*$/;
    const lines = text.replace(/\r\n?/g, "\n").split("\n");

    lines.forEach((raw, i) => {
      const lineNo = i + 1;
      const line = raw.trim();
      if (line.length === 0 || line.startsWith("#")) return;

      // anything past the third separator is example text, `||` included
      const fields = line.split("|");
      const [verb, category, summary] = fields.slice(0, 3).map(f => f.trim());
      const example = fields.slice(3).join("|").trim();
      if (verb === undefined || category === undefined || summary === undefined || fields.length < 4) {
        throw new Error(`Malformed line ${lineNo}: expected 'VERB|CATEGORY|summary|example'`);
      }
      if (!verbRe.test(verb)) throw new Error(`Malformed line ${lineNo}: invalid verb '${verb}'`);
      if (!isCategory(category)) throw new Error(`Malformed line ${lineNo}: unknown category '${category}'`);
      if (summary.length === 0 || example.length === 0) {
        throw new Error(`Malformed line ${lineNo}: summary and example must be nonempty`);
      }
      if (entries.has(verb)) throw new Error(`Malformed line ${lineNo}: duplicate verb '${verb}'`);

      entries.set(verb, { verb, category, summary, example });
    });

    return new CheatSheet(entries);
  }

  /**
   * @param filename path to a sheet file, resolved against the working directory
   * @returns a new CheatSheet
   */
  public static async parseFromFile(filename: string): Promise<CheatSheet> {
    const text = await fs.readFile(path.resolve(filename), "utf8");
    return CheatSheet.parse(text);
  }

  /** @returns number of verbs */
  public get size(): number { return this.entries.size; }

  /** @param verb any case @returns whether the sheet lists it */
  public has(verb: string): boolean { return this.entries.has(verb.trim().toUpperCase()); }

  /**
   * @param verb any case
   * @returns the sheet row for `verb`
   */
  public lookup(verb: string): SqlVerb {
    const entry = this.entries.get(verb.trim().toUpperCase());
    if (!entry) throw new Error(`Unknown SQL verb '${verb}'`);
    return entry;
  }

  /** @returns all rows in file order */
  public verbs(): SqlVerb[] { return [...this.entries.values()]; }

  /** @returns rows of one category in file order */
  public byCategory(category: SqlCategory): SqlVerb[] {
    return this.verbs().filter(v => v.category === category);
  }

  /**
   * Category of a statement, judged by its leading verb (the longest sheet
   * verb its first words spell). For `WITH ...`, the leading verb is the one
   * after the last common table expression.
   * @param statement SQL text
   * @returns category of the leading verb
   */
  public classify(statement: string): SqlCategory {
    const body = statement
      .split(/\r?\n/)
      .filter(l => !l.trim().startsWith("--"))
      .join("\n");
    const tokens = body.match(/[(),]|[A-Za-z_][A-Za-z0-9_]*/g) ?? [];
    const first = tokens[0];
    if (first === undefined) throw new Error("Empty SQL statement");

    if (first.toUpperCase() !== "WITH") return (this.verbAt(tokens, 0) ?? this.lookup(first)).category;

    const entry = this.verbAt(tokens, skipCommonTableExpressions(tokens, 1));
    if (!entry) throw new Error("No statement verb after WITH clause");
    return entry.category;
  }

  // longest sheet verb spelled by the words starting at tokens[start]
  private verbAt(tokens: readonly string[], start: number): SqlVerb | undefined {
    for (let n = Math.min(this.maxWords, tokens.length - start); n >= 1; n--) {
      const words = tokens.slice(start, start + n);
      if (!words.every(isWord)) continue;
      const entry = this.entries.get(words.join(" ").toUpperCase());
      if (entry) return entry;
    }
    return undefined;
  }

  /** @returns markdown, one section per nonempty category */
  public toMarkdown(): string {
    const sections: string[] = [];
    for (const category of SQL_CATEGORIES) {
      const rows = this.byCategory(category);
      if (rows.length === 0) continue;
      const info = CATEGORY_INFO[category];
      sections.push([
        `## ${category}: ${info.expansion}`,
        "",
        `_Mnemonic: ${info.mnemonic}_`,
        "",
        renderTable(["Verb", "Summary", "Example"], rows.map(r => [r.verb, r.summary, code(r.example)])),
      ].join("\n"));
    }
    return sections.join("\n\n");
  }

  /** @returns debug string */
  public toString(): string { return `CheatSheet(${this.size} verbs)`; }
}
