import assert from "node:assert";
import { renderTopic } from "../src/notes.js";

describe("renderTopic", () => {
  it("renders the combinator policy table", async () => {
    const lines = (await renderTopic("combinators")).split("\n");
    assert.equal(lines[0], "# Promise combinators");
    assert.ok(lines.includes(
      "| `Promise.all` | every unit to fulfill, or the first rejection | array of values in input order | reason of the first unit to reject | fulfills with [] |",
    ));
    assert.ok(lines.includes(
      "| `Promise.allSettled` | every unit to settle | array of {status, value \\| reason} in input order | never rejects | fulfills with [] |",
    ));
  });

  it("renders the pattern catalog", async () => {
    const md = await renderTopic("patterns");
    assert.ok(md.startsWith("# Design patterns\n\n## Creational\n"));
  });

  it("renders the SQL sheet from the default file", async () => {
    const md = await renderTopic("sql");
    assert.ok(md.startsWith("# SQL verbs\n\n## DDL: Data Definition Language\n"));
    assert.ok(md.split("\n").includes("| SELECT | Read rows, optionally filtered, joined, grouped and sorted | `SELECT name FROM users WHERE id = 1;` |"));
  });

  it("rejects unknown topics", async () => {
    await assert.rejects(renderTopic("music"), /Unknown topic 'music', expected one of: combinators, patterns, sql/);
  });

  it("rejects a missing sheet file", async () => {
    await assert.rejects(renderTopic("sql", "sheets/missing.txt"));
  });
});
