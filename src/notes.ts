// src/notes.ts
// Renders one notes topic as markdown.

import { COMBINATOR_POLICIES } from "./combinators.js";
import { code, renderTable } from "./markdown.js";
import { renderCatalog } from "./patterns/catalog.js";
import { CheatSheet } from "./sql.js";

export type Topic = "combinators" | "patterns" | "sql";

export const TOPICS: readonly Topic[] = ["combinators", "patterns", "sql"];

/** Sheet file used when none is given, relative to the working directory. */
export const DEFAULT_SHEET = "sheets/sql-verbs.txt";

function isTopic(s: string): s is Topic {
  return TOPICS.some(t => t === s);
}

function renderCombinators(): string {
  const rows = COMBINATOR_POLICIES.map(p => [code(`Promise.${p.name}`), p.waitsFor, p.fulfillsWith, p.rejectsWith, p.emptyInput]);
  return [
    "# Promise combinators",
    "",
    "A unit settles once: fulfilled with a value or rejected with a reason, and never changes after that.",
    "",
    renderTable(["Combinator", "Waits for", "Fulfills with", "Rejects with", "Empty input"], rows),
  ].join("\n");
}

/**
 * @param topic one of TOPICS
 * @param sheetFile cheat sheet to load for the sql topic
 * @returns markdown for `topic`
 */
export async function renderTopic(topic: string, sheetFile: string = DEFAULT_SHEET): Promise<string> {
  if (!isTopic(topic)) throw new Error(`Unknown topic '${topic}', expected one of: ${TOPICS.join(", ")}`);
  switch (topic) {
    case "combinators":
      return renderCombinators();
    case "patterns":
      return `# Design patterns\n\n${renderCatalog()}`;
    case "sql": {
      const sheet = await CheatSheet.parseFromFile(sheetFile);
      return `# SQL verbs\n\n${sheet.toMarkdown()}`;
    }
  }
}
