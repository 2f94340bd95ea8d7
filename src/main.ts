#!/usr/bin/env node
// src/main.ts
// notes <combinators|patterns|sql> [sheet-file]

import { DEFAULT_SHEET, renderTopic, TOPICS } from "./notes.js";

async function main(): Promise<void> {
  const [topic, sheetFile = DEFAULT_SHEET] = process.argv.slice(2);
  if (topic === undefined) {
    console.error(`Usage: notes <${TOPICS.join("|")}> [sheet-file]`);
    process.exit(1);
  }
  console.log(await renderTopic(topic, sheetFile));
}

main().catch((error) => {
  console.error("Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
