import assert from "assert";
import { all, allSettled, any, COMBINATOR_POLICIES, race, type CombinatorName } from "./combinators.js";

type Outcome =
  | { status: "fulfilled", value: unknown }
  | { status: "rejected", reason: unknown };

interface Task { id: number; delayMs: number; fails: boolean; }

type Combinator = (values: Promise<string>[]) => Promise<unknown>;

const toy: Record<CombinatorName, Combinator> = { all, allSettled, race, any };
const native: Record<CombinatorName, Combinator> = {
  all: (v) => Promise.all(v),
  allSettled: (v) => Promise.allSettled(v),
  race: (v) => Promise.race(v),
  any: (v) => Promise.any(v),
};

/** Errors compare by message; AggregateErrors also by their inner errors. */
function describeReason(reason: unknown): unknown {
  if (reason instanceof AggregateError) {
    return { aggregate: reason.message, errors: reason.errors.map(describeReason) };
  }
  return reason instanceof Error ? reason.message : reason;
}

async function outcomeOf(p: Promise<unknown>): Promise<Outcome> {
  try {
    return { status: "fulfilled", value: await p };
  } catch (reason) {
    return { status: "rejected", reason: describeReason(reason) };
  }
}

/**
 * Run every combinator, toy and native side by side over the same randomly
 * delayed (and sometimes failing) units, and check that they agree.
 */
async function simulationMain(): Promise<void> {
  const rounds = 200;
  const maxTasks = 6;
  const failureRate = 0.3;

  const stats = {
    startTime: Date.now(),
    startMemory: process.memoryUsage().heapUsed,
    rounds: 0,
    comparisons: 0,
    fulfilled: 0,
    rejected: 0,
    unhandledRejections: 0,
    mismatches: 0,
    byCombinator: new Map<CombinatorName, number>(),
  };

  const rejectionHandler = (reason: unknown) => {
    stats.unhandledRejections++;
    console.error("⚠️  Unhandled rejection:", reason);
  };
  process.on("unhandledRejection", rejectionHandler);

  // Delay between 0 and 5ms; ties are allowed and exercise same-tick ordering
  function randomTasks(): Task[] {
    const count = Math.floor(Math.random() * (maxTasks + 1));
    return Array.from({ length: count }, (_, id) => ({
      id,
      delayMs: Math.floor(Math.random() * 6),
      fails: Math.random() < failureRate,
    }));
  }

  function start(task: Task): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      setTimeout(() => {
        if (task.fails) reject(new Error(`task ${task.id} failed`));
        else resolve(`task ${task.id}`);
      }, task.delayMs);
    });
  }

  async function compare(name: CombinatorName, tasks: Task[]): Promise<void> {
    // race over nothing never settles
    if (name === "race" && tasks.length === 0) return;
    const units = tasks.map(start);
    const [mine, theirs] = await Promise.all([outcomeOf(toy[name](units)), outcomeOf(native[name](units))]);
    stats.comparisons++;
    stats.byCombinator.set(name, (stats.byCombinator.get(name) ?? 0) + 1);
    if (mine.status === "fulfilled") stats.fulfilled++; else stats.rejected++;
    try {
      assert.deepStrictEqual(mine, theirs);
    } catch (error) {
      stats.mismatches++;
      console.error(`❌ ${name} disagrees on ${JSON.stringify(tasks)}`);
      throw error;
    }
  }

  console.log("🔀 Starting promise combinator simulation...");
  console.log(`   Rounds: ${rounds}`);
  console.log(`   Units per round: 0..${maxTasks}`);
  console.log(`   Failure rate: ${Math.round(failureRate * 100)}%`);
  console.log("");

  try {
    for (let round = 0; round < rounds; round++) {
      const tasks = randomTasks();
      await Promise.all(COMBINATOR_POLICIES.map(({ name }) => compare(name, tasks)));
      stats.rounds++;
    }

    const duration = (Date.now() - stats.startTime) / 1000;
    const memoryDelta = (process.memoryUsage().heapUsed - stats.startMemory) / 1024 / 1024;

    console.log("═══════════════════════════════════════════════════");
    console.log("✅ SIMULATION COMPLETED SUCCESSFULLY");
    console.log("═══════════════════════════════════════════════════");
    console.log("");
    console.log("📊 STATISTICS:");
    console.log("─────────────────────────────────────────────────");
    console.log(`   Rounds:                 ${stats.rounds}`);
    console.log(`   Comparisons:            ${stats.comparisons}`);
    console.log(`   Fulfilled outcomes:     ${stats.fulfilled} (${Math.round(stats.fulfilled / stats.comparisons * 100)}%)`);
    console.log(`   Rejected outcomes:      ${stats.rejected} (${Math.round(stats.rejected / stats.comparisons * 100)}%)`);
    console.log(`   Duration:               ${duration.toFixed(2)}s`);
    console.log("");

    console.log("🔍 OBSERVATIONS:");
    console.log("─────────────────────────────────────────────────");
    console.log(`   ${stats.mismatches === 0 ? "✅" : "❌"} Toy and native combinators agree (${stats.mismatches} mismatches)`);
    console.log(`   ${stats.unhandledRejections === 0 ? "✅" : "❌"} No unhandled rejections (${stats.unhandledRejections} detected)`);
    console.log(`   ${Math.abs(memoryDelta) < 50 ? "✅" : "⚠️ "} Memory ${memoryDelta > 0 ? "+" : ""}${memoryDelta.toFixed(2)}MB`);
    console.log("");

    console.log("📋 COMPARISONS PER COMBINATOR:");
    console.log("─────────────────────────────────────────────────");
    for (const [name, count] of stats.byCombinator) {
      console.log(`   ${name}: ${count}`);
    }
    console.log("");
    console.log("═══════════════════════════════════════════════════");
  } catch (error) {
    console.error("❌ SIMULATION FAILED:", error);
    throw error;
  } finally {
    process.off("unhandledRejection", rejectionHandler);
  }
}

simulationMain().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
