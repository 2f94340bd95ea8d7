import assert from "node:assert";
import { all, allSettled, any, ANY_REJECTED_MESSAGE, COMBINATOR_POLICIES, race } from "../src/combinators.js";
import { Deferred } from "../src/deferred.js";

/* -------- helpers -------- */

// let every queued promise reaction run
function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function track<T>(p: Promise<T>): { settled: () => boolean } {
  let done = false;
  p.then(() => { done = true; }, () => { done = true; });
  return { settled: () => done };
}

function* broken(): Generator<number> {
  throw new Error("iteration failed");
}

/* ================================= all ================================= */

describe("all", () => {
  it("fulfills in input order even when units settle out of order", async () => {
    const [a, b, c] = [new Deferred<number>(), new Deferred<number>(), new Deferred<number>()];
    const p = all([a.promise, b.promise, c.promise]);
    c.resolve(3);
    a.resolve(1);
    b.resolve(2);
    assert.deepStrictEqual(await p, [1, 2, 3]);
  });

  it("treats plain values as fulfilled units", async () => {
    const d = new Deferred<string>();
    const p = all([d.promise, "plain"]);
    d.resolve("later");
    assert.deepStrictEqual(await p, ["later", "plain"]);
  });

  it("fulfills with [] for empty input", async () => {
    assert.deepStrictEqual(await all([]), []);
  });

  it("waits until every unit has fulfilled", async () => {
    const [a, b] = [new Deferred<number>(), new Deferred<number>()];
    const p = all([a.promise, b.promise]);
    const t = track(p);
    a.resolve(1);
    await flush();
    assert.equal(t.settled(), false);
    b.resolve(2);
    await p;
    assert.equal(t.settled(), true);
  });

  it("rejects with the first rejection in time, not in input order", async () => {
    const [a, b] = [new Deferred<number>(), new Deferred<number>()];
    const first = new Error("second unit");
    const later = new Error("first unit");
    const p = all([a.promise, b.promise]);
    b.reject(first);
    a.reject(later);
    await assert.rejects(p, (err: unknown) => {
      assert.strictEqual(err, first);
      return true;
    });
  });

  it("rejects instead of throwing when iteration fails", async () => {
    await assert.rejects(all(broken()), /iteration failed/);
  });
});

/* ============================== allSettled ============================== */

describe("allSettled", () => {
  it("reports every outcome in input order", async () => {
    const [a, b] = [new Deferred<number>(), new Deferred<number>()];
    const reason = new Error("nope");
    const p = allSettled([a.promise, b.promise, 7]);
    b.reject(reason);
    a.resolve(1);
    assert.deepStrictEqual(await p, [
      { status: "fulfilled", value: 1 },
      { status: "rejected", reason },
      { status: "fulfilled", value: 7 },
    ]);
  });

  it("fulfills even when every unit rejects", async () => {
    const e1 = new Error("e1");
    const e2 = new Error("e2");
    const results = await allSettled([Promise.reject(e1), Promise.reject(e2)]);
    assert.deepStrictEqual(results.map(r => r.status), ["rejected", "rejected"]);
  });

  it("fulfills with [] for empty input", async () => {
    assert.deepStrictEqual(await allSettled([]), []);
  });

  it("rejects instead of throwing when iteration fails", async () => {
    await assert.rejects(allSettled(broken()), /iteration failed/);
  });
});

/* ================================= race ================================= */

describe("race", () => {
  it("fulfills with the first unit to settle", async () => {
    const [a, b] = [new Deferred<string>(), new Deferred<string>()];
    const p = race([a.promise, b.promise]);
    b.resolve("b");
    a.resolve("a");
    assert.equal(await p, "b");
  });

  it("rejects when the first unit to settle rejects", async () => {
    const [a, b] = [new Deferred<string>(), new Deferred<string>()];
    const reason = new Error("fast failure");
    const p = race([a.promise, b.promise]);
    a.reject(reason);
    b.resolve("slow success");
    await assert.rejects(p, /fast failure/);
  });

  it("lets a plain value beat a pending unit", async () => {
    const d = new Deferred<string>();
    assert.equal(await race([d.promise, "now"]), "now");
  });

  it("never settles for empty input", async () => {
    const t = track(race([]));
    await flush();
    assert.equal(t.settled(), false);
  });
});

/* ================================= any ================================= */

describe("any", () => {
  it("fulfills with the first fulfillment, ignoring earlier rejections", async () => {
    const [a, b, c] = [new Deferred<string>(), new Deferred<string>(), new Deferred<string>()];
    const p = any([a.promise, b.promise, c.promise]);
    a.reject(new Error("a failed"));
    c.resolve("c");
    b.resolve("b");
    assert.equal(await p, "c");
  });

  it("rejects with an AggregateError of reasons in input order", async () => {
    const [a, b] = [new Deferred<string>(), new Deferred<string>()];
    const ea = new Error("a failed");
    const eb = new Error("b failed");
    const p = any([a.promise, b.promise]);
    b.reject(eb);
    a.reject(ea);
    await assert.rejects(p, (err: unknown) => {
      assert.ok(err instanceof AggregateError);
      assert.equal(err.message, ANY_REJECTED_MESSAGE);
      assert.deepStrictEqual(err.errors, [ea, eb]);
      return true;
    });
  });

  it("rejects immediately for empty input", async () => {
    await assert.rejects(any([]), (err: unknown) => {
      assert.ok(err instanceof AggregateError);
      assert.deepStrictEqual(err.errors, []);
      return true;
    });
  });

  it("rejects instead of throwing when iteration fails", async () => {
    await assert.rejects(any(broken()), /iteration failed/);
  });
});

/* ========================= late rejections ========================= */

describe("rejections after the result has settled", () => {
  let unhandled = 0;
  const countUnhandled = () => { unhandled++; };

  beforeEach(() => {
    unhandled = 0;
    process.on("unhandledRejection", countUnhandled);
  });
  afterEach(() => { process.off("unhandledRejection", countUnhandled); });

  it("are consumed by every combinator", async () => {
    await assert.rejects(all([Promise.reject(new Error("first")), Promise.reject(new Error("second"))]), /first/);
    assert.equal(await any([Promise.resolve(1), Promise.reject(new Error("late"))]), 1);
    assert.equal(await race([Promise.resolve("won"), Promise.reject(new Error("lost"))]), "won");
    await allSettled([Promise.reject(new Error("recorded"))]);
    await new Promise((resolve) => setTimeout(resolve, 10));
    assert.equal(unhandled, 0);
  });
});

/* ============================ native agreement ============================ */

describe("agreement with the native combinators", () => {
  it("matches Promise.all and Promise.allSettled on the same units", async () => {
    const units = [Promise.resolve(1), 2, Promise.resolve(3)];
    assert.deepStrictEqual(await all(units), await Promise.all(units));
    const reason = new Error("x");
    const mixed = [Promise.resolve(1), Promise.reject(reason)];
    assert.deepStrictEqual(await allSettled(mixed), await Promise.allSettled(mixed));
  });

  it("matches Promise.any on all-rejected units", async () => {
    const e1 = new Error("1");
    const e2 = new Error("2");
    const units = [Promise.reject(e1), Promise.reject(e2)];
    const mine = await any(units).catch((err: unknown) => err);
    const theirs = await Promise.any(units).catch((err: unknown) => err);
    assert.ok(mine instanceof AggregateError && theirs instanceof AggregateError);
    assert.equal(mine.message, theirs.message);
    assert.deepStrictEqual(mine.errors, theirs.errors);
  });
});

describe("COMBINATOR_POLICIES", () => {
  it("describes each combinator once", () => {
    assert.deepStrictEqual(COMBINATOR_POLICIES.map(p => p.name), ["all", "allSettled", "race", "any"]);
  });
});
