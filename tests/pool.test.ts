import { expect, test } from "vitest";

import {
  Arena,
  ArenaPool,
  HtmlBuilder,
  InvalidHandleError,
  PoolError,
  type TraceEvent,
  renderDocument
} from "../src/public/mod.js";

test("pool: a released arena is reset and handed out again", () => {
  const pool = new ArenaPool();
  const arena = pool.acquire();
  const handle = new HtmlBuilder(arena).p(null, "x");

  pool.release(arena);
  expect(pool.idleCount).toBe(1);
  expect(() => arena.resolve(handle)).toThrow(InvalidHandleError);

  const again = pool.acquire();
  expect(again).toBe(arena);
  expect(again.size).toBe(0);
  expect(pool.leasedCount).toBe(1);
  expect(pool.idleCount).toBe(0);
});

test("pool: arenas carry the pool's options", () => {
  const pool = new ArenaPool({ validate: false, budgets: { maxNodes: 1 } });
  const arena = pool.acquire();

  expect(arena.validate).toBe(false);
  arena.allocate({ kind: "text", value: "a" });
  expect(() => arena.allocate({ kind: "text", value: "b" })).toThrow("Budget exceeded: maxNodes limit=1 actual=2");
});

test("pool: releasing an arena the pool does not lease fails", () => {
  const pool = new ArenaPool();
  const stranger = new Arena();
  const arena = pool.acquire();
  pool.release(arena);

  expect(() => pool.release(stranger)).toThrow(PoolError);
  expect(() => pool.release(arena)).toThrow(`Pool misuse: ARENA_NOT_LEASED arena=${String(arena.id)}`);
});

test("pool: idle arenas are capped and worn-out arenas dropped", () => {
  const events: TraceEvent[] = [];
  const pool = new ArenaPool({ maxIdle: 1, maxGenerations: 2, onTrace: (event) => events.push(event) });
  const first = pool.acquire();
  const second = pool.acquire();

  pool.release(first);
  pool.release(second);
  expect(pool.idleCount).toBe(1);

  const reused = pool.acquire();
  expect(reused).toBe(first);
  pool.release(reused);
  expect(pool.idleCount).toBe(0);

  const releases = events.filter((event) => event.kind === "pool-release");
  expect(releases.map((event) => (event.kind === "pool-release" ? event.reason : ""))).toEqual([
    "pooled",
    "pool-full",
    "generation-limit"
  ]);
  expect(events.map((event) => event.seq)).toEqual(events.map((_, index) => index + 1));
  expect(events[0]).toEqual({ seq: 1, kind: "pool-acquire", arenaId: first.id, reused: false });
});

test("pool: withArena releases after success and after failure", () => {
  const pool = new ArenaPool();

  const size = pool.withArena((arena) => {
    new HtmlBuilder(arena).br();
    return arena.size;
  });
  expect(size).toBe(1);
  expect(pool.leasedCount).toBe(0);

  expect(() =>
    pool.withArena((arena) => new HtmlBuilder(arena).ul(null, "not allowed"))
  ).toThrow("Schema validation failed: DISALLOWED_CHILD tag=ul child=#text index=0 allowed=[li, script, template]");
  expect(pool.leasedCount).toBe(0);
  expect(pool.idleCount).toBe(1);
});

test("pool: withArenaAsync releases once the promise settles", async () => {
  const pool = new ArenaPool();

  const html = await pool.withArenaAsync(async (arena) => {
    await Promise.resolve();
    expect(pool.leasedCount).toBe(1);
    return arena.size;
  });

  expect(html).toBe(0);
  expect(pool.leasedCount).toBe(0);
  await expect(pool.withArenaAsync(() => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
  expect(pool.leasedCount).toBe(0);
});

test("pool: renderDocument builds and serializes in a leased arena", () => {
  const pool = new ArenaPool();

  const output = renderDocument(
    pool,
    (html) => html.html(null, html.head(null, html.title(null, "T")), html.body(null, "hi")),
    { doctype: true }
  );

  expect(output).toBe("<!DOCTYPE html>\n<html><head><title>T</title></head><body>hi</body></html>");
  expect(pool.idleCount).toBe(1);
});
