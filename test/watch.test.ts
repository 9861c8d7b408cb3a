import { describe, it } from "node:test";
import assert from "node:assert";
import { type ChangeRecord, createChangeDataCache, watch } from "../src/index.js";
import { nextBatch } from "./helpers.js";

function paths(records: ChangeRecord[]): string[] {
  return records.map((record) => record.path.toDotted());
}

describe("watch", () => {
  describe("callback-based watching", () => {
    it("should call callback for each recorded change", () => {
      const cache = createChangeDataCache({ base: { money: 100 } });
      const base = cache.getMapping("base");

      const calls: ChangeRecord[] = [];
      watch(cache, (record) => {
        calls.push(record);
      });

      base.set("money", 5);
      base.delete("money");

      assert.deepStrictEqual(paths(calls), ["base.money", "base.money"]);
      assert.deepStrictEqual(
        calls.map((record) => record.kind),
        ["set", "delete"],
      );
      assert.strictEqual(calls[0], cache.log[0]);
    });

    it("should allow unsubscribe", () => {
      const cache = createChangeDataCache({ base: { money: 100 } });
      const base = cache.getMapping("base");

      const calls: ChangeRecord[] = [];
      const handle = watch(cache, (record) => {
        calls.push(record);
      });

      base.set("money", 1);
      assert.strictEqual(calls.length, 1);

      handle.unsubscribe();

      base.set("money", 2);
      assert.strictEqual(calls.length, 1); // No new call after unsubscribe
    });

    it("should support multiple watchers", () => {
      const cache = createChangeDataCache({ base: { money: 100 } });

      const calls1: ChangeRecord[] = [];
      const calls2: ChangeRecord[] = [];

      watch(cache, (record) => calls1.push(record));
      watch(cache, (record) => calls2.push(record));

      cache.updateData("base.money", 7);

      assert.strictEqual(calls1.length, 1);
      assert.strictEqual(calls2.length, 1);
    });

    it("should not call back while tracking is stopped", () => {
      const cache = createChangeDataCache({ base: { money: 100 } });

      const calls: ChangeRecord[] = [];
      watch(cache, (record) => calls.push(record));

      cache.stopTracking();
      cache.updateData("base.money", 7);

      assert.strictEqual(calls.length, 0);
    });

    it("should keep caches apart", () => {
      const first = createChangeDataCache({ base: { money: 100 } });
      const second = createChangeDataCache({ base: { money: 100 } });

      const calls: ChangeRecord[] = [];
      watch(first, (record) => calls.push(record));

      second.updateData("base.money", 7);

      assert.strictEqual(calls.length, 0);
    });
  });

  describe("async iterator watching", () => {
    it("should coalesce records made before the consumer asks", async () => {
      const cache = createChangeDataCache({ base: {} });
      const base = cache.getMapping("base");
      const watcher = watch(cache);

      base.set("a", 1);
      base.set("b", 2);

      assert.deepStrictEqual(paths(await nextBatch(watcher)), ["base.a", "base.b"]);
      watcher.unsubscribe();
    });

    it("should yield one batch per record without coalescing", async () => {
      const cache = createChangeDataCache({ base: {} });
      const base = cache.getMapping("base");
      const watcher = watch(cache, { coalesce: false });

      base.set("a", 1);
      base.set("b", 2);

      assert.deepStrictEqual(paths(await nextBatch(watcher)), ["base.a"]);
      assert.deepStrictEqual(paths(await nextBatch(watcher)), ["base.b"]);
      watcher.unsubscribe();
    });

    it("should resolve a waiting consumer with the next record", async () => {
      const cache = createChangeDataCache({ items: [] });
      const watcher = watch(cache);

      const waiting = nextBatch(watcher);
      cache.getSequence("items").push("x");

      const batch = await waiting;
      assert.deepStrictEqual(paths(batch), ["items.0"]);
      assert.strictEqual(batch[0].created, true);
      watcher.unsubscribe();
    });

    it("should finish a waiting consumer on unsubscribe", async () => {
      const cache = createChangeDataCache({});
      const watcher = watch(cache);

      const waiting = watcher.next();
      watcher.unsubscribe();

      const result = await waiting;
      assert.strictEqual(result.done, true);
    });

    it("should serve consumers waiting at the same time in order", async () => {
      const cache = createChangeDataCache({ base: {} });
      const watcher = watch(cache);

      const first = nextBatch(watcher);
      const second = nextBatch(watcher);
      cache.updateData("base.a", 1);
      cache.updateData("base.b", 2);

      assert.deepStrictEqual(paths(await first), ["base.a"]);
      assert.deepStrictEqual(paths(await second), ["base.b"]);
      watcher.unsubscribe();
    });

    it("should finish every waiting consumer on unsubscribe", async () => {
      const cache = createChangeDataCache({});
      const watcher = watch(cache);

      const first = watcher.next();
      const second = watcher.next();
      watcher.unsubscribe();

      assert.strictEqual((await first).done, true);
      assert.strictEqual((await second).done, true);
    });

    it("should unsubscribe on dispose", async () => {
      const cache = createChangeDataCache({ base: {} });
      const watcher = watch(cache);
      const other = watch(cache);

      watcher[Symbol.dispose]();
      await other[Symbol.asyncDispose]();
      cache.updateData("base.a", 1);

      assert.strictEqual((await watcher.next()).done, true);
      assert.strictEqual((await other.next()).done, true);
    });

    it("should unsubscribe when a for-await loop breaks", async () => {
      const cache = createChangeDataCache({ base: {} });
      const watcher = watch(cache);

      cache.updateData("base.a", 1);

      const seen: string[] = [];
      for await (const batch of watcher) {
        seen.push(...paths(batch));
        break;
      }

      cache.updateData("base.b", 2);

      assert.deepStrictEqual(seen, ["base.a"]);
      assert.strictEqual((await watcher.next()).done, true);
    });
  });
});
