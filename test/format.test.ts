import { describe, it } from "node:test";
import assert from "node:assert";
import {
  applyDiff,
  cloneValue,
  compact,
  createChangeDataCache,
  InvalidPathError,
  KeyNotFoundError,
  toChangeSet,
  toUpdateDocument,
} from "../src/index.js";
import { asMapping, record } from "./helpers.js";

describe("toUpdateDocument", () => {
  it("should split sets and deletes into $set and $unset", () => {
    const cache = createChangeDataCache({ base: { money: 100, props: { a: 1 } } });
    const base = cache.getMapping("base");

    base.set("money", 150);
    asMapping(base.get("props")).delete("a");

    assert.deepStrictEqual(toUpdateDocument(cache.packCache()), {
      $set: { "base.money": 150 },
      $unset: { "base.props.a": "" },
    });
  });

  it("should leave out empty operators", () => {
    assert.deepStrictEqual(toUpdateDocument(compact([])), {});
    assert.deepStrictEqual(toUpdateDocument(compact([record(1, "delete", "a.b")])), {
      $unset: { "a.b": "" },
    });
  });

  it("should reject keys a document database would misread", () => {
    const cache = createChangeDataCache({ base: {} });
    cache.getMapping("base").set("a.b", 1);

    assert.throws(() => toUpdateDocument(cache.peek()), InvalidPathError);

    cache.clearCache();
    cache.getMapping("base").set("$inc", 1);

    assert.throws(() => toUpdateDocument(cache.peek()), {
      name: "InvalidPathError",
      path: "base.$inc",
    });
  });

  it("should reject __proto__ segments", () => {
    assert.throws(() => toUpdateDocument(compact([record(1, "set", "a.__proto__", 1)])), {
      name: "InvalidPathError",
      path: "a.__proto__",
    });
  });
});

describe("toChangeSet", () => {
  it("should key updates and removals by dotted path", () => {
    const cache = createChangeDataCache({ base: { money: 100, items: ["a"] } });

    cache.removeData("base.money");
    cache.pushData("base.items", "b");

    assert.deepStrictEqual(toChangeSet(cache.packCache()), {
      update: { "base.items.1": "b" },
      remove: { "base.money": true },
    });
  });
});

describe("applyDiff", () => {
  it("should bring a copy of the initial data up to date", () => {
    const initial = { base: { money: 100, props: { a: 1 }, items: [1, 2] } };
    const replica = cloneValue(initial);
    const cache = createChangeDataCache(initial);
    const base = cache.getMapping("base");
    const props = asMapping(base.get("props"));

    base.set("money", 150);
    props.delete("a");
    props.set("b", 2);
    cache.pushData("base.items", 3);
    cache.updateData("base.items.0", 10);

    applyDiff(replica, cache.packCache());

    assert.deepStrictEqual(replica, { base: { money: 150, props: { b: 2 }, items: [10, 2, 3] } });
    assert.deepStrictEqual(replica, cache.snapshot());
  });

  it("should create missing mappings for sets and skip unreachable deletes", () => {
    const diff = compact([record(1, "set", "a.b.c", 1), record(2, "delete", "x.y")]);

    assert.deepStrictEqual(applyDiff({}, diff), { a: { b: { c: 1 } } });
  });

  it("should not share values with the diff", () => {
    const diff = compact([record(1, "set", "a", { n: 1 })]);

    const target = applyDiff({}, diff);
    const entry = diff.get('["a"]');

    assert.ok(entry?.op === "set");
    assert.notStrictEqual(target.a, entry.value);
  });

  it("should store __proto__ segments as own keys", () => {
    const diff = compact([record(1, "set", "a.__proto__.b", 1)]);

    const target = applyDiff({}, diff);

    assert.strictEqual(Object.getPrototypeOf(target.a), Object.prototype);
    assert.deepStrictEqual(Object.getOwnPropertyDescriptor(target.a, "__proto__")?.value, { b: 1 });
  });

  it("should throw when a set lands under a scalar", () => {
    const diff = compact([record(1, "set", "a.b", 2)]);

    assert.throws(() => applyDiff({ a: 1 }, diff), KeyNotFoundError);
  });
});
