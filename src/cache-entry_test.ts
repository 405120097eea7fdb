import { expect, test } from "vitest";
import { CacheEntry, classify, isFresh } from "./cache-entry.ts";

const entry = CacheEntry("value", 1_000, 500);

test("isFresh: fresh strictly before insertedAt + ttl", () => {
  expect(isFresh(entry, 1_000)).toBe(true);
  expect(isFresh(entry, 1_499)).toBe(true);
  expect(isFresh(entry, 1_500)).toBe(false);
});

test("classify: no entry is a Miss", () => {
  expect(classify(undefined, 0)).toEqual({ _tag: "Miss" });
});

test("classify: fresh entry is a Hit", () => {
  expect(classify(entry, 1_200)).toEqual({ _tag: "Hit", entry });
});

test("classify: expired entry is reported with its value", () => {
  expect(classify(entry, 9_000)).toEqual({ _tag: "Expired", entry });
});
