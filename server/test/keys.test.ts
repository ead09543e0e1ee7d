import test from "node:test";
import assert from "node:assert/strict";

import { InvalidSpecError } from "../src/media/errors.ts";
import { deriveMediaKey, normalizeTransformSpec } from "../src/media/keys.ts";

test("deriveMediaKey is deterministic and hex encoded", () => {
  const first = deriveMediaKey("originals/reef/a.jpg", { width: 150, height: 150 });
  const second = deriveMediaKey("originals/reef/a.jpg", { width: 150, height: 150 });

  assert.equal(first, second);
  assert.match(first, /^[0-9a-f]{32}$/);
});

test("deriveMediaKey separates objects and transforms", () => {
  const base = deriveMediaKey("originals/reef/a.jpg", { width: 150, height: 150 });

  assert.notEqual(deriveMediaKey("originals/reef/b.jpg", { width: 150, height: 150 }), base);
  assert.notEqual(deriveMediaKey("originals/reef/a.jpg", { width: 300, height: 150 }), base);
  assert.notEqual(deriveMediaKey("originals/reef/a.jpg", { width: 150, height: 150, fit: "contain" }), base);
});

test("an omitted fit is the same transform as cover", () => {
  assert.equal(
    deriveMediaKey("originals/reef/a.jpg", { width: 64, height: 48 }),
    deriveMediaKey("originals/reef/a.jpg", { width: 64, height: 48, fit: "cover" })
  );
});

test("deriveMediaKey does not require the object to exist", () => {
  assert.match(deriveMediaKey("originals/nowhere/ghost.png", { width: 10, height: 10 }), /^[0-9a-f]{32}$/);
});

test("invalid specs are rejected", () => {
  assert.throws(() => deriveMediaKey("", { width: 10, height: 10 }), InvalidSpecError);
  assert.throws(() => deriveMediaKey("a.jpg", { width: 0, height: 10 }), /width must be a positive integer/);
  assert.throws(() => deriveMediaKey("a.jpg", { width: 10, height: 2.5 }), /height must be a positive integer/);
  assert.throws(() => normalizeTransformSpec({ width: 10_001, height: 10 }), /width must be at most 10000/);
});

test("normalizeTransformSpec applies the default fit", () => {
  assert.deepEqual(normalizeTransformSpec({ width: 20, height: 30 }), { width: 20, height: 30, fit: "cover" });
});

test("distinct inputs across a grid of refs and sizes never collide", () => {
  const keys = new Set<string>();
  let inputs = 0;

  for (let image = 0; image < 20; image += 1) {
    for (const width of [64, 150, 300]) {
      for (const fit of ["cover", "contain", "inside"] as const) {
        keys.add(deriveMediaKey(`originals/reef/IMG_${image}.jpg`, { width, height: width, fit }));
        inputs += 1;
      }
    }
  }

  assert.equal(keys.size, inputs);
});
