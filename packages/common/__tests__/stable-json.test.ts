import { describe, it, expect } from "vitest";
import { sha256Hex, stableStringify } from "../src/stable-json.js";

describe("stableStringify", () => {
  it("sorts keys, drops undefined and encodes bigint + bytes", () => {
    const out = stableStringify({ b: 1, a: { d: undefined, c: [1n, new Uint8Array([1, 255])] } });
    expect(out).toBe('{"a":{"c":["1","0x01ff"]},"b":1}');
  });

  it("is insensitive to key insertion order", () => {
    expect(stableStringify({ x: 1, y: [2, { q: 3, p: 4 }] })).toBe(stableStringify({ y: [2, { p: 4, q: 3 }], x: 1 }));
  });

  it("marks true cycles but not shared references", () => {
    const shared = { v: 1 };
    const cyclic: { self?: unknown; n: number } = { n: 1 };
    cyclic.self = cyclic;

    expect(stableStringify({ a: shared, b: shared })).toBe('{"a":{"v":1},"b":{"v":1}}');
    expect(stableStringify(cyclic)).toBe('{"n":1,"self":"[Circular]"}');
  });
});

describe("sha256Hex", () => {
  it("hashes utf8 text", () => {
    expect(sha256Hex("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });
});
