import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import { hash, digest } from "../src/core/hash.js";

function reference(data: Uint8Array | string): string {
  return createHash("sha256").update(data).digest("hex");
}

// ===================================================================
// Known answers
// ===================================================================

describe("hash known answers", () => {
  it.each([
    ["", "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"],
    ["abc", "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"],
    ["hello world", "b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9"],
    [
      "abcdbcdecdefdefgefghfghighijhijkijkljklmklmnlmnomnopnopq",
      "248d6a61d20638b8e5c026930c3e6039a33ce45964ff2167f6ecedd419db06c1",
    ],
    [
      "abcdefghbcdefghicdefghijdefghijkefghijklfghijklmghijklmnhijklmnoijklmnopjklmnopqklmnopqrlmnopqrsmnopqrstnopqrstu",
      "cf5b16a778af8380036ce59e7b0492370b249b11e8f07a51afac45037afee9d1",
    ],
  ])("hash(%j)", (input, expected) => {
    expect(hash(input)).toBe(expected);
  });

  it("hashes one million 'a' characters", () => {
    expect(hash("a".repeat(1_000_000))).toBe(
      "cdc76e5c9914fb9281a1c7e284d73e67f1809a48a497200e046d39ccc7112cd0",
    );
  });
});

// ===================================================================
// Properties
// ===================================================================

describe("hash properties", () => {
  it("is deterministic", () => {
    const data = new Uint8Array([1, 2, 3, 4, 5]);
    expect(hash(data)).toBe(hash(data));
  });

  it("returns a 64-char lowercase hex string", () => {
    for (const input of ["", "x", "anything at all", "\u0000ÿ"]) {
      expect(hash(input)).toMatch(/^[0-9a-f]{64}$/);
    }
  });

  it("treats a string as its UTF-8 bytes", () => {
    expect(hash("héllo ✓")).toBe(hash(new TextEncoder().encode("héllo ✓")));
    expect(hash("héllo ✓")).toBe(reference("héllo ✓"));
  });

  it("hashes only the viewed range of a subarray", () => {
    const backing = new TextEncoder().encode("--abc--");
    expect(hash(backing.subarray(2, 5))).toBe(hash("abc"));
  });

  it.each([55, 56, 63, 64, 65, 119, 120, 127, 128, 129])(
    "matches node:crypto at the %i-byte boundary",
    (length) => {
      const data = new Uint8Array(length);
      for (let i = 0; i < length; i++) data[i] = (i * 31 + 7) & 0xff;
      expect(hash(data)).toBe(reference(data));
    },
  );

  it("matches node:crypto for every length up to 300 bytes", () => {
    for (let length = 0; length <= 300; length++) {
      const data = new Uint8Array(length);
      for (let i = 0; i < length; i++) data[i] = (i ^ length) & 0xff;
      expect(hash(data)).toBe(reference(data));
    }
  });

  it("changes when any single bit of the input flips", () => {
    const base = new Uint8Array(80).fill(0x42);
    const baseDigest = hash(base);
    const seen = new Set<string>([baseDigest]);
    for (let bit = 0; bit < base.length * 8; bit += 7) {
      const flipped = Uint8Array.from(base);
      flipped[bit >> 3] = 0x42 ^ (1 << (bit & 7));
      const d = hash(flipped);
      expect(d).not.toBe(baseDigest);
      seen.add(d);
    }
    expect(seen.size).toBe(1 + Math.ceil((80 * 8) / 7));
  });
});

// ===================================================================
// digest
// ===================================================================

describe("digest", () => {
  it("returns the same value as hash, as 32 raw bytes", () => {
    const raw = digest("abc");
    expect(raw).toHaveLength(32);
    expect(Buffer.from(raw).toString("hex")).toBe(hash("abc"));
  });

  it("agrees with node:crypto's raw digest", () => {
    const data = new Uint8Array([0xde, 0xad, 0xbe, 0xef]);
    expect(Buffer.from(digest(data)).equals(createHash("sha256").update(data).digest())).toBe(true);
  });
});
