import { createHmac } from "crypto";
import { describe, expect, it } from "vitest";
import { HmacRandomSource, HmacRandomSourceFactory, MathRandomSource, createRandomSeed, rollFloat } from "@ladder-lottery/core-rng";

describe("HmacRandomSource", () => {
  it("replays the same stream for the same seeds", () => {
    const a = new HmacRandomSource("server-seed", "client-seed");
    const b = new HmacRandomSource("server-seed", "client-seed");
    const first = [a.next(), a.next(), a.next()];
    const second = [b.next(), b.next(), b.next()];
    expect(second).toEqual(first);
    expect(a.drawn).toBe(3);
  });

  it("derives each draw from the hmac of clientSeed:nonce", () => {
    const digest = createHmac("sha256", "server-seed").update("client-seed:0").digest("hex");
    const expected = parseInt(digest.slice(0, 13), 16) / Math.pow(16, 13);
    expect(rollFloat("server-seed", "client-seed", 0)).toBe(expected);
    expect(new HmacRandomSource("server-seed", "client-seed").next()).toBe(expected);
  });

  it("starts from the given nonce", () => {
    const source = new HmacRandomSource("server-seed", "client-seed", 5);
    expect(source.next()).toBe(rollFloat("server-seed", "client-seed", 5));
    expect(source.next()).toBe(rollFloat("server-seed", "client-seed", 6));
  });

  it("stays within [0, 1)", () => {
    const source = new HmacRandomSource("bounds");
    for (let i = 0; i < 500; i++) {
      const value = source.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("rejects an empty server seed", () => {
    expect(() => new HmacRandomSource("")).toThrowError(/serverSeed/);
  });
});

describe("HmacRandomSourceFactory", () => {
  it("reuses a supplied seed", () => {
    const factory = new HmacRandomSourceFactory();
    const { seed, source } = factory.create("  test-seed ");
    expect(seed).toBe("test-seed");
    expect(source.next()).toBe(new HmacRandomSource("test-seed").next());
  });

  it("creates a fresh seed when none is supplied", () => {
    const factory = new HmacRandomSourceFactory();
    const { seed } = factory.create();
    expect(seed).toMatch(/^[0-9a-f]{32}$/);
    expect(createRandomSeed()).not.toBe(seed);
  });
});

describe("MathRandomSource", () => {
  it("draws from Math.random", () => {
    const value = new MathRandomSource().next();
    expect(value).toBeGreaterThanOrEqual(0);
    expect(value).toBeLessThan(1);
  });
});
