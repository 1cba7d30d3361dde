import { createHmac, randomBytes } from "crypto";

export interface IRandomSource {
  /** Uniform draw in [0, 1). */
  next(): number;
}

export interface SeededRandomSource {
  seed: string;
  source: IRandomSource;
}

export interface IRandomSourceFactory {
  create(seed?: string): SeededRandomSource;
}

export const RANDOM_SOURCE_FACTORY = Symbol("RANDOM_SOURCE_FACTORY");

const HEX_DIGITS = 13;
const HEX_SPAN = Math.pow(16, HEX_DIGITS);
const DEFAULT_CLIENT_SEED = "ladder";

export class MathRandomSource implements IRandomSource {
  next(): number {
    return Math.random();
  }
}

/**
 * Deterministic stream of draws: each draw is the HMAC-SHA256 of `clientSeed:nonce`
 * keyed by the server seed, read as a 52-bit fraction. The nonce advances per draw.
 */
export class HmacRandomSource implements IRandomSource {
  private nonce: number;

  constructor(private readonly serverSeed: string, private readonly clientSeed: string = DEFAULT_CLIENT_SEED, startNonce = 0) {
    if (!serverSeed) {
      throw new Error("HmacRandomSource: serverSeed must not be empty");
    }
    this.nonce = startNonce;
  }

  next(): number {
    const value = rollFloat(this.serverSeed, this.clientSeed, this.nonce);
    this.nonce += 1;
    return value;
  }

  get drawn(): number {
    return this.nonce;
  }
}

export function rollFloat(serverSeed: string, clientSeed: string, nonce: number): number {
  const digest = createHmac("sha256", serverSeed).update(`${clientSeed}:${nonce}`).digest("hex");
  return parseInt(digest.slice(0, HEX_DIGITS), 16) / HEX_SPAN;
}

export function createRandomSeed(): string {
  return randomBytes(16).toString("hex");
}

export class HmacRandomSourceFactory implements IRandomSourceFactory {
  constructor(private readonly clientSeed: string = DEFAULT_CLIENT_SEED) {}

  create(seed?: string): SeededRandomSource {
    const resolved = seed && seed.trim() ? seed.trim() : createRandomSeed();
    return { seed: resolved, source: new HmacRandomSource(resolved, this.clientSeed) };
  }
}
