export * from "./types";
export { assertLadderConfig, countRungs, generateLayout } from "./generator";
export { assertLayout, invertPermutation, simulateLayout, traceRoute, traceTokens } from "./simulator";
export { renderLadder } from "./renderer";
export { normalizeNames, pairNames } from "./names";
export { LadderEngine } from "./engine";
export { collectLandingStats } from "./stats";
