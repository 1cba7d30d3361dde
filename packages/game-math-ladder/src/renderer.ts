import { LadderError, LadderErrorCode, invalidConfiguration } from "@ladder-lottery/core-errors";
import { assertLayout, traceRoute } from "./simulator";
import { LadderDiagram, RenderOptions, RungLayout } from "./types";

const DEFAULT_COLUMN_WIDTH = 80;
const DEFAULT_LEVEL_HEIGHT = 24;
const DEFAULT_LABEL_BAND = 32;
const TICK_LENGTH = 6;

interface Frame {
  columnWidth: number;
  levelHeight: number;
  labelBand: number;
  levelCount: number;
}

function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

// Ladder units: rails at x = 0..n-1, levels downward from y = 0 to y = levelCount.
// The visible window adds half a unit on every side.
function px(frame: Frame, x: number): number {
  return (x + 0.5) * frame.columnWidth;
}

function py(frame: Frame, y: number): number {
  return frame.labelBand + (y + 0.5) * frame.levelHeight;
}

export function renderLadder(
  layout: RungLayout,
  playerNames: readonly string[],
  outcomeNames: readonly string[],
  options: RenderOptions = {},
): LadderDiagram {
  assertLayout(layout);
  assertNames("playerNames", playerNames, layout.playerCount);
  assertNames("outcomeNames", outcomeNames, layout.playerCount);

  const frame: Frame = {
    columnWidth: positiveOption("columnWidth", options.columnWidth, DEFAULT_COLUMN_WIDTH),
    levelHeight: positiveOption("levelHeight", options.levelHeight, DEFAULT_LEVEL_HEIGHT),
    labelBand: positiveOption("labelBand", options.labelBand, DEFAULT_LABEL_BAND),
    levelCount: layout.levels.length,
  };
  const width = layout.playerCount * frame.columnWidth;
  const height = (frame.levelCount + 1) * frame.levelHeight + 2 * frame.labelBand;
  const top = py(frame, 0);
  const bottom = py(frame, frame.levelCount);

  const rails = playerNames.map((_, i) => {
    const x = px(frame, i);
    return `\n    <line class="rail" x1="${x}" y1="${top}" x2="${x}" y2="${bottom}"/>`;
  }).join("");

  const rungs = layout.levels.map((level, c) => {
    const y = py(frame, c + 0.5);
    return level.map((present, i) => {
      if (!present) return "";
      return `\n    <line class="rung" data-level="${c}" data-gap="${i}" x1="${px(frame, i)}" y1="${y}" x2="${px(frame, i + 1)}" y2="${y}"/>`;
    }).join("");
  }).join("");

  const route = options.highlight == null ? "" : renderRoute(layout, options.highlight, frame);

  const playerLabels = playerNames.map((name, i) => {
    return `\n    <text class="playerLabel" x="${px(frame, i)}" y="${frame.labelBand / 2}" text-anchor="middle" dominant-baseline="middle">${esc(name)}</text>`;
  }).join("");

  const outcomeTicks = outcomeNames.map((name, j) => {
    const x = px(frame, j);
    const labelY = height - frame.labelBand / 2;
    return `\n    <line class="tick" x1="${x}" y1="${bottom}" x2="${x}" y2="${bottom + TICK_LENGTH}"/>\n    <text class="outcomeLabel" x="${x}" y="${labelY}" text-anchor="middle" dominant-baseline="middle">${esc(name)}</text>`;
  }).join("");

  const svg = `<?xml version="1.0" encoding="UTF-8"?>\n<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">\n<style>\n.rail { stroke: #000000; stroke-width: 1.5; }\n.rung { stroke: #1f77b4; stroke-width: 3; }\n.route { fill: none; stroke: #d62728; stroke-width: 2.5; stroke-linejoin: round; }\n.tick { stroke: #000000; stroke-width: 1; }\n.playerLabel, .outcomeLabel {\n  font-family: sans-serif;\n  font-size: 12px;\n  fill: #0f172a;\n}\n.playerLabel { font-weight: 600; }\n</style>\n<g id="layer-rails" class="layer rails">${rails}\n</g>\n<g id="layer-rungs" class="layer rungs">${rungs}\n</g>\n<g id="layer-route" class="layer route">${route}\n</g>\n<g id="layer-labels" class="layer labels">\n  <g class="playerLabels">${playerLabels}\n  </g>\n  <g class="outcomeTicks">${outcomeTicks}\n  </g>\n</g>\n</svg>`;

  return { svg, width, height };
}

function renderRoute(layout: RungLayout, topIndex: number, frame: Frame): string {
  const rails = traceRoute(layout, topIndex);
  const points: Array<[number, number]> = [[px(frame, rails[0]), py(frame, 0)]];
  for (let c = 0; c < frame.levelCount; c++) {
    const from = rails[c];
    const to = rails[c + 1];
    if (from !== to) {
      const y = py(frame, c + 0.5);
      points.push([px(frame, from), y], [px(frame, to), y]);
    }
  }
  points.push([px(frame, rails[rails.length - 1]), py(frame, frame.levelCount)]);
  const d = points.map(([x, y]) => `${x},${y}`).join(" ");
  return `\n    <polyline class="route" data-player="${topIndex}" points="${d}"/>`;
}

function assertNames(field: string, names: readonly string[], expected: number): void {
  if (!Array.isArray(names) || names.length !== expected) {
    throw new LadderError(LadderErrorCode.INVALID_NAMES, `Ladder: ${field} must contain ${expected} entries`, {
      field,
      expected,
      actual: Array.isArray(names) ? names.length : null,
    });
  }
}

function positiveOption(field: string, value: number | undefined, fallback: number): number {
  if (value == null) {
    return fallback;
  }
  if (!Number.isFinite(value) || value <= 0) {
    throw invalidConfiguration(`Ladder: ${field} must be a positive number`, { [field]: value });
  }
  return value;
}
