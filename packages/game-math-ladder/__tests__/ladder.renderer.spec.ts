import { describe, expect, it } from "vitest";
import { RungLayout, renderLadder } from "../src";

const single: RungLayout = { playerCount: 2, levels: [[true]] };

describe("renderLadder", () => {
  it("sizes the canvas from players and levels", () => {
    const diagram = renderLadder(single, ["A", "B"], ["X", "Y"]);
    expect(diagram.width).toBe(160);
    expect(diagram.height).toBe(112);
    expect(diagram.svg.startsWith('<?xml version="1.0" encoding="UTF-8"?>')).toBe(true);
    expect(diagram.svg).toContain('<svg xmlns="http://www.w3.org/2000/svg" width="160" height="112" viewBox="0 0 160 112">');
  });

  it("draws one rail per player from the top to the bottom of the ladder", () => {
    const { svg } = renderLadder(single, ["A", "B"], ["X", "Y"]);
    expect(svg.match(/class="rail"/g)).toHaveLength(2);
    expect(svg).toContain('<line class="rail" x1="40" y1="44" x2="40" y2="68"/>');
    expect(svg).toContain('<line class="rail" x1="120" y1="44" x2="120" y2="68"/>');
  });

  it("draws rungs halfway through their level", () => {
    const { svg } = renderLadder(single, ["A", "B"], ["X", "Y"]);
    expect(svg).toContain('<line class="rung" data-level="0" data-gap="0" x1="40" y1="56" x2="120" y2="56"/>');
  });

  it("draws only the rungs that are present", () => {
    const layout: RungLayout = {
      playerCount: 4,
      levels: [
        [true, false, true],
        [false, false, false],
        [false, true, false],
      ],
    };
    const { svg } = renderLadder(layout, ["A", "B", "C", "D"], ["1", "2", "3", "4"]);
    expect(svg.match(/class="rung"/g)).toHaveLength(3);
    expect(svg).toContain('<line class="rung" data-level="0" data-gap="2" x1="200" y1="56" x2="280" y2="56"/>');
    expect(svg).toContain('<line class="rung" data-level="2" data-gap="1" x1="120" y1="104" x2="200" y2="104"/>');
  });

  it("labels players on top and outcome slots at the bottom", () => {
    const { svg } = renderLadder(single, ["A", "B"], ["X", "Y"]);
    expect(svg).toContain(
      '<text class="playerLabel" x="40" y="16" text-anchor="middle" dominant-baseline="middle">A</text>',
    );
    expect(svg).toContain('<line class="tick" x1="120" y1="68" x2="120" y2="74"/>');
    expect(svg).toContain(
      '<text class="outcomeLabel" x="120" y="96" text-anchor="middle" dominant-baseline="middle">Y</text>',
    );
  });

  it("escapes names", () => {
    const { svg } = renderLadder(single, ["<A&B>", "\"q\""], ["X", "it's"]);
    expect(svg).toContain(">&lt;A&amp;B&gt;</text>");
    expect(svg).toContain(">&quot;q&quot;</text>");
    expect(svg).toContain(">it&apos;s</text>");
  });

  it("highlights the route of one player", () => {
    const { svg } = renderLadder(single, ["A", "B"], ["X", "Y"], { highlight: 0 });
    expect(svg).toContain('<polyline class="route" data-player="0" points="40,44 40,56 120,56 120,68"/>');
  });

  it("leaves the route layer empty without a highlight", () => {
    const { svg } = renderLadder(single, ["A", "B"], ["X", "Y"]);
    expect(svg).toContain('<g id="layer-route" class="layer route">\n</g>');
  });

  it("honours custom spacing", () => {
    const diagram = renderLadder(single, ["A", "B"], ["X", "Y"], { columnWidth: 100, levelHeight: 40, labelBand: 20 });
    expect(diagram.width).toBe(200);
    expect(diagram.height).toBe(120);
    expect(diagram.svg).toContain('<line class="rung" data-level="0" data-gap="0" x1="50" y1="60" x2="150" y2="60"/>');
  });

  it("renders a ladder without levels", () => {
    const diagram = renderLadder({ playerCount: 3, levels: [] }, ["A", "B", "C"], ["X", "Y", "Z"]);
    expect(diagram.height).toBe(88);
    expect(diagram.svg.match(/class="rail"/g)).toHaveLength(3);
    expect(diagram.svg).not.toContain('class="rung"');
  });

  it("rejects name lists of the wrong length", () => {
    expect(() => renderLadder(single, ["A"], ["X", "Y"])).toThrowError(/playerNames must contain 2 entries/);
    expect(() => renderLadder(single, ["A", "B"], ["X", "Y", "Z"])).toThrowError(/outcomeNames must contain 2 entries/);
  });

  it("rejects invalid spacing", () => {
    expect(() => renderLadder(single, ["A", "B"], ["X", "Y"], { columnWidth: 0 })).toThrowError(/columnWidth/);
  });
});
