import fs from "fs";
import { loadLadderSettings } from "@ladder-lottery/core-config";
import { buildStatsReport, drawLadder, drawOptionsFrom, parseArgs, statsOptionsFrom, toDrawReport } from "./reports";

const USAGE = [
  "Available commands: draw, stats",
  "Example: npm run simulator -- draw --players 4 --levels 10 --probability 0.35 --names \"A, B, C, D\" --out ladder.svg",
  "Example: npm run simulator -- stats --rounds 10000 --players 4 --levels 10 --seed test-seed",
];

async function main() {
  const [, , command, ...rest] = process.argv;
  if (!command) {
    USAGE.forEach((line) => console.error(line));
    process.exit(1);
  }

  const args = parseArgs(rest);
  const settings = loadLadderSettings((key) => process.env[key]);

  switch (command) {
    case "draw": {
      const options = drawOptionsFrom(args, settings);
      const round = drawLadder(options, settings);
      if (args.out) {
        fs.writeFileSync(args.out, round.diagram.svg, "utf8");
      }
      console.log(JSON.stringify(toDrawReport(round, options.seed), null, 2));
      break;
    }
    case "stats": {
      const report = buildStatsReport(statsOptionsFrom(args, settings));
      console.log(JSON.stringify(report, null, 2));
      break;
    }
    default:
      console.error(`Unsupported command: ${command}`);
      USAGE.forEach((line) => console.error(line));
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
