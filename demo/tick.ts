// ---------------------------------------------------------------------------
// Demo: a work loop that prints an ETA before every unit
// ---------------------------------------------------------------------------

import chalk from "chalk";
import { setTimeout as sleep } from "node:timers/promises";
import { createProgressEstimator } from "../src/index.js";

const TOTAL = 100;
const WORK_MS = 50;

function formatEta(ms: number | null): string {
  if (ms === null) return chalk.gray("unknown");
  const secs = Math.floor(ms / 1000);
  const millis = String(ms % 1000).padStart(3, "0");
  return chalk.green(`${secs}.${millis}s`);
}

async function main(): Promise<void> {
  const est = createProgressEstimator(10, TOTAL);

  est.on("regimechange", ({ from, to }) => {
    console.log(chalk.dim(`[${from} -> ${to}]`));
  });

  for (let i = 0; i < TOTAL; i++) {
    console.log(`${chalk.bold("ETA:")} ${formatEta(est.eta())}`);
    await sleep(WORK_MS);
    est.tick();
  }
}

main().catch((err: unknown) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exitCode = 1;
});
