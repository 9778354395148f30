import { getLiveDateArg, getPositiveIntArg } from "./lib/args";
import { formatPerformanceTable } from "../src/market/performance";
import { runSectorPerformance } from "../src/market/pipeline";

const MAX_CONCURRENCY = 32;

async function main() {
  const argv = process.argv.slice(2);
  const date = getLiveDateArg(argv);
  const res = await runSectorPerformance(date, {
    concurrency: getPositiveIntArg(argv, "concurrency", MAX_CONCURRENCY)
  });

  console.log(formatPerformanceTable(res.snapshot));
  console.log(`\nWrote ${res.path}`);
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
