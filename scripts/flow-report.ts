import { getDateArg, getGroupByArg, getPositiveIntArg, getWindowArg } from "./lib/args";
import { runFlowReport } from "../src/market/pipeline";

const MAX_CONCURRENCY = 32;

async function main() {
  const argv = process.argv.slice(2);
  const date = getDateArg(argv);
  const res = await runFlowReport(date, {
    window: getWindowArg(argv),
    groupBy: getGroupByArg(argv),
    concurrency: getPositiveIntArg(argv, "concurrency", MAX_CONCURRENCY)
  });

  console.log(
    JSON.stringify(
      {
        stage: "flows",
        date,
        window: res.report.window.days,
        groups: res.report.window.summaries.length,
        missingSymbols: res.report.missingSymbols,
        jsonPath: res.jsonPath,
        markdownPath: res.markdownPath
      },
      null,
      2
    )
  );
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
