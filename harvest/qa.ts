import { buildReport } from "./report.js";
import { readRunOutput } from "./utils/emitter.js";

const folder = process.argv[2];
if (!folder) {
  console.error("Usage: qa <outputFolder>");
  process.exit(1);
}

const { records, failures } = readRunOutput(folder);
console.log(JSON.stringify(buildReport(records, failures.length), null, 2));
