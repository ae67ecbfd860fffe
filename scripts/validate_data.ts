import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { resolveConfig } from "../src/lib/config.js";
import { checkDataset, datasetChecks } from "./lib/datasets.js";

const ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
const PUBLIC_DIR = path.join(ROOT, "public");

async function main(): Promise<void> {
  const readText = (file: string) => readFile(path.join(PUBLIC_DIR, file), "utf8");
  const reports = await Promise.all(
    datasetChecks(resolveConfig(undefined)).map((check) => checkDataset(check, readText)),
  );

  for (const report of reports) {
    console.log(`${report.label}: ${report.rows} row(s) from public/${report.file}`);
  }
  const problems = reports.flatMap((report) => report.problems);
  if (problems.length > 0) {
    for (const problem of problems) {
      console.error(problem);
    }
    process.exitCode = 1;
    return;
  }
  console.log("Data files look good.");
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
