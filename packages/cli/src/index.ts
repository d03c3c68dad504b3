#!/usr/bin/env tsx

import { Command } from "commander";
import { loadConfig, pick } from "./config";
import { runConvert } from "./commands/convert";
import { runReport } from "./commands/report";
import { runSelftest } from "./commands/selftest";
import { runSplit } from "./commands/split";
import { consoleLogger } from "./logger";

interface SplitFlags {
  in?: string;
  out?: string;
  manifest?: string;
  config?: string;
}

interface ConvertFlags {
  in?: string;
  out?: string;
  issues?: string;
  config?: string;
}

interface ReportFlags {
  converted?: string;
  issues?: string;
  out?: string;
  config?: string;
}

const program = new Command();

program
  .name("db2sf")
  .description("Extract DB2 CREATE TABLE statements and rewrite them for Snowflake")
  .version("0.1.0");

program
  .command("split")
  .description("Split DDL dumps into one file per table and write a manifest")
  .option("--in <dir>", "Directory of .sql/.txt dumps (default: data/input)")
  .option(
    "--out <dir>",
    "Directory for per-table files (default: data/output/original_db2_table_creation)",
  )
  .option("--manifest <path>", "Manifest JSON path (default: data/output/manifest.json)")
  .option("--config <path>", "Path to JSON config file (default: ./db2sf.config.json)")
  .action((opts: SplitFlags) => {
    const config = loadConfig(consoleLogger, opts.config);
    const summary = runSplit(
      {
        input: pick("input", opts.in, config),
        output: pick("extracted", opts.out, config),
        manifest: pick("manifest", opts.manifest, config),
      },
      consoleLogger,
    );
    process.exitCode = summary.exitCode;
  });

program
  .command("convert")
  .description("Rewrite extracted table files as Snowflake DDL and log every issue")
  .option(
    "--in <dir>",
    "Directory of extracted table files (default: data/output/original_db2_table_creation)",
  )
  .option(
    "--out <dir>",
    "Directory for Snowflake files (default: data/output/new_snowflake_table_creation)",
  )
  .option("--issues <path>", "Issues log path (default: data/output/issues.txt)")
  .option("--config <path>", "Path to JSON config file (default: ./db2sf.config.json)")
  .action((opts: ConvertFlags) => {
    const config = loadConfig(consoleLogger, opts.config);
    const summary = runConvert(
      {
        input: pick("extracted", opts.in, config),
        output: pick("converted", opts.out, config),
        issues: pick("issues", opts.issues, config),
      },
      consoleLogger,
    );
    process.exitCode = summary.exitCode;
  });

program
  .command("report")
  .description("Generate a static HTML review of converted tables and their issues")
  .option(
    "--converted <dir>",
    "Directory of Snowflake files (default: data/output/new_snowflake_table_creation)",
  )
  .option("--issues <path>", "Issues log path (default: data/output/issues.txt)")
  .option("--out <dir>", "Output directory for HTML (default: data/output/report)")
  .option("--config <path>", "Path to JSON config file (default: ./db2sf.config.json)")
  .action((opts: ReportFlags) => {
    const config = loadConfig(consoleLogger, opts.config);
    const summary = runReport(
      {
        converted: pick("converted", opts.converted, config),
        issues: pick("issues", opts.issues, config),
        output: pick("report", opts.out, config),
      },
      consoleLogger,
    );
    process.exitCode = summary.exitCode;
  });

program
  .command("selftest")
  .description("Convert the built-in sample table and print the result")
  .action(() => {
    process.exitCode = runSelftest(consoleLogger).exitCode;
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
