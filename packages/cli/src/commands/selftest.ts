import {
  convertDump,
  displayName,
  formatDiagnosticLine,
  type DumpConversion,
} from "@db2sf/core";
import { ExitCode } from "../files";
import type { Logger } from "../logger";

export const SAMPLE_DUMP = [
  "-- sample export",
  "CREATE TABLE APP.ACCOUNT (",
  "  ACCOUNT_ID INTEGER NOT NULL CONSTRAINT PK_ACC PRIMARY KEY,",
  "  NAME VARCHAR(100) FOR SBCS DATA NOT NULL WITH DEFAULT '',",
  "  CRT_TS TIMESTAMP NOT NULL WITH DEFAULT CURRENT TIMESTAMP,",
  "  BAL DECIMAL(18,2) WITH DEFAULT 0,",
  "  NOTES CLOB(1M),",
  "  CODE CHAR(3) WITH DEFAULT",
  ");",
].join("\n");

export interface SelftestSummary {
  conversion: DumpConversion;
  exitCode: ExitCode;
}

/** Run the built-in sample through extraction and conversion in memory. */
export function runSelftest(logger: Logger, dump: string = SAMPLE_DUMP): SelftestSummary {
  const conversion = convertDump({ source: "<sample>", text: dump });

  for (const warning of conversion.warnings) {
    logger.warn(warning);
  }

  let converted = 0;
  for (const { table, result, error } of conversion.tables) {
    if (!result) {
      logger.error(`Error converting ${displayName(table)}: ${error ?? "unknown error"}`);
      continue;
    }
    converted++;
    logger.info(`${displayName(result.identity)}:\n${result.sql}`);
  }

  for (const diagnostic of conversion.diagnostics) {
    logger.info(formatDiagnosticLine(diagnostic));
  }

  return {
    conversion,
    exitCode: converted > 0 ? ExitCode.Success : ExitCode.NothingConverted,
  };
}
