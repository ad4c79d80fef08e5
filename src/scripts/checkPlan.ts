#!/usr/bin/env node
import { readFile } from "fs/promises";
import { parseArgs } from "util";
import { validateConfig } from "../configs/environment";
import { CoachPlanService } from "../services/coachPlan.service";
import { parseWholeNumber } from "../utils/convert";
import { errorMessage } from "../utils/errors";

export const USAGE = "Usage: check-plan <plan.csv> [--weeks <n>]";

/**
 * Prints the quality report of a plan file. Resolves to 0 for a clean plan,
 * 1 when it has issues or cannot be read, 2 on a usage error.
 */
export async function run(argv: string[]): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        weeks: { type: "string" },
      },
    });

    const [file] = positionals;
    if (!file) {
      console.error(USAGE);
      return 2;
    }

    validateConfig();
    const text = await readFile(file, { encoding: "utf-8" });
    const weeks = parseWholeNumber("weeks", values.weeks);
    const service = new CoachPlanService(undefined, null);
    const { quality } = service.checkPlanText(
      text,
      weeks === undefined ? undefined : { weeks }
    );

    const { totals } = quality;
    console.log(
      `[Info] ${totals.weeks} week(s), ${totals.sessions} session(s), ${totals.rows} exercise row(s)`
    );
    if (quality.valid) {
      console.log("[OK] Plan passed the quality check");
      return 0;
    }
    for (const issue of quality.issues) {
      console.log(`[Issue] ${issue}`);
    }
    return 1;
  } catch (error) {
    console.error(`[Error] ${errorMessage(error)}`);
    return 1;
  }
}

// Run if called directly
if (require.main === module) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(`[Error] ${errorMessage(error)}`);
      process.exitCode = 1;
    });
}
