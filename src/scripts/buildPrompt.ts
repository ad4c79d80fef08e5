#!/usr/bin/env node
import { writeFile } from "fs/promises";
import path from "path";
import { parseArgs } from "util";
import { validateConfig } from "../configs/environment";
import { CoachPlanService } from "../services/coachPlan.service";
import { parseWholeNumber } from "../utils/convert";
import { errorMessage } from "../utils/errors";

const USAGE = `Build a coaching prompt from your vault files.

Usage: build-prompt [options]

  --data-dir <dir>        Folder containing Markdown notes (default: data)
  --yaml-dir <dir>        Folder containing YAML trainer sessions (default: gym-data)
  --out <file>            Output prompt file (default: prompt.txt)
  --model <name>          Local model name for the printed commands (default: llama3.1:8b)
  --max-yaml-files <n>    Max YAML files to include (default: 50)
  --weeks <n>             Plan length in weeks (default: 5)
  --start <YYYY-MM-DD>    Plan starts the first Monday on or after this date
  -h, --help              Show this help`;

async function buildPrompt(argv: string[]): Promise<void> {
  const config = validateConfig();
  const { values } = parseArgs({
    args: argv,
    options: {
      "data-dir": { type: "string", default: config.vault.dataDir },
      "yaml-dir": { type: "string", default: config.vault.yamlDir },
      out: { type: "string", default: "prompt.txt" },
      model: { type: "string", default: config.ollama.model },
      "max-yaml-files": { type: "string" },
      weeks: { type: "string" },
      start: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const out = values.out;
  const weeks = parseWholeNumber("weeks", values.weeks);
  const service = new CoachPlanService(
    {
      dataDir: values["data-dir"],
      yamlDir: values["yaml-dir"],
      maxYamlFiles: parseWholeNumber("max-yaml-files", values["max-yaml-files"]) ?? config.vault.maxYamlFiles,
      maxCharsPerFile: config.vault.maxCharsPerFile,
      localModel: values.model,
    },
    null
  );

  const coachPrompt = await service.buildCoachPrompt({
    settings: weeks === undefined ? undefined : { weeks },
    startDate: values.start,
    promptFile: out,
  });
  await writeFile(out, coachPrompt.prompt, { encoding: "utf-8" });

  console.log(`[OK] Wrote prompt to: ${path.resolve(out)}`);
  console.log(`[Info] Prompt length: ${coachPrompt.length} characters`);
  console.log(`[Info] Weeks start: ${coachPrompt.weekStarts.join(", ")}`);
  for (const warning of coachPrompt.profile.warnings) {
    console.log(`[Warn] ${warning}`);
  }
  console.log();
  console.log("Run Ollama manually like this:");
  console.log(`  ${coachPrompt.commands[0]}`);
  console.log();
  console.log("Tip: Save the model output to a CSV file:");
  console.log(`  ${coachPrompt.commands[1]}`);
  console.log("Then check it with: check-plan week_plan.csv");
}

/** Runs the command and resolves to its exit code. */
export async function run(argv: string[]): Promise<number> {
  try {
    await buildPrompt(argv);
    return 0;
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
