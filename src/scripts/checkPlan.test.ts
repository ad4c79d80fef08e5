import { writeFile } from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_SETTINGS } from "../services/promptBuilder.service";
import { TWO_DAY_PLAN, createTempDir, removeDir } from "../testing/vault.fixture";
import { USAGE, run } from "./checkPlan";

/** A plan that satisfies the default settings for three weeks. */
const defaultPlan = (): string => {
  const lines: string[] = [];
  for (const week of [1, 2, 3]) {
    lines.push(`Week Plan — Week of 2026-11-0${week + 1}`);
    lines.push("Day,Session Title,Exercise,Block,Load,Reps,Notes");
    for (const day of DEFAULT_SETTINGS.availableDays) {
      const title = day === DEFAULT_SETTINGS.swimDay ? "Swim + Core" : "Strength";
      for (const block of [1, 2, 3]) {
        for (const exercise of [1, 2, 3]) {
          lines.push(`${day},${title},Exercise ${block}.${exercise},Block ${block},20 kg,10,Easy`);
        }
      }
    }
  }
  return lines.join("\n");
};

describe("check-plan", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  const writePlan = async (text: string): Promise<string> => {
    const file = path.join(dir, "week_plan.csv");
    await writeFile(file, text, { encoding: "utf-8" });
    return file;
  };

  it("exits with 0 for a plan that passes", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const file = await writePlan(defaultPlan());

    await expect(run([file, "--weeks", "3"])).resolves.toBe(0);
    expect(log.mock.calls.map((args) => args.join(" "))).toEqual([
      "[Info] 3 week(s), 15 session(s), 135 exercise row(s)",
      "[OK] Plan passed the quality check",
    ]);
  });

  it("lists every issue and exits with 1", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const file = await writePlan(TWO_DAY_PLAN);

    await expect(run([file, "--weeks", "3"])).resolves.toBe(1);
    expect(log.mock.calls.map((args) => args.join(" "))).toEqual([
      "[Info] 1 week(s), 2 session(s), 4 exercise row(s)",
      "[Issue] Expected 3 week(s), found 1",
      "[Issue] Week 1, Monday: 2 exercise(s), expected 9",
      "[Issue] Week 1, Wednesday: 2 exercise(s), expected 9",
    ]);
  });

  it("prints the usage and exits with 2 without a file", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    await expect(run([])).resolves.toBe(2);
    expect(error).toHaveBeenCalledWith(USAGE);
  });

  it("exits with 1 when the file cannot be read", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    await expect(run([path.join(dir, "absent.csv")])).resolves.toBe(1);
    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0][0])).toMatch(/^\[Error\] ENOENT/);
  });
});
