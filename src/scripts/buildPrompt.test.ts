import { readFile } from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  INJURY_NOTES,
  SKILL_NOTES,
  createVault,
  removeDir,
} from "../testing/vault.fixture";
import { run } from "./buildPrompt";

describe("build-prompt", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await createVault({
      "injuries.md": INJURY_NOTES,
      "skills.md": SKILL_NOTES,
      "gym-data/2025-09-01.yml": "title: Strength Lower\n",
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    await removeDir(dir);
  });

  const vaultArgs = () => [
    "--data-dir",
    dir,
    "--yaml-dir",
    path.join(dir, "gym-data"),
    "--model",
    "test-model",
  ];

  it("writes the prompt file and prints the manual commands", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const out = path.join(dir, "prompt.txt");

    const code = await run([...vaultArgs(), "--out", out, "--weeks", "4", "--start", "2026-10-21"]);

    expect(code).toBe(0);
    const prompt = await readFile(out, { encoding: "utf-8" });
    expect(prompt).toContain("- Output must be a 4-week plan for my available days");
    expect(prompt).toContain("--- 2025-09-01.yml ---\ntitle: Strength Lower");
    expect(log.mock.calls.map((args) => args.join(" "))).toEqual([
      `[OK] Wrote prompt to: ${out}`,
      `[Info] Prompt length: ${prompt.length} characters`,
      "[Info] Weeks start: 2026-10-26, 2026-11-02, 2026-11-09, 2026-11-16",
      "",
      "Run Ollama manually like this:",
      `  ollama run test-model < "${out}"`,
      "",
      "Tip: Save the model output to a CSV file:",
      `  ollama run test-model < "${out}" > week_plan.csv`,
      "Then check it with: check-plan week_plan.csv",
    ]);
  });

  it("prints the usage on --help without writing anything", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await expect(run(["--help"])).resolves.toBe(0);
    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0])).toMatch(/^Build a coaching prompt from your vault files\./);
  });

  it("fails on a flag that is not a whole number", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    await expect(run([...vaultArgs(), "--weeks", "x"])).resolves.toBe(1);
    expect(error).toHaveBeenCalledWith('[Error] --weeks expects a whole number, got "x"');
  });

  it("fails on settings outside their bounds", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    await expect(
      run([...vaultArgs(), "--out", path.join(dir, "prompt.txt"), "--weeks", "2"])
    ).resolves.toBe(1);
    expect(error).toHaveBeenCalledWith("[Error] Invalid coach settings");
  });

  it("rejects an invalid environment before reading the vault", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.stubEnv("COACH_MAX_YAML_FILES", "abc");

    await expect(run(vaultArgs())).resolves.toBe(1);
    expect(error).toHaveBeenCalledWith(
      "[Error] Invalid environment configuration: COACH_MAX_YAML_FILES: must be a number"
    );
  });
});
