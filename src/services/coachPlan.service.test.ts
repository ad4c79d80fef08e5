import path from "path";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { Weekday } from "../common/common-enum";
import {
  INJURY_NOTES,
  SKILL_NOTES,
  TWO_DAY_PLAN,
  createVault,
  removeDir,
} from "../testing/vault.fixture";
import { UpstreamError, ValidationError } from "../utils/errors";
import { CoachPlanService, type VaultOptions } from "./coachPlan.service";
import type { PlanModel } from "./planModel.service";

const fakeModel = (answer: string | Error): PlanModel => ({
  name: "fake-model",
  generate: vi.fn(async () => {
    if (answer instanceof Error) throw answer;
    return answer;
  }),
});

describe("CoachPlanService", () => {
  let dir = "";
  let options: VaultOptions;

  beforeAll(async () => {
    dir = await createVault({
      "injuries.md": INJURY_NOTES,
      "skills.md": SKILL_NOTES,
    });
    options = {
      dataDir: dir,
      yamlDir: path.join(dir, "gym-data"),
      maxYamlFiles: 50,
      maxCharsPerFile: 12000,
      localModel: "llama3.1:8b",
    };
  });

  afterAll(async () => {
    await removeDir(dir);
  });

  describe("buildCoachPrompt", () => {
    it("assembles the vault, the profile and the run commands", async () => {
      const service = new CoachPlanService(options, null);

      const result = await service.buildCoachPrompt({
        startDate: "2026-10-21",
        promptFile: "out.txt",
      });

      expect(result.weekStarts).toEqual([
        "2026-10-26",
        "2026-11-02",
        "2026-11-09",
        "2026-11-16",
        "2026-11-23",
      ]);
      expect(result.commands[0]).toBe('ollama run llama3.1:8b < "out.txt"');
      expect(result.length).toBe(result.prompt.length);
      expect(result.prompt).toContain(`--- goals.md (MISSING: ${path.join(dir, "goals.md")}) ---`);
      expect(result.prompt).toContain("--- injuries.md ---\n# Injuries & Constraints");
      expect(result.prompt).toContain("(No YAML folder found. Skipping.)");
      expect(result.settings.preferredExercises).toEqual([
        "Deadlift",
        "Bench Press",
        "Single-Arm Dumbbell Row",
        "Barbell Row",
      ]);
      expect(result.profile.sources).toEqual({ injuries: true, skills: true });
    });

    it("rejects a malformed start date", async () => {
      const service = new CoachPlanService(options, null);

      await expect(service.buildCoachPrompt({ startDate: "2026-13-01" })).rejects.toThrow(
        'Invalid start date "2026-13-01", expected YYYY-MM-DD'
      );
    });

    it("rejects settings outside their bounds", async () => {
      const service = new CoachPlanService(options, null);

      await expect(service.buildCoachPrompt({ settings: { weeks: 2 } })).rejects.toMatchObject({
        status: 400,
        details: ["weeks: weeks must be at least 3"],
      });
    });

    it("requires the swim day to be an available day", async () => {
      const service = new CoachPlanService(options, null);

      const attempt = service.buildCoachPrompt({
        settings: { availableDays: [] },
      });
      await expect(attempt).rejects.toBeInstanceOf(ValidationError);

      await expect(
        service.buildCoachPrompt({ settings: { availableDays: [Weekday.MONDAY] } })
      ).rejects.toMatchObject({
        details: ["swimDay: swimDay must be one of the available days"],
      });
    });
  });

  describe("generatePlan", () => {
    it("returns the prompt only when no hosted model is configured", async () => {
      const service = new CoachPlanService(options, null);

      const result = await service.generatePlan({ startDate: "2026-10-21" });

      expect(result.status).toBe("prompt_only");
      if (result.status === "prompt_only") {
        expect(result.commands).toHaveLength(2);
        expect(result.prompt).toContain("SYSTEM / ROLE");
      }
    });

    it("parses and checks the model's answer", async () => {
      const model = fakeModel(TWO_DAY_PLAN);
      const service = new CoachPlanService(options, model);

      const result = await service.generatePlan({ startDate: "2026-10-21" });

      expect(model.generate).toHaveBeenCalledWith(expect.stringContaining("SYSTEM / ROLE"));
      expect(result.status).toBe("generated");
      if (result.status === "generated") {
        expect(result.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
        expect(result.model).toBe("fake-model");
        expect(result.raw).toBe(TWO_DAY_PLAN);
        expect(result.quality.totals).toEqual({ weeks: 1, sessions: 2, rows: 4 });
        expect(result.quality.issues[0]).toBe("Expected 5 week(s), found 1");
      }
    });

    it("wraps model failures as upstream errors", async () => {
      const service = new CoachPlanService(options, fakeModel(new Error("quota exceeded")));

      const attempt = service.generatePlan();
      await expect(attempt).rejects.toBeInstanceOf(UpstreamError);
      await expect(attempt).rejects.toMatchObject({
        status: 502,
        message: "Plan model fake-model failed: quota exceeded",
      });
    });

    it("rejects an empty answer", async () => {
      const service = new CoachPlanService(options, fakeModel("  \n"));

      await expect(service.generatePlan()).rejects.toThrow(
        "Plan model fake-model returned an empty answer"
      );
    });
  });

  describe("checkPlanText", () => {
    it("checks against the default settings merged with overrides", () => {
      const service = new CoachPlanService(options, null);

      const { quality } = service.checkPlanText(TWO_DAY_PLAN, {
        weeks: 3,
        blocksPerSession: 1,
        exercisesPerBlock: 2,
      });

      expect(quality.issues).toEqual(["Expected 3 week(s), found 1"]);
    });
  });
});
