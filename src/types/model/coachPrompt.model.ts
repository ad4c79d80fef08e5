import type { AthleteProfile } from "./athleteProfile.model";
import type { CoachSettings } from "./coachSettings.model";
import type { ParsedPlan, PlanQualityReport } from "./plan.model";

export interface CoachPrompt {
  prompt: string;
  length: number;
  weekStarts: string[];
  settings: CoachSettings;
  profile: AthleteProfile;
  commands: string[];
}

export interface GeneratedPlan {
  status: "generated";
  id: string;
  model: string;
  promptLength: number;
  raw: string;
  plan: ParsedPlan;
  quality: PlanQualityReport;
}

export interface PromptOnlyPlan {
  status: "prompt_only";
  reason: string;
  prompt: string;
  commands: string[];
}

export type PlanResult = GeneratedPlan | PromptOnlyPlan;
