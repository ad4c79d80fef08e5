import type { InjuryNotes } from "./injury.model";
import type { SkillNotes } from "./skill.model";

export interface AthleteProfile {
  injuries: InjuryNotes;
  skills: SkillNotes;
  warnings: string[];
  sources: {
    injuries: boolean;
    skills: boolean;
  };
}
