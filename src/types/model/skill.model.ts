import type {
  BodyArea,
  ExperienceLevel,
  Proficiency,
} from "../../common/common-enum";

export interface ExerciseFamiliarity {
  name: string;
  proficiency: Proficiency;
  notes?: string;
}

export interface ConditioningHabit {
  activity: string;
  frequency?: string;
  level?: ExperienceLevel;
  notes?: string;
}

export interface MobilityStatus {
  description: string;
  restricted: boolean;
  areas: BodyArea[];
}

export interface SkillNotes {
  historyReference?: string;
  exercises: ExerciseFamiliarity[];
  conditioning: ConditioningHabit[];
  mobility: MobilityStatus;
}
