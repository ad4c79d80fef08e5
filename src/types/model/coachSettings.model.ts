import type { Weekday } from "../../common/common-enum";

export interface CoachSettings {
  weeks: number;
  availableDays: Weekday[];
  sessionMinutes: number;
  blocksPerSession: number;
  exercisesPerBlock: number;
  equipment: string[];
  swimDay?: Weekday;
  preferredExercises: string[];
}
