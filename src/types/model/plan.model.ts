export const PLAN_COLUMNS = [
  "Day",
  "Session Title",
  "Exercise",
  "Block",
  "Load",
  "Reps",
  "Notes",
] as const;

export type PlanColumn = (typeof PLAN_COLUMNS)[number];

export interface PlanRow {
  line: number;
  day: string;
  sessionTitle: string;
  exercise: string;
  block: string;
  load: string;
  reps: string;
  notes: string;
}

export interface PlanWeek {
  index: number;
  title?: string;
  startDate?: string;
  rows: PlanRow[];
}

export interface RejectedLine {
  line: number;
  text: string;
  reason: string;
}

export interface ParsedPlan {
  weeks: PlanWeek[];
  rejected: RejectedLine[];
}

export interface PlanQualityReport {
  valid: boolean;
  issues: string[];
  totals: {
    weeks: number;
    sessions: number;
    rows: number;
  };
}
