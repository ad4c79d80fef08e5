import { Weekday } from "../common/common-enum";
import type { CoachSettings } from "../types/model/coachSettings.model";
import {
  PLAN_COLUMNS,
  type ParsedPlan,
  type PlanColumn,
  type PlanQualityReport,
  type PlanRow,
  type PlanWeek,
} from "../types/model/plan.model";
import { parseCsvLine } from "../utils/csv";

const WEEK_TITLE = /^"?\s*week\b/i;
const WEEK_OF = /week of (\d{4}-\d{2}-\d{2})/i;
const LOAD = /^(?:\d+(?:\.\d+)?(?:\s*-\s*\d+(?:\.\d+)?)?\s*kg|bodyweight|bw|-|n\/a)$/i;
const SWIM = /swim|nata/i;

const ROW_FIELDS: Record<PlanColumn, keyof Omit<PlanRow, "line">> = {
  Day: "day",
  "Session Title": "sessionTitle",
  Exercise: "exercise",
  Block: "block",
  Load: "load",
  Reps: "reps",
  Notes: "notes",
};

/** Matches full day names and prefixes of at least three letters. */
export function normalizeDay(value: string): Weekday | undefined {
  const day = value.trim().toLowerCase();
  if (day.length < 3) return undefined;
  return Object.values(Weekday).find((weekday) =>
    weekday.toLowerCase().startsWith(day)
  );
}

/**
 * Reads the CSV plan a model returns: week title lines open a new week,
 * header lines are skipped, everything else must be a seven-column row.
 */
export function parsePlan(text: string): ParsedPlan {
  const weeks: PlanWeek[] = [];
  const rejected: ParsedPlan["rejected"] = [];
  let current: PlanWeek | null = null;

  for (const [index, raw] of text.split(/\r?\n/).entries()) {
    const line = raw.trim();
    const lineNumber = index + 1;
    if (!line || line.startsWith("```")) continue;

    if (WEEK_TITLE.test(line)) {
      const title = line.replace(/,+$/, "").replace(/^"|"$/g, "").trim();
      current = { index: weeks.length + 1, title, rows: [] };
      const startDate = WEEK_OF.exec(title)?.[1];
      if (startDate) current.startDate = startDate;
      weeks.push(current);
      continue;
    }

    const fields = parseCsvLine(line);
    if (!fields) {
      rejected.push({ line: lineNumber, text: line, reason: "unterminated quoted field" });
      continue;
    }
    if (fields[0].toLowerCase() === "day") continue;
    if (fields.length !== PLAN_COLUMNS.length) {
      rejected.push({
        line: lineNumber,
        text: line,
        reason: `expected ${PLAN_COLUMNS.length} columns, found ${fields.length}`,
      });
      continue;
    }

    if (!current) {
      current = { index: 1, rows: [] };
      weeks.push(current);
    }
    const [day, sessionTitle, exercise, block, load, reps, notes] = fields;
    current.rows.push({ line: lineNumber, day, sessionTitle, exercise, block, load, reps, notes });
  }

  return { weeks, rejected };
}

const groupBy = <T>(items: T[], key: (item: T) => string): Map<string, T[]> => {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    groups.set(k, [...(groups.get(k) ?? []), item]);
  }
  return groups;
};

function rowIssues(week: PlanWeek, row: PlanRow, settings: CoachSettings): string[] {
  const issues: string[] = [];
  const where = `Week ${week.index}, line ${row.line}`;

  const missing = PLAN_COLUMNS.filter((column) => row[ROW_FIELDS[column]] === "");
  if (missing.length > 0) {
    issues.push(`${where}: missing ${missing.join(", ")}`);
  }

  const day = normalizeDay(row.day);
  if (row.day && (!day || !settings.availableDays.includes(day))) {
    issues.push(`${where}: ${row.day} is not an available day`);
  }

  if (row.load && !LOAD.test(row.load)) {
    issues.push(`${where}: load "${row.load}" is not written in kg`);
  }

  return issues;
}

function sessionIssues(week: PlanWeek, settings: CoachSettings): string[] {
  const issues: string[] = [];
  const expected = settings.blocksPerSession * settings.exercisesPerBlock;
  const sessions = groupBy(week.rows, (row) => normalizeDay(row.day) ?? row.day);

  for (const [day, rows] of sessions) {
    if (rows.length !== expected) {
      issues.push(
        `Week ${week.index}, ${day}: ${rows.length} exercise(s), expected ${expected}`
      );
      continue;
    }

    const blocks = groupBy(rows, (row) => row.block);
    if (blocks.size !== settings.blocksPerSession) {
      issues.push(
        `Week ${week.index}, ${day}: ${blocks.size} block(s), expected ${settings.blocksPerSession}`
      );
      continue;
    }
    for (const [block, blockRows] of blocks) {
      if (blockRows.length !== settings.exercisesPerBlock) {
        issues.push(
          `Week ${week.index}, ${day}, ${block}: ${blockRows.length} exercise(s), expected ${settings.exercisesPerBlock}`
        );
      }
    }
  }

  return issues;
}

export function countSessions(week: PlanWeek): number {
  return new Set(week.rows.map((row) => normalizeDay(row.day) ?? row.day)).size;
}

export function checkPlanQuality(
  plan: ParsedPlan,
  settings: CoachSettings
): PlanQualityReport {
  const issues: string[] = [];

  if (plan.weeks.length !== settings.weeks) {
    issues.push(`Expected ${settings.weeks} week(s), found ${plan.weeks.length}`);
  }
  for (const rejected of plan.rejected) {
    issues.push(`Line ${rejected.line}: ${rejected.reason}`);
  }

  for (const week of plan.weeks) {
    if (week.rows.length === 0) {
      issues.push(`Week ${week.index}: no sessions`);
      continue;
    }
    for (const row of week.rows) {
      issues.push(...rowIssues(week, row, settings));
    }
    issues.push(...sessionIssues(week, settings));

    const { swimDay } = settings;
    if (
      swimDay &&
      !week.rows.some(
        (row) =>
          normalizeDay(row.day) === swimDay &&
          (SWIM.test(row.sessionTitle) || SWIM.test(row.exercise))
      )
    ) {
      issues.push(`Week ${week.index}: no swimming session on ${swimDay}`);
    }
  }

  return {
    valid: issues.length === 0,
    issues,
    totals: {
      weeks: plan.weeks.length,
      sessions: plan.weeks.reduce((sum, week) => sum + countSessions(week), 0),
      rows: plan.weeks.reduce((sum, week) => sum + week.rows.length, 0),
    },
  };
}
