import dayjs from "dayjs";
import {
  InjuryStatus,
  PAIN_SCALE_MAX,
  Proficiency,
  Weekday,
} from "../common/common-enum";
import type { AthleteProfile } from "../types/model/athleteProfile.model";
import type { CoachSettings } from "../types/model/coachSettings.model";
import type { InjuryRecord } from "../types/model/injury.model";
import { PLAN_COLUMNS } from "../types/model/plan.model";
import { weekStartDates, weekTitle } from "../utils/convert";

export const DEFAULT_SETTINGS: CoachSettings = {
  weeks: 5,
  availableDays: [
    Weekday.MONDAY,
    Weekday.TUESDAY,
    Weekday.WEDNESDAY,
    Weekday.THURSDAY,
    Weekday.SUNDAY,
  ],
  sessionMinutes: 60,
  blocksPerSession: 3,
  exercisesPerBlock: 3,
  equipment: [
    "barbell + plates",
    "dumbbells",
    "stability ball",
    "plyometric box",
  ],
  swimDay: Weekday.WEDNESDAY,
  preferredExercises: [
    "Deadlift",
    "Bench Press",
    "Single-Arm Dumbbell Row",
    "Barbell Row",
  ],
};

export interface PromptInput {
  markdownContext: string;
  yamlContext: string;
  settings: CoachSettings;
  profile?: AthleteProfile;
  startDate?: dayjs.Dayjs;
}

/**
 * Fills in unspecified settings. Known exercises from the skills note take
 * the place of the default preferred list.
 */
export function resolveSettings(
  overrides: Partial<CoachSettings> = {},
  profile?: AthleteProfile
): CoachSettings {
  const known = (profile?.skills.exercises ?? [])
    .filter((exercise) => exercise.proficiency === Proficiency.KNOWN)
    .map((exercise) => exercise.name);

  return {
    ...DEFAULT_SETTINGS,
    preferredExercises: known.length > 0 ? known : DEFAULT_SETTINGS.preferredExercises,
    ...overrides,
  };
}

export function ollamaCommands(model: string, promptFile: string): string[] {
  return [
    `ollama run ${model} < "${promptFile}"`,
    `ollama run ${model} < "${promptFile}" > week_plan.csv`,
  ];
}

const shortDay = (day: Weekday): string => day.slice(0, 3);

function injuryRule(injury: InjuryRecord): string {
  const details = [injury.description];
  if (injury.frequency) details.push(`${injury.frequency} pain`);
  if (injury.painIntensity !== undefined) {
    details.push(`~${injury.painIntensity}/${PAIN_SCALE_MAX}`);
  }
  const rule = `- Protect my ${injury.area ?? "injury"} (${details.join(", ")}). Avoid sudden increases in impact or intensity.`;
  return injury.constraints.length > 0
    ? `${rule} Follow: ${injury.constraints.join("; ")}.`
    : rule;
}

function profileRules(settings: CoachSettings, profile?: AthleteProfile): string[] {
  const rules: string[] = [];

  const mobility = profile?.skills.mobility;
  if (mobility?.restricted) {
    const areas = mobility.areas.length > 0 ? ` (${mobility.areas.join(", ")})` : "";
    rules.push(`- Respect my mobility restrictions${areas}: ${mobility.description}`);
  } else {
    rules.push(
      "- I have no mobility limitations (but include mobility work as supportive)."
    );
  }

  rules.push(
    `- Prefer exercises I already know (${settings.preferredExercises.join(", ")}) unless the YAML history strongly indicates other staples.`
  );

  const toTeach = (profile?.skills.exercises ?? [])
    .filter((exercise) => exercise.proficiency === Proficiency.NEEDS_TEACHING)
    .map((exercise) => exercise.name);
  if (toTeach.length > 0) {
    rules.push(
      `- I still need to be taught ${toTeach.join(", ")}; only program them with a technique note and light load.`
    );
  }

  for (const injury of profile?.injuries.injuries ?? []) {
    if (injury.status === InjuryStatus.ONGOING) {
      rules.push(injuryRule(injury));
    }
  }

  for (const habit of profile?.skills.conditioning ?? []) {
    const details = [habit.frequency, habit.level].filter(
      (detail): detail is string => Boolean(detail)
    );
    rules.push(
      details.length > 0
        ? `- I do ${habit.activity} (${details.join(", ")}).`
        : `- I do ${habit.activity}.`
    );
  }

  return rules;
}

function progressionRules(settings: CoachSettings): string[] {
  const { weeks } = settings;
  const rules = [
    "- Review the training history to establish a baseline.",
    `- ${weeks - 2 === 1 ? "Week 1" : `Weeks 1–${weeks - 2}`} of the new block should progress gradually from that baseline.`,
    `- Week ${weeks - 1} may be the highest load/volume.`,
    `- Week ${weeks} should be a deload (10–20% volume reduction).`,
    "- Do not exceed safe progression rules for running, strength, or swimming.",
    "- Each day should work different training focuses.",
  ];
  if (settings.swimDay) {
    rules.push(`- Include at least one swimming session on ${settings.swimDay}.`);
  }
  return rules;
}

export function buildPrompt({
  markdownContext,
  yamlContext,
  settings,
  profile,
  startDate = dayjs(),
}: PromptInput): string {
  const starts = weekStartDates(startDate, settings.weeks);
  const exercisesPerSession = settings.blocksPerSession * settings.exercisesPerBlock;
  const blockLabels = Array.from(
    { length: settings.blocksPerSession },
    (_, i) => `"Block ${i + 1}"`
  ).join(", ");
  const protectedAreas = (profile?.injuries.injuries ?? [])
    .filter((injury) => injury.status === InjuryStatus.ONGOING && injury.area)
    .map((injury) => injury.area);
  const protection =
    protectedAreas.length > 0
      ? ` and protection of my ${protectedAreas.join(", ")}`
      : "";

  return `SYSTEM / ROLE

You are my Gym Coach AI Agent. You generate training sessions that prioritize health, strength, flexibility, and endurance. You must respect my constraints and avoid sudden spikes in workload.

DATA SOURCES (READ FIRST)

1) Read the Markdown notes below (source of truth): goals, skills, injuries and availability.
2) Read and analyze all YAML training sessions below. Use them to learn my personal trainer's session style and formatting patterns (exercise order, blocks, typical rep ranges, typical loads, rounding, warm-up structure). Keep continuity with my trainer's approach.

RULES

- Output must be a ${settings.weeks}-week plan for my available days (${settings.availableDays.map(shortDay).join(", ")}).
- Each session must fit within ${settings.sessionMinutes} minutes including warm-up.
- Each session must include ${exercisesPerSession} exercises in total, divided into ${settings.blocksPerSession} blocks of ${settings.exercisesPerBlock} exercises each.
- Each block must have a short title (e.g., "Strength Upper Body", "Core + Mobility", "Endurance Run").
- Each exercise must have Load, Reps, and Notes fields.
- Use only exercises that I can do with my available equipment and mobility.
- I have: ${settings.equipment.join(", ")}.
${profileRules(settings, profile).join("\n")}
- Running volume must increase gradually. Avoid sudden increases in impact or intensity.

AUTO-PROGRESSION

${progressionRules(settings).join("\n")}

OUTPUT FORMAT

Return ONLY CSV text, one block per week:

1) A title line for each week: "${weekTitle("YYYY-MM-DD")}".
2) The header line, then one line per exercise.
NO extra commentary. NO markdown tables. NO bullets. No explanations.

Week start dates: ${starts.join(", ")}

CSV columns must be exactly:
${PLAN_COLUMNS.join(",")}

Definitions:

- Day: ${settings.availableDays.join("/")}
- Session Title: short session name (e.g., "Strength Lower + Core")
- Exercise: exercise name in English and Spanish
- Block: ${blockLabels} (${settings.exercisesPerBlock} exercises each)
- Load: write as kg (e.g., "40 kg"), or "bodyweight"
- Reps: reps per round or time (e.g., "10-12" or "25 min")
- Notes: brief cues or rest times
Quote any field that contains a comma.

QUALITY CHECK BEFORE OUTPUT

- Ensure every row has ALL columns filled
- Ensure each session fits ${settings.sessionMinutes} minutes
- Ensure gradual running progression${protection}

========================
MARKDOWN CONTEXT
========================
${markdownContext}

========================
YAML TRAINING HISTORY (REFERENCE ONLY)
========================
${yamlContext}
`;
}
