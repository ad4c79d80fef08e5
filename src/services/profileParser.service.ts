import path from "path";
import {
  BODY_AREAS,
  type BodyArea,
  ExperienceLevel,
  InjuryStatus,
  PAIN_SCALE_MAX,
  PainFrequency,
  Proficiency,
} from "../common/common-enum";
import { VaultLoader, vaultLoader } from "../loaders/vaultLoader";
import type { AthleteProfile } from "../types/model/athleteProfile.model";
import type { InjuryNotes, InjuryRecord } from "../types/model/injury.model";
import type { NoteSection } from "../types/model/noteSection.model";
import type {
  ConditioningHabit,
  ExerciseFamiliarity,
  MobilityStatus,
  SkillNotes,
} from "../types/model/skill.model";
import { logger } from "../utils/logger";
import { splitSections } from "../utils/markdown";

export const INJURY_NOTES_FILE = "injuries.md";
export const SKILL_NOTES_FILE = "skills.md";

export interface ParseResult<T> {
  notes: T;
  warnings: string[];
}

type InjurySectionKind = "considerations" | "pain" | "status" | "past";
type SkillSectionKind = "mobility" | "conditioning" | "exercises" | "history";

const INJURY_SECTIONS: [InjurySectionKind, RegExp][] = [
  ["considerations", /consideration|constraint|guidance|precaution/i],
  ["pain", /pain/i],
  ["status", /status|current/i],
  ["past", /injur|history|past/i],
];

const SKILL_SECTIONS: [SkillSectionKind, RegExp][] = [
  ["mobility", /mobility|flexib/i],
  ["conditioning", /endurance|conditioning|cardio/i],
  ["exercises", /exercise|know|skill|lift|movement/i],
  ["history", /history|background/i],
];

const AREA_SYNONYMS: Record<BodyArea, RegExp> = {
  ankle: /\bankles?\b/i,
  knee: /\bknees?\b/i,
  hip: /\bhips?\b/i,
  back: /\b(?:lower back|upper back|back|spine|lumbar)\b/i,
  shoulder: /\bshoulders?\b/i,
  wrist: /\bwrists?\b/i,
  elbow: /\belbows?\b/i,
  neck: /\bneck\b/i,
};

const PAIN_SCORE = /(?<![\d.])(-?\d+(?:\.\d+)?)\s*\/\s*7\b/;
const RESOLVED =
  /\b(?:resolved|healed|recovered|pain[- ]free|no (?:more |longer )?pain|fully better)\b/gi;
const ONGOING =
  /\b(?:pain|painful|ache|aches|sore|soreness|discomfort|flares?|swelling|unstable)\b/i;
const INTERMITTENT =
  /\b(?:occasional|occasionally|intermittent|intermittently|sometimes|now and then|on and off|from time to time)\b/i;
const CONSTANT =
  /\b(?:constant|constantly|always|every day|daily|persistent|chronic)\b/i;
const ONSET_AGO =
  /\b(?:\d+|a|an|one|two|three|four|five|few|several)\s+(?:years?|months?|weeks?)\s+ago\b/i;
const ONSET_YEAR = /\b(?:19|20)\d{2}\b/;

const NEEDS_TEACHING =
  /\b(?:teach|teaching|taught|learn|learning|unfamiliar|new to|not sure)\b/i;
const NOTE_SEPARATOR = /\s*(?:\(|\s[-–—]\s|:\s)/;

const ACTIVITIES: [string, RegExp][] = [
  ["swimming", /\bswim/i],
  ["running", /\b(?:run|running|jog|jogging)\b/i],
  ["cycling", /\b(?:cycl\w*|bike|biking)\b/i],
  ["rowing", /\brow(?:ing|er)?\b/i],
  ["walking", /\bwalk/i],
  ["hiking", /\bhik/i],
];
const HABIT_FREQUENCY =
  /\b(?:at least\s+)?(?:once|twice|three times|\d+\s*(?:x|times))\s*(?:a|per)\s*week\b|\b(?:daily|every day|weekly)\b/i;
const LEVELS: [ExperienceLevel, RegExp][] = [
  [ExperienceLevel.BEGINNER, /\b(?:beginner|starting|just started|new to)\b/i],
  [ExperienceLevel.INTERMEDIATE, /\bintermediate\b/i],
  [ExperienceLevel.ADVANCED, /\b(?:advanced|experienced|competitive)\b/i],
];

const MOBILITY_CLEAR =
  /\b(?:no|without)\s+(?:\w+\s+)?(?:limitations?|restrictions?|issues)\b|\bfull range\b|\bunrestricted\b/i;
const MOBILITY_LIMITED =
  /\b(?:limit|limited|limitations?|restrict|restricted|restrictions?|tight|tightness|stiff|stiffness)\b/i;

const CODE_SPAN = /`([^`]+)`/;

export function detectBodyArea(text: string): BodyArea | undefined {
  return BODY_AREAS.find((area) => AREA_SYNONYMS[area].test(text));
}

/**
 * Lines naming the given area, or, when none does, the lines naming no area
 * at all. Lines about other areas never leak into a record.
 */
function linesFor(lines: string[], area: BodyArea | undefined): string[] {
  if (area) {
    const matching = lines.filter((line) => AREA_SYNONYMS[area].test(line));
    if (matching.length > 0) return matching;
  }
  return lines.filter((line) => detectBodyArea(line) === undefined);
}

/**
 * A level-1 heading above deeper ones is the document title, and the text
 * under it is an introduction rather than one of the note's categories.
 */
function contentSections(sections: NoteSection[]): NoteSection[] {
  const hasSubsections = sections.some((section) => section.level > 1);
  return hasSubsections
    ? sections.filter((section) => section.level !== 1)
    : sections;
}

function classify<K extends string>(
  sections: NoteSection[],
  matchers: [K, RegExp][]
): Map<K, string[]> {
  const grouped = new Map<K, string[]>();
  for (const section of contentSections(sections)) {
    const match = matchers.find(([, pattern]) => pattern.test(section.title));
    if (!match) continue;
    const [kind] = match;
    grouped.set(kind, [...(grouped.get(kind) ?? []), ...section.entries]);
  }
  return grouped;
}

export function splitNote(text: string): { name: string; notes?: string } {
  const separator = NOTE_SEPARATOR.exec(text);
  if (!separator || separator.index === 0) {
    return { name: text.trim() };
  }
  const name = text.slice(0, separator.index).trim();
  const notes = text
    .slice(separator.index + separator[0].length)
    .replace(/\)\s*$/, "")
    .trim();
  return notes ? { name, notes } : { name };
}

function injuryStatus(text: string): InjuryStatus {
  const withoutResolved = text.replace(RESOLVED, "");
  if (ONGOING.test(withoutResolved)) return InjuryStatus.ONGOING;
  RESOLVED.lastIndex = 0;
  if (RESOLVED.test(text)) return InjuryStatus.RESOLVED;
  return InjuryStatus.UNKNOWN;
}

function painFrequency(text: string): PainFrequency | undefined {
  if (INTERMITTENT.test(text)) return PainFrequency.INTERMITTENT;
  if (CONSTANT.test(text)) return PainFrequency.CONSTANT;
  return undefined;
}

function onsetOf(description: string): string | undefined {
  return (ONSET_AGO.exec(description) ?? ONSET_YEAR.exec(description))?.[0];
}

/**
 * Extracts injury records from the "Injuries & Constraints" note. Nothing in
 * the note is required; unreadable or contradictory values become warnings.
 */
export function parseInjuryNotes(markdown: string): ParseResult<InjuryNotes> {
  const warnings: string[] = [];
  const grouped = classify(splitSections(markdown), INJURY_SECTIONS);

  const past = grouped.get("past") ?? [];
  const statusLines = grouped.get("status") ?? [];
  const painLines = grouped.get("pain") ?? [];
  const considerations = grouped.get("considerations") ?? [];

  const injuries = past.map((description): InjuryRecord => {
    const area = detectBodyArea(description);
    const relevantStatus = linesFor(statusLines, area);
    const relevantPain = linesFor(painLines, area);
    const statusText =
      relevantStatus.length > 0 ? relevantStatus.join(" ") : description;
    const evidence = [...relevantStatus, ...relevantPain, description];

    const record: InjuryRecord = {
      description,
      status: injuryStatus(statusText),
      constraints: linesFor(considerations, area),
    };
    if (area) record.area = area;

    const onset = onsetOf(description);
    if (onset) record.onset = onset;

    const frequency = painFrequency(evidence.join(" "));
    if (frequency) record.frequency = frequency;

    const score = evidence
      .map((line) => PAIN_SCORE.exec(line))
      .find((match) => match !== null);
    if (score) {
      const value = parseFloat(score[1]);
      if (value >= 0 && value <= PAIN_SCALE_MAX) {
        record.painIntensity = value;
      } else {
        warnings.push(
          `Pain score ${score[0].replace(/\s+/g, "")} for "${description}" is outside the 0-${PAIN_SCALE_MAX} scale; ignored`
        );
      }
    }

    if (
      record.status === InjuryStatus.RESOLVED &&
      record.painIntensity !== undefined &&
      record.painIntensity > 0
    ) {
      warnings.push(
        `"${description}" is marked resolved but reports pain ${record.painIntensity}/${PAIN_SCALE_MAX}`
      );
    }

    return record;
  });

  return { notes: { injuries, considerations }, warnings };
}

function exerciseFamiliarity(entry: string): ExerciseFamiliarity {
  const { name, notes } = splitNote(entry);
  const record: ExerciseFamiliarity = {
    name,
    proficiency: NEEDS_TEACHING.test(entry)
      ? Proficiency.NEEDS_TEACHING
      : Proficiency.KNOWN,
  };
  if (notes) record.notes = notes;
  return record;
}

function conditioningHabit(entry: string): ConditioningHabit {
  const activity =
    ACTIVITIES.find(([, pattern]) => pattern.test(entry))?.[0] ??
    splitNote(entry).name;
  const habit: ConditioningHabit = { activity, notes: entry };

  const frequency = HABIT_FREQUENCY.exec(entry);
  if (frequency) habit.frequency = frequency[0].toLowerCase();

  const level = LEVELS.find(([, pattern]) => pattern.test(entry));
  if (level) habit.level = level[0];

  return habit;
}

function mobilityStatus(entries: string[]): MobilityStatus {
  const limited = entries.filter(
    (entry) => !MOBILITY_CLEAR.test(entry) && MOBILITY_LIMITED.test(entry)
  );
  const areas: BodyArea[] = [];
  for (const entry of limited) {
    const area = detectBodyArea(entry);
    if (area && !areas.includes(area)) areas.push(area);
  }
  return {
    description: entries.join(" "),
    restricted: limited.length > 0,
    areas,
  };
}

/** Extracts familiarity, conditioning and mobility from the skills note. */
export function parseSkillNotes(markdown: string): ParseResult<SkillNotes> {
  const grouped = classify(splitSections(markdown), SKILL_SECTIONS);

  const notes: SkillNotes = {
    exercises: (grouped.get("exercises") ?? []).map(exerciseFamiliarity),
    conditioning: (grouped.get("conditioning") ?? []).map(conditioningHabit),
    mobility: mobilityStatus(grouped.get("mobility") ?? []),
  };

  const reference = (grouped.get("history") ?? [])
    .map((entry) => CODE_SPAN.exec(entry))
    .find((match) => match !== null);
  if (reference) notes.historyReference = reference[1];

  return { notes, warnings: [] };
}

export class ProfileParserService {
  constructor(private readonly loader: VaultLoader = vaultLoader) {}

  async loadAthleteProfile(dataDir: string): Promise<AthleteProfile> {
    const warnings: string[] = [];

    const injuryText = await this.loader.readOptional(
      path.join(dataDir, INJURY_NOTES_FILE)
    );
    const skillText = await this.loader.readOptional(
      path.join(dataDir, SKILL_NOTES_FILE)
    );

    if (injuryText === null) {
      warnings.push(`${INJURY_NOTES_FILE} not found in ${dataDir}`);
    }
    if (skillText === null) {
      warnings.push(`${SKILL_NOTES_FILE} not found in ${dataDir}`);
    }

    const injuries = parseInjuryNotes(injuryText ?? "");
    const skills = parseSkillNotes(skillText ?? "");
    warnings.push(...injuries.warnings, ...skills.warnings);

    if (warnings.length > 0) {
      logger.warn(`Athlete profile loaded with ${warnings.length} warning(s)`);
    }

    return {
      injuries: injuries.notes,
      skills: skills.notes,
      warnings,
      sources: {
        injuries: injuryText !== null,
        skills: skillText !== null,
      },
    };
  }
}

export const profileParserService = new ProfileParserService();
