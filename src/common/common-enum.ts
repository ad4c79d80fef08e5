export enum Weekday {
  MONDAY = "Monday",
  TUESDAY = "Tuesday",
  WEDNESDAY = "Wednesday",
  THURSDAY = "Thursday",
  FRIDAY = "Friday",
  SATURDAY = "Saturday",
  SUNDAY = "Sunday",
}

export enum InjuryStatus {
  RESOLVED = "resolved",
  ONGOING = "ongoing",
  UNKNOWN = "unknown",
}

export enum PainFrequency {
  INTERMITTENT = "intermittent",
  CONSTANT = "constant",
}

export enum Proficiency {
  KNOWN = "known",
  NEEDS_TEACHING = "needs_teaching",
}

export enum ExperienceLevel {
  BEGINNER = "beginner",
  INTERMEDIATE = "intermediate",
  ADVANCED = "advanced",
}

export const PAIN_SCALE_MAX = 7;

export const BODY_AREAS = [
  "ankle",
  "knee",
  "hip",
  "back",
  "shoulder",
  "wrist",
  "elbow",
  "neck",
] as const;

export type BodyArea = (typeof BODY_AREAS)[number];
