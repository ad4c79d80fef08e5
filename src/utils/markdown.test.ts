import { describe, expect, it } from "vitest";
import { splitSections } from "./markdown";

describe("splitSections", () => {
  it("groups list items under their heading and drops empty sections", () => {
    const markdown = [
      "Intro line",
      "",
      "# Title",
      "",
      "## Known Exercises",
      "- **Deadlift**",
      "* Bench Press",
      "1. Barbell Row",
      "- [x] Plank",
      "",
      "---",
      "",
      "## Mobility",
      "No limitations.",
      "Full range.",
    ].join("\n");

    expect(splitSections(markdown)).toEqual([
      { title: "", level: 0, entries: ["Intro line"] },
      {
        title: "Known Exercises",
        level: 2,
        entries: ["Deadlift", "Bench Press", "Barbell Row", "Plank"],
      },
      { title: "Mobility", level: 2, entries: ["No limitations.", "Full range."] },
    ]);
  });

  it("prefers list items over plain lines within a section", () => {
    expect(splitSections("## Status\nSome prose\n- Ankle fine\n")).toEqual([
      { title: "Status", level: 2, entries: ["Ankle fine"] },
    ]);
  });

  it("skips fenced code blocks", () => {
    const markdown = [
      "## Known Exercises",
      "- Deadlift",
      "```",
      "# not a heading",
      "- not an item",
      "```",
      "- Squat",
    ].join("\n");

    expect(splitSections(markdown)).toEqual([
      { title: "Known Exercises", level: 2, entries: ["Deadlift", "Squat"] },
    ]);
  });
});
