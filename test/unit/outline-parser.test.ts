import { describe, expect, it } from "vitest";
import { parseOutlineMarkdown } from "../../src/modules/outline/outline-parser.js";
import { calculateOutlineStats, flattenSections } from "../../src/modules/outline/outline-stats.js";
import { createOutline } from "../../src/modules/outline/types.js";

describe("modules/outline/outline-parser", () => {
  it("reads sections, subsections and descriptions", () => {
    const sections = parseOutlineMarkdown(
      [
        "# Incident Response",
        "Preamble is ignored",
        "## Detection",
        "How alerts reach people.",
        "Paging rules.",
        "### Alert routing",
        "Escalation paths",
        "",
        "## Recovery"
      ].join("\n")
    );

    expect(sections).toHaveLength(2);
    expect(sections[0].title).toBe("Detection");
    expect(sections[0].description).toBe("How alerts reach people. Paging rules.");
    expect(sections[0].subsections[0]).toMatchObject({ title: "Alert routing", description: "Escalation paths" });
    expect(sections[1]).toMatchObject({ title: "Recovery", description: "", coverage_pct: 0, subsections: [] });
  });

  it("ignores subsections before the first section", () => {
    expect(parseOutlineMarkdown("### Orphan\r\n## Real")).toHaveLength(1);
  });
});

describe("modules/outline/outline-stats", () => {
  it("averages coverage over every section in pre-order", () => {
    const outline = createOutline({
      title: "Stats",
      sections: [
        { title: "A", coverage_pct: 40, subsections: [{ title: "A.1", coverage_pct: 100 }] },
        { title: "B", coverage_pct: 10 }
      ]
    });

    calculateOutlineStats(outline);

    expect(flattenSections(outline.sections).map((section) => section.title)).toEqual(["A", "A.1", "B"]);
    expect(outline.avg_coverage).toBe(50);
    expect(outline.low_coverage_sections).toBe(2);
  });

  it("zeroes the aggregates for an empty outline", () => {
    const outline = createOutline({ title: "Empty" });
    outline.avg_coverage = 42;

    calculateOutlineStats(outline);

    expect(outline.avg_coverage).toBe(0);
    expect(outline.low_coverage_sections).toBe(0);
  });
});
