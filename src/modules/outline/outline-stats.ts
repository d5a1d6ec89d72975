import type { Outline, OutlineSection } from "./types.js";

export const LOW_COVERAGE_THRESHOLD = 50.0;

export const flattenSections = (sections: readonly OutlineSection[]): OutlineSection[] => {
  const flattened: OutlineSection[] = [];
  const visit = (section: OutlineSection): void => {
    flattened.push(section);
    section.subsections.forEach(visit);
  };
  sections.forEach(visit);
  return flattened;
};

export const calculateOutlineStats = (outline: Outline, lowCoverageThreshold = LOW_COVERAGE_THRESHOLD): void => {
  const all = flattenSections(outline.sections);
  if (all.length === 0) {
    outline.avg_coverage = 0.0;
    outline.low_coverage_sections = 0;
    return;
  }

  outline.avg_coverage = all.reduce((sum, section) => sum + section.coverage_pct, 0) / all.length;
  outline.low_coverage_sections = all.filter((section) => section.coverage_pct < lowCoverageThreshold).length;
};
