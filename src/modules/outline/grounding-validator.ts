import { logInfo } from "../../observability/logger.js";
import { calculateOutlineStats, flattenSections } from "./outline-stats.js";
import type { Outline, OutlineSection } from "./types.js";

export const KEYWORD_MATCH_REJECTION_RATIO = 0.5;
export const LOW_COVERAGE_PRUNE_THRESHOLD = 5.0;
export const COVERAGE_WARNING_THRESHOLD = 15.0;
const TITLE_PREVIEW_COUNT = 5;
const PRUNED_PREVIEW_COUNT = 3;

export type GroundingReport = {
  rejected: boolean;
  matchedSections: number;
  totalSections: number;
  keywordMatchRatio: number;
  prunedTitles: string[];
  prunedCount: number;
  coverageWarning: boolean;
};

export interface GroundingOptions {
  requestId?: string;
  logInfo?: typeof logInfo;
}

const normalizeKeywords = (keywords: readonly string[]): string[] =>
  keywords.map((keyword) => keyword.trim().toLowerCase()).filter((keyword) => keyword.length > 0);

const containsKeyword = (text: string, keywords: readonly string[]): boolean => {
  const haystack = text.toLowerCase();
  return keywords.some((keyword) => haystack.includes(keyword));
};

const sectionMatchesKeywords = (section: OutlineSection, keywords: readonly string[]): boolean =>
  containsKeyword(`${section.title} ${section.description}`, keywords);

export const filterByKeywordMatch = (sections: readonly OutlineSection[], keywords: readonly string[]): OutlineSection[] => {
  const normalized = normalizeKeywords(keywords);
  const filter = (list: readonly OutlineSection[]): OutlineSection[] =>
    list
      .filter((section) => sectionMatchesKeywords(section, normalized))
      .map((section) => {
        section.subsections = filter(section.subsections);
        return section;
      });
  return filter(sections);
};

const isPrunable = (section: OutlineSection, keywords: readonly string[]): boolean =>
  section.coverage_pct > 0 &&
  section.coverage_pct < LOW_COVERAGE_PRUNE_THRESHOLD &&
  !containsKeyword(section.title, keywords);

const pruneLowCoverage = (sections: readonly OutlineSection[], keywords: readonly string[]): OutlineSection[] =>
  sections
    .filter((section) => !isPrunable(section, keywords))
    .map((section) => {
      section.subsections = pruneLowCoverage(section.subsections, keywords);
      return section;
    });

const appendNote = (outline: Outline, note: string): void => {
  outline.validation_notes = outline.validation_notes ? `${outline.validation_notes}\n\n${note}` : note;
};

const buildRejectionNote = (
  outline: Outline,
  matched: number,
  total: number,
  ratio: number,
  keywords: readonly string[]
): string => {
  const titles = outline.sections.slice(0, TITLE_PREVIEW_COUNT).map((section) => `  - ${section.title}`);
  const more = outline.sections.length > TITLE_PREVIEW_COUNT ? "\n  ..." : "";
  return [
    `OUTLINE REJECTED: Only ${matched}/${total} sections (${Math.round(ratio * 100)}%) match provided keywords.`,
    "The outline does not appear to be grounded in the corpus.",
    `Keywords provided: ${keywords.join(", ")}`,
    `Outline generated:\n${titles.join("\n")}${more}`,
    [
      "Recommendations:",
      `  1. Search the corpus directly for: ${keywords[0] ?? ""}`,
      "  2. Verify the corpus contains material about this topic",
      "  3. Try keywords that better match corpus content",
      "  4. Add more source documents if the corpus is too sparse"
    ].join("\n")
  ].join("\n\n");
};

const buildPruneNote = (removed: number, titles: readonly string[]): string => {
  const listed = titles.slice(0, PRUNED_PREVIEW_COUNT).map((title) => `  - ${title}`);
  const more = titles.length > PRUNED_PREVIEW_COUNT ? `\n  ... and ${titles.length - PRUNED_PREVIEW_COUNT} more` : "";
  const scope = removed > titles.length ? " (including subsections)" : "";
  return `REMOVED ${removed} sections${scope} with very low coverage (<${LOW_COVERAGE_PRUNE_THRESHOLD}%) unrelated to keywords:\n${listed.join("\n")}${more}`;
};

const buildCoverageWarning = (avgCoverage: number): string =>
  [
    `COVERAGE WARNING: Remaining outline has low corpus coverage (${avgCoverage.toFixed(1)}%). Consider:`,
    "  1. Adding more source documents to the corpus",
    "  2. Refining keywords to better match corpus content",
    "  3. Verifying section titles relate directly to the topic"
  ].join("\n");

/**
 * Applies the keyword gate, low-coverage pruning and the coverage advisory,
 * in that order. Mutates the outline: sections are replaced, notes appended
 * and aggregates recomputed after every change.
 */
export const validateOutlineGrounding = (
  outline: Outline,
  keywords: readonly string[] = outline.keywords,
  options: GroundingOptions = {}
): GroundingReport => {
  const log = options.logInfo ?? logInfo;
  const normalized = normalizeKeywords(keywords);
  const provided = keywords.map((keyword) => keyword.trim()).filter((keyword) => keyword.length > 0);
  calculateOutlineStats(outline);

  const all = flattenSections(outline.sections);
  const matched = all.filter((section) => sectionMatchesKeywords(section, normalized)).length;
  const total = all.length;
  const ratio = total > 0 ? matched / total : 0;
  let rejected = false;

  if (normalized.length > 0 && total > 0 && ratio < KEYWORD_MATCH_REJECTION_RATIO) {
    rejected = true;
    appendNote(outline, buildRejectionNote(outline, matched, total, ratio, provided));
    outline.sections = filterByKeywordMatch(outline.sections, normalized);
    calculateOutlineStats(outline);
  }

  const prunedTitles = flattenSections(outline.sections)
    .filter((section) => isPrunable(section, normalized))
    .map((section) => section.title);
  let prunedCount = 0;
  if (prunedTitles.length > 0) {
    const before = flattenSections(outline.sections).length;
    outline.sections = pruneLowCoverage(outline.sections, normalized);
    prunedCount = before - flattenSections(outline.sections).length;
    appendNote(outline, buildPruneNote(prunedCount, prunedTitles));
    calculateOutlineStats(outline);
  }

  const coverageWarning = outline.avg_coverage > 0 && outline.avg_coverage < COVERAGE_WARNING_THRESHOLD;
  if (coverageWarning) {
    appendNote(outline, buildCoverageWarning(outline.avg_coverage));
  }

  log("outline.grounding.validated", { requestId: options.requestId ?? null }, {
    rejected,
    matched_sections: matched,
    total_sections: total,
    keyword_match_ratio: ratio,
    pruned_count: prunedCount,
    coverage_warning: coverageWarning,
    remaining_sections: flattenSections(outline.sections).length
  });

  return {
    rejected,
    matchedSections: matched,
    totalSections: total,
    keywordMatchRatio: ratio,
    prunedTitles,
    prunedCount,
    coverageWarning
  };
};
