export type OutlineSection = {
  title: string;
  description: string;
  /** 0–100, written by coverage analysis. */
  coverage_pct: number;
  source_count: number;
  notes: string;
  subsections: OutlineSection[];
};

export type Outline = {
  title: string;
  keywords: string[];
  sections: OutlineSection[];
  avg_coverage: number;
  low_coverage_sections: number;
  validation_notes: string;
};

export type OutlineSectionInput = Partial<Omit<OutlineSection, "subsections">> & {
  title: string;
  subsections?: OutlineSectionInput[];
};

export const createOutlineSection = (input: OutlineSectionInput): OutlineSection => ({
  title: input.title,
  description: input.description ?? "",
  coverage_pct: input.coverage_pct ?? 0,
  source_count: input.source_count ?? 0,
  notes: input.notes ?? "",
  subsections: (input.subsections ?? []).map(createOutlineSection)
});

export const createOutline = (input: {
  title: string;
  keywords?: string[];
  sections?: OutlineSectionInput[];
}): Outline => ({
  title: input.title,
  keywords: [...(input.keywords ?? [])],
  sections: (input.sections ?? []).map(createOutlineSection),
  avg_coverage: 0,
  low_coverage_sections: 0,
  validation_notes: ""
});
