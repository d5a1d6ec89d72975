export const QUALITY_RATINGS = ["deprecated", "supplemental", "reference", "preferred"] as const;

export type QualityRating = (typeof QUALITY_RATINGS)[number];

export const DEFAULT_QUALITY_RATING: QualityRating = "reference";

export type ChunkMetadata = {
  document_id?: string;
  quality_rating?: QualityRating;
  tags?: string[];
  format?: string;
  created_date?: string;
  modified_date?: string;
  filename?: string;
  [key: string]: unknown;
};

export type Chunk = Readonly<{
  id: string;
  content: string;
  document_id: string;
  metadata: Readonly<ChunkMetadata>;
}>;

/**
 * Conjunction of optional constraints. An absent filter, or one with no
 * fields set, matches every chunk.
 */
export type MetadataFilter = {
  quality_rating?: QualityRating;
  format?: string;
  /** Any-of, case-insensitive. */
  tags?: string[];
};

export const isQualityRating = (value: unknown): value is QualityRating =>
  QUALITY_RATINGS.some((rating) => rating === value);
