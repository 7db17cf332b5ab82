export type IsoDateTime = string;

export type EmbeddingVector = number[];

export type RelevanceCategory =
  | 'Highly Relevant'
  | 'Moderately Relevant'
  | 'Somewhat Relevant'
  | 'Low Relevance';

export type PaperStatus = 'to_read' | 'reading' | 'read' | 'discarded';

export const PAPER_STATUSES: readonly PaperStatus[] = ['to_read', 'reading', 'read', 'discarded'];

export interface CategoryThreshold {
  min: number; // inclusive
  category: RelevanceCategory;
}

export interface AppConfig {
  storage: {
    root: string;
  };
  context: {
    file: string;
  };
  encoder: {
    models: string[]; // preferred first, fallbacks after
    endpoint: string;
    apiKeyEnv: string | null;
    timeoutMs: number;
  };
  scoring: {
    thresholds: CategoryThreshold[];
    updateTolerance: number; // percentage points
  };
  arxiv: {
    maxResults: number;
  };
}

export interface Snippet {
  id: string;
  content: string;
  source: string | null;
  paperId: string | null;
  addedAt: IsoDateTime;
}

export interface Paper {
  id: string;
  title: string;
  abstract: string;
  notes: string;
  arxivId: string | null;
  authors: string[];
  categories: string[];
  publishedAt: string | null;
  pdfPath: string | null;
  relevanceScore: number; // clamped to [0, 100]
  rawScore: number; // similarity * 100, unclamped
  category: RelevanceCategory;
  status: PaperStatus;
  embedding: EmbeddingVector | null;
  embeddingNeedsUpdate: boolean;
  embeddingUpdatedAt: IsoDateTime | null;
  scoredModel: string;
  contextVersion: string;
  recalculatedAt: IsoDateTime | null;
  addedAt: IsoDateTime;
  updatedAt: IsoDateTime;
}
