export const DOCUMENT_TYPES = [
  'Thesis',
  'Synopsis',
  'Dissertation',
  'ResearchPaper',
  'LiteratureReview',
  'ResearchProposal',
  'AcademicReport',
] as const;

export type DocumentType = typeof DOCUMENT_TYPES[number];

export const ACADEMIC_LEVELS = ['Undergraduate', 'Masters', 'PhD'] as const;

export type AcademicLevel = typeof ACADEMIC_LEVELS[number];

export const CITATION_STYLES = ['apa', 'harvard', 'mla', 'ieee'] as const;

export type CitationStyle = typeof CITATION_STYLES[number];

export const SECTION_ROLES = [
  'abstract',
  'executive_summary',
  'introduction',
  'background',
  'objectives',
  'research_questions',
  'literature_review',
  'theoretical_framework',
  'methodology',
  'themes',
  'results',
  'findings',
  'analysis',
  'discussion',
  'research_gaps',
  'timeline',
  'expected_outcomes',
  'recommendations',
  'conclusion',
  'references',
] as const;

export type SectionRole = typeof SECTION_ROLES[number];

/**
 * What the caller asks for. Frozen once the pipeline starts.
 */
export interface GenerationRequest {
  readonly topic: string;
  readonly documentType: DocumentType;
  readonly academicLevel: AcademicLevel;
  readonly targetWordCount: number;
  readonly focusAreas: readonly string[];
  readonly additionalRequirements?: string;
  readonly citationStyle?: CitationStyle;
}

/**
 * Raw hit returned by the search capability
 */
export interface SearchHit {
  title: string;
  url: string;
  snippet: string;
  date?: string;
}

export interface ResearchRecord {
  readonly id: string;            // e.g., "S3" - stable within one corpus
  readonly query: string;         // First query that surfaced this record
  readonly url: string;
  readonly title: string;
  readonly snippet: string;
  readonly retrievedAt: string;   // ISO timestamp
  readonly publishedAt?: string;  // As reported by the search service
  readonly dedupKey: string;      // Normalized URL
}

/**
 * Research gathered once per document and read by every section.
 * Buckets hold record ids; a record surfaced by several queries is stored once.
 */
export interface ResearchCorpus {
  queries: string[];
  buckets: Record<string, string[]>;
  records: Record<string, ResearchRecord>;
}

export interface OutlineNode {
  readonly id: string;
  readonly title: string;
  readonly role: SectionRole;
  readonly wordBudget: number;
  readonly ordinal: number;
  readonly searchHint: string | null;
  readonly drafted: boolean;  // false for References: its text is the bibliography
}

export type ScoreDimension = 'readability' | 'burstiness' | 'originality';

export interface ScoreBreakdown {
  composite: number;
  readability: number;
  burstiness: number;
  originality: number;
  failedDimensions: ScoreDimension[];
  gradeLevel: number;         // Flesch-Kincaid grade
  sentenceVariation: number;  // Coefficient of variation of sentence lengths
  repeatedTrigramRatio: number;
  corpusOverlap: number;      // Share of 5-grams found in research snippets
}

export type SectionStatus = 'drafted' | 'accepted' | 'exhausted';

export interface SectionDraft {
  sectionId: string;
  text: string;
  score: number;
  subScores?: ScoreBreakdown;
  attempts: number;
  citedRecordIds: readonly string[];
  status: SectionStatus;
  qualityShortfall: boolean;
}

export interface CitationEntry {
  readonly sourceId: string;
  readonly index: number;         // 1-based, first appearance across the document
  readonly inText: string;
  readonly bibliography: string;
}

export interface CitationTable {
  style: CitationStyle;
  entries: CitationEntry[];
  unresolved: string[];           // Marker ids with no record in the corpus
}

export interface AssembledSection {
  readonly id: string;
  readonly title: string;
  readonly role: SectionRole;
  readonly ordinal: number;
  readonly text: string;
  readonly wordCount: number;
  readonly wordBudget: number;
  readonly score: number | null;  // null for sections that are not drafted
  readonly attempts: number;
  readonly qualityShortfall: boolean;
}

export interface DocumentStats {
  words: number;
  sentences: number;
  paragraphs: number;
}

export interface Document {
  readonly request: GenerationRequest;
  readonly title: string;
  readonly sections: readonly AssembledSection[];
  readonly citations: readonly CitationEntry[];
  readonly bibliography: string;
  readonly tableOfContents: readonly string[];
  readonly markdown: string;
  readonly wordCount: number;
  readonly qualityShortfalls: readonly string[];  // Section ids
  readonly unresolvedMarkers: readonly string[];
  readonly stats: DocumentStats;
  readonly generatedAt: string;
}

/**
 * Progress emitted while a document is being generated
 */
export interface ProgressInfo {
  currentStep: string;
  stepNumber: number;
  totalSteps: number;
  note?: string;  // e.g., "3/7 sections settled"
}

export type OnProgressCallback = (progress: ProgressInfo) => void;
