export type SectionType =
  | 'main_content'
  | 'article'
  | 'sidebar'
  | 'navigation'
  | 'header'
  | 'footer'
  | 'comments'
  | 'related_links'
  | 'advertisements'
  | 'unknown';

export type ExtractionMode = 'article' | 'product' | 'forum' | 'list_page' | 'documentation' | 'generic';

export type ConfidenceLevel = 'very_high' | 'high' | 'medium' | 'low' | 'very_low';

export interface SectionStats {
  textLength: number;
  wordCount: number;
  linkCount: number;
  imageCount: number;
  paragraphCount: number;
  headingCount: number;
  densityScore: number;
  linkDensity: number;
  elementCount: number;
}

export interface Section {
  selector: string;
  semanticType: SectionType;
  score: number;
  confidence: number;
  stats: SectionStats;
  previewText: string;
  xpath?: string;
}

export interface Recommendations {
  bestMainContentSelector?: string;
  bestTitleSelector?: string;
  bestCommentsSelector?: string;
  suggestedMode: ExtractionMode;
  confidenceLevel: ConfidenceLevel;
}

export interface ScoringDetail {
  selector: string;
  semanticType: SectionType;
  terms: Record<string, number>;
  finalScore: number;
}

export interface DebugInfo {
  totalElements: number;
  analyzedSections: number;
  processingTimeMs: number;
  scoringDetails: ScoringDetail[];
}

export interface StructureAnalysis {
  url: string;
  timestamp: string;
  sections: Section[];
  recommendations: Recommendations;
  debugInfo?: DebugInfo;
}

export interface ScoringWeights {
  content: {
    density: number;
    linkDensity: number;
    paragraphs: number;
    textLength: number;
    paragraphCap: number;
    textLengthCap: number;
  };
  sidebar: {
    links: number;
    shortText: number;
    linkCap: number;
    textLengthCap: number;
  };
  navigation: {
    linkDensity: number;
    shortText: number;
    textLengthCap: number;
  };
  comments: {
    elements: number;
    textDeviation: number;
    elementCap: number;
    textTarget: number;
    textDeviationScale: number;
  };
  fallbackScore: number;
  confidence: {
    base: number;
    words: number;
    wordCap: number;
    paragraphs: number;
    paragraphCap: number;
    balancedLinkBonus: number;
    balancedLinkMin: number;
    balancedLinkMax: number;
  };
}

export type ScoringWeightOverrides = {
  [K in keyof ScoringWeights]?: ScoringWeights[K] extends number ? number : Partial<ScoringWeights[K]>;
};

export interface AnalyzerOptions {
  minContentLength?: number;
  detectComments?: boolean;
  debugMode?: boolean;
  weights?: ScoringWeightOverrides;
}
