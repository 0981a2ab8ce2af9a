export const REVIEW_DIMENSIONS = [
  'readability',
  'performance',
  'security',
  'maintainability',
  'best-practices',
] as const;

export type ReviewDimension = (typeof REVIEW_DIMENSIONS)[number];

export interface ReviewConfig {
  apiBaseUrl: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  timeout: number; // ms
  maxChars: number; // total source characters sent per request
  chunkSize: number; // characters per chunk when scanning
  maxFiles: number;
  maxFileSize: number; // bytes
  includePatterns: string[];
  excludePatterns: string[];
  dimensions: ReviewDimension[];
}

export interface ReviewRequest {
  source: string;
  language?: string;
  dimensions: ReviewDimension[];
}

export interface CommitRecord {
  hash: string;
  message: string;
  author: string;
  date: string;
  diff: string;
}

export type ChangeScope = 'staged' | 'working';

export interface SourceFile {
  path: string;
  language: string;
  content: string;
  size: number;
}

export interface ComplexityEstimate {
  time?: string;
  space?: string;
}

interface ResultBase {
  model: string;
  text: string;
  createdAt: string;
}

export interface CommitReviewResult extends ResultBase {
  kind: 'commits';
  repository: string;
  range: string;
  commits: Array<Omit<CommitRecord, 'diff'>>;
}

export interface ChangesReviewResult extends ResultBase {
  kind: 'changes';
  repository: string;
  scope: ChangeScope;
}

export interface FileReviewResult extends ResultBase {
  kind: 'file';
  path: string;
  language: string;
  size: number;
  lines: number;
}

export interface AlgorithmResult extends ResultBase {
  kind: 'algorithms';
  language: string;
  task?: string;
  complexity?: ComplexityEstimate;
}

export type ReviewResult =
  | CommitReviewResult
  | ChangesReviewResult
  | FileReviewResult
  | AlgorithmResult;

export type ScanChunk =
  | { file: string; part: number; parts: number; text: string }
  | { file: string; part: number; parts: number; error: string };

export interface ScanReport {
  repository: string;
  model: string;
  totalFiles: number;
  filesAnalyzed: string[];
  chunks: ScanChunk[];
  errors: Array<{ file: string; error: string }>;
}

export interface ChatMessage {
  role: 'user' | 'model';
  text: string;
}

export interface ModelRequest {
  system?: string;
  messages: ChatMessage[];
}

export interface HealthCheck {
  isHealthy: boolean;
  error?: string;
}
