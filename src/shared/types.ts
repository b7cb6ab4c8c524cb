// === JSON values (input records are schemaless) ===

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/** One line of the input dataset. Non-object lines are kept as-is. */
export type PaperRecord = JsonValue;

// === Normalized views ===

export interface AnnotationBlock {
  title_zh: string;
  summary_zh: string;
  tldr: string;
  highlights: string[];
}

export interface PaperIdentity {
  id: string;
  absUrl: string;
  pdfUrl: string;
}

export interface NormalizedItem extends PaperIdentity {
  index: number;
  displayTitle: string;
  titleZh: string;
  titleEn: string;
  tldr: string;
  summary: string;
  authors: string[];
  categories: string[];
  highlights: string[];
}

export interface DigestDocument {
  date: string;
  count: number;
  items: NormalizedItem[];
}

// === Configuration (.arxiv-digest.yml) ===

export interface DigestConfig {
  output?: {
    candidates?: string[];
    fallback_dir?: string;
  };
  front_matter?: {
    layout?: string;
    tags?: string[];
  };
  tldr_max_chars?: number;
}

export type ResolvedDigestConfig = {
  output: { candidates: string[]; fallback_dir: string };
  front_matter: { layout: string; tags: string[] };
  tldr_max_chars: number;
};

export interface EnvConfig {
  log_level: 'debug' | 'info' | 'warn' | 'error';
  project_root?: string;
}

// === Error Type ===

export type ErrorSeverity = 'critical' | 'high' | 'medium' | 'low';

export type DigestErrorCode = 'E101' | 'E102' | 'E103' | 'E104';

export interface ErrorContext {
  file?: string;
  line?: number;
}

export class DigestError extends Error {
  readonly code: DigestErrorCode;
  readonly severity: ErrorSeverity;
  readonly userMessage?: string;
  readonly context: ErrorContext;
  readonly cause?: Error;

  constructor(opts: {
    code: DigestErrorCode;
    severity: ErrorSeverity;
    message: string;
    userMessage?: string;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super(opts.message);
    this.name = 'DigestError';
    this.code = opts.code;
    this.severity = opts.severity;
    this.userMessage = opts.userMessage;
    this.context = opts.context ?? {};
    this.cause = opts.cause;
  }
}
