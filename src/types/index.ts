// ============================================================================
// Enums
// ============================================================================

/**
 * Declared kind of the input document
 */
export enum InputKind {
  TEXT = 'text',
  PDF = 'pdf',
  DOCX = 'docx'
}

/**
 * Rendered outputs beyond the always-written Markdown and LaTeX files
 */
export enum OutputFormat {
  PDF = 'pdf',
  DOCX = 'docx',
  JSON = 'json'
}

/**
 * How far along the input already is as a resume; steers the rewrite
 */
export enum ResumeMaturity {
  RAW_TEXT = 'raw_text',
  MATURE = 'mature',
  IMMATURE = 'immature'
}

// ============================================================================
// Toolbox
// ============================================================================

export const TOOL_ORDER = [
  'run_input_processor',
  'run_text_modifier',
  'run_resume_generator'
] as const;

export type ToolName = typeof TOOL_ORDER[number];

export function isToolName(value: string): value is ToolName {
  return TOOL_ORDER.some(tool => tool === value);
}

// ============================================================================
// Artifacts
// ============================================================================

export type ArtifactKind = 'markdown' | 'latex' | 'pdf' | 'docx' | 'json';

export type ArtifactName =
  | 'markdown'
  | 'polished_markdown'
  | 'resume.md'
  | 'resume.tex'
  | 'resume.pdf'
  | 'resume.docx'
  | 'resume.json';

/**
 * A named text or file payload produced by exactly one tool
 */
export interface Artifact {
  name: ArtifactName;
  kind: ArtifactKind;
  producedBy: ToolName;
  /** Inline text, for artifacts passed between tools */
  content?: string;
  /** Location on disk, for rendered files */
  path?: string;
}

/**
 * An output format that was requested but not produced
 */
export interface SkippedOutput {
  format: OutputFormat;
  reason: string;
}

// ============================================================================
// Input
// ============================================================================

export interface InputPayload {
  text?: string;
  path?: string;
  kind?: InputKind;
}

// ============================================================================
// Decisions
// ============================================================================

export type PipelineStatus = 'not_started' | 'in_progress' | 'done';

export interface ToDoEntry {
  tool: ToolName;
  rationale: string;
}

export interface Decision {
  todo: ToDoEntry[];
  next: ToolName | null;
  status: PipelineStatus;
  source: 'llm' | 'fallback';
}

// ============================================================================
// Pipeline State
// ============================================================================

export interface PipelineState {
  completed: Set<ToolName>;
  /** Latest Markdown handed from one tool to the next */
  currentText: string | null;
  outputDir: string;
  artifacts: Map<ArtifactName, Artifact>;
  maturity: ResumeMaturity | null;
  decisions: Decision[];
}

export function createPipelineState(outputDir: string): PipelineState {
  return {
    completed: new Set(),
    currentText: null,
    outputDir,
    artifacts: new Map(),
    maturity: null,
    decisions: []
  };
}
