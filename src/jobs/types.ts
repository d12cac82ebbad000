/**
 * Design Run Types
 *
 * Shared shapes for the generate → validate → finalize workflow.
 */

import type { LLMResponseMetadata } from '../llm/llmMetadata';

/**
 * The three text fields produced by the generation stage.
 * Any of them may be empty; an empty markup field cannot be published.
 */
export interface Artifact {
  markup: string;
  style: string;
  behavior: string;
}

export type Verdict = 'approved' | 'rejected';

export type WorkflowPhase = 'start' | 'generating' | 'validating' | 'finalizing' | 'done';

export type SyntaxCheckMode = 'loose' | 'strict';

export interface SyntaxCheckResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export type PageType =
  | 'form'
  | 'dashboard'
  | 'ecommerce'
  | 'blog'
  | 'navigation'
  | 'landing'
  | 'game'
  | 'unknown';

export type VisualStyle = 'modern' | 'minimal' | 'business' | 'creative' | 'playful';

export interface RequirementProfile {
  type: PageType;
  style: VisualStyle;
  interactive: boolean;
  responsive: boolean;
  features: string[];
}

export interface GenerationResult {
  artifact: Artifact;
  usedFallback: boolean;
  syntax: SyntaxCheckResult;
  profile: RequirementProfile;
  metadata?: LLMResponseMetadata;
  error?: string;
}

export type ValidationMode = 'visual' | 'text';

export interface ValidationOutcome {
  verdict: Verdict;
  feedback: string;
  mode: ValidationMode;
  syntax: SyntaxCheckResult;
  metadata?: LLMResponseMetadata;
}

export interface FinalizationResult {
  previewUrl: string;
  outputFile: string;
  filename: string;
}

export interface IterationRecord {
  iteration: number;
  usedFallback: boolean;
  verdict?: Verdict;
  validationMode?: ValidationMode;
  syntaxErrors: string[];
}

export interface RunUsage {
  calls: number;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  estimatedCost: number;
}

/**
 * Mutable record of one run. Owned by the workflow, read by stages.
 */
export interface WorkflowState {
  runId: string;
  createdAt: string;
  requirements: string;
  maxIterations: number;
  phase: WorkflowPhase;
  iterationCount: number;
  artifact: Artifact;
  verdict?: Verdict;
  validationFeedback: string;
  previewUrl?: string;
  outputFile?: string;
  errorMessage?: string;
  history: IterationRecord[];
  diagnostics: {
    logsPath?: string;
    stageTimings: Record<string, number>;
    usage: RunUsage;
  };
}

export interface DesignResult {
  success: boolean;
  runId: string;
  approved: boolean;
  iterationCount: number;
  previewUrl?: string;
  outputFile?: string;
  validationFeedback: string;
  artifact: Artifact;
  history: IterationRecord[];
  usage: RunUsage;
  error?: string;
}

export type ProgressStep = 'generating' | 'validating' | 'finalizing';

export type DesignEvent =
  | { type: 'start'; runId: string; requirements: string; maxIterations: number }
  | {
      type: 'progress';
      runId: string;
      step: ProgressStep;
      iterationCount: number;
      verdict?: Verdict;
      feedback?: string;
      usedFallback?: boolean;
      previewUrl?: string;
    }
  | { type: 'complete'; runId: string; finalResult: DesignResult }
  | { type: 'error'; runId: string; message: string };
