/**
 * Design Workflow
 *
 * start → generating → validating → (generating | finalizing) → done
 *
 * Generation and validation failures stay inside their stages and turn
 * into a fallback artifact or a rejection. Only finalization can end a
 * run with an error.
 */

import { z } from 'zod';
import { config } from '../config';
import { describeError, isFatalRunError } from '../errors';
import { addUsage } from '../llm/llmMetadata';
import { OpenRouterService, CompletionClient } from '../llm/openRouterService';
import { createLogger } from '../logger';
import { BrowserRenderer, Renderer } from '../render/browserRenderer';
import { getRunConfig } from './config';
import { DesignerStage, GenerationStage } from './designer';
import { FinalizationStage, PrototypeFinalizer } from './finalizer';
import {
  createRunState,
  getRunSummary,
  markStageEnd,
  markStageStart,
  updatePhase,
  writeRunLog,
} from './runManager';
import { DesignEvent, DesignResult, WorkflowPhase, WorkflowState } from './types';
import { ValidationStage, ValidatorStage } from './validator';

const log = createLogger('workflow');

const FEEDBACK_PREVIEW_LIMIT = 200;

export interface WorkflowStages {
  designer: GenerationStage;
  validator: ValidationStage;
  finalizer: FinalizationStage;
}

export interface WorkflowOptions {
  maxIterations: number;
  logBase: string | null;
}

const designRequestSchema = z.object({
  requirements: z.string({
    required_error: 'requirements are required',
    invalid_type_error: 'requirements must be a string',
  }),
  maxIterations: z
    .number({ invalid_type_error: 'maxIterations must be a number' })
    .int('maxIterations must be a positive integer')
    .positive('maxIterations must be a positive integer')
    .optional(),
});

/**
 * Pure transition function. The ceiling check happens after validation,
 * so a run never generates more than `maxIterations` times.
 */
export function nextPhase(state: WorkflowState): WorkflowPhase {
  if (state.errorMessage) return 'done';

  switch (state.phase) {
    case 'start':
      return 'generating';
    case 'generating':
      return 'validating';
    case 'validating':
      return state.verdict === 'approved' || state.iterationCount >= state.maxIterations
        ? 'finalizing'
        : 'generating';
    case 'finalizing':
    case 'done':
      return 'done';
  }
}

export function summarizeFeedback(feedback: string, limit = FEEDBACK_PREVIEW_LIMIT): string {
  return feedback.length > limit ? `${feedback.slice(0, limit)}...` : feedback;
}

export function toDesignResult(state: WorkflowState): DesignResult {
  return {
    success: !state.errorMessage,
    runId: state.runId,
    approved: state.verdict === 'approved',
    iterationCount: state.iterationCount,
    previewUrl: state.previewUrl,
    outputFile: state.outputFile,
    validationFeedback: state.validationFeedback,
    artifact: state.artifact,
    history: state.history,
    usage: state.diagnostics.usage,
    ...(state.errorMessage !== undefined && { error: state.errorMessage }),
  };
}

export class DesignWorkflow {
  private readonly options: WorkflowOptions;

  constructor(private readonly stages: WorkflowStages, options: Partial<WorkflowOptions> = {}) {
    this.options = {
      maxIterations: config.workflow.maxIterations,
      logBase: getRunConfig().logBase,
      ...options,
    };
  }

  /** Runs to completion. Never rejects; failures come back as `success: false`. */
  async startDesign(requirements: string, maxIterations?: number): Promise<DesignResult> {
    const state = this.prepare(requirements, maxIterations);
    for await (const event of this.drive(state)) {
      log.debug(`${state.runId}: ${event.type}`);
    }
    return toDesignResult(state);
  }

  /** Ends with exactly one `complete` or `error` event. */
  streamDesign(requirements: string, maxIterations?: number): AsyncGenerator<DesignEvent, void, undefined> {
    return this.drive(this.prepare(requirements, maxIterations));
  }

  private prepare(requirements: string, maxIterations?: number): WorkflowState {
    const parsed = designRequestSchema.safeParse({ requirements, maxIterations });
    if (!parsed.success) {
      const state = createRunState('', this.options.maxIterations, null);
      state.errorMessage = parsed.error.issues.map((issue) => issue.message).join('; ');
      state.phase = 'done';
      return state;
    }

    return createRunState(
      parsed.data.requirements,
      parsed.data.maxIterations ?? this.options.maxIterations,
      this.options.logBase
    );
  }

  private async *drive(state: WorkflowState): AsyncGenerator<DesignEvent, void, undefined> {
    if (state.errorMessage) {
      log.error(`Rejected design request: ${state.errorMessage}`);
      yield { type: 'error', runId: state.runId, message: state.errorMessage };
      return;
    }

    log.info(`🚀 ${state.runId} started (max ${state.maxIterations} iterations)`);
    writeRunLog(state, `Requirements: ${state.requirements}`);
    yield {
      type: 'start',
      runId: state.runId,
      requirements: state.requirements,
      maxIterations: state.maxIterations,
    };

    try {
      while (state.phase !== 'done') {
        const phase = nextPhase(state);
        updatePhase(state, phase);

        if (phase === 'generating') {
          yield await this.runGeneration(state);
        } else if (phase === 'validating') {
          yield await this.runValidation(state);
        } else if (phase === 'finalizing') {
          const event = await this.runFinalization(state);
          if (event) yield event;
        }
      }
    } catch (error) {
      state.errorMessage = `Unexpected failure: ${describeError(error)}`;
      state.phase = 'done';
      log.error(`${state.runId} aborted`, error);
    }

    writeRunLog(state, getRunSummary(state));

    if (state.errorMessage) {
      log.error(`❌ ${state.runId} failed: ${state.errorMessage}`);
      yield { type: 'error', runId: state.runId, message: state.errorMessage };
      return;
    }

    log.info(`✅ ${state.runId} finished after ${state.iterationCount} iteration(s): ${state.previewUrl}`);
    yield { type: 'complete', runId: state.runId, finalResult: toDesignResult(state) };
  }

  private async runGeneration(state: WorkflowState): Promise<DesignEvent> {
    const iteration = state.iterationCount + 1;
    const stage = `generate_${iteration}`;
    markStageStart(state, stage);

    const result = await this.stages.designer.generate(
      state.requirements,
      state.validationFeedback,
      state.iterationCount
    );

    markStageEnd(state, stage);
    state.artifact = result.artifact;
    state.iterationCount = iteration;
    state.verdict = undefined;
    state.diagnostics.usage = addUsage(state.diagnostics.usage, result.metadata);
    state.history.push({
      iteration,
      usedFallback: result.usedFallback,
      syntaxErrors: result.syntax.errors,
    });

    if (result.usedFallback) {
      writeRunLog(state, `Iteration ${iteration}: fallback prototype (${result.error ?? 'unknown reason'})`);
    }

    return {
      type: 'progress',
      runId: state.runId,
      step: 'generating',
      iterationCount: iteration,
      usedFallback: result.usedFallback,
    };
  }

  private async runValidation(state: WorkflowState): Promise<DesignEvent> {
    const stage = `validate_${state.iterationCount}`;
    markStageStart(state, stage);

    const outcome = await this.stages.validator.validate(state.requirements, state.artifact, state.iterationCount);

    markStageEnd(state, stage);
    state.verdict = outcome.verdict;
    state.validationFeedback = outcome.feedback;
    state.diagnostics.usage = addUsage(state.diagnostics.usage, outcome.metadata);

    const record = state.history[state.history.length - 1];
    if (record) {
      record.verdict = outcome.verdict;
      record.validationMode = outcome.mode;
      record.syntaxErrors = outcome.syntax.errors;
    }
    writeRunLog(state, `Iteration ${state.iterationCount}: ${outcome.verdict} (${outcome.mode} review)`);

    return {
      type: 'progress',
      runId: state.runId,
      step: 'validating',
      iterationCount: state.iterationCount,
      verdict: outcome.verdict,
      feedback: summarizeFeedback(outcome.feedback),
    };
  }

  private async runFinalization(state: WorkflowState): Promise<DesignEvent | null> {
    markStageStart(state, 'finalize');
    try {
      const result = await this.stages.finalizer.finalize(state);
      state.previewUrl = result.previewUrl;
      state.outputFile = result.outputFile;
      writeRunLog(state, `Published ${result.outputFile} at ${result.previewUrl}`);
    } catch (error) {
      if (!isFatalRunError(error)) throw error;
      state.errorMessage = error.message;
      writeRunLog(state, `Finalization failed: ${error.message}`);
      return null;
    } finally {
      markStageEnd(state, 'finalize');
    }

    return {
      type: 'progress',
      runId: state.runId,
      step: 'finalizing',
      iterationCount: state.iterationCount,
      verdict: state.verdict,
      previewUrl: state.previewUrl,
    };
  }
}

export interface DesignWorkflowOverrides extends Partial<WorkflowStages>, Partial<WorkflowOptions> {
  client?: CompletionClient;
  renderer?: Renderer | null;
}

/**
 * Wires the production stages from configuration. Any stage, the
 * completion client or the renderer can be swapped out.
 */
export function createDesignWorkflow(overrides: DesignWorkflowOverrides = {}): DesignWorkflow {
  const client = overrides.client ?? new OpenRouterService();
  const renderer = overrides.renderer === undefined ? new BrowserRenderer() : overrides.renderer;

  const stages: WorkflowStages = {
    designer: overrides.designer ?? new DesignerStage(client),
    validator: overrides.validator ?? new ValidatorStage(client, renderer),
    finalizer: overrides.finalizer ?? new PrototypeFinalizer(),
  };

  return new DesignWorkflow(stages, {
    ...(overrides.maxIterations !== undefined && { maxIterations: overrides.maxIterations }),
    ...(overrides.logBase !== undefined && { logBase: overrides.logBase }),
  });
}

let defaultWorkflow: DesignWorkflow | null = null;

function getDefaultWorkflow(): DesignWorkflow {
  if (!defaultWorkflow) defaultWorkflow = createDesignWorkflow();
  return defaultWorkflow;
}

export function startDesign(requirements: string, maxIterations?: number): Promise<DesignResult> {
  return getDefaultWorkflow().startDesign(requirements, maxIterations);
}

export function streamDesign(
  requirements: string,
  maxIterations?: number
): AsyncGenerator<DesignEvent, void, undefined> {
  return getDefaultWorkflow().streamDesign(requirements, maxIterations);
}
