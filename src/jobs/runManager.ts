/**
 * Run Manager
 *
 * Run lifecycle bookkeeping: ids, initial state, per-run log file,
 * phase changes and stage timings. No LLM calls here.
 */

import * as fs from 'fs';
import * as path from 'path';
import { describeError } from '../errors';
import { emptyRunUsage } from '../llm/llmMetadata';
import { createLogger } from '../logger';
import { WorkflowPhase, WorkflowState } from './types';

const log = createLogger('run');

export function generateRunId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `run-${timestamp}-${random}`;
}

export function createRunState(requirements: string, maxIterations: number, logBase: string | null): WorkflowState {
  const runId = generateRunId();
  const logsPath = logBase ? path.join(logBase, `${runId}.log`) : undefined;

  if (logsPath) {
    try {
      fs.mkdirSync(path.dirname(logsPath), { recursive: true });
    } catch (error) {
      log.warn(`Run log directory unavailable, continuing without a log file: ${describeError(error)}`);
    }
  }

  return {
    runId,
    createdAt: new Date().toISOString(),
    requirements,
    maxIterations,
    phase: 'start',
    iterationCount: 0,
    artifact: { markup: '', style: '', behavior: '' },
    validationFeedback: '',
    history: [],
    diagnostics: {
      logsPath,
      stageTimings: {},
      usage: emptyRunUsage(),
    },
  };
}

/**
 * Write a timestamped line to the run log file. A failing write is
 * reported once and disables the file for the rest of the run.
 */
export function writeRunLog(state: WorkflowState, line: string): void {
  const logsPath = state.diagnostics.logsPath;
  if (!logsPath) return;

  const timestamp = new Date().toISOString();
  try {
    fs.appendFileSync(logsPath, `[${timestamp}] ${line}\n`, 'utf8');
  } catch (error) {
    log.warn(`Cannot write run log ${logsPath}: ${describeError(error)}`);
    state.diagnostics.logsPath = undefined;
  }
}

export function markStageStart(state: WorkflowState, stageName: string): void {
  state.diagnostics.stageTimings[`${stageName}_start`] = Date.now();
  writeRunLog(state, `Stage started: ${stageName}`);
}

export function markStageEnd(state: WorkflowState, stageName: string): void {
  const endTime = Date.now();
  const startTime = state.diagnostics.stageTimings[`${stageName}_start`];

  if (startTime) {
    const duration = endTime - startTime;
    state.diagnostics.stageTimings[stageName] = duration;
    writeRunLog(state, `Stage completed: ${stageName} (${duration}ms)`);
  } else {
    writeRunLog(state, `Stage completed: ${stageName} (no start time recorded)`);
  }
}

export function updatePhase(state: WorkflowState, phase: WorkflowPhase): void {
  const oldPhase = state.phase;
  state.phase = phase;
  writeRunLog(state, `Phase changed: ${oldPhase} → ${phase}`);
  log.debug(`${state.runId}: ${oldPhase} → ${phase}`);
}

export function getRunSummary(state: WorkflowState): string {
  const lines = [
    `Run ID: ${state.runId}`,
    `Phase: ${state.phase}`,
    `Created: ${state.createdAt}`,
    `Iterations: ${state.iterationCount}/${state.maxIterations}`,
    `Verdict: ${state.verdict ?? 'none'}`,
  ];

  if (state.previewUrl) lines.push(`Preview: ${state.previewUrl}`);
  if (state.outputFile) lines.push(`Output: ${state.outputFile}`);
  if (state.diagnostics.logsPath) lines.push(`Logs: ${state.diagnostics.logsPath}`);
  if (state.errorMessage) lines.push(`Error: ${state.errorMessage}`);

  const usage = state.diagnostics.usage;
  lines.push(`LLM calls: ${usage.calls} (${usage.totalTokens} tokens, ~$${usage.estimatedCost.toFixed(4)})`);

  const timings = Object.entries(state.diagnostics.stageTimings)
    .filter(([key]) => !key.endsWith('_start'))
    .map(([stage, ms]) => `  ${stage}: ${ms}ms`);

  if (timings.length > 0) {
    lines.push('Stage Timings:');
    lines.push(...timings);
  }

  return lines.join('\n');
}
