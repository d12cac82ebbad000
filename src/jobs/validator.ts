/**
 * Validator Stage
 *
 * Judges an artifact against the requirements. With a renderer available
 * the page is screenshotted and shown to a vision model; otherwise, or
 * when capture fails, a text model reviews the code. Structural errors
 * always force a rejection.
 */

import { checkArtifactSyntax } from '../ai/syntaxChecker';
import { config } from '../config';
import { describeError } from '../errors';
import { LLMResponseMetadata, createUnavailableMetadata } from '../llm/llmMetadata';
import { CompletionClient, ImageAttachment, Message } from '../llm/openRouterService';
import {
  judgeFailureFeedback,
  textJudgeSystemPrompt,
  visualJudgeSystemPrompt,
} from '../llm/presets/validator';
import { createLogger } from '../logger';
import type { Renderer } from '../render/browserRenderer';
import { ScreenshotLimits, prepareScreenshotForJudge } from '../render/screenshot';
import { composePrototypeDocument, titleFromRequirements } from './artifactWriter';
import {
  Artifact,
  SyntaxCheckMode,
  SyntaxCheckResult,
  ValidationMode,
  ValidationOutcome,
  Verdict,
} from './types';

const log = createLogger('validator');

export interface ValidationStage {
  validate(requirements: string, artifact: Artifact, iterationCount: number): Promise<ValidationOutcome>;
}

export interface ValidatorSettings {
  textModel: string;
  visionModel: string;
  temperature: number;
  maxTokens: number;
  syntaxMode: SyntaxCheckMode;
  screenshot: ScreenshotLimits;
}

function defaultSettings(): ValidatorSettings {
  return {
    textModel: config.validator.textModel,
    visionModel: config.validator.visionModel,
    temperature: config.validator.temperature,
    maxTokens: config.validator.maxTokens,
    syntaxMode: config.validator.syntaxMode,
    screenshot: config.render.screenshot,
  };
}

/**
 * An explicit "VERDICT: X" line decides. Otherwise exactly one of the two
 * keywords must appear; both, neither, or "not approved" mean rejected.
 */
export function parseVerdict(response: string): Verdict {
  const explicit = /verdict\s*[:：]\s*[*_`"']*\s*(approved|rejected)\b/i.exec(response);
  if (explicit) {
    return explicit[1].toLowerCase() === 'approved' ? 'approved' : 'rejected';
  }

  const negated = /\b(?:not|never)\s+approved\b/i.test(response);
  const approved = /\bapproved\b/i.test(response) && !negated;
  const rejected = /\brejected\b/i.test(response) || negated;

  return approved && !rejected ? 'approved' : 'rejected';
}

function describeSyntax(syntax: SyntaxCheckResult): string {
  const lines = [`SYNTAX CHECK: ${syntax.valid ? 'passed' : 'failed'}`];
  if (syntax.errors.length > 0) lines.push(`Errors: ${syntax.errors.join('; ')}`);
  if (syntax.warnings.length > 0) lines.push(`Warnings: ${syntax.warnings.join('; ')}`);
  return lines.join('\n');
}

export function composeJudgePrompt(
  requirements: string,
  artifact: Artifact,
  syntax: SyntaxCheckResult,
  iterationCount: number,
  mode: ValidationMode
): string {
  return [
    'REQUIREMENTS:',
    requirements.trim() || '(none given)',
    '',
    `ITERATION: ${iterationCount}`,
    describeSyntax(syntax),
    '',
    mode === 'visual'
      ? 'The attached screenshot shows the rendered page. The source code follows for reference.'
      : 'No rendering is available. Review the source code below.',
    '',
    '```html',
    artifact.markup,
    '```',
    '',
    '```css',
    artifact.style,
    '```',
    '',
    '```javascript',
    artifact.behavior,
    '```',
  ].join('\n');
}

interface Judgement {
  verdict: Verdict;
  feedback: string;
  metadata: LLMResponseMetadata;
}

export class ValidatorStage implements ValidationStage {
  private readonly settings: ValidatorSettings;

  constructor(
    private readonly client: CompletionClient,
    private readonly renderer: Renderer | null,
    settings: Partial<ValidatorSettings> = {}
  ) {
    this.settings = { ...defaultSettings(), ...settings };
  }

  async validate(requirements: string, artifact: Artifact, iterationCount: number): Promise<ValidationOutcome> {
    const syntax = checkArtifactSyntax(artifact, this.settings.syntaxMode);
    const screenshot = await this.captureScreenshot(artifact, requirements);
    const mode: ValidationMode = screenshot ? 'visual' : 'text';

    const judgement = await this.judge(requirements, artifact, syntax, iterationCount, mode, screenshot);

    let verdict = judgement.verdict;
    let feedback = judgement.feedback;
    if (!syntax.valid) {
      verdict = 'rejected';
      feedback = `Code syntax errors: ${syntax.errors.join('; ')}\n\n${feedback}`;
    }

    log.info(`Iteration ${iterationCount}: ${verdict.toUpperCase()} (${mode} review)`);
    return { verdict, feedback, mode, syntax, metadata: judgement.metadata };
  }

  private async captureScreenshot(artifact: Artifact, requirements: string): Promise<ImageAttachment | null> {
    if (!this.renderer) return null;

    try {
      if (!(await this.renderer.isAvailable())) return null;
      const png = await this.renderer.capture(composePrototypeDocument(artifact, titleFromRequirements(requirements)));
      return await prepareScreenshotForJudge(png, this.settings.screenshot);
    } catch (error) {
      log.warn(`Rendering failed, falling back to text-only review: ${describeError(error)}`);
      return null;
    }
  }

  private async judge(
    requirements: string,
    artifact: Artifact,
    syntax: SyntaxCheckResult,
    iterationCount: number,
    mode: ValidationMode,
    screenshot: ImageAttachment | null
  ): Promise<Judgement> {
    const model = mode === 'visual' ? this.settings.visionModel : this.settings.textModel;
    const messages: Message[] = [
      { role: 'system', content: mode === 'visual' ? visualJudgeSystemPrompt : textJudgeSystemPrompt },
      { role: 'user', content: composeJudgePrompt(requirements, artifact, syntax, iterationCount, mode) },
    ];

    try {
      const response = await this.client.complete({
        model,
        messages,
        temperature: this.settings.temperature,
        maxTokens: this.settings.maxTokens,
        ...(screenshot ? { image: screenshot } : {}),
      });
      return {
        verdict: parseVerdict(response.content),
        feedback: response.content.trim(),
        metadata: response.metadata,
      };
    } catch (error) {
      const reason = describeError(error);
      log.error(`${mode} review failed, rejecting this iteration: ${reason}`);
      return {
        verdict: 'rejected',
        feedback: judgeFailureFeedback(reason),
        metadata: createUnavailableMetadata(model, reason),
      };
    }
  }
}
