/**
 * Designer Stage
 *
 * Turns requirements (and the last review's feedback) into an artifact.
 * Never throws: a failed completion call yields the fallback artifact.
 */

import { extractArtifact } from '../ai/codeExtractor';
import { classifyRequirements } from '../ai/requirementProfile';
import { checkArtifactSyntax } from '../ai/syntaxChecker';
import { config } from '../config';
import { describeError } from '../errors';
import { createUnavailableMetadata } from '../llm/llmMetadata';
import { CompletionClient, Message } from '../llm/openRouterService';
import { FALLBACK_ARTIFACT, designerSystemPrompt } from '../llm/presets/designer';
import { createLogger } from '../logger';
import { GenerationResult, RequirementProfile, SyntaxCheckMode } from './types';

const log = createLogger('designer');

export interface GenerationStage {
  generate(requirements: string, previousFeedback?: string, previousIteration?: number): Promise<GenerationResult>;
}

export interface DesignerSettings {
  model: string;
  temperature: number;
  maxTokens: number;
  syntaxMode: SyntaxCheckMode;
}

function defaultSettings(): DesignerSettings {
  return {
    model: config.designer.model,
    temperature: config.designer.temperature,
    maxTokens: config.designer.maxTokens,
    syntaxMode: config.validator.syntaxMode,
  };
}

export function composeDesignerUserPrompt(
  requirements: string,
  profile: RequirementProfile,
  previousFeedback?: string,
  previousIteration?: number
): string {
  const lines = [
    'REQUIREMENTS:',
    requirements.trim(),
    '',
    'ANALYSIS:',
    `- Page type: ${profile.type}`,
    `- Visual style: ${profile.style}`,
    `- Interactive: ${profile.interactive ? 'yes' : 'no'}`,
    `- Responsive: ${profile.responsive ? 'yes' : 'desktop only'}`,
  ];

  if (profile.features.length > 0) {
    lines.push(`- Mentioned features: ${profile.features.join(', ')}`);
  }

  const feedback = previousFeedback?.trim();
  if (feedback) {
    const heading = previousIteration ? `REVIEW FEEDBACK ON ITERATION ${previousIteration}:` : 'REVIEW FEEDBACK:';
    lines.push(
      '',
      heading,
      feedback,
      '',
      'Revise the prototype so that every point above is addressed. Return the complete updated code.'
    );
  }

  return lines.join('\n');
}

export class DesignerStage implements GenerationStage {
  private readonly settings: DesignerSettings;

  constructor(private readonly client: CompletionClient, settings: Partial<DesignerSettings> = {}) {
    this.settings = { ...defaultSettings(), ...settings };
  }

  async generate(requirements: string, previousFeedback?: string, previousIteration?: number): Promise<GenerationResult> {
    const profile = classifyRequirements(requirements);

    if (!requirements.trim()) {
      log.warn('Requirements are empty, serving the fallback prototype');
      return this.fallback(profile, 'Requirements are empty');
    }

    const messages: Message[] = [
      { role: 'system', content: designerSystemPrompt },
      { role: 'user', content: composeDesignerUserPrompt(requirements, profile, previousFeedback, previousIteration) },
    ];

    try {
      const response = await this.client.complete({
        model: this.settings.model,
        messages,
        temperature: this.settings.temperature,
        maxTokens: this.settings.maxTokens,
      });

      const artifact = extractArtifact(response.content);
      if (!artifact.markup) {
        log.warn('Designer response contained no html block');
      }

      return {
        artifact,
        usedFallback: false,
        syntax: checkArtifactSyntax(artifact, this.settings.syntaxMode),
        profile,
        metadata: response.metadata,
      };
    } catch (error) {
      const message = describeError(error);
      log.error(`Generation failed, serving the fallback prototype: ${message}`);
      return {
        ...this.fallback(profile, message),
        metadata: createUnavailableMetadata(this.settings.model, message),
      };
    }
  }

  private fallback(profile: RequirementProfile, reason: string): GenerationResult {
    const artifact = { ...FALLBACK_ARTIFACT };
    return {
      artifact,
      usedFallback: true,
      syntax: checkArtifactSyntax(artifact, this.settings.syntaxMode),
      profile,
      error: reason,
    };
  }
}
