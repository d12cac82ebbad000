/**
 * Finalizer Stage
 *
 * Publishes the last artifact as one HTML file and makes sure a preview
 * server is serving its directory.
 */

import { config } from '../config';
import { FinalizationError } from '../errors';
import { createLogger } from '../logger';
import { PreviewServerRegistry, previewServers } from '../preview/previewRegistry';
import { titleFromRequirements, writePrototypeFile } from './artifactWriter';
import { FinalizationResult, WorkflowState } from './types';

const log = createLogger('finalizer');

export interface FinalizationStage {
  finalize(state: WorkflowState): Promise<FinalizationResult>;
}

export interface FinalizerOptions {
  outputDir: string;
  preferredPort: number;
  registry: PreviewServerRegistry;
}

export class PrototypeFinalizer implements FinalizationStage {
  private readonly options: FinalizerOptions;

  constructor(options: Partial<FinalizerOptions> = {}) {
    this.options = {
      outputDir: config.preview.outputDir,
      preferredPort: config.preview.port,
      registry: previewServers,
      ...options,
    };
  }

  async finalize(state: WorkflowState): Promise<FinalizationResult> {
    if (!state.artifact.markup.trim()) {
      throw new FinalizationError(
        `No markup was produced after ${state.iterationCount} iteration(s); there is nothing to publish`
      );
    }

    const written = await writePrototypeFile(
      this.options.outputDir,
      state.artifact,
      titleFromRequirements(state.requirements)
    );
    log.info(`📄 Wrote ${written.outputFile}`);

    const preview = await this.options.registry.start(this.options.outputDir, this.options.preferredPort);
    const previewUrl = `${preview.url}/${encodeURIComponent(written.filename)}`;

    return { previewUrl, outputFile: written.outputFile, filename: written.filename };
  }
}
