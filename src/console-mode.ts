#!/usr/bin/env node
import { config } from './config';
import { describeError } from './errors';
import { createDesignWorkflow } from './jobs/workflow';
import { logger } from './logger';
import { previewServers } from './preview/previewRegistry';

process.on('uncaughtException', (error) => {
  console.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

async function main(): Promise<void> {
  console.log('🎨 Prototype Studio - Console Mode');

  const requirements = process.argv.slice(2).join(' ').trim();
  if (!requirements) {
    console.error('Usage: prototype-studio "<describe the page you want>"');
    process.exit(1);
  }

  if (!config.openRouter.apiKey) {
    console.error('\n❌ FATAL: Configuration error: Missing required OpenRouter API key');
    console.error('\nTo fix:');
    console.error('  1. Copy template: cp .env.example .env');
    console.error('  2. Edit .env and set OPENROUTER_API_KEY');
    console.error('  3. Run again');
    process.exit(1);
  }

  const workflow = createDesignWorkflow();
  let previewUrl: string | undefined;

  for await (const event of workflow.streamDesign(requirements)) {
    switch (event.type) {
      case 'start':
        logger.info(`Run ${event.runId} started (max ${event.maxIterations} iterations)`);
        break;
      case 'progress':
        if (event.step === 'generating') {
          logger.info(`🛠️  Iteration ${event.iterationCount}: generated${event.usedFallback ? ' (fallback)' : ''}`);
        } else if (event.step === 'validating') {
          logger.info(`🔍 Iteration ${event.iterationCount}: ${event.verdict?.toUpperCase()}`);
          if (event.feedback) logger.info(event.feedback);
        } else {
          logger.info(`📦 Published after ${event.iterationCount} iteration(s)`);
        }
        break;
      case 'complete':
        previewUrl = event.finalResult.previewUrl;
        logger.info(
          `Usage: ${event.finalResult.usage.totalTokens} tokens, ~$${event.finalResult.usage.estimatedCost.toFixed(4)}`
        );
        break;
      case 'error':
        console.error(`\n❌ Design run failed: ${event.message}`);
        await previewServers.stopAll();
        process.exit(1);
    }
  }

  console.log(`\n✅ Preview: ${previewUrl}`);
  console.log('Press Ctrl+C to stop the preview server.');

  const shutdown = (signal: string) => {
    console.log(`\n${signal} received, shutting down gracefully...`);
    previewServers
      .stopAll()
      .then(() => process.exit(0))
      .catch((error) => {
        console.error('Failed to stop preview servers:', describeError(error));
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
