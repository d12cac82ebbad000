export {
  DesignWorkflow,
  createDesignWorkflow,
  nextPhase,
  startDesign,
  streamDesign,
  summarizeFeedback,
  toDesignResult,
} from './jobs/workflow';
export type { DesignWorkflowOverrides, WorkflowOptions, WorkflowStages } from './jobs/workflow';
export { DesignerStage, composeDesignerUserPrompt } from './jobs/designer';
export type { DesignerSettings, GenerationStage } from './jobs/designer';
export { ValidatorStage, composeJudgePrompt, parseVerdict } from './jobs/validator';
export type { ValidationStage, ValidatorSettings } from './jobs/validator';
export { PrototypeFinalizer } from './jobs/finalizer';
export type { FinalizationStage, FinalizerOptions } from './jobs/finalizer';
export {
  composePrototypeDocument,
  parsePrototypeDocument,
  titleFromRequirements,
  writePrototypeFile,
} from './jobs/artifactWriter';
export { getRunSummary } from './jobs/runManager';
export { extractArtifact, extractFencedBlock } from './ai/codeExtractor';
export { checkArtifactSyntax } from './ai/syntaxChecker';
export { classifyRequirements } from './ai/requirementProfile';
export { OpenRouterService } from './llm/openRouterService';
export type { CompletionClient, CompletionRequest, ImageAttachment, Message } from './llm/openRouterService';
export { BrowserRenderer, resolveBrowserExecutable } from './render/browserRenderer';
export type { Renderer } from './render/browserRenderer';
export { PreviewServer } from './preview/previewServer';
export type { PreviewStatus } from './preview/previewServer';
export { PreviewServerRegistry, previewServers } from './preview/previewRegistry';
export type { RunningPreview } from './preview/previewRegistry';
export { listPrototypes } from './preview/prototypeFiles';
export type { PrototypeFileInfo } from './preview/prototypeFiles';
export { CompletionError, FinalizationError, ResourceError, TimeoutError } from './errors';
export type * from './jobs/types';
