export * from "./authoring";
export * from "./errors";
export * from "./config";
export * from "./cache";
export * from "./storage";
export {
  configureLogger,
  createLogger,
  describeError,
  getLoggerConfig,
  resetLogger,
  LOG_LEVELS,
  type LogContext,
  type LogHandler,
  type LogLevel,
  type Logger,
  type LoggerConfig
} from "./util/logger";
export { withDeadline, type CallOptions } from "./util/deadline";
export { ComponentPath, type LocalStat } from "./components/paths";
export { COMPONENT_EXTENSIONS, discoverComponents, isComponentFile, type ComponentMap } from "./components/resolver";
export { DEFAULT_CACHE_NAMESPACE, cacheKeyPrefix, getCacheKey, getStoragePath, type ArtifactKind } from "./components/cache-keys";
export {
  TieredSourceCache,
  type ResolvedSource,
  type SourceTier,
  type TieredSourceCacheOptions
} from "./components/source-cache";
export {
  AUTHORING_MODULE_ID,
  BYTECODE_FORMAT,
  compileComponent,
  decodeBytecode,
  encodeBytecode,
  evaluateComponent,
  selectRenderable,
  transpileComponent,
  type BytecodeEnvelope,
  type CompiledModule,
  type EvaluateOptions
} from "./components/compiler";
export {
  LifecycleManager,
  createComponentId,
  type ComponentState,
  type LifecycleEvent,
  type LifecycleEvents,
  type LifecycleHook
} from "./components/lifecycle";
export {
  ComponentRegistry,
  createComponentRegistry,
  type ComponentMetadata,
  type ComponentRegistryOptions,
  type ComponentStatus,
  type RegistryCollaborators,
  type ScaffoldOptions
} from "./components/registry";
export {
  createComponentContext,
  createTemplateVars,
  forwardTemplateVars,
  mergeVars,
  TEMPLATE_ENGINE_KEY,
  TEMPLATE_RENDER_KEY,
  type ComponentContextInput,
  type ComponentInvoker,
  type EngineBindings,
  type InvokeOptions,
  type RenderContext,
  type RenderEngine,
  type RenderVars,
  type TemplateInvoker
} from "./render/context";
export { BlockTemplates, COMPONENT_FILTER, createBlockTemplates, type BlockTemplatesOptions, type TemplateComponentInvoker } from "./render/templates";
export {
  HybridRenderer,
  createHybridRenderer,
  type HybridRendererOptions,
  type RenderComponentOptions,
  type RenderOutcome,
  type RendererCollaborators
} from "./render/renderer";
