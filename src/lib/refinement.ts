export {
  createTemplateCatalog,
  getDefaultCatalog,
  loadCatalogTables,
  PARAMETER_PRESET_NAMES,
  PARAMETER_PRESETS,
  TECHNIQUE_TEMPLATES,
  type CatalogTables,
  type ParameterPresetName,
  type TemplateCatalog,
} from './refinement/catalog.js';
export {
  classify,
  detectRole,
  detectTaskType,
  detectTechnique,
  scoreTaskTypes,
  type Classification,
} from './refinement/classifier.js';
export {
  composeTemplate,
  ensureQueryPlaceholder,
  formatTemplate,
  hasQueryPlaceholder,
  renderPrompt,
  TemplateFormatError,
} from './refinement/composer.js';
export {
  containsMathActionVerb,
  finalizeConfiguration,
  normalizeWhitespace,
  stripNudge,
  type FinalizeOptions,
  type RecursionGuard,
} from './refinement/finalizer.js';
export {
  AnalysisGateway,
  buildAnalysisPrompt,
  DEFAULT_ANALYSIS,
  defaultAnalysisResult,
  parseAnalysisResponse,
  sendPrompt,
  withStrictJsonPreamble,
  type AnalysisRequest,
} from './refinement/gateway.js';
export {
  refine,
  type IterationProgress,
  type RefineOptions,
} from './refinement/loop.js';
export {
  mergeParameters,
  pickParameters,
  validateParameters,
} from './refinement/parameters.js';
export {
  buildConfiguration,
  rederiveConfiguration,
  selectConfiguration,
  suggestsNewSelection,
  type SelectionOverrides,
} from './refinement/selection.js';
