import type {
  AnalysisSuggestion,
  ConfigurationSelection,
  ParameterInput,
  PromptConfiguration,
} from '../../config/types.js';
import type { TemplateCatalog } from './catalog.js';
import { classify } from './classifier.js';
import { composeTemplate } from './composer.js';
import { mergeParameters } from './parameters.js';

export interface SelectionOverrides {
  technique?: string;
  parameters?: ParameterInput;
}

export function buildConfiguration(
  selection: ConfigurationSelection,
  catalog: TemplateCatalog,
  parameterOverrides?: ParameterInput
): PromptConfiguration {
  return {
    ...selection,
    template: composeTemplate(selection.role, selection.technique, catalog),
    parameters: mergeParameters(
      catalog.taskParameters(selection.taskType),
      parameterOverrides
    ),
  };
}

export function selectConfiguration(
  query: string,
  catalog: TemplateCatalog,
  overrides: SelectionOverrides = {}
): PromptConfiguration {
  const detected = classify(query);
  return buildConfiguration(
    {
      role: detected.role,
      taskType: detected.taskType,
      technique: overrides.technique ?? detected.technique,
    },
    catalog,
    overrides.parameters
  );
}

export function suggestsNewSelection(
  suggestion: AnalysisSuggestion,
  current: ConfigurationSelection
): boolean {
  return (
    (suggestion.role !== undefined && suggestion.role !== current.role) ||
    (suggestion.technique !== undefined &&
      suggestion.technique !== current.technique)
  );
}

// Model suggestions take precedence; the classifier fills whatever is missing.
export function rederiveConfiguration(
  candidate: string,
  suggestion: AnalysisSuggestion,
  catalog: TemplateCatalog,
  overrides: SelectionOverrides = {}
): PromptConfiguration {
  const detected = classify(candidate);
  return buildConfiguration(
    {
      role: suggestion.role ?? detected.role,
      taskType: suggestion.taskType ?? detected.taskType,
      technique:
        overrides.technique ?? suggestion.technique ?? detected.technique,
    },
    catalog,
    overrides.parameters
  );
}
