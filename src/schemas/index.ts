export {
  RefinePromptInputSchema,
  SelectConfigurationInputSchema,
  ValidateParametersInputSchema,
  type RefinePromptInput,
  type SelectConfigurationInput,
  type ValidateParametersInput,
} from './inputs.js';
