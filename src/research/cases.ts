import type { GenerationParameters, PromptTechnique } from '../config/types.js';

export interface ResearchCase {
  query: string;
  category: string;
  expectedRole: string;
  expectedTechnique: PromptTechnique;
  description: string;
}

export const STANDARD_CASES: readonly ResearchCase[] = [
  {
    query: 'Write a Python function to calculate the Fibonacci sequence',
    category: 'coding',
    expectedRole: 'Software Engineer',
    expectedTechnique: 'chain_of_thought',
    description: 'Algorithm implementation task',
  },
  {
    query: 'Explain why the sky is blue',
    category: 'explanation',
    expectedRole: 'Physicist',
    expectedTechnique: 'socratic',
    description: 'Scientific explanation task',
  },
  {
    query: 'Analyze the impact of social media on mental health',
    category: 'analysis',
    expectedRole: 'Psychologist',
    expectedTechnique: 'tree_of_thought',
    description: 'Complex analysis task',
  },
  {
    query: 'Create a marketing strategy for a new eco-friendly product',
    category: 'business',
    expectedRole: 'Business Analyst',
    expectedTechnique: 'structured_output',
    description: 'Strategic planning task',
  },
  {
    query: 'Solve this equation: 3x^2 + 2x - 5 = 0',
    category: 'math',
    expectedRole: 'Mathematician',
    expectedTechnique: 'chain_of_thought',
    description: 'Mathematical problem-solving task',
  },
];

export const RESEARCH_TECHNIQUES: readonly PromptTechnique[] = [
  'chain_of_thought',
  'tree_of_thought',
  'structured_output',
  'socratic',
  'role_playing',
];

export const RESEARCH_PARAMETER_SETS: readonly GenerationParameters[] = [
  { temperature: 0.2, num_ctx: 2048, num_predict: 1024 },
  { temperature: 0.5, num_ctx: 2048, num_predict: 1024 },
  { temperature: 0.7, num_ctx: 2048, num_predict: 1024 },
  { temperature: 0.2, num_ctx: 4096, num_predict: 2048 },
  { temperature: 0.5, num_ctx: 4096, num_predict: 2048 },
];

export function parameterSetKey(params: GenerationParameters): string {
  return `temp_${params.temperature}_ctx_${params.num_ctx}`;
}
