import { readFileSync } from 'node:fs';

import { z } from 'zod';

import { IDENTITY_TEMPLATE, QUERY_PLACEHOLDER } from '../../config/constants.js';
import { DEFAULT_TASK_TYPE } from '../../config/patterns.js';
import type {
  GenerationParameters,
  PromptTechnique,
} from '../../config/types.js';

/**
 * Read-only lookup service for role templates, technique templates and
 * task-type parameter presets. Unknown names never fail: templates fall back
 * to the identity template and presets to the "default" task type.
 */
export interface TemplateCatalog {
  roleTemplate(role: string): string;
  techniqueTemplate(technique: string): string;
  taskParameters(taskType: string): GenerationParameters;
  roles(): readonly string[];
  techniques(): readonly string[];
}

export interface CatalogTables {
  roleTemplates: Readonly<Record<string, string>>;
  techniqueTemplates: Readonly<Record<string, string>>;
  taskParameters: Readonly<Record<string, GenerationParameters>>;
}

export const TECHNIQUE_TEMPLATES: Readonly<Record<PromptTechnique, string>> = {
  zero_shot: '{query}',
  few_shot:
    'Here are some examples:\n\nExample 1: [First example]\nAnswer: [First answer]\n\nExample 2: [Second example]\nAnswer: [Second answer]\n\nNow answer this: {query}',
  chain_of_thought:
    "Think through this step-by-step: {query}\n\nLet's break this down into parts and solve methodically.",
  self_consistency:
    'Consider multiple approaches to solve this problem: {query}\n\nApproach 1:\nApproach 2:\nApproach 3:\n\nBased on these approaches, the most consistent answer is:',
  tree_of_thought:
    "Let's explore different reasoning paths for: {query}\n\nPath A:\n  Step A1\n  Step A2\n  Outcome A\n\nPath B:\n  Step B1\n  Step B2\n  Outcome B\n\nEvaluating these paths, the best solution is:",
  role_playing: 'You are an expert {role}. {query}',
  structured_output:
    'Provide your answer in the following format:\n\n1. Initial thoughts\n2. Analysis\n3. Solution steps\n4. Final answer\n5. Verification\n\n{query}',
  socratic:
    'To answer: {query}\n\nLet me ask myself some clarifying questions:\n1. What are the key components of this problem?\n2. What information do I need to solve it?\n3. What assumptions am I making?\n4. How can I verify my answer?',
  guided_conversation:
    "Let's discuss this step by step. I'll guide you through analyzing: {query}\n\nFirst, let's clarify the scope and objectives. Then we'll explore key considerations, and finally develop a detailed response.",
};

export const PARAMETER_PRESET_NAMES = [
  'creative',
  'precise',
  'balanced',
  'chat',
  'code',
] as const;

export type ParameterPresetName = (typeof PARAMETER_PRESET_NAMES)[number];

export const PARAMETER_PRESETS: Readonly<
  Record<ParameterPresetName, GenerationParameters>
> = {
  creative: { temperature: 0.8, num_ctx: 4096, num_predict: 2048 },
  precise: { temperature: 0.2, num_ctx: 2048, num_predict: 1024 },
  balanced: { temperature: 0.5, num_ctx: 2048, num_predict: 1024 },
  chat: { temperature: 0.7, num_ctx: 2048, num_predict: 512 },
  code: { temperature: 0.3, num_ctx: 4096, num_predict: 2048 },
};

const RoleTemplatesSchema = z.record(
  z.string(),
  z.string().includes(QUERY_PLACEHOLDER, {
    message: `Role template must contain ${QUERY_PLACEHOLDER}`,
  })
);

const TaskParametersSchema = z
  .record(
    z.string(),
    z.object({
      temperature: z.number().min(0).max(1),
      num_ctx: z.number().int().positive(),
      num_predict: z.number().int().positive(),
    })
  )
  .refine((table) => DEFAULT_TASK_TYPE in table, {
    message: `Task parameter table must define "${DEFAULT_TASK_TYPE}"`,
  });

function readDataFile(name: string): unknown {
  const raw = readFileSync(new URL(`../../../data/${name}`, import.meta.url), {
    encoding: 'utf8',
  });
  return JSON.parse(raw);
}

export function loadCatalogTables(): CatalogTables {
  return {
    roleTemplates: RoleTemplatesSchema.parse(
      readDataFile('role-templates.json')
    ),
    techniqueTemplates: TECHNIQUE_TEMPLATES,
    taskParameters: TaskParametersSchema.parse(
      readDataFile('task-parameters.json')
    ),
  };
}

const FALLBACK_PRESET: GenerationParameters = {
  temperature: 0.7,
  num_ctx: 2048,
  num_predict: 1024,
};

class StaticTemplateCatalog implements TemplateCatalog {
  private readonly roleTable: ReadonlyMap<string, string>;
  private readonly techniqueTable: ReadonlyMap<string, string>;
  private readonly presetTable: ReadonlyMap<string, GenerationParameters>;

  constructor(tables: CatalogTables) {
    this.roleTable = new Map(Object.entries(tables.roleTemplates));
    this.techniqueTable = new Map(Object.entries(tables.techniqueTemplates));
    this.presetTable = new Map(Object.entries(tables.taskParameters));
  }

  roleTemplate(role: string): string {
    return this.roleTable.get(role) ?? IDENTITY_TEMPLATE;
  }

  techniqueTemplate(technique: string): string {
    return this.techniqueTable.get(technique) ?? IDENTITY_TEMPLATE;
  }

  taskParameters(taskType: string): GenerationParameters {
    const preset =
      this.presetTable.get(taskType) ??
      this.presetTable.get(DEFAULT_TASK_TYPE) ??
      FALLBACK_PRESET;
    return { ...preset };
  }

  roles(): readonly string[] {
    return [...this.roleTable.keys()];
  }

  techniques(): readonly string[] {
    return [...this.techniqueTable.keys()];
  }
}

export function createTemplateCatalog(tables: CatalogTables): TemplateCatalog {
  return new StaticTemplateCatalog(tables);
}

let defaultCatalog: TemplateCatalog | null = null;

export function getDefaultCatalog(): TemplateCatalog {
  defaultCatalog ??= createTemplateCatalog(loadCatalogTables());
  return defaultCatalog;
}
