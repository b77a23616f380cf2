import type { GenerationParameters, ModelInfo } from '../config/types.js';

export interface OutputSection {
  title: string;
  lines: string[];
}

export function buildOutput(
  title: string,
  meta: string[],
  sections: OutputSection[],
  footer: string[] = []
): string {
  const lines: string[] = [`# ${title}`];

  if (meta.length) {
    lines.push(...meta.map((line) => `- ${line}`));
  }

  for (const section of sections) {
    lines.push('', `## ${section.title}`, ...section.lines);
  }

  if (footer.length) {
    lines.push('', ...footer);
  }

  return lines.join('\n');
}

export function asBulletList(items: string[]): string[] {
  return items.map((item) => `- ${item}`);
}

export function asCodeBlock(text: string): string[] {
  return ['```', text, '```'];
}

export function formatModelLine(info: ModelInfo): string {
  return `Model: ${info.model} (${info.target})`;
}

export function formatParameterLines(params: GenerationParameters): string[] {
  return asBulletList([
    `temperature: ${params.temperature}`,
    `num_ctx: ${params.num_ctx}`,
    `num_predict: ${params.num_predict}`,
  ]);
}
