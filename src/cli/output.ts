import type { ResearchArtifacts } from '../research/report.js';

function ensureNewline(message: string): string {
  return message.endsWith('\n') ? message : `${message}\n`;
}

export function writeStderr(message: string): void {
  process.stderr.write(ensureNewline(message));
}

// stdout carries the MCP protocol in server mode, so plain output only goes
// there when a terminal is attached.
export function writeCliOutput(message: string): void {
  const stream = process.stdout.isTTY ? process.stdout : process.stderr;
  stream.write(ensureNewline(message));
}

export function formatResearchSummary(artifacts: ResearchArtifacts): string {
  return [
    'Research artifacts:',
    `  report:   ${artifacts.reportPath}`,
    `  analysis: ${artifacts.analysisPath}`,
    `  raw:      ${artifacts.rawResultsPath}`,
  ].join('\n');
}
