import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ExecutionResult, WizardStructure } from '../types/index.js';

export interface SummaryOptions {
  runDir: string;
  wizard: WizardStructure;
  result: ExecutionResult;
}

export async function writeSummary(options: SummaryOptions): Promise<void> {
  const md = buildSummaryMarkdown(options.wizard, options.result);
  await writeFile(join(options.runDir, 'summary.md'), md, 'utf-8');
}

export function buildSummaryMarkdown(wizard: WizardStructure, result: ExecutionResult): string {
  const lines: string[] = [
    '# Run Summary',
    `- Wizard: ${wizard.name} (${wizard.wizardId})`,
    `- Result: ${result.success ? 'Success' : 'Failure'}`,
    `- Final state: ${result.finalState}`,
    `- Pages: ${result.pagesCompleted}/${wizard.pages.length} completed`,
    `- Duration: ${formatDuration(result.executionTimeMs)}`,
    `- Screenshots: ${result.screenshots.length} returned of ${result.totalScreenshots} captured`,
  ];

  const strategies = Object.entries(result.selectStrategies);
  if (strategies.length > 0) {
    lines.push('');
    lines.push('## Select Strategies');
    for (const [fieldId, strategy] of strategies) {
      lines.push(`- ${fieldId}: ${strategy}`);
    }
  }

  if (result.error) {
    lines.push('');
    lines.push('## Error');
    lines.push(`- Kind: ${result.error.kind}`);
    lines.push(`- Message: ${result.error.message}`);
    if (result.error.fieldId) lines.push(`- Field: ${result.error.fieldId}`);
    if (result.error.selector) lines.push(`- Selector: ${result.error.selector}`);
  }

  lines.push('');
  lines.push('## Run Info');
  lines.push(`- Run ID: ${result.runId}`);
  lines.push(`- Target: ${wizard.url}`);

  return lines.join('\n') + '\n';
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}s`;
}
