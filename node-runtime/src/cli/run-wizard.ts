#!/usr/bin/env node
/**
 * CLI: run a wizard from stdin JSON → JSONL events on stdout.
 *
 * Usage:
 *   echo '{"wizardId":"loan-estimator","userData":{...}}' | npx tsx node-runtime/src/cli/run-wizard.ts
 *   echo '{"structure":{...},"schema":{...},"userData":{...}}' | npx tsx node-runtime/src/cli/run-wizard.ts
 *
 * Operational logs go to stderr so stdout stays a clean event stream.
 */

import { z } from 'zod';
import { loadConfig } from '../config/loader.js';
import { createLogger } from '../logging/logger.js';
import { playwrightLauncher } from '../engines/browser-session.js';
import { WizardRunner, createRunId } from '../runner/wizard-runner.js';
import { WizardCatalog } from '../catalog/wizard-catalog.js';
import { parseUserDataSchema, parseWizardStructure } from '../catalog/documents.js';
import { createWizardTools, runWizard } from '../tools/wizard-tools.js';
import type { ExecuteWizardResponse } from '../tools/wizard-tools.js';
import { toExecutionError } from '../exception/classifier.js';

const UserDataInput = z.record(z.unknown());

const CliInputSchema = z.union([
  z.object({ wizardId: z.string().min(1), userData: UserDataInput }),
  z.object({ structure: z.unknown(), schema: z.unknown(), userData: UserDataInput }),
]);

// ── helpers ────────────────────────────────────────

function emit(event: Record<string, unknown>): void {
  process.stdout.write(JSON.stringify(event) + '\n');
}

async function readStdin(): Promise<string> {
  let raw = '';
  process.stdin.setEncoding('utf-8');
  for await (const chunk of process.stdin) {
    raw += String(chunk);
  }
  return raw;
}

// ── main ───────────────────────────────────────────

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, name: 'run-wizard' });

  let json: unknown;
  try {
    json = JSON.parse(await readStdin());
  } catch {
    emit({ type: 'run_error', error: { kind: 'StructureError', message: 'Invalid JSON on stdin' } });
    process.exitCode = 1;
    return;
  }

  const input = CliInputSchema.safeParse(json);
  if (!input.success) {
    emit({
      type: 'run_error',
      error: { kind: 'StructureError', message: 'Expected {wizardId, userData} or {structure, schema, userData}' },
    });
    process.exitCode = 1;
    return;
  }

  const runner = new WizardRunner({ launcher: playwrightLauncher, config, logger });
  const runId = createRunId();
  const onStateChange = (change: { from: string; to: string; pageNumber?: number }) =>
    emit({ type: 'state', runId, ...change });

  let response: ExecuteWizardResponse;
  if ('wizardId' in input.data) {
    emit({ type: 'run_start', runId, wizardId: input.data.wizardId });
    const tools = createWizardTools({ catalog: new WizardCatalog(config.wizardsDir, logger), runner, logger });
    response = await tools.executeWizard(input.data.wizardId, input.data.userData, { runId, onStateChange });
  } else {
    try {
      const structure = parseWizardStructure(input.data.structure);
      const schema = parseUserDataSchema(input.data.schema);
      emit({ type: 'run_start', runId, wizardId: structure.wizardId, totalPages: structure.pages.length });
      response = await runWizard(runner, structure, schema, input.data.userData, { runId, onStateChange });
    } catch (error) {
      response = { success: false, error: toExecutionError(error) };
    }
  }

  if ('runId' in response || 'validation' in response) {
    emit({ type: 'run_complete', ...response });
  } else {
    emit({ type: 'run_error', error: response.error });
  }
  process.exitCode = response.success ? 0 : 1;
}

main().catch((error: unknown) => {
  emit({ type: 'run_error', error: toExecutionError(error) });
  process.exitCode = 1;
});
