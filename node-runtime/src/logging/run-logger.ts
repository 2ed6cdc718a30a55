import { writeFile, appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { ExecutionState, InteractionKind } from '../types/index.js';

export type RunEvent =
  | { type: 'state'; state: ExecutionState; pageNumber?: number }
  | { type: 'navigation_attempt'; attempt: number; ok: boolean; message?: string }
  | { type: 'field'; fieldId: string; interaction: InteractionKind; ok: boolean; strategy?: string; message?: string }
  | { type: 'screenshot'; step: number; label: string; sizeBytes: number }
  | { type: 'error'; kind: string; message: string };

/**
 * Per-run trace directory: logs.jsonl plus every captured screenshot.
 */
export class RunLogger {
  private logPath: string;
  private initialized = false;

  constructor(private runDir: string) {
    this.logPath = join(runDir, 'logs.jsonl');
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.runDir, { recursive: true });
    this.initialized = true;
  }

  async logEvent(event: RunEvent): Promise<void> {
    await this.ensureDir();
    const entry = {
      timestamp: new Date().toISOString(),
      ...event,
    };
    await appendFile(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
  }

  async saveScreenshot(step: number, label: string, buffer: Buffer): Promise<string> {
    await this.ensureDir();
    const filePath = join(this.runDir, `${String(step).padStart(2, '0')}_${label}.jpg`);
    await writeFile(filePath, buffer);
    return filePath;
  }

  getRunDir(): string {
    return this.runDir;
  }
}
