import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from '../logging/logger.js';
import type { UserDataSchema, WizardStructure } from '../types/index.js';
import { SchemaNotFoundError, WizardNotFoundError, describeCause } from '../exception/errors.js';
import { parseJson, parseUserDataSchema, parseWizardStructure } from './documents.js';

export const STRUCTURES_DIR = 'wizard-structures';
export const SCHEMAS_DIR = 'data-schemas';

const WIZARD_ID = /^[a-z0-9-]+$/;

export interface WizardSummary {
  wizardId: string;
  name: string;
  url: string;
  totalPages: number;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read-only view over the documents the discovery collaborator wrote:
 *   <wizardsDir>/wizard-structures/<id>.json
 *   <wizardsDir>/data-schemas/<id>-schema.json
 */
export class WizardCatalog {
  constructor(
    private wizardsDir: string,
    private logger: Logger,
  ) {}

  structurePath(wizardId: string): string {
    return join(this.wizardsDir, STRUCTURES_DIR, `${wizardId}.json`);
  }

  schemaPath(wizardId: string): string {
    return join(this.wizardsDir, SCHEMAS_DIR, `${wizardId}-schema.json`);
  }

  async list(): Promise<WizardSummary[]> {
    let entries: string[];
    try {
      entries = await readdir(join(this.wizardsDir, STRUCTURES_DIR));
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.warn({ wizardsDir: this.wizardsDir }, 'Wizard structures directory not found');
        return [];
      }
      throw error;
    }

    const summaries: WizardSummary[] = [];
    for (const entry of entries.filter((e) => e.endsWith('.json')).sort()) {
      const wizardId = entry.slice(0, -'.json'.length);
      try {
        const wizard = await this.loadStructure(wizardId);
        summaries.push({
          wizardId: wizard.wizardId,
          name: wizard.name,
          url: wizard.url,
          totalPages: wizard.pages.length,
        });
      } catch (error) {
        this.logger.warn({ file: entry, error: describeCause(error) }, 'Skipping unreadable wizard structure');
      }
    }
    return summaries;
  }

  async loadStructure(wizardId: string): Promise<WizardStructure> {
    if (!WIZARD_ID.test(wizardId)) throw new WizardNotFoundError(wizardId);

    const path = this.structurePath(wizardId);
    const text = await readFile(path, 'utf-8').catch((error: unknown) => {
      throw isNotFound(error) ? new WizardNotFoundError(wizardId) : error;
    });
    return parseWizardStructure(parseJson(text, path), path);
  }

  async loadSchema(wizardId: string): Promise<UserDataSchema> {
    if (!WIZARD_ID.test(wizardId)) throw new SchemaNotFoundError(wizardId);

    const path = this.schemaPath(wizardId);
    const text = await readFile(path, 'utf-8').catch((error: unknown) => {
      throw isNotFound(error) ? new SchemaNotFoundError(wizardId) : error;
    });
    return parseUserDataSchema(parseJson(text, path), path);
  }
}
