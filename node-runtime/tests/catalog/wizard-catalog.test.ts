import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { WizardCatalog } from '../../src/catalog/wizard-catalog.js';
import { SchemaNotFoundError, StructureError, WizardNotFoundError } from '../../src/exception/errors.js';
import { createSilentLogger } from '../../src/logging/logger.js';
import { exampleUserData, validateForWizard } from '../../src/validation/schema-validator.js';
import { makeWizardsDir, writeJson } from '../helpers/wizard-dir.js';

describe('WizardCatalog', () => {
  let dir: string;
  let catalog: WizardCatalog;

  beforeEach(async () => {
    dir = await makeWizardsDir();
    catalog = new WizardCatalog(dir, createSilentLogger());
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('list', () => {
    it('summarizes every readable structure, sorted by file name', async () => {
      expect(await catalog.list()).toEqual([
        { wizardId: 'address-change', name: 'Address Change', url: 'https://forms.test/address', totalPages: 1 },
        { wizardId: 'contact-form', name: 'Contact Form', url: 'https://forms.test/contact', totalPages: 2 },
      ]);
    });

    it('skips files that fail to parse', async () => {
      await writeFile(join(dir, 'wizard-structures', 'broken.json'), '{ not json', 'utf-8');
      await writeFile(join(dir, 'wizard-structures', 'notes.txt'), 'ignored', 'utf-8');
      expect((await catalog.list()).map((w) => w.wizardId)).toEqual(['address-change', 'contact-form']);
    });

    it('returns an empty list when the directory does not exist', async () => {
      const empty = new WizardCatalog(join(dir, 'missing'), createSilentLogger());
      expect(await empty.list()).toEqual([]);
    });
  });

  describe('loadStructure', () => {
    it('parses and fills defaults', async () => {
      const wizard = await catalog.loadStructure('address-change');
      expect(wizard.pages[0].continueButton).toEqual({ selector: '#submit', selectorType: 'css' });
    });

    it('throws WizardNotFoundError for an unknown id', async () => {
      await expect(catalog.loadStructure('nope')).rejects.toThrow(WizardNotFoundError);
    });

    it('refuses ids that would leave the catalog directory', async () => {
      await expect(catalog.loadStructure('../secrets')).rejects.toThrow(WizardNotFoundError);
    });

    it('throws StructureError naming the file when the document is invalid', async () => {
      await writeJson(dir, 'wizard-structures/half-done.json', { wizardId: 'half-done', name: 'Half' });

      const error = await catalog.loadStructure('half-done').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StructureError);
      if (error instanceof StructureError) {
        expect(error.source).toBe(join(dir, 'wizard-structures', 'half-done.json'));
        expect(error.issues).toContain('url: Required');
      }
    });
  });

  describe('loadSchema', () => {
    it('loads the schema stored beside the structure', async () => {
      const schema = await catalog.loadSchema('contact-form');
      expect(schema.required).toEqual(['name', 'country']);
    });

    it('throws SchemaNotFoundError when only the structure exists', async () => {
      await expect(catalog.loadSchema('address-change')).rejects.toThrow(SchemaNotFoundError);
    });
  });
});

describe('bundled wizards', () => {
  const catalog = new WizardCatalog(fileURLToPath(new URL('../../../wizards', import.meta.url)), createSilentLogger());

  it('parse, and their example data passes validation', async () => {
    const wizard = await catalog.loadStructure('loan-estimator');
    const schema = await catalog.loadSchema('loan-estimator');

    expect(wizard.pages).toHaveLength(3);
    expect(validateForWizard(wizard, schema, exampleUserData(schema)).valid).toBe(true);
  });
});
