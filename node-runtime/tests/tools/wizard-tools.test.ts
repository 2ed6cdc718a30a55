import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rm } from 'node:fs/promises';
import { createWizardTools, runWizard } from '../../src/tools/wizard-tools.js';
import { WizardCatalog } from '../../src/catalog/wizard-catalog.js';
import { WizardRunner } from '../../src/runner/wizard-runner.js';
import { createSilentLogger } from '../../src/logging/logger.js';
import { FakePage, fakeBrowser, testConfig } from '../helpers/fake-browser.js';
import type { FakeBrowser } from '../helpers/fake-browser.js';
import { makeWizardsDir } from '../helpers/wizard-dir.js';
import { twoPageSchema, twoPageWizard } from '../helpers/wizards.js';

describe('wizard tools', () => {
  const logger = createSilentLogger();
  let dir: string;
  let browser: FakeBrowser;
  let tools: ReturnType<typeof createWizardTools>;

  beforeEach(async () => {
    dir = await makeWizardsDir();
    browser = fakeBrowser(new FakePage({ texts: { body: 'Done' } }));
    const runner = new WizardRunner({ launcher: browser.launcher, config: testConfig(), logger });
    tools = createWizardTools({ catalog: new WizardCatalog(dir, logger), runner, logger });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('lists the available wizards', async () => {
    const response = await tools.listWizards();
    expect(response.success && response.count).toBe(2);
  });

  it('describes a wizard with its schema and example data', async () => {
    const response = await tools.getWizardInfo('contact-form');

    expect(response).toEqual({
      success: true,
      wizardId: 'contact-form',
      name: 'Contact Form',
      url: 'https://forms.test/contact',
      totalPages: 2,
      schema: twoPageSchema(),
      exampleUserData: { name: 'Ada Lovelace', country: 'USA' },
    });
  });

  it('reports an unknown wizard as a failure instead of throwing', async () => {
    expect(await tools.getWizardInfo('nope')).toEqual({
      success: false,
      error: { kind: 'WizardNotFound', message: 'Wizard not found: nope' },
    });
  });

  it('rejects invalid user data without opening a browser', async () => {
    const response = await tools.executeWizard('contact-form', { country: 'USA' });

    expect(response.success).toBe(false);
    expect('validation' in response && response.validation.missingFields.map((f) => f.fieldId)).toEqual(['name']);
    expect(browser.launches).toBe(0);
  });

  it('executes a wizard whose data validates', async () => {
    const response = await tools.executeWizard('contact-form', { name: 'Ada', country: 'USA' });

    expect(response.success).toBe(true);
    expect('pagesCompleted' in response && response.pagesCompleted).toBe(2);
    expect(browser.launches).toBe(1);
  });

  it('fails execution of a wizard that has no schema', async () => {
    const response = await tools.executeWizard('address-change', {});
    expect(response).toEqual({
      success: false,
      error: { kind: 'SchemaNotFound', message: 'User data schema not found for wizard: address-change' },
    });
    expect(browser.launches).toBe(0);
  });
});

describe('runWizard', () => {
  it('runs in-memory documents through the same validation gate', async () => {
    const logger = createSilentLogger();
    const browser = fakeBrowser(new FakePage({ texts: { body: 'Done' } }));
    const runner = new WizardRunner({ launcher: browser.launcher, config: testConfig(), logger });

    const rejected = await runWizard(runner, twoPageWizard(), twoPageSchema(), { name: 'Ada', country: 'Mexico' });
    expect(rejected.success).toBe(false);
    expect(browser.launches).toBe(0);

    const accepted = await runWizard(runner, twoPageWizard(), twoPageSchema(), { name: 'Ada', country: 'USA' });
    expect(accepted.success).toBe(true);
  });
});
