import type { Logger } from '../logging/logger.js';
import type {
  ClickField,
  EngineConfig,
  FillEnterField,
  FillField,
  GroupField,
  JavascriptClickField,
  SelectField,
  SubField,
  WizardField,
} from '../types/index.js';
import type { BrowserPage, WizardLocator } from '../engines/browser-page.js';
import { normalizeSelector, resolveControl } from '../engines/selectors.js';
import { FieldFillError, describeCause } from '../exception/errors.js';
import { isRecord, ownValue } from '../utils/records.js';
import { selectStrategies, subFieldSelectStrategies } from './select-strategies.js';
import type { SelectStrategy } from './select-strategies.js';

export interface FieldOutcome {
  fieldId: string;
  skipped: boolean;
  strategy?: string;
  items?: number;
}

type FieldExecutorConfig = Pick<EngineConfig, 'timeouts' | 'settle'>;

function assertNever(value: never): never {
  throw new Error(`Unhandled interaction: ${JSON.stringify(value)}`);
}

/**
 * Performs one declared interaction against the live page.
 */
export class FieldExecutor {
  constructor(
    private config: FieldExecutorConfig,
    private logger: Logger,
  ) {}

  async execute(page: BrowserPage, field: WizardField, value: unknown): Promise<FieldOutcome> {
    const selector = normalizeSelector(field);

    if (value === undefined || value === null) {
      if (field.required) {
        throw new FieldFillError({ fieldId: field.fieldId, selector, reason: 'missing required value' });
      }
      this.logger.debug({ fieldId: field.fieldId }, 'No value provided, skipping optional field');
      return { fieldId: field.fieldId, skipped: true };
    }

    try {
      const outcome = await this.dispatch(page, field, value);
      if (!outcome.skipped) {
        await page.waitForTimeout(this.config.settle.afterFieldMs);
      }
      return outcome;
    } catch (error) {
      if (error instanceof FieldFillError) throw error;
      throw new FieldFillError({ fieldId: field.fieldId, selector, reason: 'interaction failed', cause: error });
    }
  }

  private dispatch(page: BrowserPage, field: WizardField, value: unknown): Promise<FieldOutcome> {
    switch (field.interaction) {
      case 'fill':
        return this.fill(page, field, value);
      case 'fill_enter':
        return this.fillEnter(page, field, value);
      case 'click':
        return this.click(page, field, value);
      case 'javascript_click':
        return this.javascriptClick(page, field, value);
      case 'select':
        return this.select(page, field, value);
      case 'group':
        return this.fillGroup(page, field, value);
      default:
        return assertNever(field);
    }
  }

  private scalar(field: WizardField | SubField, value: unknown): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    throw new FieldFillError({
      fieldId: field.fieldId,
      selector: normalizeSelector(field),
      reason: `expected a scalar value, got ${Array.isArray(value) ? 'a list' : typeof value}`,
    });
  }

  private async fill(page: BrowserPage, field: FillField, value: unknown): Promise<FieldOutcome> {
    await resolveControl(page, field).fill(this.scalar(field, value));
    this.logger.debug({ fieldId: field.fieldId }, 'Filled field');
    return { fieldId: field.fieldId, skipped: false };
  }

  // Typeahead inputs only register the choice after an explicit Enter.
  private async fillEnter(page: BrowserPage, field: FillEnterField, value: unknown): Promise<FieldOutcome> {
    const locator = resolveControl(page, field);
    await locator.fill(this.scalar(field, value));
    await locator.press('Enter');
    await page.waitForTimeout(this.config.settle.afterEnterMs);
    this.logger.debug({ fieldId: field.fieldId }, 'Filled field and confirmed with Enter');
    return { fieldId: field.fieldId, skipped: false };
  }

  private async click(page: BrowserPage, field: ClickField, value: unknown): Promise<FieldOutcome> {
    if (value === false) return { fieldId: field.fieldId, skipped: true };
    await resolveControl(page, field).click();
    this.logger.debug({ fieldId: field.fieldId }, 'Clicked field');
    return { fieldId: field.fieldId, skipped: false };
  }

  // Styled radios hide the input under its label, so a visibility-gated
  // click never lands; dispatch the event directly instead.
  private async javascriptClick(
    page: BrowserPage,
    field: JavascriptClickField,
    value: unknown,
  ): Promise<FieldOutcome> {
    if (value === false) return { fieldId: field.fieldId, skipped: true };
    await resolveControl(page, field).dispatchEvent('click');
    this.logger.debug({ fieldId: field.fieldId }, 'Dispatched click event');
    return { fieldId: field.fieldId, skipped: false };
  }

  private async select(page: BrowserPage, field: SelectField, value: unknown): Promise<FieldOutcome> {
    const locator = resolveControl(page, field);
    const strategy = await this.trySelect(locator, field, selectStrategies(this.scalar(field, value)));
    return { fieldId: field.fieldId, skipped: false, strategy };
  }

  /**
   * Tries each strategy under the short per-strategy timeout, so exhausting
   * all of them costs a small multiple of that bound.
   */
  private async trySelect(
    locator: WizardLocator,
    field: WizardField | SubField,
    strategies: SelectStrategy[],
    fieldId: string = field.fieldId,
  ): Promise<string> {
    const attempted: string[] = [];
    let lastError: unknown;

    for (const strategy of strategies) {
      attempted.push(strategy.name);
      try {
        await locator.selectOption(strategy.option, { timeout: this.config.timeouts.selectStrategyTimeoutMs });
        this.logger.debug({ fieldId, strategy: strategy.name }, 'Selected option');
        return strategy.name;
      } catch (error) {
        lastError = error;
        this.logger.debug({ fieldId, strategy: strategy.name, error: describeCause(error) }, 'Select strategy failed');
      }
    }

    throw new FieldFillError({
      fieldId,
      selector: normalizeSelector(field),
      reason: 'no option matched',
      attemptedStrategies: attempted,
      cause: lastError,
    });
  }

  private async fillGroup(page: BrowserPage, field: GroupField, value: unknown): Promise<FieldOutcome> {
    if (!Array.isArray(value)) {
      throw new FieldFillError({
        fieldId: field.fieldId,
        selector: normalizeSelector(field),
        reason: 'expected a list of records',
      });
    }

    // Zero items means "none", which differs from leaving the field out.
    if (value.length === 0) {
      this.logger.debug({ fieldId: field.fieldId }, 'Empty group, skipping');
      return { fieldId: field.fieldId, skipped: true, items: 0 };
    }

    for (const [index, item] of value.entries()) {
      if (!isRecord(item)) {
        throw new FieldFillError({
          fieldId: `${field.fieldId}[${index}]`,
          selector: normalizeSelector(field),
          reason: 'expected a record',
        });
      }

      await resolveControl(page, field.addButton).click();
      await page.waitForTimeout(this.config.settle.afterGroupItemMs);

      for (const subField of field.subFields) {
        await this.fillSubField(page, field, index, subField, ownValue(item, subField.fieldId));
      }

      await resolveControl(page, field.saveButton).click();
      await page.waitForTimeout(this.config.settle.afterGroupItemMs);
      this.logger.debug({ fieldId: field.fieldId, item: index + 1, total: value.length }, 'Saved group item');
    }

    return { fieldId: field.fieldId, skipped: false, items: value.length };
  }

  private async fillSubField(
    page: BrowserPage,
    group: GroupField,
    index: number,
    subField: SubField,
    value: unknown,
  ): Promise<void> {
    const path = `${group.fieldId}[${index}].${subField.fieldId}`;

    if (value === undefined || value === null) {
      this.logger.warn({ fieldId: path }, 'Missing value for sub-field, skipping');
      return;
    }

    const locator = resolveControl(page, subField);
    const text = this.scalar(subField, value);

    try {
      switch (subField.interaction) {
        case 'fill':
          await locator.fill(text);
          return;
        case 'select':
          await this.trySelect(locator, subField, subFieldSelectStrategies(text), path);
          return;
      }
    } catch (error) {
      if (error instanceof FieldFillError) throw error;
      throw new FieldFillError({
        fieldId: path,
        selector: normalizeSelector(subField),
        reason: 'interaction failed',
        cause: error,
      });
    }
  }
}
