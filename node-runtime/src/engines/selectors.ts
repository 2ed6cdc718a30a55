import type { ControlRef } from '../types/index.js';
import type { BrowserPage, WizardLocator } from './browser-page.js';

/**
 * id-typed selectors are stored with or without their leading '#'.
 */
export function normalizeSelector(control: ControlRef): string {
  if (control.selectorType === 'id' && !control.selector.startsWith('#')) {
    return `#${control.selector}`;
  }
  return control.selector;
}

export function resolveControl(page: BrowserPage, control: ControlRef): WizardLocator {
  switch (control.selectorType) {
    case 'text':
      return page.getByText(control.selector, { exact: true }).first();
    case 'id':
      return page.locator(normalizeSelector(control));
    case 'css':
      return page.locator(control.selector);
  }
}
