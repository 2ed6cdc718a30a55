import type { WaitUntil } from '../types/index.js';

/**
 * The slice of Playwright's Locator the engine relies on. Playwright's own
 * Locator satisfies it structurally; tests supply in-process fakes.
 */
export interface WizardLocator {
  click(options?: { timeout?: number }): Promise<void>;
  fill(value: string, options?: { timeout?: number }): Promise<void>;
  press(key: string, options?: { timeout?: number }): Promise<void>;
  dispatchEvent(type: string): Promise<void>;
  selectOption(values: string | { label: string }, options?: { timeout?: number }): Promise<string[]>;
  innerText(options?: { timeout?: number }): Promise<string>;
  first(): WizardLocator;
}

export type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

export interface BrowserPage {
  goto(url: string, options?: { waitUntil?: WaitUntil; timeout?: number }): Promise<unknown>;
  locator(selector: string): WizardLocator;
  getByText(text: string, options?: { exact?: boolean }): WizardLocator;
  screenshot(options?: { type?: 'jpeg' | 'png'; quality?: number; fullPage?: boolean }): Promise<Buffer>;
  waitForTimeout(timeout: number): Promise<void>;
  waitForLoadState(state?: LoadState, options?: { timeout?: number }): Promise<void>;
  url(): string;
  title(): Promise<string>;
}

export interface SessionContext {
  setDefaultTimeout(timeout: number): void;
  setDefaultNavigationTimeout(timeout: number): void;
  newPage(): Promise<BrowserPage>;
  close(): Promise<void>;
}

export interface LaunchedBrowser {
  context: SessionContext;
  close(): Promise<void>;
}
