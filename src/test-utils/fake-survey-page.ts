/**
 * In-memory SurveyPage for tests
 * Records every interaction and lets tests script the remote page state
 */

import type { DownloadControl, Selector, SurveyPage } from "../types/page";

export type PageAction =
  | { type: "open"; url: string }
  | { type: "click"; selector: Selector }
  | { type: "fill"; selector: Selector; text: string }
  | { type: "download"; formId: number };

export class FakeSurveyPage implements SurveyPage {
  readonly actions: PageAction[] = [];
  readonly lookups: number[] = [];

  url = "about:blank";
  windows = 1;
  elements = new Set<string>(); // "id:<value>" or "xpath:<value>"
  controls = new Set<number>(); // Form ids that have a download control
  failingControls = new Set<number>(); // Controls whose activation throws
  closed = false;

  // Runs after each click, e.g. to simulate navigation
  onClick?: (selector: Selector) => void;

  async open(url: string): Promise<void> {
    this.url = url;
    this.actions.push({ type: "open", url });
  }

  async location(): Promise<string> {
    return this.url;
  }

  async windowCount(): Promise<number> {
    return this.windows;
  }

  async click(selector: Selector): Promise<void> {
    this.actions.push({ type: "click", selector });
    this.onClick?.(selector);
  }

  async fill(selector: Selector, text: string): Promise<void> {
    this.actions.push({ type: "fill", selector, text });
  }

  async hasElement(selector: Selector): Promise<boolean> {
    return this.elements.has(`${selector.by}:${selector.value}`);
  }

  async findDownloadControl(formId: number): Promise<DownloadControl | null> {
    this.lookups.push(formId);
    if (!this.controls.has(formId)) return null;

    return {
      activate: async () => {
        if (this.failingControls.has(formId)) {
          throw new Error(`control ${formId} is disabled`);
        }
        this.actions.push({ type: "download", formId });
      },
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  downloads(): number[] {
    return this.actions.flatMap((action) =>
      action.type === "download" ? [action.formId] : [],
    );
  }
}
