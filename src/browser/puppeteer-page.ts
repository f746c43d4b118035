/**
 * Puppeteer Survey Page
 * SurveyPage backed by a puppeteer-core driven Chrome session
 */

import puppeteer, { type Browser, type Page } from "puppeteer-core";
import type { BrowserConfig, FormConfig } from "../types/config";
import type { DownloadControl, Selector, SurveyPage } from "../types/page";

export interface LaunchOptions extends BrowserConfig {
  downloadDir: string; // Absolute path the browser saves downloads to
}

function toQuery(selector: Selector): string {
  return selector.by === "id"
    ? `[id="${selector.value}"]`
    : `::-p-xpath(${selector.value})`;
}

function describe(selector: Selector): string {
  return `${selector.by} "${selector.value}"`;
}

export class PuppeteerSurveyPage implements SurveyPage {
  private constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    private readonly form: FormConfig,
  ) {}

  /**
   * Start the browser and route its downloads to `downloadDir`
   * Without an executable path the locally installed Chrome is used
   */
  static async launch(
    options: LaunchOptions,
    form: FormConfig,
  ): Promise<PuppeteerSurveyPage> {
    const browser = await puppeteer.launch({
      headless: options.headless,
      ...(options.executablePath
        ? { executablePath: options.executablePath }
        : { channel: "chrome" as const }),
    });

    try {
      const session = await browser.target().createCDPSession();
      await session.send("Browser.setDownloadBehavior", {
        behavior: "allow",
        downloadPath: options.downloadDir,
      });

      const [existing] = await browser.pages();
      const page = existing ?? (await browser.newPage());
      return new PuppeteerSurveyPage(browser, page, form);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  async open(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded" });
  }

  async location(): Promise<string> {
    return this.page.url();
  }

  async windowCount(): Promise<number> {
    return (await this.browser.pages()).length;
  }

  async hasElement(selector: Selector): Promise<boolean> {
    const handle = await this.page.$(toQuery(selector));
    if (!handle) return false;
    await handle.dispose();
    return true;
  }

  async click(selector: Selector): Promise<void> {
    const handle = await this.page.$(toQuery(selector));
    if (!handle) {
      throw new Error(`No element matches ${describe(selector)}`);
    }
    try {
      await handle.click();
    } finally {
      await handle.dispose();
    }
  }

  async fill(selector: Selector, text: string): Promise<void> {
    const handle = await this.page.$(toQuery(selector));
    if (!handle) {
      throw new Error(`No element matches ${describe(selector)}`);
    }
    try {
      await handle.evaluate((element) => {
        if (element instanceof HTMLInputElement) element.value = "";
      });
      await handle.type(text);
    } finally {
      await handle.dispose();
    }
  }

  /**
   * The download link of a band sits next to its `<prefix><formId>` checkbox
   */
  async findDownloadControl(formId: number): Promise<DownloadControl | null> {
    const anchorId = `${this.form.bandAnchorPrefix}${formId}`;
    const controlId = this.form.downloadControl;

    const found = await this.page.evaluate(
      (anchor: string, control: string) =>
        document
          .getElementById(anchor)
          ?.parentElement?.querySelector(`[id="${control}"]`) instanceof
        HTMLElement,
      anchorId,
      controlId,
    );
    if (!found) return null;

    return {
      activate: async () => {
        const clicked = await this.page.evaluate(
          (anchor: string, control: string) => {
            const element = document
              .getElementById(anchor)
              ?.parentElement?.querySelector(`[id="${control}"]`);
            if (!(element instanceof HTMLElement)) return false;
            element.click();
            return true;
          },
          anchorId,
          controlId,
        );
        if (!clicked) {
          throw new Error(`Download control next to "${anchorId}" went away`);
        }
      },
    };
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}
