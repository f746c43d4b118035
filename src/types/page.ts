/**
 * Browser page contract
 * The pipeline only talks to the remote form through this interface
 */

export type Selector =
  | { by: "id"; value: string }
  | { by: "xpath"; value: string };

export interface DownloadControl {
  activate(): Promise<void>;
}

/**
 * Anything that can report how many browser windows/tabs are open
 */
export interface WindowSource {
  windowCount(): Promise<number>;
}

export interface SurveyPage extends WindowSource {
  open(url: string): Promise<void>;
  location(): Promise<string>;
  click(selector: Selector): Promise<void>;
  /** Clears the input before typing */
  fill(selector: Selector, text: string): Promise<void>;
  hasElement(selector: Selector): Promise<boolean>;
  /** Resolves the download control of a band, null when the page has none */
  findDownloadControl(formId: number): Promise<DownloadControl | null>;
  close(): Promise<void>;
}
