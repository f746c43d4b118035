/**
 * Fetch context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { HigalFetchConfig } from "./config";
import type { SurveyPage } from "./page";
import type { SearchRequest } from "./request";
import type { MigrationReport, TriggerReport } from "./report";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

export interface FetchContext {
  // Input - provided at initialization
  config: HigalFetchConfig;
  tracker: Tracker;
  logger: Logger;
  page: SurveyPage;
  request: SearchRequest;

  // Aborts every pending wait (wired to SIGINT by the CLI)
  signal?: AbortSignal;
  verbose?: boolean;

  trigger?: TriggerReport; // Written by the trigger module
  migration?: MigrationReport; // Written by the migrator module
}
