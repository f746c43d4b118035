/**
 * Central type exports
 */

// Configuration
export type {
  HigalFetchConfig,
  PartialHigalFetchConfig,
  ServiceConfig,
  FormConfig,
  BandCatalog,
  TimeoutsConfig,
  DownloadConfig,
  OutputConfig,
  BrowserConfig,
  LoggingConfig,
  ConfigError,
} from "./config";
export {
  HigalFetchConfigSchema,
  PartialHigalFetchConfigSchema,
} from "./config";

// Request
export type {
  Frame,
  AngularUnit,
  AngularQuantity,
  RadiusInput,
  SkyPosition,
  BandName,
  SearchRequestInput,
  SearchRequest,
} from "./request";
export { FRAMES } from "./request";

// Page
export type {
  Selector,
  DownloadControl,
  WindowSource,
  SurveyPage,
} from "./page";

// Reports
export type {
  PollStatus,
  PollOutcome,
  BandFailureReason,
  BandOutcome,
  TriggerReport,
  PendingFile,
  MigrationFailureReason,
  MigrationOutcome,
  MigrationReport,
} from "./report";

// Context
export type { FetchContext } from "./context";

// Tracker
export { Tracker } from "../utils/tracker";
export type {
  Issue,
  IssueType,
  BandIssue,
  FileIssue,
  ResourceIssue,
  ResourceIssueReason,
  FetchStats,
} from "../utils/tracker";
