/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const ServiceConfigSchema = z.object({
  url: z.url(),
  // Substring of the location that only the results view carries
  resultsMarker: z.string().min(1),
});

export const FormConfigSchema = z.object({
  frameControls: z.object({
    fk5: z.string().min(1),
    galactic: z.string().min(1),
  }),
  coordinateInput: z.string().min(1),
  radiusInput: z.string().min(1),
  submitXPath: z.string().min(1),
  downloadControl: z.string().min(1),
  bandAnchorPrefix: z.string().min(1),
});

// Band name -> internal form identifier, e.g. { "HIGAL_BLUE": 4047 }
export const BandCatalogSchema = z
  .record(z.string().regex(/^[A-Z0-9_]+$/), z.number().int().positive())
  .refine((catalog) => Object.keys(catalog).length > 0, {
    message: "band catalog must name at least one band",
  });

export const TimeoutsConfigSchema = z.object({
  results: z.number().int().positive(), // In milliseconds
  controls: z.number().int().positive(),
  settle: z.number().int().positive(),
  settleGrace: z.number().int().nonnegative(),
  completion: z.number().int().positive(),
  interval: z.number().int().positive(),
});

export const DownloadConfigSchema = z.object({
  directory: z.string(),
  pattern: z.string().min(1),
  // Suffix of the sibling file the browser keeps while a download is in flight
  markerSuffix: z.string().min(1),
  settleFirst: z.boolean(),
});

export const OutputConfigSchema = z.object({
  directory: z.string(),
  writeStats: z.boolean(),
});

export const BrowserConfigSchema = z.object({
  executablePath: z.string().nullable(),
  headless: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const HigalFetchConfigSchema = z.object({
  service: ServiceConfigSchema,
  form: FormConfigSchema,
  bands: BandCatalogSchema,
  timeouts: TimeoutsConfigSchema,
  download: DownloadConfigSchema,
  output: OutputConfigSchema,
  browser: BrowserConfigSchema,
  logging: LoggingConfigSchema,
});

export const PartialHigalFetchConfigSchema = z.object({
  service: ServiceConfigSchema.partial().optional(),
  form: FormConfigSchema.partial().optional(),
  bands: BandCatalogSchema.optional(),
  timeouts: TimeoutsConfigSchema.partial().optional(),
  download: DownloadConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  browser: BrowserConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// TypeScript types inferred from schemas
export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;
export type FormConfig = z.infer<typeof FormConfigSchema>;
export type BandCatalog = Readonly<z.infer<typeof BandCatalogSchema>>;
export type TimeoutsConfig = z.infer<typeof TimeoutsConfigSchema>;
export type DownloadConfig = z.infer<typeof DownloadConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type BrowserConfig = z.infer<typeof BrowserConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type HigalFetchConfig = z.infer<typeof HigalFetchConfigSchema>;
export type PartialHigalFetchConfig = z.infer<
  typeof PartialHigalFetchConfigSchema
>;

export interface ConfigError {
  path: string;
  error: unknown;
}
