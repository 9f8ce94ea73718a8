/**
 * Configuration schema (Zod).
 *
 * The parsed value is the single source of runtime settings; it is frozen after
 * loading and thresholds are handed to the classifier explicitly.
 */

import { z } from "zod";

const thresholdPercent = z.number().gt(0).max(100);

export const thresholdsConfigSchema = z.object({
  cpuThresholdPercent: thresholdPercent.default(10),
  memoryThresholdPercent: thresholdPercent.default(15),
});

export const awsProviderConfigSchema = z.object({
  enabled: z.boolean().default(false),
  region: z.string().min(1).default("us-east-1"),
  profile: z.string().optional(),
});

export const azureProviderConfigSchema = z.object({
  enabled: z.boolean().default(false),
  subscriptionId: z.string().optional(),
  tenantId: z.string().optional(),
});

export const gcpProviderConfigSchema = z.object({
  enabled: z.boolean().default(false),
  projectId: z.string().optional(),
  /** Static OAuth2 token; when unset the gcloud CLI is asked for one. */
  accessToken: z.string().optional(),
});

export const providersConfigSchema = z.object({
  aws: awsProviderConfigSchema.default({}),
  azure: azureProviderConfigSchema.default({}),
  gcp: gcpProviderConfigSchema.default({}),
});

/** Longest interval a single Node timer can wait (2^31 - 1 ms), in whole hours. */
export const MAX_INTERVAL_HOURS = 596;

export const optimizerConfigSchema = z
  .object({
    thresholds: thresholdsConfigSchema.default({}),
    intervalHours: z.number().positive().max(MAX_INTERVAL_HOURS).default(6),
    lookbackHours: z.number().int().positive().default(24),
    /** Bound on one provider's whole collection. */
    collectorTimeoutMs: z.number().int().positive().default(60_000),
    /** Bound on each provider API call (list page, metric query, action). */
    callTimeoutMs: z.number().int().positive().default(10_000),
    autoOptimize: z.boolean().default(false),
    dryRun: z.boolean().default(false),
    deleteUnattachedStorage: z.boolean().default(false),
    reportDir: z.string().min(1).default("."),
    providers: providersConfigSchema.default({}),
  })
  .superRefine((config, ctx) => {
    if (config.callTimeoutMs >= config.collectorTimeoutMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["callTimeoutMs"],
        message: `must be less than collectorTimeoutMs (${config.collectorTimeoutMs})`,
      });
    }
  });

export type AwsProviderConfig = z.output<typeof awsProviderConfigSchema>;
export type AzureProviderConfig = z.output<typeof azureProviderConfigSchema>;
export type GcpProviderConfig = z.output<typeof gcpProviderConfigSchema>;
export type ProvidersConfig = z.output<typeof providersConfigSchema>;
export type OptimizerConfig = z.output<typeof optimizerConfigSchema>;
export type OptimizerConfigInput = z.input<typeof optimizerConfigSchema>;
