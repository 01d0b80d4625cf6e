import os from 'os';
import path from 'path';
import { z } from 'zod';

/**
 * Package indexes known to report stale versions for upstream projects.
 * Records from these repos never win the version vote.
 */
export const DEFAULT_REPO_DENYLIST = [
  'appget',
  'baulk',
  'chocolatey',
  'cygwin',
  'just-install',
  'scoop',
  'winget',
] as const;

/** Repology rejects bursts above this many concurrent project queries. */
export const DEFAULT_REPOLOGY_CONCURRENCY = 11;

export const RepologyConfigSchema = z.object({
  apiUrl: z.string().url().default('https://repology.org/api/v1'),
  concurrency: z.number().int().min(1).default(DEFAULT_REPOLOGY_CONCURRENCY),
  denylist: z.array(z.string()).default([...DEFAULT_REPO_DENYLIST]),
});

export const HttpConfigSchema = z.object({
  timeoutMs: z.number().int().min(1000).default(30_000),
  /** How many times a download is re-requested with identity encoding to obtain a Content-Length. */
  contentLengthRetries: z.number().int().min(0).default(3),
});

export const EvaluatorConfigSchema = z.object({
  shell: z.string().default('/bin/bash'),
  timeoutMs: z.number().int().min(100).default(10_000),
});

export const DownloadConfigSchema = z.object({
  dir: z.string().default(path.join(os.tmpdir(), 'pacup')),
});

export const InstallConfigSchema = z.object({
  command: z.string().default('pacstall'),
  args: z.array(z.string()).default(['-Il']),
});

export const ShipConfigSchema = z.object({
  enabled: z.boolean().default(false),
  push: z.boolean().default(false),
  remote: z.string().default('origin'),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  repology: RepologyConfigSchema.default({}),
  http: HttpConfigSchema.default({}),
  evaluator: EvaluatorConfigSchema.default({}),
  download: DownloadConfigSchema.default({}),
  install: InstallConfigSchema.default({}),
  ship: ShipConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type RepologyConfig = z.infer<typeof RepologyConfigSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type EvaluatorConfig = z.infer<typeof EvaluatorConfigSchema>;
export type ShipConfig = z.infer<typeof ShipConfigSchema>;
