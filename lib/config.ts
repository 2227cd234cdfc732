import { z } from 'zod';
import { readFile } from 'fs/promises';
import { ConfigurationError } from './errors';
import type { SourceConfig } from './types';

export const DEFAULT_SELECTORS = {
  articles: 'article',
  title: 'h2',
  link: 'a',
  date: 'time'
} as const;

/** Navigation and UI labels that show up as "titles" on listing pages */
export const DEFAULT_STOPLIST = [
  'read more',
  'learn more',
  'continue reading',
  'subscribe',
  'sign up',
  'sign in',
  'log in',
  'load more',
  'view all',
  'see all posts',
  'privacy policy',
  'terms of service',
  'cookie policy',
  'contact us',
  'no title',
  'untitled'
];

const httpUrl = z
  .string()
  .url()
  .refine(value => /^https?:\/\//i.test(value), { message: 'must be an http(s) URL' });

export const SourceSelectorsSchema = z.object({
  articles: z.string().min(1).default(DEFAULT_SELECTORS.articles),
  title: z.string().min(1).default(DEFAULT_SELECTORS.title),
  link: z.string().min(1).default(DEFAULT_SELECTORS.link),
  date: z.string().min(1).default(DEFAULT_SELECTORS.date),
  summary: z.string().min(1).optional()
});

export const SourceConfigSchema = z
  .object({
    name: z.string().trim().min(1),
    tier: z.string().trim().min(1).default('tier1'),
    feedUrl: httpUrl.optional(),
    pageUrl: httpUrl.optional(),
    selectors: SourceSelectorsSchema.default({})
  })
  .refine(source => Boolean(source.feedUrl || source.pageUrl), {
    message: 'a source needs a feedUrl, a pageUrl, or both'
  });

export const CollectorConfigSchema = z
  .object({
    sources: z.array(SourceConfigSchema).min(1),
    rateLimit: z
      .object({
        minDelaySeconds: z.number().min(0).max(60).default(2),
        jitterSeconds: z.number().min(0).max(60).default(1),
        keyBy: z.enum(['host', 'global']).default('host')
      })
      .default({}),
    fetch: z
      .object({
        timeoutMs: z.number().int().positive().max(120000).default(30000),
        maxAttempts: z.number().int().min(1).max(10).default(3),
        baseBackoffMs: z.number().int().min(0).default(1000),
        maxBackoffMs: z.number().int().min(0).default(30000)
      })
      .default({}),
    identities: z.array(z.string().min(1)).default([]),
    validation: z
      .object({
        minTitleLength: z.number().int().min(1).default(10),
        maxTitleLength: z.number().int().positive().optional(),
        stoplist: z.array(z.string()).default(DEFAULT_STOPLIST)
      })
      .default({}),
    maxConcurrency: z.number().int().min(1).max(32).default(3),
    maxItemsPerSource: z.number().int().positive().default(10),
    /** Tier names, highest priority first */
    tierPriority: z.array(z.string()).default(['tier1', 'tier2']),
    runTimeoutMs: z.number().int().positive().optional(),
    output: z
      .object({
        dataDir: z.string().min(1).default('data')
      })
      .default({})
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.sources.forEach((source, index) => {
      if (seen.has(source.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sources', index, 'name'],
          message: `duplicate source name "${source.name}"`
        });
      }
      seen.add(source.name);
    });
  });

export type CollectorConfig = z.infer<typeof CollectorConfigSchema>;
export type CollectorConfigInput = z.input<typeof CollectorConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a raw configuration object and freeze the source list.
 * Throws ConfigurationError listing every invalid field.
 */
export function loadConfig(raw: unknown): CollectorConfig {
  const parsed = CollectorConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid collector configuration: ${issues.join('; ')}`, { issues });
  }

  const config = parsed.data;
  for (const source of config.sources) {
    Object.freeze(source.selectors);
    Object.freeze(source);
  }
  Object.freeze(config.sources);
  return config;
}

/**
 * Validate a single source record, e.g. one added at runtime
 */
export function parseSourceConfig(raw: unknown): SourceConfig {
  const parsed = SourceConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid source configuration: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

export async function readConfigFile(filePath: string): Promise<CollectorConfig> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new ConfigurationError(`Cannot read configuration file ${filePath}: ${message}`, {
      issues: [message],
      cause: error instanceof Error ? error : undefined
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new ConfigurationError(`Configuration file ${filePath} is not valid JSON: ${message}`, {
      issues: [message],
      cause: error instanceof Error ? error : undefined
    });
  }

  return loadConfig(raw);
}
