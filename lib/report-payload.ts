import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { CollectionResult, FetchMethod, RunTotals } from './types';

/**
 * Data file handed to report generators. Keys are snake_case because the
 * reporting side reads them as-is.
 */
export interface ReportPayload {
  timestamp: string;
  total_articles: number;
  articles: ReportArticle[];
  metrics: {
    sources: ReportSourceMetrics[];
    totals: RunTotals & { cancelled: boolean };
  };
}

export interface ReportArticle {
  source: string;
  tier: string;
  title: string;
  link: string;
  published_at: string | null;
  summary: string | null;
  method: FetchMethod;
}

export interface ReportSourceMetrics {
  source: string;
  method: FetchMethod | null;
  article_count: number;
  success: boolean;
  duration_ms: number;
  error: { category: string; message: string } | null;
}

export function toReportPayload(result: CollectionResult): ReportPayload {
  return {
    timestamp: result.metrics.finishedAt,
    total_articles: result.articles.length,
    articles: result.articles.map(article => ({
      source: article.source,
      tier: article.tier,
      title: article.title,
      link: article.link,
      published_at: article.publishedAt ?? null,
      summary: article.summary ?? null,
      method: article.method
    })),
    metrics: {
      sources: result.metrics.sources.map(source => ({
        source: source.source,
        method: source.method,
        article_count: source.articleCount,
        success: source.success,
        duration_ms: source.durationMs,
        error: source.error ? { category: source.error.category, message: source.error.message } : null
      })),
      totals: { ...result.metrics.totals, cancelled: result.metrics.cancelled }
    }
  };
}

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * `intelligence_data_YYYYMMDD_HHMMSS.json`, UTC
 */
export function reportFileName(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `intelligence_data_${day}_${time}.json`;
}

/**
 * Write the payload into `dir` (created if missing) and return the file path
 */
export async function writeReportPayload(dir: string, payload: ReportPayload, now: Date = new Date()): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = path.join(dir, reportFileName(now));
  await writeFile(filePath, JSON.stringify(payload, null, 2) + '\n', 'utf8');
  return filePath;
}
