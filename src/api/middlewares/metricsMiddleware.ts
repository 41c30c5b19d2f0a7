/**
 * HTTP Metrics
 *
 * Tracks per-route request counts and latency for /api/metrics:
 * - http_requests_total{method,path,status}
 * - http_request_duration_seconds{method,path}
 *
 * One instance per app (see createApp), so tests never share counters.
 *
 * Express drops req.route and resets req.baseUrl once a handler calls next(err),
 * so the template is stored in res.locals by labelRoute() while the route is active.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { routePath } from '@/utils/routePath';

const MAX_SAMPLES_PER_ROUTE = 1000;
const UNTRACKED_PATHS = new Set(['/api/metrics', '/api/health']);

const ROUTE_TEMPLATE_LOCAL = 'routeTemplate';

// Templates, not concrete ids, keep label cardinality bounded
function labelOf(req: Request, res: Response): string {
  const stored: unknown = res.locals[ROUTE_TEMPLATE_LOCAL];
  if (typeof stored === 'string') return stored;
  return req.route ? routePath(req) : 'unmatched';
}

interface RequestCount {
  method: string;
  path: string;
  status: number;
  count: number;
}

export class HttpMetrics {
  private readonly counts = new Map<string, RequestCount>();
  private readonly durations = new Map<string, { method: string; path: string; samples: number[] }>();

  middleware(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      if (UNTRACKED_PATHS.has(req.path)) {
        next();
        return;
      }

      const startTime = process.hrtime.bigint();

      res.on('finish', () => {
        const seconds = Number(process.hrtime.bigint() - startTime) / 1e9;
        this.record(req.method, labelOf(req, res), res.statusCode, seconds);
      });

      next();
    };
  }

  /**
   * Route-level middleware: remembers the matched template for the finish hook
   */
  labelRoute(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      res.locals[ROUTE_TEMPLATE_LOCAL] = routePath(req);
      next();
    };
  }

  record(method: string, path: string, status: number, seconds: number): void {
    const countKey = `${method} ${path} ${status}`;
    const existing = this.counts.get(countKey);
    if (existing) {
      existing.count += 1;
    } else {
      this.counts.set(countKey, { method, path, status, count: 1 });
    }

    const durationKey = `${method} ${path}`;
    const series = this.durations.get(durationKey) ?? { method, path, samples: [] };
    series.samples.push(seconds);
    if (series.samples.length > MAX_SAMPLES_PER_ROUTE) {
      series.samples.shift();
    }
    this.durations.set(durationKey, series);
  }

  /**
   * HTTP series in Prometheus text format
   */
  render(): string[] {
    const lines: string[] = [];

    lines.push('# HELP http_requests_total Total HTTP requests');
    lines.push('# TYPE http_requests_total counter');
    for (const { method, path, status, count } of this.counts.values()) {
      lines.push(`http_requests_total{method="${method}",path="${path}",status="${status}"} ${count}`);
    }
    lines.push('');

    lines.push('# HELP http_request_duration_seconds HTTP request duration in seconds');
    lines.push('# TYPE http_request_duration_seconds summary');
    for (const { method, path, samples } of this.durations.values()) {
      if (samples.length === 0) continue;

      const sorted = [...samples].sort((a, b) => a - b);
      const quantile = (q: number): number => sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * q))] ?? 0;
      const sum = samples.reduce((a, b) => a + b, 0);
      const labels = `method="${method}",path="${path}"`;

      lines.push(`http_request_duration_seconds{${labels},quantile="0.5"} ${quantile(0.5).toFixed(4)}`);
      lines.push(`http_request_duration_seconds{${labels},quantile="0.95"} ${quantile(0.95).toFixed(4)}`);
      lines.push(`http_request_duration_seconds{${labels},quantile="0.99"} ${quantile(0.99).toFixed(4)}`);
      lines.push(`http_request_duration_seconds_sum{${labels}} ${sum.toFixed(4)}`);
      lines.push(`http_request_duration_seconds_count{${labels}} ${samples.length}`);
    }
    lines.push('');

    return lines;
  }

  reset(): void {
    this.counts.clear();
    this.durations.clear();
  }
}
