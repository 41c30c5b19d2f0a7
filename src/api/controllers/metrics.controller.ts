/**
 * Metrics Controller
 *
 * Prometheus text exposition for scrapers (Prometheus, Grafana Agent, DataDog agent).
 * Format: https://prometheus.io/docs/instrumenting/exposition_formats/
 */

import { Request, Response } from 'express';
import { HttpMetrics } from '@/api/middlewares/metricsMiddleware';

function processMetrics(): string[] {
  const memUsage = process.memoryUsage();
  const cpuUsage = process.cpuUsage();

  return [
    '# HELP process_uptime_seconds Process uptime in seconds',
    '# TYPE process_uptime_seconds gauge',
    `process_uptime_seconds ${process.uptime()}`,
    '',
    '# HELP process_heap_used_bytes Process heap memory used in bytes',
    '# TYPE process_heap_used_bytes gauge',
    `process_heap_used_bytes ${memUsage.heapUsed}`,
    '',
    '# HELP process_rss_bytes Process resident set size in bytes',
    '# TYPE process_rss_bytes gauge',
    `process_rss_bytes ${memUsage.rss}`,
    '',
    '# HELP process_cpu_user_seconds_total Total user CPU time in seconds',
    '# TYPE process_cpu_user_seconds_total counter',
    `process_cpu_user_seconds_total ${cpuUsage.user / 1_000_000}`,
    '',
    '# HELP process_cpu_system_seconds_total Total system CPU time in seconds',
    '# TYPE process_cpu_system_seconds_total counter',
    `process_cpu_system_seconds_total ${cpuUsage.system / 1_000_000}`,
    '',
  ];
}

export function createMetricsController(httpMetrics: HttpMetrics) {
  /**
   * GET /api/metrics
   */
  async function getMetrics(_req: Request, res: Response): Promise<void> {
    const lines = [
      ...httpMetrics.render(),
      ...processMetrics(),
      '# HELP app_info Application information',
      '# TYPE app_info gauge',
      `app_info{node_version="${process.version}",env="${process.env.NODE_ENV || 'development'}"} 1`,
      '',
    ];

    res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.send(lines.join('\n'));
  }

  return { getMetrics };
}
