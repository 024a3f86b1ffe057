import { Controller, Get, Header } from '@nestjs/common';
import { PrometheusMetricsAdapter } from '../infrastructure/adapters/metrics/prometheus-metrics.adapter';

const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

/**
 * Scrape endpoint for message, resolution, upstream attempt, outbound
 * delivery and latency series plus the live order cache size.
 */
@Controller('internal')
export class MetricsController {
  constructor(private readonly prometheus: PrometheusMetricsAdapter) {}

  @Get('metrics')
  @Header('Content-Type', PROMETHEUS_CONTENT_TYPE)
  @Header('Cache-Control', 'no-store')
  scrape(): string {
    return this.prometheus.renderPrometheus();
  }
}
