import { Inject, Injectable } from '@nestjs/common';
import {
  METRIC_CACHE_ENTRIES,
  METRIC_MESSAGES_TOTAL,
  METRIC_ORDER_RESOLUTIONS_TOTAL,
  METRIC_OUTBOUND_MESSAGES_TOTAL,
  METRIC_RESPONSE_LATENCY_SECONDS,
  METRIC_UPSTREAM_ATTEMPTS_TOTAL,
  RESPONSE_LATENCY_BUCKETS,
} from '@/common/metrics';
import type {
  MetricsPort,
  OrderResolutionOutcome,
  UpstreamAttemptResult,
} from '@/modules/order-status/application/ports/metrics.port';
import type { OrderCachePort } from '@/modules/order-status/application/ports/order-cache.port';
import { ORDER_CACHE_PORT } from '@/modules/order-status/application/ports/tokens';
import type { IntentName } from '@/modules/order-status/domain/intent';

@Injectable()
export class PrometheusMetricsAdapter implements MetricsPort {
  private readonly messages = new Map<string, number>();
  private readonly resolutions = new Map<string, number>();
  private readonly upstreamAttempts = new Map<string, number>();
  private readonly outbound = new Map<string, number>();

  private readonly latencyBuckets = new Map<string, number>();
  private readonly latencySum = new Map<string, number>();
  private readonly latencyCount = new Map<string, number>();

  constructor(
    @Inject(ORDER_CACHE_PORT)
    private readonly cache: OrderCachePort,
  ) {}

  incrementMessage(input: { intent: IntentName }): void {
    increment(this.messages, input.intent);
  }

  observeResponseLatency(input: { intent: IntentName; seconds: number }): void {
    const intent = sanitizeLabelValue(input.intent);
    const latency = Number.isFinite(input.seconds) && input.seconds >= 0 ? input.seconds : 0;

    this.latencySum.set(intent, (this.latencySum.get(intent) ?? 0) + latency);
    increment(this.latencyCount, intent);

    for (const bucket of RESPONSE_LATENCY_BUCKETS) {
      if (latency <= bucket) {
        increment(this.latencyBuckets, `${intent}|${bucket}`);
      }
    }

    increment(this.latencyBuckets, `${intent}|+Inf`);
  }

  incrementOrderResolution(outcome: OrderResolutionOutcome): void {
    increment(this.resolutions, outcome);
  }

  incrementUpstreamAttempt(result: UpstreamAttemptResult): void {
    increment(this.upstreamAttempts, result);
  }

  incrementOutboundMessage(delivered: boolean): void {
    increment(this.outbound, delivered ? 'delivered' : 'failed');
  }

  renderPrometheus(): string {
    const lines: string[] = [];

    renderCounter(lines, METRIC_MESSAGES_TOTAL, 'Inbound messages handled by intent.', 'intent', this.messages);
    renderCounter(
      lines,
      METRIC_ORDER_RESOLUTIONS_TOTAL,
      'Order resolutions by outcome.',
      'outcome',
      this.resolutions,
    );
    renderCounter(
      lines,
      METRIC_UPSTREAM_ATTEMPTS_TOTAL,
      'Order API attempts by result.',
      'result',
      this.upstreamAttempts,
    );
    renderCounter(
      lines,
      METRIC_OUTBOUND_MESSAGES_TOTAL,
      'Outbound WhatsApp messages by result.',
      'result',
      this.outbound,
    );

    lines.push(`# HELP ${METRIC_CACHE_ENTRIES} Entries currently held by the order cache.`);
    lines.push(`# TYPE ${METRIC_CACHE_ENTRIES} gauge`);
    lines.push(`${METRIC_CACHE_ENTRIES} ${this.cache.size()}`);

    lines.push(`# HELP ${METRIC_RESPONSE_LATENCY_SECONDS} Inbound message handling latency in seconds.`);
    lines.push(`# TYPE ${METRIC_RESPONSE_LATENCY_SECONDS} histogram`);
    for (const [key, value] of this.latencyBuckets.entries()) {
      const [intent, bucket] = key.split('|');
      lines.push(
        `${METRIC_RESPONSE_LATENCY_SECONDS}_bucket{intent="${intent}",le="${bucket}"} ${value}`,
      );
    }
    for (const [intent, value] of this.latencySum.entries()) {
      lines.push(`${METRIC_RESPONSE_LATENCY_SECONDS}_sum{intent="${intent}"} ${value}`);
    }
    for (const [intent, value] of this.latencyCount.entries()) {
      lines.push(`${METRIC_RESPONSE_LATENCY_SECONDS}_count{intent="${intent}"} ${value}`);
    }

    return `${lines.join('\n')}\n`;
  }
}

function increment(counter: Map<string, number>, key: string): void {
  counter.set(key, (counter.get(key) ?? 0) + 1);
}

function renderCounter(
  lines: string[],
  name: string,
  help: string,
  label: string,
  values: Map<string, number>,
): void {
  lines.push(`# HELP ${name} ${help}`);
  lines.push(`# TYPE ${name} counter`);
  for (const [labelValue, value] of values.entries()) {
    lines.push(`${name}{${label}="${sanitizeLabelValue(labelValue)}"} ${value}`);
  }
}

function sanitizeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}
