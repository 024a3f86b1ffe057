import type { IntentName } from '../../domain/intent';

export type OrderResolutionOutcome = 'cache_hit' | 'found' | 'not_found';

export type UpstreamAttemptResult = 'success' | 'not_found' | 'transient' | 'malformed';

export interface MetricsPort {
  incrementMessage(input: { intent: IntentName }): void;

  observeResponseLatency(input: { intent: IntentName; seconds: number }): void;

  incrementOrderResolution(outcome: OrderResolutionOutcome): void;

  incrementUpstreamAttempt(result: UpstreamAttemptResult): void;

  incrementOutboundMessage(delivered: boolean): void;
}
