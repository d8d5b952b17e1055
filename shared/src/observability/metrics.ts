import { Counter, Histogram, Registry } from 'prom-client';

export interface ResolverMetrics {
  outcomes: Counter<'source' | 'outcome'>;
  duration: Histogram<'source'>;
  results: Counter<'status'>;
}

/** Registers the resolution pipeline metrics on the given registry. */
export function createResolverMetrics(registry: Registry): ResolverMetrics {
  return {
    outcomes: new Counter({
      name: 'airport_resolver_outcomes_total',
      help: 'Resolver outcomes by resolver and outcome kind',
      labelNames: ['source', 'outcome'] as const,
      registers: [registry]
    }),
    duration: new Histogram({
      name: 'airport_resolver_duration_seconds',
      help: 'Duration of a single resolver attempt in seconds',
      labelNames: ['source'] as const,
      buckets: [0.005, 0.05, 0.25, 0.5, 1, 2, 5],
      registers: [registry]
    }),
    results: new Counter({
      name: 'airport_resolution_results_total',
      help: 'Final lookup results by status',
      labelNames: ['status'] as const,
      registers: [registry]
    })
  };
}
