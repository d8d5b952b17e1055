import CircuitBreaker from 'opossum';
import {
  LookupQuery,
  LookupResult,
  LookupStatus,
  ResolverAttempt,
  ResolverOutcome,
  ResolverSource
} from '../models/airport.model';
import { Logger, consoleLogger } from '../lib/logger';
import { ResolverMetrics } from '../observability/metrics';
import { AirportLookup, AirportResolver } from './resolver';

export type ResolutionState = 'TRY_LOCAL' | 'TRY_GEOCODE' | 'TRY_DIRECTORY' | 'RESOLVED' | 'UNRESOLVED';

type ActiveState = Exclude<ResolutionState, 'RESOLVED' | 'UNRESOLVED'>;

type MatchOutcome = Extract<ResolverOutcome, { kind: 'match' }>;
type DegradedOutcome = Extract<ResolverOutcome, { kind: 'service_unavailable' }>;

const STAGES: Record<ActiveState, { source: ResolverSource; next: ResolutionState }> = {
  TRY_LOCAL: { source: 'local', next: 'TRY_GEOCODE' },
  TRY_GEOCODE: { source: 'geocode', next: 'TRY_DIRECTORY' },
  TRY_DIRECTORY: { source: 'directory', next: 'UNRESOLVED' }
};

const ACTIVE_STATES: readonly ActiveState[] = ['TRY_LOCAL', 'TRY_GEOCODE', 'TRY_DIRECTORY'];

export const DEFAULT_ACCEPTANCE_THRESHOLD = 0.75;
export const DEFAULT_RESOLVER_TIMEOUT_MS = 4000;

export type ResolverSet = Record<ResolverSource, AirportResolver>;

export interface BreakerSettings {
  errorThresholdPercentage?: number;
  resetTimeout?: number;
  rollingCountTimeout?: number;
  volumeThreshold?: number;
}

export interface ResolutionOrchestratorOptions {
  acceptanceThreshold?: number;
  /** Per-resolver timeout; a timeout counts as service_unavailable. */
  timeoutMs?: number;
  breaker?: BreakerSettings;
  logger?: Logger;
  metrics?: ResolverMetrics;
}

/**
 * Thrown inside the breaker so that unavailable outcomes count as failures.
 * An auth_failure is returned as-is: it is a configuration problem that
 * must keep being reported as one, not hidden behind an open circuit.
 */
class DegradedOutcomeError extends Error {
  constructor(public readonly outcome: DegradedOutcome) {
    super(outcome.message);
    this.name = 'DegradedOutcomeError';
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Runs local -> geocode -> directory, stopping at the first match whose
 * confidence reaches the acceptance threshold. Below-threshold matches are
 * kept as a last resort; nothing at all yields an explicit "unresolved".
 */
export class ResolutionOrchestrator implements AirportLookup {
  private readonly acceptanceThreshold: number;
  private readonly logger: Logger;
  private readonly metrics?: ResolverMetrics;
  private readonly breakers = new Map<ResolverSource, CircuitBreaker<[LookupQuery], ResolverOutcome>>();

  constructor(private readonly resolvers: ResolverSet, options: ResolutionOrchestratorOptions = {}) {
    this.acceptanceThreshold = options.acceptanceThreshold ?? DEFAULT_ACCEPTANCE_THRESHOLD;
    this.logger = options.logger ?? consoleLogger;
    this.metrics = options.metrics;

    const breakerOptions: CircuitBreaker.Options = {
      timeout: options.timeoutMs ?? DEFAULT_RESOLVER_TIMEOUT_MS,
      errorThresholdPercentage: options.breaker?.errorThresholdPercentage ?? 50,
      resetTimeout: options.breaker?.resetTimeout ?? 30000,
      rollingCountTimeout: options.breaker?.rollingCountTimeout ?? 10000,
      rollingCountBuckets: 10,
      volumeThreshold: options.breaker?.volumeThreshold ?? 5
    };

    for (const state of ACTIVE_STATES) {
      const { source } = STAGES[state];
      const resolver = this.resolvers[source];
      const breaker = new CircuitBreaker(async (query: LookupQuery) => {
        const outcome = await resolver.resolve(query);
        if (outcome.kind === 'service_unavailable') {
          throw new DegradedOutcomeError(outcome);
        }
        return outcome;
      }, { ...breakerOptions, name: `resolver:${source}` });

      breaker.on('open', () => this.logger.error(`Circuit breaker OPEN for ${source} resolver`));
      breaker.on('halfOpen', () => this.logger.info(`Circuit breaker HALF-OPEN for ${source} resolver`));
      breaker.on('close', () => this.logger.info(`Circuit breaker CLOSED for ${source} resolver`));

      this.breakers.set(source, breaker);
    }
  }

  async resolve(query: LookupQuery): Promise<LookupResult> {
    const text = query.trim();
    if (!text) {
      return this.finish(text, 'unresolved', null, []);
    }

    const attempts: ResolverAttempt[] = [];
    let best: MatchOutcome | null = null;
    let state: ResolutionState = 'TRY_LOCAL';
    let accepted: MatchOutcome | null = null;

    while (state !== 'RESOLVED' && state !== 'UNRESOLVED') {
      const stage: { source: ResolverSource; next: ResolutionState } = STAGES[state];
      const outcome = await this.attempt(stage.source, text);
      attempts.push(this.summarize(outcome));
      this.report(text, outcome);

      if (outcome.kind === 'match') {
        if (outcome.confidence >= this.acceptanceThreshold) {
          accepted = outcome;
          state = 'RESOLVED';
          continue;
        }
        if (!best || outcome.confidence > best.confidence) {
          best = outcome;
        }
      }

      this.logger.debug(`[airport-resolver] "${text}": ${state} -> ${stage.next} (${outcome.kind})`);
      state = stage.next;
    }

    if (accepted) {
      return this.finish(text, 'resolved', accepted, attempts);
    }
    return best ? this.finish(text, 'low_confidence', best, attempts) : this.finish(text, 'unresolved', null, attempts);
  }

  /** Stops the breakers' rolling-window timers. */
  shutdown(): void {
    for (const breaker of this.breakers.values()) {
      breaker.shutdown();
    }
  }

  private async attempt(source: ResolverSource, query: LookupQuery): Promise<ResolverOutcome> {
    const breaker = this.breakers.get(source);
    if (!breaker) {
      return { kind: 'service_unavailable', source, reason: 'circuit_open', message: `No ${source} resolver configured` };
    }

    const endTimer = this.metrics?.duration.startTimer({ source });
    try {
      return await breaker.fire(query);
    } catch (error) {
      return this.toDegradedOutcome(source, error);
    } finally {
      endTimer?.();
    }
  }

  private toDegradedOutcome(source: ResolverSource, error: unknown): ResolverOutcome {
    if (error instanceof DegradedOutcomeError) {
      return error.outcome;
    }

    const code = errorCode(error);
    const message = error instanceof Error ? error.message : String(error);
    if (code === 'ETIMEDOUT') {
      return { kind: 'service_unavailable', source, reason: 'timeout', message };
    }
    if (code === 'EOPENBREAKER') {
      return { kind: 'service_unavailable', source, reason: 'circuit_open', message };
    }
    return { kind: 'service_unavailable', source, reason: 'network', message: `Resolver failed unexpectedly: ${message}` };
  }

  private report(query: string, outcome: ResolverOutcome): void {
    this.metrics?.outcomes.inc({ source: outcome.source, outcome: outcome.kind });

    if (outcome.kind === 'auth_failure') {
      this.logger.error(
        `[airport-resolver] ${outcome.source} resolver auth failure for "${query}": ${outcome.message} (configuration problem)`
      );
    } else if (outcome.kind === 'service_unavailable') {
      this.logger.warn(
        `[airport-resolver] ${outcome.source} resolver degraded (${outcome.reason}) for "${query}": ${outcome.message}`
      );
    }
  }

  private summarize(outcome: ResolverOutcome): ResolverAttempt {
    switch (outcome.kind) {
      case 'match':
        return { source: outcome.source, outcome: outcome.kind, confidence: outcome.confidence };
      case 'service_unavailable':
        return { source: outcome.source, outcome: outcome.kind, reason: outcome.reason };
      default:
        return { source: outcome.source, outcome: outcome.kind };
    }
  }

  private finish(
    query: string,
    status: LookupStatus,
    outcome: MatchOutcome | null,
    attempts: ResolverAttempt[]
  ): LookupResult {
    this.metrics?.results.inc({ status });

    if (!outcome) {
      return { status, query, code: null, confidence: 0, source: null, candidates: [], attempts };
    }
    return {
      status,
      query,
      code: outcome.candidates[0].code,
      confidence: outcome.confidence,
      source: outcome.source,
      candidates: outcome.candidates,
      attempts
    };
  }
}
