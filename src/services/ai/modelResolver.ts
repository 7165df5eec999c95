import type { ModelCandidate } from '../../utils/types';
import {
  CredentialMissingError,
  ModelUnavailableError,
  RemoteCallFailedError,
  describeError
} from '../../utils/errors';
import type { Logger } from '../../utils/logger';
import { silentLogger } from '../../utils/logger';
import { isUsableCredential } from './credentials';
import { normalizeModelId } from './generationApi';
import type { GenerationApi, GenerationHandle } from './generationApi';

export type StrategyName = 'catalog-match' | 'first-capable' | 'direct-fallback';

export interface InstantiationAttempt {
  strategy: StrategyName;
  modelId: string;
  error?: string;
}

export type StrategyResult =
  | { status: 'matched'; handle: GenerationHandle }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; reason: string };

export type ResolutionOutcome =
  | {
      ok: true;
      handle: GenerationHandle;
      strategy: StrategyName;
      attempts: InstantiationAttempt[];
    }
  | {
      ok: false;
      error: CredentialMissingError | ModelUnavailableError;
      attempts: InstantiationAttempt[];
      catalogError?: RemoteCallFailedError;
    };

/** Capable catalog entries, with and without the `models/` namespace. */
export interface CatalogEntry {
  id: string;
  normalizedId: string;
}

export type CatalogState =
  | { status: 'ok'; entries: CatalogEntry[] }
  | { status: 'failed'; error: RemoteCallFailedError };

type Matcher = (preferred: string, candidate: string) => boolean;

// exact, suffix, substring
const MATCHERS: Matcher[] = [
  (preferred, candidate) => preferred === candidate,
  (preferred, candidate) => candidate.endsWith(preferred),
  (preferred, candidate) => candidate.includes(preferred)
];

interface StrategyContext {
  api: GenerationApi;
  preferences: readonly string[];
  catalog: CatalogState;
  attempts: InstantiationAttempt[];
}

function tryInstantiate(
  ctx: StrategyContext,
  strategy: StrategyName,
  modelId: string
): GenerationHandle | null {
  try {
    const handle = ctx.api.createHandle(modelId);
    ctx.attempts.push({ strategy, modelId });
    return handle;
  } catch (err) {
    ctx.attempts.push({ strategy, modelId, error: describeError(err) });
    return null;
  }
}

/** Preference order first; within one preference, exact beats suffix beats substring. */
export function findCatalogMatches(preferred: string, entries: readonly CatalogEntry[]): CatalogEntry[] {
  const seen = new Set<CatalogEntry>();
  const matches: CatalogEntry[] = [];
  for (const test of MATCHERS) {
    for (const entry of entries) {
      if (!seen.has(entry) && test(preferred, entry.normalizedId)) {
        seen.add(entry);
        matches.push(entry);
      }
    }
  }
  return matches;
}

function catalogMatch(ctx: StrategyContext): StrategyResult {
  if (ctx.catalog.status !== 'ok') return { status: 'skipped', reason: 'catalog unavailable' };

  for (const preferred of ctx.preferences) {
    for (const entry of findCatalogMatches(preferred, ctx.catalog.entries)) {
      const handle =
        tryInstantiate(ctx, 'catalog-match', preferred) ??
        (entry.id !== preferred ? tryInstantiate(ctx, 'catalog-match', entry.id) : null);
      if (handle) return { status: 'matched', handle };
    }
  }
  return { status: 'failed', reason: 'no preferred model is listed in the catalog' };
}

function firstCapable(ctx: StrategyContext): StrategyResult {
  if (ctx.catalog.status !== 'ok') return { status: 'skipped', reason: 'catalog unavailable' };
  if (ctx.catalog.entries.length === 0) return { status: 'skipped', reason: 'catalog has no capable models' };

  for (const entry of ctx.catalog.entries) {
    const handle = tryInstantiate(ctx, 'first-capable', entry.normalizedId);
    if (handle) return { status: 'matched', handle };
  }
  return { status: 'failed', reason: 'no capable catalog model could be instantiated' };
}

function directFallback(ctx: StrategyContext): StrategyResult {
  for (const preferred of ctx.preferences) {
    const handle = tryInstantiate(ctx, 'direct-fallback', preferred);
    if (handle) return { status: 'matched', handle };
  }
  return { status: 'failed', reason: 'no preferred model could be instantiated' };
}

const RESOLUTION_PIPELINE: ReadonlyArray<[StrategyName, (ctx: StrategyContext) => StrategyResult]> = [
  ['catalog-match', catalogMatch],
  ['first-capable', firstCapable],
  ['direct-fallback', directFallback]
];

export async function queryCatalog(api: GenerationApi): Promise<CatalogState> {
  try {
    const models = await api.listModels();
    const entries = models
      .filter((m: ModelCandidate) => m.supportsGeneration)
      .map((m) => ({ id: m.id, normalizedId: normalizeModelId(m.id) }));
    return { status: 'ok', entries };
  } catch (err) {
    return { status: 'failed', error: new RemoteCallFailedError('listModels', err) };
  }
}

export interface ResolveModelOptions {
  apiKey: string | undefined;
  provider: string;
  /** Builds the API client; only called once the credential passes the sanity check. */
  connect: (apiKey: string) => GenerationApi;
  preferences: readonly string[];
  logger?: Logger;
}

/**
 * Picks one usable model: catalog match on the preference list, then the
 * first capable catalog entry, then each preference without validation.
 * Never throws; every failure ends up in the outcome.
 */
export async function resolveModel(options: ResolveModelOptions): Promise<ResolutionOutcome> {
  const log = options.logger ?? silentLogger;

  if (!isUsableCredential(options.apiKey)) {
    return { ok: false, error: new CredentialMissingError(), attempts: [] };
  }

  let api: GenerationApi;
  try {
    api = options.connect(options.apiKey.trim());
  } catch (err) {
    log.error(`Could not create the ${options.provider} client`, err);
    return { ok: false, error: new ModelUnavailableError([], err), attempts: [] };
  }

  const catalog = await queryCatalog(api);
  if (catalog.status === 'failed') {
    log.debug('Model catalog unavailable, falling back to direct instantiation', {
      provider: options.provider,
      error: catalog.error.message
    });
  }

  const ctx: StrategyContext = {
    api,
    preferences: options.preferences,
    catalog,
    attempts: []
  };

  for (const [strategy, run] of RESOLUTION_PIPELINE) {
    const result = run(ctx);
    if (result.status === 'matched') {
      log.info(`Resolved ${options.provider} model ${result.handle.modelId}`, { strategy });
      return { ok: true, handle: result.handle, strategy, attempts: ctx.attempts };
    }
    log.debug(`Model strategy ${strategy} ${result.status}`, { reason: result.reason });
  }

  const tried = [...new Set(ctx.attempts.map((a) => a.modelId))];
  return {
    ok: false,
    error: new ModelUnavailableError(tried),
    attempts: ctx.attempts,
    catalogError: catalog.status === 'failed' ? catalog.error : undefined
  };
}

/**
 * Session-scoped, resolve-once wrapper. Concurrent first callers share one
 * in-flight resolution; the outcome (including a failure) is kept until
 * `reset()`.
 */
export class ModelResolver {
  private pending: Promise<ResolutionOutcome> | null = null;

  constructor(private readonly options: ResolveModelOptions) {}

  get provider(): string {
    return this.options.provider;
  }

  hasCredential(): boolean {
    return isUsableCredential(this.options.apiKey);
  }

  resolve(): Promise<ResolutionOutcome> {
    if (!this.pending) {
      this.pending = resolveModel(this.options);
    }
    return this.pending;
  }

  /** Forgets the memoised outcome; the next `resolve()` queries the API again. */
  reset(): void {
    this.pending = null;
  }
}
