/**
 * Pipeline Runner
 *
 * Stage functions that load their inputs from a record store, run one
 * pipeline step and persist its output. A LoadError aborts the stage
 * with nothing written; a SaveError is logged and the in-memory result
 * is still returned.
 */

import type { ChannelRecord, GuideGroups } from '@/types';
import type { PipelineConfig } from '@/lib/config';
import type { HttpClient } from '@/lib/http';
import type { Clock } from '@/lib/concurrency';
import type { RecordStore } from '@/lib/storage';
import { LoadError, SaveError } from '@/lib/errors';
import { createLogger, generateRunId, type Logger } from '@/lib/logger';
import { validateEndpoints, type ValidationResult } from '@/lib/endpoint-validator';
import { extractPlaylists, type PlaylistExtraction } from '@/lib/playlist-extractor';
import { extractGuides, type GuideExtraction } from '@/lib/guide-extractor';
import { reconcile, type ReconcileResult } from '@/lib/reconciler';
import { auditGuides, type AuditReport } from '@/lib/integrity-auditor';
import { dedupeChannels, type DedupeResult } from '@/lib/deduplicator';

export interface PipelineDeps {
  store: RecordStore;
  http: HttpClient;
  clock?: Clock;
  logger?: Logger;
  /** Shared by every stage of one run; generated when absent */
  runId?: string;
}

export type StageResult<T> =
  | { success: true; data: T; saved: boolean; durationMs: number }
  | { success: false; error: LoadError; durationMs: number };

export interface FullPipelineData {
  validation: ValidationResult;
  playlists: PlaylistExtraction;
  guides: GuideExtraction;
  reconciliation: ReconcileResult;
}

interface StageContext {
  config: PipelineConfig;
  deps: PipelineDeps;
  log: Logger;
  /** Persist an output; false when a SaveError was logged */
  persist(save: () => Promise<void>): Promise<boolean>;
}

function stageLogger(deps: PipelineDeps): Logger {
  const base = deps.logger ?? createLogger('Pipeline');
  return base.child({ runId: deps.runId ?? generateRunId() });
}

/**
 * Run a stage body, converting LoadError into a failed result
 */
async function runStage<T>(
  name: string,
  config: PipelineConfig,
  deps: PipelineDeps,
  body: (context: StageContext) => Promise<{ data: T; saved: boolean }>
): Promise<StageResult<T>> {
  const startTime = Date.now();
  const log = stageLogger(deps);

  const persist = async (save: () => Promise<void>): Promise<boolean> => {
    try {
      await save();
      return true;
    } catch (error) {
      if (error instanceof SaveError) {
        log.error(`[SAVE ERROR] ${name}: ${error.message}`, error);
        return false;
      }
      throw error;
    }
  };

  log.info(`[STAGE] Starting ${name}`);

  try {
    const { data, saved } = await body({ config, deps, log, persist });
    const durationMs = Date.now() - startTime;
    log.info(`[STAGE] Finished ${name} in ${durationMs}ms`, { saved });
    return { success: true, data, saved, durationMs };
  } catch (error) {
    if (error instanceof LoadError) {
      log.error(`[LOAD ERROR] ${name}: ${error.message}`, error);
      return { success: false, error, durationMs: Date.now() - startTime };
    }
    throw error;
  }
}

/**
 * Validate every endpoint and persist the enriched document and dead links
 */
export function runValidation(
  config: PipelineConfig,
  deps: PipelineDeps
): Promise<StageResult<ValidationResult>> {
  return runStage('validation', config, deps, async ({ log, persist }) => {
    const document = await deps.store.loadEndpoints();

    const result = await log.withTiming('validate endpoints', () =>
      validateEndpoints(
        document,
        { retry: config.retry, concurrency: config.concurrency, mirrors: config.mirrors },
        { http: deps.http, clock: deps.clock, logger: log.child({ service: 'EndpointValidator' }) }
      )
    );

    const endpointsSaved = await persist(() => deps.store.saveEndpoints(result.document));
    const deadLinksSaved = await persist(() => deps.store.saveDeadLinks(result.deadLinks));

    return { data: result, saved: endpointsSaved && deadLinksSaved };
  });
}

/**
 * Extract channels from every playlist URL and replace the channel store
 */
export function runPlaylistExtraction(
  config: PipelineConfig,
  deps: PipelineDeps
): Promise<StageResult<PlaylistExtraction>> {
  return runStage('playlist extraction', config, deps, async ({ log, persist }) => {
    const { playlistUrls } = await deps.store.loadEndpoints();

    const extraction = await log.withTiming('extract playlists', () =>
      extractPlaylists(
        playlistUrls,
        { concurrency: config.concurrency },
        { http: deps.http, logger: log.child({ service: 'PlaylistExtractor' }) }
      )
    );

    const saved = await persist(() => deps.store.saveChannels(extraction.channels));
    return { data: extraction, saved };
  });
}

/**
 * Extract guide entries from every guide URL and replace the guide store
 */
export function runGuideExtraction(
  config: PipelineConfig,
  deps: PipelineDeps
): Promise<StageResult<GuideExtraction>> {
  return runStage('guide extraction', config, deps, async ({ log, persist }) => {
    const { epgUrls } = await deps.store.loadEndpoints();

    const extraction = await log.withTiming('extract guides', () =>
      extractGuides(
        epgUrls,
        { concurrency: config.concurrency },
        { http: deps.http, logger: log.child({ service: 'GuideExtractor' }) }
      )
    );

    const saved = await persist(() => deps.store.saveGuides(extraction.groups));
    return { data: extraction, saved };
  });
}

async function reconcileAndSave(
  channels: readonly ChannelRecord[],
  groups: GuideGroups,
  { config, deps, log, persist }: StageContext
): Promise<{ data: ReconcileResult; saved: boolean }> {
  const result = reconcile(
    channels,
    groups,
    { threshold: config.matchThreshold },
    log.child({ service: 'Reconciler' })
  );
  const saved = await persist(() => deps.store.saveChannels(result.channels));
  return { data: result, saved };
}

/**
 * Annotate stored channels with their best guide match
 */
export function runReconciliation(
  config: PipelineConfig,
  deps: PipelineDeps
): Promise<StageResult<ReconcileResult>> {
  return runStage('reconciliation', config, deps, async (context) => {
    const channels = await deps.store.loadChannels();
    const groups = await deps.store.loadGuides();
    return reconcileAndSave(channels, groups, context);
  });
}

/**
 * Report integrity problems in the stored guide entries. Writes nothing.
 */
export function runAudit(
  config: PipelineConfig,
  deps: PipelineDeps
): Promise<StageResult<AuditReport>> {
  return runStage('audit', config, deps, async ({ log }) => {
    const groups = await deps.store.loadGuides();
    return { data: auditGuides(groups, log.child({ service: 'IntegrityAuditor' })), saved: true };
  });
}

/**
 * Remove channels with repeated ids from the channel store
 */
export function runDedupe(
  config: PipelineConfig,
  deps: PipelineDeps
): Promise<StageResult<DedupeResult>> {
  return runStage('dedupe', config, deps, async ({ log, persist }) => {
    const channels = await deps.store.loadChannels();
    const result = dedupeChannels(channels, log.child({ service: 'Deduplicator' }));
    const saved = await persist(() => deps.store.saveChannels(result.channels));
    return { data: result, saved };
  });
}

/**
 * Validate, extract playlists and guides concurrently, then reconcile
 */
export async function runFullPipeline(
  config: PipelineConfig,
  deps: PipelineDeps
): Promise<StageResult<FullPipelineData>> {
  const runDeps: PipelineDeps = { ...deps, runId: deps.runId ?? generateRunId() };
  const startTime = Date.now();

  const validation = await runValidation(config, runDeps);
  if (!validation.success) return validation;

  const [playlists, guides] = await Promise.all([
    runPlaylistExtraction(config, runDeps),
    runGuideExtraction(config, runDeps),
  ]);
  if (!playlists.success) return playlists;
  if (!guides.success) return guides;

  const reconciliation = await runStage('reconciliation', config, runDeps, (context) =>
    reconcileAndSave(playlists.data.channels, guides.data.groups, context)
  );
  if (!reconciliation.success) return reconciliation;

  return {
    success: true,
    data: {
      validation: validation.data,
      playlists: playlists.data,
      guides: guides.data,
      reconciliation: reconciliation.data,
    },
    saved: validation.saved && playlists.saved && guides.saved && reconciliation.saved,
    durationMs: Date.now() - startTime,
  };
}
