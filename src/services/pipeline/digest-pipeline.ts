/**
 * Digest Pipeline
 *
 * One sequential run for one profile:
 *
 *   list candidates → (ledger has? skip) → fetch → normalize → extract → ledger put
 *        ↓ (at least one new record)
 *   + ledger entries no digest holds yet
 *   consolidate → render → save digest → deliver → prune
 *
 * Per-message failures are recorded in the report and the loop moves on.
 * A LedgerError stops the run and carries the progress made so far.
 *
 * @module services/pipeline/digest-pipeline
 */

import { subDays } from 'date-fns';
import { fillTemplate } from '@/lib/utils/text';
import { createLogger, type EnhancedLogger } from '@/lib/utils/logger';
import { LedgerError, errorMessage } from '@/lib/errors';
import type { ProfileConfig } from '@/config/profiles';
import type { DeliverySink, GmailMessage, MailboxSource, MessageHandle } from '@/lib/gmail/types';
import type { Ledger } from '@/lib/ledger/ledger-store';
import type { ContentNormalizer } from '@/services/normalizer';
import type { ItemExtractor } from '@/services/extractor';
import type { Consolidator } from '@/services/consolidator';
import { renderTextDigest, type DocumentRenderer, type RenderedDigest } from '@/services/render';
import type { DigestRecord, ExtractionRecord, NormalizedMessage } from '@/types/digest';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type RunStage = 'list' | 'fetch' | 'normalize' | 'render' | 'delivery';

export interface StageError {
  stage: RunStage;
  messageId?: string;
  error: string;
}

export type DeliveryStatus = 'disabled' | 'sent' | 'failed' | 'skipped';

export interface RunReport {
  profile: string;
  force: boolean;
  aborted: boolean;
  startedAt: string;
  durationMs: number;
  candidates: number;
  alreadyProcessed: number;
  fetchFailures: number;
  contentSkips: number;
  extractedFull: number;
  extractedFallback: number;
  /** Earlier records no digest held yet, folded into this run's digest */
  carriedOver: number;
  digestId?: string;
  artifactPath?: string;
  delivery: DeliveryStatus;
  pruned: number;
  tokensUsed: number;
  estimatedCost: number;
  errors: StageError[];
}

export interface RunProgress {
  succeeded: number;
  degraded: number;
  skipped: number;
}

export interface RunOptions {
  /** Re-extract candidates the ledger already holds */
  force?: boolean;
  /** Checked between messages; an aborted run produces no digest */
  signal?: AbortSignal;
}

export interface DigestPipelineDependencies {
  profile: ProfileConfig;
  ledger: Ledger;
  mailbox: MailboxSource;
  normalizer: Pick<ContentNormalizer, 'normalize'>;
  extractor: Pick<ItemExtractor, 'extract'>;
  consolidator: Pick<Consolidator, 'consolidate'>;
  renderer: DocumentRenderer;
  /** Required when the profile enables delivery */
  delivery?: DeliverySink;
  logger?: EnhancedLogger;
  now?: () => Date;
}

export function progressOf(report: RunReport): RunProgress {
  return {
    succeeded: report.extractedFull,
    degraded: report.extractedFallback,
    skipped: report.alreadyProcessed + report.fetchFailures + report.contentSkips,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE
// ═══════════════════════════════════════════════════════════════════════════════

export class DigestPipeline {
  private readonly deps: DigestPipelineDependencies;
  private readonly logger: EnhancedLogger;
  private readonly now: () => Date;

  constructor(deps: DigestPipelineDependencies) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger('DigestPipeline', { profile: deps.profile.name });
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * @throws LedgerError when the ledger becomes unusable; `context.progress`
   * holds the counts reached before the failure
   */
  public async run(options: RunOptions = {}): Promise<RunReport> {
    const { profile } = this.deps;
    const started = this.now();
    const report: RunReport = {
      profile: profile.name,
      force: options.force ?? false,
      aborted: false,
      startedAt: started.toISOString(),
      durationMs: 0,
      candidates: 0,
      alreadyProcessed: 0,
      fetchFailures: 0,
      contentSkips: 0,
      extractedFull: 0,
      extractedFallback: 0,
      carriedOver: 0,
      delivery: profile.delivery.enabled ? 'skipped' : 'disabled',
      pruned: 0,
      tokensUsed: 0,
      estimatedCost: 0,
      errors: [],
    };

    this.logger.start('Digest run started', { force: report.force, label: profile.label });

    try {
      const records = await this.processCandidates(report, options);

      if (records.length > 0 && !report.aborted) {
        const carried = this.undigestedRecords(records);
        report.carriedOver = carried.length;
        await this.produceDigest([...carried, ...records], report, options.signal);
      } else if (records.length === 0) {
        this.logger.info('No new messages, no digest produced');
      }

      if (!report.aborted) {
        report.pruned = this.deps.ledger.prune(profile.ledger.retentionDays, this.now());
      }
    } catch (error) {
      if (error instanceof LedgerError) {
        report.durationMs = this.now().getTime() - started.getTime();
        throw new LedgerError(error.message, { ...error.context, progress: progressOf(report) });
      }
      throw error;
    }

    report.durationMs = this.now().getTime() - started.getTime();
    this.logger.success('Digest run finished', {
      durationMs: report.durationMs,
      aborted: report.aborted,
      ...progressOf(report),
      digestId: report.digestId,
    });
    return report;
  }

  // ═════════════════════════════════════════════════════════════════════════════
  // MESSAGE LOOP
  // ═════════════════════════════════════════════════════════════════════════════

  private async listCandidates(report: RunReport, signal?: AbortSignal): Promise<MessageHandle[]> {
    const { profile, mailbox } = this.deps;
    const since = new Date(this.now().getTime() - profile.lookbackHours * 60 * 60 * 1000);

    try {
      return await mailbox.listCandidates({ label: profile.label, since, signal });
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error('Listing candidates failed', { error: message });
      report.errors.push({ stage: 'list', error: message });
      return [];
    }
  }

  private async processCandidates(report: RunReport, options: RunOptions): Promise<ExtractionRecord[]> {
    const { ledger, mailbox, normalizer, extractor } = this.deps;
    const { signal } = options;
    const records: ExtractionRecord[] = [];

    const candidates = await this.listCandidates(report, signal);
    report.candidates = candidates.length;
    this.logger.info('Candidates listed', { candidates: candidates.length });

    for (const handle of candidates) {
      if (signal?.aborted) {
        report.aborted = true;
        this.logger.warn('Run aborted between messages', { processed: records.length });
        break;
      }

      if (!report.force && ledger.has(handle.id)) {
        report.alreadyProcessed++;
        this.logger.debug('Already processed, skipping', { messageId: handle.id });
        continue;
      }

      let raw: GmailMessage;
      try {
        raw = await mailbox.fetchMessage(handle.id, signal);
      } catch (error) {
        report.fetchFailures++;
        report.errors.push({ stage: 'fetch', messageId: handle.id, error: errorMessage(error) });
        this.logger.warn('Fetch failed, skipping message', { messageId: handle.id, error: errorMessage(error) });
        continue;
      }

      let message: NormalizedMessage;
      try {
        message = await normalizer.normalize(raw);
      } catch (error) {
        report.contentSkips++;
        report.errors.push({ stage: 'normalize', messageId: handle.id, error: errorMessage(error) });
        this.logger.warn('Message could not be normalized, skipping', {
          messageId: handle.id,
          error: errorMessage(error),
        });
        continue;
      }

      const outcome = await extractor.extract(message, signal);
      if (signal?.aborted) {
        report.aborted = true;
        this.logger.warn('Run aborted during extraction, message left for next run', { messageId: message.id });
        break;
      }

      ledger.put({ messageId: message.id, processedAt: this.now(), record: outcome.record });
      records.push(outcome.record);
      report.tokensUsed += outcome.tokensUsed;
      report.estimatedCost += outcome.estimatedCost;

      if (outcome.record.kind === 'full') {
        report.extractedFull++;
      } else {
        report.extractedFallback++;
      }
    }

    return records;
  }

  // ═════════════════════════════════════════════════════════════════════════════
  // DIGEST
  // ═════════════════════════════════════════════════════════════════════════════

  /**
   * Records from earlier runs that never reached a digest, within retention
   * and not already in this run's batch.
   */
  private undigestedRecords(records: ExtractionRecord[]): ExtractionRecord[] {
    const { profile, ledger } = this.deps;
    const inBatch = new Set(records.map((record) => record.messageId));
    const cutoff = subDays(this.now(), profile.ledger.retentionDays).getTime();

    const carried = ledger
      .undigested()
      .filter((entry) => !inBatch.has(entry.messageId) && entry.processedAt.getTime() >= cutoff)
      .map((entry) => entry.record);

    if (carried.length > 0) {
      this.logger.info('Adding records left out of earlier digests', {
        count: carried.length,
        messageIds: carried.map((record) => record.messageId),
      });
    }
    return carried;
  }

  private async produceDigest(
    records: ExtractionRecord[],
    report: RunReport,
    signal?: AbortSignal
  ): Promise<void> {
    const { profile, ledger, consolidator, renderer } = this.deps;

    const { digest, tokensUsed, estimatedCost } = await consolidator.consolidate(profile.name, records, signal);
    report.digestId = digest.digestId;
    report.tokensUsed += tokensUsed;
    report.estimatedCost += estimatedCost;

    let artifact: RenderedDigest | undefined;
    try {
      artifact = await renderer.render(digest);
      report.artifactPath = artifact.path;
    } catch (error) {
      report.errors.push({ stage: 'render', error: errorMessage(error) });
      this.logger.error('Rendering failed, digest kept in ledger only', {
        digestId: digest.digestId,
        error: errorMessage(error),
      });
    }

    ledger.saveDigest(digest, artifact?.path);
    ledger.attachDigest(digest.digestId, digest.sourceMessageIds);

    if (profile.delivery.enabled && artifact) {
      report.delivery = await this.deliver(digest, artifact, report);
    }
  }

  private async deliver(digest: DigestRecord, artifact: RenderedDigest, report: RunReport): Promise<DeliveryStatus> {
    const { profile, delivery } = this.deps;
    const recipient = profile.delivery.recipient;

    if (!delivery || !recipient) {
      report.errors.push({ stage: 'delivery', error: 'Delivery enabled but no sink or recipient configured' });
      this.logger.warn('Delivery enabled but no sink or recipient configured');
      return 'skipped';
    }

    try {
      const result = await delivery.send({
        to: recipient,
        subject: fillTemplate(profile.delivery.subjectPattern, {
          profile: profile.name,
          date: digest.dateRangeCovered.label,
        }),
        bodyText: renderTextDigest(digest),
        attachments: [{ filename: artifact.filename, mimeType: artifact.mimeType, content: artifact.content }],
      });
      this.logger.info('Digest delivered', { digestId: digest.digestId, deliveryId: result.messageId });
      return 'sent';
    } catch (error) {
      report.errors.push({ stage: 'delivery', error: errorMessage(error) });
      this.logger.error('Delivery failed', { digestId: digest.digestId, error: errorMessage(error) });
      return 'failed';
    }
  }
}
