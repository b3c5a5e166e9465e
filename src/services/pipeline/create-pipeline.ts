/**
 * Wires the production collaborators for one profile.
 *
 * Everything a run touches is built from the profile passed in, so two
 * profiles can run side by side in one process.
 *
 * @module services/pipeline/create-pipeline
 */

import type { Credentials } from '@/config/app';
import type { ProfileConfig } from '@/config/profiles';
import { OpenAIReasoningService } from '@/lib/ai/openai-client';
import { GmailMailboxSource, GmailSendService, createGmailAuth } from '@/lib/gmail';
import { LedgerStore } from '@/lib/ledger/ledger-store';
import { createLogger } from '@/lib/utils/logger';
import { Consolidator } from '@/services/consolidator';
import { ItemExtractor } from '@/services/extractor';
import { ContentNormalizer } from '@/services/normalizer';
import { PdfDigestRenderer } from '@/services/render';
import { DigestPipeline } from './digest-pipeline';

export interface PipelineHandle {
  pipeline: DigestPipeline;
  /** Owned by the caller; close it when the run is over */
  ledger: LedgerStore;
}

/**
 * @throws LedgerError when the profile's ledger store cannot be opened
 */
export function createDigestPipeline(profile: ProfileConfig, credentials: Credentials): PipelineHandle {
  const bindings = { profile: profile.name };
  const ledger = LedgerStore.open(profile.ledger.path);

  const auth = createGmailAuth(credentials.gmail);
  const mailbox = new GmailMailboxSource(auth, { timeoutMs: profile.mailbox.timeoutMs, retry: profile.retry });

  const service = new OpenAIReasoningService({
    apiKey: credentials.openaiApiKey,
    model: profile.ai.model,
    temperature: profile.ai.temperature,
    maxTokens: profile.ai.maxTokens,
    timeoutMs: profile.ai.timeoutMs,
  });

  const pipeline = new DigestPipeline({
    profile,
    ledger,
    mailbox,
    normalizer: new ContentNormalizer(profile.processing, {
      fetchAttachment: (messageId, attachmentId) => mailbox.fetchAttachment(messageId, attachmentId),
      logger: createLogger('ContentNormalizer', bindings),
    }),
    extractor: new ItemExtractor({
      service,
      prompts: profile.prompts,
      ai: profile.ai,
      retry: profile.retry,
      logger: createLogger('ItemExtractor', bindings),
    }),
    consolidator: new Consolidator({
      service,
      prompts: profile.prompts,
      ai: profile.ai,
      retry: profile.retry,
      logger: createLogger('Consolidator', bindings),
    }),
    renderer: new PdfDigestRenderer({
      directory: profile.output.directory,
      filenamePattern: profile.output.filenamePattern,
      logger: createLogger('PdfDigestRenderer', bindings),
    }),
    delivery: profile.delivery.enabled
      ? new GmailSendService(auth, { timeoutMs: profile.mailbox.timeoutMs })
      : undefined,
  });

  return { pipeline, ledger };
}
