import type { ActivitySummary } from '../../../domain/entities/ActivitySummary.js';
import type { SubmitOptions } from '../../../domain/ports/SummarySinkPort.js';
import { chunkSummary, safeChunkDuration } from '../../../domain/services/DurationChunker.js';
import { validateLegacyPayload } from '../../../domain/services/PayloadValidator.js';
import type { Logger } from '../../../shared/Logger.js';
import type { BaseSinkOptions, DeliveryOutcome } from '../BaseSummarySink.js';
import { BaseSummarySink } from '../BaseSummarySink.js';
import { toLegacyPayload } from '../timetracking/payloads.js';

export interface PreviewSinkOptions extends BaseSinkOptions {
  maxEntryMinutes: number;
  chunkMarginMinutes: number;
  /** 每個 payload 一行 JSON；預設寫到 stdout */
  write?: (line: string) => void;
}

/**
 * Dry-run sink：走與 time-tracking sink 相同的切段與驗證，只印出 payload 不送出
 */
export class PreviewSink extends BaseSummarySink {
  readonly name = 'preview';
  private readonly chunkSizeMs: number;
  private readonly write: (line: string) => void;

  constructor(private readonly options: PreviewSinkOptions, logger: Logger) {
    super(options, logger);
    this.chunkSizeMs = safeChunkDuration(
      options.maxEntryMinutes * 60_000,
      options.chunkMarginMinutes * 60_000,
    );
    this.write = options.write ?? ((line) => { process.stdout.write(line + '\n'); });
  }

  protected async deliver(summary: ActivitySummary, _options: SubmitOptions): Promise<DeliveryOutcome> {
    const chunks = chunkSummary(summary, this.chunkSizeMs);
    const payloads = chunks.map(toLegacyPayload);
    for (const payload of payloads) {
      validateLegacyPayload(payload, this.options.maxEntryMinutes);
    }
    for (const payload of payloads) {
      this.write(JSON.stringify(payload));
    }
    return { via: 'preview', chunks: chunks.length };
  }
}
