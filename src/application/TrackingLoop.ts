import type { ActivitySummary } from '../domain/entities/ActivitySummary.js';
import type { WindowSnapshot } from '../domain/entities/WindowSnapshot.js';
import { SourceUnavailableError, errorMessage } from '../domain/errors/DomainErrors.js';
import type { FocusSourcePort } from '../domain/ports/FocusSourcePort.js';
import { sortedSummaries } from '../domain/services/SummaryAggregator.js';
import { Logger } from '../shared/Logger.js';
import type { SessionTracker } from './SessionTracker.js';
import type { SubmissionUseCase } from './SubmissionUseCase.js';
import type { SubmissionReport } from './dto/SubmissionReport.js';

export interface TrackingLoopOptions {
  pollIntervalMs: number;
  submitIntervalMs: number;
  idleThresholdMs: number;
}

export interface TrackingLoopDeps {
  tracker: SessionTracker;
  source: FocusSourcePort;
  /** 未提供時只追蹤不提交 */
  submission?: SubmissionUseCase;
  options: TrackingLoopOptions;
  /** 每次提交（含 shutdown）後寫出該輪開始時的 summaries */
  persist?: (summaries: readonly ActivitySummary[]) => Promise<void>;
  logger?: Logger;
}

export interface ShutdownResult {
  /** 最後一次提交前尚未送出的 summaries */
  pending: ActivitySummary[];
  report?: SubmissionReport;
}

/**
 * 輪詢驅動：定期讀取焦點 / 閒置狀態餵給 SessionTracker，並定期提交
 *
 * - 閒置時間 >= idleThresholdMs 視為 idle，idle 期間不呼叫 observeFocus
 * - 只有應用程式改變（或沒有 open session）才呼叫 observeFocus；只改標題時 updateWindowTitle
 * - SourceUnavailableError 略過該輪
 * - 同一時間最多一個提交在進行；stop() 時中止它的重試
 */
export class TrackingLoop {
  private readonly tracker: SessionTracker;
  private readonly source: FocusSourcePort;
  private readonly submission?: SubmissionUseCase;
  private readonly options: TrackingLoopOptions;
  private readonly persist?: (summaries: readonly ActivitySummary[]) => Promise<void>;
  private readonly logger: Logger;

  private pollTimer: NodeJS.Timeout | null = null;
  private submitTimer: NodeJS.Timeout | null = null;
  private inFlight: Promise<SubmissionReport | undefined> | null = null;
  private inFlightAbort: AbortController | null = null;
  private ticking: Promise<void> | null = null;
  private running = false;
  private lastApplicationId: string | null = null;

  constructor(deps: TrackingLoopDeps) {
    this.tracker = deps.tracker;
    this.source = deps.source;
    this.submission = deps.submission;
    this.options = deps.options;
    this.persist = deps.persist;
    this.logger = deps.logger ?? new Logger('TrackingLoop');
  }

  isRunning(): boolean {
    return this.running;
  }

  /** 單次輪詢 */
  async tick(): Promise<void> {
    const idleMs = await this.readIdle();
    if (idleMs !== undefined) {
      const wasIdle = this.tracker.isIdle();
      this.tracker.observeIdleTransition(idleMs >= this.options.idleThresholdMs);
      if (this.tracker.isIdle() !== wasIdle) {
        this.logger.info(wasIdle ? 'User active again' : 'User idle', { idleMs });
      }
    }
    if (this.tracker.isIdle()) return;

    let snapshot: WindowSnapshot;
    try {
      snapshot = await this.source.poll();
    } catch (err) {
      if (err instanceof SourceUnavailableError) {
        this.logger.debug('Focus source unavailable, skipping poll', { error: err.message });
        return;
      }
      throw err;
    }

    const { applicationId, windowTitle } = snapshot;
    const open = this.tracker.getOpenSession();

    if (open && open.applicationId === applicationId) {
      if (open.windowTitle !== windowTitle) {
        this.tracker.updateWindowTitle(applicationId, windowTitle);
      }
    } else if (open || applicationId !== this.lastApplicationId || !this.tracker.isIgnored(applicationId)) {
      if (applicationId !== this.lastApplicationId) {
        this.logger.debug('Focus changed', { applicationId, windowTitle });
      }
      this.tracker.observeFocus(applicationId, windowTitle);
    }
    this.lastApplicationId = applicationId;
  }

  /** 立即提交；若已有提交進行中則回傳同一個 promise */
  submitNow(): Promise<SubmissionReport | undefined> {
    if (!this.submission) return Promise.resolve(undefined);
    if (this.inFlight) return this.inFlight;

    const submission = this.submission;
    const abort = new AbortController();
    const pending = sortedSummaries(this.tracker.getSummaries());
    this.inFlightAbort = abort;
    this.inFlight = submission.submit({ signal: abort.signal })
      .then(async (report) => {
        await this.persistSummaries(pending);
        return report;
      })
      .catch((err: unknown) => {
        this.logger.error('Periodic submission failed', { error: errorMessage(err) });
        return undefined;
      })
      .finally(() => {
        this.inFlight = null;
        this.inFlightAbort = null;
      });
    return this.inFlight;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.logger.info('Tracking started', {
      pollIntervalMs: this.options.pollIntervalMs,
      submitIntervalMs: this.submission ? this.options.submitIntervalMs : undefined,
    });

    this.schedulePoll(0);
    if (this.submission) {
      this.submitTimer = setInterval(() => {
        void this.submitNow();
      }, this.options.submitIntervalMs);
    }
  }

  /**
   * 停止輪詢：等待進行中的提交 → 結束 open session → 不重試地做最後一次提交
   * 可重複呼叫
   */
  async stop(): Promise<ShutdownResult> {
    this.running = false;
    if (this.pollTimer) clearTimeout(this.pollTimer);
    if (this.submitTimer) clearInterval(this.submitTimer);
    this.pollTimer = null;
    this.submitTimer = null;

    if (this.ticking) {
      await this.ticking;
    }
    if (this.inFlight) {
      this.logger.info('Cancelling retries of the in-flight submission');
      this.inFlightAbort?.abort();
      await this.inFlight;
    }

    this.tracker.endOpenSession();
    const pending = sortedSummaries(this.tracker.getSummaries());

    if (!this.submission) {
      await this.persistSummaries(pending);
      return { pending };
    }

    const report = await this.submission.submit({ retry: false });
    await this.persistSummaries(pending);
    this.logger.info('Tracking stopped', { submitted: report.submitted, failed: report.failed });
    return { pending, report };
  }

  /** 寫檔失敗只記錄，不影響追蹤與提交 */
  private async persistSummaries(summaries: readonly ActivitySummary[]): Promise<void> {
    if (!this.persist) return;
    try {
      await this.persist(summaries);
    } catch (err) {
      this.logger.error('Failed to save summaries', { error: errorMessage(err) });
    }
  }

  private schedulePoll(delayMs: number): void {
    this.pollTimer = setTimeout(() => {
      this.ticking = this.runTick().finally(() => {
        this.ticking = null;
      });
    }, delayMs);
  }

  private async runTick(): Promise<void> {
    try {
      await this.tick();
    } catch (err) {
      this.logger.error('Poll failed', { error: errorMessage(err) });
    } finally {
      if (this.running) {
        this.schedulePoll(this.options.pollIntervalMs);
      }
    }
  }

  /** 閒置毫秒數；來源無法取得時回傳 undefined（沿用目前 idle 狀態） */
  private async readIdle(): Promise<number | undefined> {
    try {
      return await this.source.pollIdleDuration();
    } catch (err) {
      if (err instanceof SourceUnavailableError) {
        this.logger.debug('Idle monitor unavailable', { error: err.message });
        return undefined;
      }
      throw err;
    }
  }
}
