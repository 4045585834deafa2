import type { ClosedSession, OpenSession } from '../domain/entities/ActivitySession.js';
import { closeSession } from '../domain/entities/ActivitySession.js';
import type { ActivitySummary } from '../domain/entities/ActivitySummary.js';
import type { Clock } from '../domain/ports/Clock.js';
import { systemClock } from '../domain/ports/Clock.js';
import type { IgnoreListPort } from '../domain/ports/IgnoreListPort.js';
import { aggregateSessions } from '../domain/services/SummaryAggregator.js';
import { Logger } from '../shared/Logger.js';

export interface SessionTrackerSettings {
  /** 同一應用程式兩段 session 的間隔 <= 此值時合併 */
  mergeThresholdMs: number;
  /** 短於此值的 session 視為雜訊丟棄（等於此值保留） */
  minDurationMs: number;
}

export interface SessionTrackerDeps {
  settings: SessionTrackerSettings;
  ignored?: Iterable<string>;
  ignoreStore?: IgnoreListPort;
  clock?: Clock;
  logger?: Logger;
}

/** beginSubmission 取得的快照：summaries 與被封存（sealed）的已結束 sessions */
export interface SubmissionSnapshot {
  readonly summaries: Map<string, ActivitySummary>;
  readonly sessions: readonly ClosedSession[];
  /** closedSessions 前 sealedCount 筆屬於此次提交 */
  readonly sealedCount: number;
  readonly takenAt: number;
}

/**
 * Session 狀態機：把 focus-change / idle 事件轉為乾淨、可合併、可過濾的 sessions
 *
 * 所有狀態操作都是同步的；唯一的 I/O（忽略清單寫檔）在記憶體狀態更新後才開始。
 *
 * 關閉規則（每次 open → closed 都套用）：
 * 1. duration = endTime - startTime
 * 2. duration < minDuration → 丟棄
 * 3. 最後一筆（未封存）同 applicationId 且 startTime - last.endTime <= mergeThreshold
 *    → 延長最後一筆的 endTime，標題改為最新
 * 4. 否則 append
 */
export class SessionTracker {
  private currentSession: OpenSession | null = null;
  private closedSessions: ClosedSession[] = [];
  private readonly ignoreSet: Set<string>;
  private idle = false;
  /** 已交給進行中提交的筆數；這些 entries 不可再被合併 */
  private sealedCount = 0;

  private readonly settings: SessionTrackerSettings;
  private readonly ignoreStore?: IgnoreListPort;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(deps: SessionTrackerDeps) {
    this.settings = deps.settings;
    this.ignoreSet = new Set(deps.ignored ?? []);
    this.ignoreStore = deps.ignoreStore;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? new Logger('SessionTracker');
  }

  /** 焦點換到某應用程式：結束目前 session，若未被忽略則開新 session */
  observeFocus(applicationId: string, windowTitle: string): void {
    const now = this.clock();

    if (this.ignoreSet.has(applicationId)) {
      this.logger.debug('Ignoring application', { applicationId });
      this.closeCurrent(now);
      return;
    }

    this.closeCurrent(now);
    this.currentSession = {
      applicationId,
      windowTitle,
      startTime: now,
      endTime: null,
    };
  }

  /**
   * 只有視窗標題改變（同一應用程式）時更新 open session 的標題，不切 session
   * 沒有 open session 或 applicationId 不符時不做事
   */
  updateWindowTitle(applicationId: string, windowTitle: string): void {
    if (this.currentSession && this.currentSession.applicationId === applicationId) {
      this.currentSession.windowTitle = windowTitle;
    }
  }

  /** idle 狀態轉換；false → true 時結束 open session */
  observeIdleTransition(isIdle: boolean): void {
    if (isIdle === this.idle) return;
    this.idle = isIdle;

    if (isIdle) {
      this.closeCurrent(this.clock());
    }
  }

  /** shutdown 用；冪等 */
  endOpenSession(now: number = this.clock()): void {
    this.closeCurrent(now);
  }

  /** 目前所有 summaries（open session 以 now 暫時結算，不改變狀態） */
  getSummaries(now: number = this.clock()): Map<string, ActivitySummary> {
    return aggregateSessions(this.closedSessions, this.currentSession, now);
  }

  /** 已結束 sessions 的複本 */
  getClosedSessions(): ClosedSession[] {
    return this.closedSessions.map((s) => ({ ...s }));
  }

  getOpenSession(): OpenSession | null {
    return this.currentSession ? { ...this.currentSession } : null;
  }

  isIdle(): boolean {
    return this.idle;
  }

  /** 清空所有已結束 sessions；open session 不受影響 */
  clearClosedSessions(): void {
    this.closedSessions = [];
    this.sealedCount = 0;
  }

  /**
   * 開始一次非同步提交：封存目前所有已結束 sessions 並回傳快照
   * 封存的 entries 不再作為合併對象，提交期間新結束的 sessions 另行 append
   * open session 不列入快照，結束後才由之後的提交送出
   */
  beginSubmission(now: number = this.clock()): SubmissionSnapshot {
    this.sealedCount = this.closedSessions.length;
    return {
      summaries: aggregateSessions(this.closedSessions, null, now),
      sessions: this.getClosedSessions(),
      sealedCount: this.sealedCount,
      takenAt: now,
    };
  }

  /** 提交成功：只移除快照內的 entries，提交期間新增的保留 */
  completeSubmission(snapshot: SubmissionSnapshot): void {
    const count = Math.min(snapshot.sealedCount, this.closedSessions.length);
    this.closedSessions = this.closedSessions.slice(count);
    this.sealedCount = 0;
  }

  /** 提交失敗：解除封存，下一輪連同新資料一起重送 */
  abandonSubmission(): void {
    const boundary = this.sealedCount;
    this.sealedCount = 0;
    if (boundary === 0 || boundary >= this.closedSessions.length) return;

    // 封存期間無法合併的相鄰 entries，解除封存後依一般合併規則補合併
    const sealedLast = this.closedSessions[boundary - 1];
    const next = this.closedSessions[boundary];
    if (this.canMerge(sealedLast, next)) {
      sealedLast.endTime = next.endTime;
      sealedLast.windowTitle = next.windowTitle;
      this.closedSessions.splice(boundary, 1);
    }
  }

  isIgnored(applicationId: string): boolean {
    return this.ignoreSet.has(applicationId);
  }

  ignoredApplications(): string[] {
    return [...this.ignoreSet].sort();
  }

  /**
   * 加入忽略清單；若目前 session 正是該應用程式則立即以一般關閉規則結束，不開新 session
   * 記憶體狀態先更新，之後才寫檔
   */
  async setIgnored(applicationId: string): Promise<void> {
    const added = !this.ignoreSet.has(applicationId);
    this.ignoreSet.add(applicationId);

    if (this.currentSession?.applicationId === applicationId) {
      this.closeCurrent(this.clock());
    }

    if (added) {
      this.logger.info('Application added to ignore list', { applicationId });
      await this.persistIgnoreSet();
    }
  }

  /** 從忽略清單移除；已丟棄或已關閉的 sessions 不會被還原 */
  async removeIgnored(applicationId: string): Promise<boolean> {
    if (!this.ignoreSet.delete(applicationId)) return false;
    this.logger.info('Application removed from ignore list', { applicationId });
    await this.persistIgnoreSet();
    return true;
  }

  private async persistIgnoreSet(): Promise<void> {
    if (!this.ignoreStore) return;
    await this.ignoreStore.save(new Set(this.ignoreSet));
  }

  private closeCurrent(endTime: number): void {
    const open = this.currentSession;
    this.currentSession = null;
    if (!open) return;

    const closed = closeSession(open, endTime);
    const duration = closed.endTime - closed.startTime;

    if (duration < this.settings.minDurationMs) {
      this.logger.debug('Discarding short session', {
        applicationId: closed.applicationId,
        durationMs: duration,
      });
      return;
    }

    const last = this.mergeCandidate(closed);
    if (last) {
      last.endTime = closed.endTime;
      last.windowTitle = closed.windowTitle;
      return;
    }

    this.closedSessions.push(closed);
  }

  private mergeCandidate(closing: ClosedSession): ClosedSession | undefined {
    const lastIndex = this.closedSessions.length - 1;
    if (lastIndex < this.sealedCount) return undefined;

    const last = this.closedSessions[lastIndex];
    return this.canMerge(last, closing) ? last : undefined;
  }

  private canMerge(last: ClosedSession, closing: ClosedSession): boolean {
    return last.applicationId === closing.applicationId
      && closing.startTime - last.endTime <= this.settings.mergeThresholdMs;
  }
}
