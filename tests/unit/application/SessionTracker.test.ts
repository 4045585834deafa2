import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SessionTracker } from '../../../src/application/SessionTracker.js';
import type { IgnoreListPort } from '../../../src/domain/ports/IgnoreListPort.js';
import { Logger } from '../../../src/shared/Logger.js';

/**
 * Feature: Session 狀態機
 *
 * 作為追蹤器，我需要把焦點切換事件轉為乾淨的 sessions：
 * 過短的丟棄、同一應用程式間隔很短的合併、被忽略的應用程式不記錄。
 */

const T0 = 1_700_000_000_000;
const SECOND = 1000;

describe('SessionTracker', () => {
  let now: number;
  let tracker: SessionTracker;
  const silent = new Logger('test', 'error', () => {});

  function at(offsetMs: number): void {
    now = T0 + offsetMs;
  }

  function makeTracker(ignored: string[] = [], ignoreStore?: IgnoreListPort): SessionTracker {
    return new SessionTracker({
      settings: { mergeThresholdMs: 30 * SECOND, minDurationMs: 10 * SECOND },
      ignored,
      ignoreStore,
      clock: () => now,
      logger: silent,
    });
  }

  beforeEach(() => {
    now = T0;
    tracker = makeTracker();
  });

  describe('observeFocus', () => {
    it('should close the previous session and open a new one', () => {
      at(0);
      tracker.observeFocus('firefox', 'Docs');
      at(60 * SECOND);
      tracker.observeFocus('code', 'main.ts');

      expect(tracker.getClosedSessions()).toEqual([
        { applicationId: 'firefox', windowTitle: 'Docs', startTime: T0, endTime: T0 + 60 * SECOND },
      ]);
      expect(tracker.getOpenSession()).toEqual({
        applicationId: 'code', windowTitle: 'main.ts', startTime: T0 + 60 * SECOND, endTime: null,
      });
    });

    it('should discard sessions shorter than minDuration', () => {
      at(0);
      tracker.observeFocus('firefox', 'Docs');
      at(5 * SECOND);
      tracker.observeFocus('code', 'main.ts');

      expect(tracker.getClosedSessions()).toEqual([]);
    });

    it('should keep a session lasting exactly minDuration', () => {
      at(0);
      tracker.observeFocus('firefox', 'Docs');
      at(10 * SECOND);
      tracker.observeFocus('code', 'main.ts');

      const closed = tracker.getClosedSessions();
      expect(closed).toHaveLength(1);
      expect(closed[0].endTime - closed[0].startTime).toBe(10 * SECOND);
    });

    it('should treat an empty application identifier as a regular key', () => {
      at(0);
      tracker.observeFocus('', '');
      at(20 * SECOND);
      tracker.observeFocus('code', 'main.ts');

      expect(tracker.getClosedSessions()[0].applicationId).toBe('');
    });
  });

  describe('merging', () => {
    /**
     * Scenario: 中間的應用程式剛好達到 minDuration
     * Given A@t0, B@t0+40s, A@t0+50s
     * Then B 保留 10 秒，A 不合併
     */
    it('should keep B when it lasts exactly minDuration between two A sessions', () => {
      at(0);
      tracker.observeFocus('A', 'a1');
      at(40 * SECOND);
      tracker.observeFocus('B', 'b1');
      at(50 * SECOND);
      tracker.observeFocus('A', 'a2');

      expect(tracker.getClosedSessions()).toEqual([
        { applicationId: 'A', windowTitle: 'a1', startTime: T0, endTime: T0 + 40 * SECOND },
        { applicationId: 'B', windowTitle: 'b1', startTime: T0 + 40 * SECOND, endTime: T0 + 50 * SECOND },
      ]);
    });

    /**
     * Scenario: 中間的應用程式差 1ms 未達 minDuration
     * Then B 被丟棄，兩段 A 合併為一段
     */
    it('should drop B and merge the surrounding A sessions when B is 1ms short', () => {
      at(0);
      tracker.observeFocus('A', 'a1');
      at(40 * SECOND);
      tracker.observeFocus('B', 'b1');
      at(49_999);
      tracker.observeFocus('A', 'a2');
      at(100 * SECOND);
      tracker.observeFocus('C', 'c1');

      expect(tracker.getClosedSessions()).toEqual([
        { applicationId: 'A', windowTitle: 'a2', startTime: T0, endTime: T0 + 100 * SECOND },
      ]);
    });

    it('should merge when the gap equals mergeThreshold', () => {
      at(0);
      tracker.observeFocus('A', 'a1');
      at(60 * SECOND);
      tracker.observeIdleTransition(true);
      at(90 * SECOND);
      tracker.observeIdleTransition(false);
      tracker.observeFocus('A', 'a2');
      at(150 * SECOND);
      tracker.endOpenSession();

      expect(tracker.getClosedSessions()).toEqual([
        { applicationId: 'A', windowTitle: 'a2', startTime: T0, endTime: T0 + 150 * SECOND },
      ]);
    });

    it('should not merge when the gap exceeds mergeThreshold', () => {
      at(0);
      tracker.observeFocus('A', 'a1');
      at(60 * SECOND);
      tracker.observeIdleTransition(true);
      at(90 * SECOND + 1);
      tracker.observeIdleTransition(false);
      tracker.observeFocus('A', 'a2');
      at(150 * SECOND);
      tracker.endOpenSession();

      expect(tracker.getClosedSessions()).toHaveLength(2);
    });
  });

  describe('updateWindowTitle', () => {
    it('should change the open session title without splitting it', () => {
      at(0);
      tracker.observeFocus('firefox', 'Docs');
      tracker.updateWindowTitle('firefox', 'Mail');
      at(30 * SECOND);
      tracker.endOpenSession();

      expect(tracker.getClosedSessions()).toEqual([
        { applicationId: 'firefox', windowTitle: 'Mail', startTime: T0, endTime: T0 + 30 * SECOND },
      ]);
    });

    it('should ignore updates for another application', () => {
      tracker.observeFocus('firefox', 'Docs');
      tracker.updateWindowTitle('code', 'main.ts');
      expect(tracker.getOpenSession()?.windowTitle).toBe('Docs');
    });
  });

  describe('idle transitions', () => {
    it('should close the open session when becoming idle', () => {
      at(0);
      tracker.observeFocus('firefox', 'Docs');
      at(20 * SECOND);
      tracker.observeIdleTransition(true);

      expect(tracker.isIdle()).toBe(true);
      expect(tracker.getOpenSession()).toBeNull();
      expect(tracker.getClosedSessions()).toHaveLength(1);
    });

    it('should do nothing when the idle state does not change', () => {
      at(0);
      tracker.observeFocus('firefox', 'Docs');
      tracker.observeIdleTransition(false);
      expect(tracker.getOpenSession()).not.toBeNull();
    });
  });

  describe('ignore list', () => {
    it('should close the current session and open nothing when an ignored app gains focus', () => {
      tracker = makeTracker(['keepassxc']);
      at(0);
      tracker.observeFocus('firefox', 'Docs');
      at(20 * SECOND);
      tracker.observeFocus('keepassxc', 'Passwords');

      expect(tracker.getOpenSession()).toBeNull();
      expect(tracker.getClosedSessions()).toHaveLength(1);
      expect(tracker.getSummaries(T0 + 60 * SECOND).has('keepassxc')).toBe(false);
    });

    it('should close the ignored application session through the normal close rule', async () => {
      const store: IgnoreListPort = { load: vi.fn(), save: vi.fn().mockResolvedValue(undefined) };
      tracker = makeTracker([], store);
      at(0);
      tracker.observeFocus('slack', 'General');
      at(15 * SECOND);
      await tracker.setIgnored('slack');

      expect(tracker.getOpenSession()).toBeNull();
      expect(tracker.getClosedSessions()).toEqual([
        { applicationId: 'slack', windowTitle: 'General', startTime: T0, endTime: T0 + 15 * SECOND },
      ]);
      expect(store.save).toHaveBeenCalledWith(new Set(['slack']));
    });

    it('should not persist when the application is already ignored', async () => {
      const store: IgnoreListPort = { load: vi.fn(), save: vi.fn().mockResolvedValue(undefined) };
      tracker = makeTracker(['slack'], store);
      await tracker.setIgnored('slack');
      expect(store.save).not.toHaveBeenCalled();
    });

    it('should remove applications and report whether anything changed', async () => {
      tracker = makeTracker(['slack', 'discord']);
      expect(await tracker.removeIgnored('slack')).toBe(true);
      expect(await tracker.removeIgnored('slack')).toBe(false);
      expect(tracker.ignoredApplications()).toEqual(['discord']);
    });
  });

  describe('getSummaries', () => {
    it('should include the open session up to now without closing it', () => {
      at(0);
      tracker.observeFocus('firefox', 'Docs');
      at(60 * SECOND);
      tracker.observeFocus('code', 'main.ts');

      const summaries = tracker.getSummaries(T0 + 90 * SECOND);
      expect(summaries.get('code')).toEqual({
        applicationId: 'code',
        activityDetails: 'main.ts',
        totalDurationMs: 30 * SECOND,
        sessionCount: 1,
        firstSeen: T0 + 60 * SECOND,
        lastSeen: T0 + 90 * SECOND,
      });
      expect(tracker.getOpenSession()).not.toBeNull();
    });
  });

  describe('submission hand-off', () => {
    it('should remove only the sealed sessions on completion', () => {
      at(0);
      tracker.observeFocus('A', 'a1');
      at(60 * SECOND);
      tracker.observeFocus('B', 'b1');

      at(70 * SECOND);
      const snapshot = tracker.beginSubmission();
      expect(snapshot.sealedCount).toBe(1);
      expect([...snapshot.summaries.keys()]).toEqual(['A']);

      at(120 * SECOND);
      tracker.observeFocus('C', 'c1');
      tracker.completeSubmission(snapshot);

      expect(tracker.getClosedSessions()).toEqual([
        { applicationId: 'B', windowTitle: 'b1', startTime: T0 + 60 * SECOND, endTime: T0 + 120 * SECOND },
      ]);
    });

    it('should never merge into a sealed session', () => {
      at(0);
      tracker.observeFocus('A', 'a1');
      at(60 * SECOND);
      tracker.endOpenSession();
      tracker.beginSubmission();

      at(70 * SECOND);
      tracker.observeFocus('A', 'a2');
      at(100 * SECOND);
      tracker.endOpenSession();

      expect(tracker.getClosedSessions()).toHaveLength(2);
    });

    /**
     * Scenario: 提交期間同一應用程式的 session 在 mergeThreshold 內結束，之後提交被放棄
     * Then 解除封存時兩段合併，結果與沒有提交時相同
     */
    it('should merge across the sealed boundary when a submission is abandoned', () => {
      at(0);
      tracker.observeFocus('A', 'a1');
      at(60 * SECOND);
      tracker.observeFocus('B', 'b1');
      at(61 * SECOND);
      tracker.observeFocus('A', 'a2');
      tracker.beginSubmission();

      at(120 * SECOND);
      tracker.endOpenSession();
      tracker.abandonSubmission();

      expect(tracker.getClosedSessions()).toEqual([
        { applicationId: 'A', windowTitle: 'a2', startTime: T0, endTime: T0 + 120 * SECOND },
      ]);
      expect(tracker.getSummaries(T0 + 120 * SECOND).get('A')).toMatchObject({
        totalDurationMs: 120 * SECOND,
        sessionCount: 1,
      });
    });

    it('should leave separate entries after abandon when the gap exceeds mergeThreshold', () => {
      at(0);
      tracker.observeFocus('A', 'a1');
      at(60 * SECOND);
      tracker.endOpenSession();
      tracker.beginSubmission();

      at(91 * SECOND);
      tracker.observeFocus('A', 'a2');
      at(120 * SECOND);
      tracker.endOpenSession();
      tracker.abandonSubmission();

      expect(tracker.getClosedSessions()).toHaveLength(2);
    });

    it('should keep everything after an abandoned submission', () => {
      at(0);
      tracker.observeFocus('A', 'a1');
      at(60 * SECOND);
      tracker.endOpenSession();
      tracker.beginSubmission();
      tracker.abandonSubmission();

      at(70 * SECOND);
      tracker.observeFocus('A', 'a2');
      at(100 * SECOND);
      tracker.endOpenSession();

      expect(tracker.getClosedSessions()).toEqual([
        { applicationId: 'A', windowTitle: 'a2', startTime: T0, endTime: T0 + 100 * SECOND },
      ]);
    });
  });

  it('should make endOpenSession idempotent', () => {
    at(0);
    tracker.observeFocus('A', 'a1');
    at(30 * SECOND);
    tracker.endOpenSession();
    tracker.endOpenSession();
    expect(tracker.getClosedSessions()).toHaveLength(1);
  });

  it('should clear closed sessions but keep the open one', () => {
    at(0);
    tracker.observeFocus('A', 'a1');
    at(30 * SECOND);
    tracker.observeFocus('B', 'b1');
    tracker.clearClosedSessions();
    expect(tracker.getClosedSessions()).toEqual([]);
    expect(tracker.getOpenSession()?.applicationId).toBe('B');
  });
});
