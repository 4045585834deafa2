/**
 * 單一應用程式的一段連續焦點區間
 * 時間皆為 epoch 毫秒；同一時間最多只有一個 open session，由 SessionTracker 持有
 */
export interface OpenSession {
  applicationId: string;
  windowTitle: string;
  startTime: number;
  endTime: null;
}

export interface ClosedSession {
  applicationId: string;
  windowTitle: string;
  startTime: number;
  endTime: number;
}

export type ActivitySession = OpenSession | ClosedSession;

/** open session 以 now 作為暫定結束時間；負值（時鐘倒退）視為 0 */
export function sessionDuration(session: ActivitySession, now: number): number {
  const end = session.endTime ?? now;
  return Math.max(0, end - session.startTime);
}

export function closeSession(session: OpenSession, endTime: number): ClosedSession {
  return {
    applicationId: session.applicationId,
    windowTitle: session.windowTitle,
    startTime: session.startTime,
    endTime,
  };
}
