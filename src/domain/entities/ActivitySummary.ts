/**
 * 單一應用程式在目前累積區間內的彙總
 * 每次 aggregation 重新計算，tracker 不保存
 */
export interface ActivitySummary {
  applicationId: string;
  /** 最近結束的 session 的視窗標題 */
  activityDetails: string;
  totalDurationMs: number;
  sessionCount: number;
  firstSeen: number;
  lastSeen: number;
}
