/** 外部來源回報的目前焦點視窗；只被 tracker 即時消費，不保留 */
export interface WindowSnapshot {
  /** 視窗管理器 class（WM_CLASS），作為 session / summary 的分組 key */
  applicationId: string;
  windowTitle: string;
}
