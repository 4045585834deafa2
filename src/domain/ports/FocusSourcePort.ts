import type { WindowSnapshot } from '../entities/WindowSnapshot.js';

/**
 * 桌面環境的焦點 / 閒置查詢來源
 * 無法連線時兩個方法都以 SourceUnavailableError reject
 */
export interface FocusSourcePort {
  poll(): Promise<WindowSnapshot>;
  /** 距離最後一次使用者輸入的毫秒數 */
  pollIdleDuration(): Promise<number>;
}
