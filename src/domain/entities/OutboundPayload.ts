/**
 * 外部 time-tracking API 的兩種 wire 格式
 * 欄位名稱即 JSON key；只由 summary 單向轉出，不會回寫 core 的資料模型
 */

/** Legacy offline time 格式：分鐘為單位，本地時間 `YYYY-MM-DD HH:MM:SS` */
export interface LegacyTimePayload {
  start_time: string;
  /** 分鐘（無條件進位） */
  duration: number;
  activity_name: string;
  activity_details: string;
}

/** Native client event：RFC 3339 UTC 起訖時間；end_time 與 duration（秒）互斥 */
export interface ClientEvent {
  event_description: string;
  start_time: string;
  end_time?: string;
  duration?: number;
  window_title: string;
  application: string;
}

export interface ClientEventPayload {
  user_client_event: ClientEvent;
}
