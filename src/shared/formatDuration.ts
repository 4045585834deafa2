const SECOND = 1000;

/**
 * 將毫秒格式化為 `1h2m3s` 形式（四捨五入到秒）
 * 0 或負值輸出 `0s`
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.round(Math.max(0, ms) / SECOND);
  if (totalSeconds === 0) return '0s';

  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  let out = '';
  if (hours > 0) out += `${hours}h`;
  if (hours > 0 || minutes > 0) out += `${minutes}m`;
  out += `${seconds}s`;
  return out;
}
