import fs from 'node:fs/promises';
import path from 'node:path';
import type { IgnoreListPort } from '../../domain/ports/IgnoreListPort.js';

export const IGNORE_FILE_HEADER = [
  '# focustrack ignored applications',
  '# One application identifier (WM_CLASS) per line',
  '# Lines starting with # are comments',
  '',
];

/** 解析忽略清單：空行與 # 開頭的行略過，其餘每行一個 identifier（去頭尾空白） */
export function parseIgnoreList(content: string): Set<string> {
  const ids = new Set<string>();
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;
    ids.add(line);
  }
  return ids;
}

/** 固定 header + 排序後的 identifiers，結尾換行 */
export function serializeIgnoreList(applicationIds: ReadonlySet<string>): string {
  const lines = [...IGNORE_FILE_HEADER, ...[...applicationIds].sort()];
  return lines.join('\n') + '\n';
}

/**
 * 以純文字檔保存的忽略清單
 * 檔案不存在時視為空清單；寫入為暫存檔 + rename
 */
export class FileIgnoreListStore implements IgnoreListPort {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Set<string>> {
    try {
      const content = await fs.readFile(this.filePath, 'utf-8');
      return parseIgnoreList(content);
    } catch (err) {
      if (isNotFound(err)) return new Set();
      throw err;
    }
  }

  async save(applicationIds: ReadonlySet<string>): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    await fs.writeFile(tmpPath, serializeIgnoreList(applicationIds), 'utf-8');
    await fs.rename(tmpPath, this.filePath);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
