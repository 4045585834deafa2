import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { z } from 'zod';
import type { WindowSnapshot } from '../../domain/entities/WindowSnapshot.js';
import { SourceUnavailableError, errorMessage } from '../../domain/errors/DomainErrors.js';
import type { FocusSourcePort } from '../../domain/ports/FocusSourcePort.js';

const FOCUSED_WINDOW = {
  dest: 'org.gnome.Shell',
  objectPath: '/org/gnome/shell/extensions/FocusedWindow',
  method: 'org.gnome.shell.extensions.FocusedWindow.Get',
};

const IDLE_MONITOR = {
  dest: 'org.gnome.Mutter.IdleMonitor',
  objectPath: '/org/gnome/Mutter/IdleMonitor/Core',
  method: 'org.gnome.Mutter.IdleMonitor.GetIdletime',
};

/** 執行外部指令並回傳 stdout；失敗時 reject */
export type CommandRunner = (file: string, args: string[], timeoutMs: number) => Promise<string>;

const execFileAsync = promisify(execFile);

const defaultRunner: CommandRunner = async (file, args, timeoutMs) => {
  const { stdout } = await execFileAsync(file, args, { timeout: timeoutMs, encoding: 'utf-8' });
  return stdout;
};

/** FocusedWindow extension 回傳的 JSON 中我們用到的欄位 */
const focusedWindowSchema = z.object({
  title: z.string().nullish(),
  wm_class: z.string().nullish(),
});

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n', t: '\t', r: '\r', b: '\b', f: '\f', v: '\v', a: '\x07',
};

/**
 * 解析 gdbus 輸出的單一字串 tuple，例如 `('{"title":"x"}',)`
 * 支援單 / 雙引號分隔與 GVariant 文字格式的跳脫序列
 */
export function parseGVariantString(output: string): string {
  const text = output.trim();
  const open = text.indexOf('(');
  const quote = text[open + 1];
  if (open === -1 || (quote !== "'" && quote !== '"')) {
    throw new Error(`unexpected gdbus output: ${text.slice(0, 80)}`);
  }

  let result = '';
  for (let i = open + 2; i < text.length; i++) {
    const ch = text[i];
    if (ch === quote) return result;
    if (ch !== '\\') {
      result += ch;
      continue;
    }

    const next = text[++i];
    if (next === 'u' || next === 'U') {
      const width = next === 'u' ? 4 : 8;
      const hex = text.slice(i + 1, i + 1 + width);
      result += String.fromCodePoint(parseInt(hex, 16));
      i += width;
    } else if (next !== undefined && next in SIMPLE_ESCAPES) {
      result += SIMPLE_ESCAPES[next];
    } else if (next !== undefined) {
      result += next;
    }
  }

  throw new Error('unterminated string in gdbus output');
}

/** 解析 `(uint64 12345,)` 形式的輸出 */
export function parseGVariantUint64(output: string): number {
  const match = /\(\s*(?:uint64\s+)?(\d+)\s*,?\s*\)/.exec(output);
  if (!match) {
    throw new Error(`unexpected gdbus output: ${output.trim().slice(0, 80)}`);
  }
  return Number(match[1]);
}

/** 將 FocusedWindow JSON 轉為 WindowSnapshot；缺少的欄位以空字串代替 */
export function parseFocusedWindow(json: string): WindowSnapshot {
  const data = focusedWindowSchema.parse(JSON.parse(json));
  return {
    applicationId: data.wm_class ?? '',
    windowTitle: data.title ?? '',
  };
}

export interface GnomeShellFocusSourceOptions {
  timeoutMs?: number;
  runner?: CommandRunner;
}

/**
 * GNOME Shell（Mutter）焦點來源
 *
 * 透過 `gdbus` 呼叫 FocusedWindow Shell extension 取得目前視窗，
 * 以及 Mutter IdleMonitor 取得閒置毫秒數。任何指令或解析失敗都轉為 SourceUnavailableError。
 */
export class GnomeShellFocusSource implements FocusSourcePort {
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(options: GnomeShellFocusSourceOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 2000;
    this.runner = options.runner ?? defaultRunner;
  }

  async poll(): Promise<WindowSnapshot> {
    try {
      const output = await this.call(FOCUSED_WINDOW);
      return parseFocusedWindow(parseGVariantString(output));
    } catch (err) {
      throw new SourceUnavailableError(`FocusedWindow query failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async pollIdleDuration(): Promise<number> {
    try {
      const output = await this.call(IDLE_MONITOR);
      return parseGVariantUint64(output);
    } catch (err) {
      throw new SourceUnavailableError(`IdleMonitor query failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private call(target: { dest: string; objectPath: string; method: string }): Promise<string> {
    return this.runner('gdbus', [
      'call', '--session',
      '--dest', target.dest,
      '--object-path', target.objectPath,
      '--method', target.method,
    ], this.timeoutMs);
  }
}
