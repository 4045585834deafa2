import { describe, it, expect, vi } from 'vitest';
import {
  GnomeShellFocusSource,
  parseFocusedWindow,
  parseGVariantString,
  parseGVariantUint64,
} from '../../../src/infrastructure/desktop/GnomeShellFocusSource.js';
import { SourceUnavailableError } from '../../../src/domain/errors/DomainErrors.js';

/**
 * Feature: GNOME Shell 焦點來源
 *
 * 透過 gdbus 取得目前視窗與閒置時間；gdbus 的輸出是 GVariant 文字格式。
 */
describe('GnomeShellFocusSource', () => {
  describe('parseGVariantString', () => {
    it('should unwrap a single-quoted tuple', () => {
      expect(parseGVariantString(`('{"title":"Docs"}',)\n`)).toBe('{"title":"Docs"}');
    });

    it('should handle double quotes and escapes', () => {
      expect(parseGVariantString(`("it's \\"here\\"\\n\\u00e9",)`)).toBe('it\'s "here"\né');
    });

    it('should reject output without a string', () => {
      expect(() => parseGVariantString('(uint64 5,)')).toThrow('unexpected gdbus output');
    });

    it('should reject an unterminated string', () => {
      expect(() => parseGVariantString(`('abc`)).toThrow('unterminated string');
    });
  });

  it('should parse uint64 idle times', () => {
    expect(parseGVariantUint64('(uint64 123456,)\n')).toBe(123456);
    expect(() => parseGVariantUint64('()')).toThrow('unexpected gdbus output');
  });

  it('should map FocusedWindow JSON to a snapshot', () => {
    expect(parseFocusedWindow('{"title":"main.ts - code","wm_class":"Code","pid":42}')).toEqual({
      applicationId: 'Code',
      windowTitle: 'main.ts - code',
    });
    expect(parseFocusedWindow('{"title":null}')).toEqual({ applicationId: '', windowTitle: '' });
  });

  it('should call gdbus and parse the focused window', async () => {
    const runner = vi.fn().mockResolvedValue(`('{"title":"Inbox","wm_class":"thunderbird"}',)\n`);
    const source = new GnomeShellFocusSource({ runner, timeoutMs: 500 });

    expect(await source.poll()).toEqual({ applicationId: 'thunderbird', windowTitle: 'Inbox' });
    expect(runner).toHaveBeenCalledWith('gdbus', [
      'call', '--session',
      '--dest', 'org.gnome.Shell',
      '--object-path', '/org/gnome/shell/extensions/FocusedWindow',
      '--method', 'org.gnome.shell.extensions.FocusedWindow.Get',
    ], 500);
  });

  it('should read the idle time from the Mutter idle monitor', async () => {
    const runner = vi.fn().mockResolvedValue('(uint64 42000,)\n');
    const source = new GnomeShellFocusSource({ runner });
    expect(await source.pollIdleDuration()).toBe(42000);
  });

  it('should wrap command failures as SourceUnavailableError', async () => {
    const runner = vi.fn().mockRejectedValue(new Error('spawn gdbus ENOENT'));
    const source = new GnomeShellFocusSource({ runner });

    await expect(source.poll()).rejects.toBeInstanceOf(SourceUnavailableError);
    await expect(source.pollIdleDuration()).rejects.toThrow('IdleMonitor query failed: spawn gdbus ENOENT');
  });

  it('should wrap malformed JSON as SourceUnavailableError', async () => {
    const source = new GnomeShellFocusSource({ runner: vi.fn().mockResolvedValue(`('not json',)`) });
    await expect(source.poll()).rejects.toBeInstanceOf(SourceUnavailableError);
  });
});
