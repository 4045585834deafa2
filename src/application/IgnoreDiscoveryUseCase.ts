import type { FocusSourcePort } from '../domain/ports/FocusSourcePort.js';
import type { Clock } from '../domain/ports/Clock.js';
import { systemClock } from '../domain/ports/Clock.js';
import { SourceUnavailableError } from '../domain/errors/DomainErrors.js';
import { Logger } from '../shared/Logger.js';
import type { SessionTracker } from './SessionTracker.js';
import type { SeenApplication } from './dto/SeenApplication.js';

export interface DiscoveryOptions {
  durationMs?: number;
  intervalMs?: number;
  /** 每次輪詢後回報進度（剩餘毫秒、目前找到幾個） */
  onProgress?: (remainingMs: number, found: number) => void;
}

export interface IgnoreDiscoveryDeps {
  source: FocusSourcePort;
  tracker: SessionTracker;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * 互動式忽略清單：觀察一段時間內出現過的應用程式，讓使用者挑一個加入忽略清單
 */
export class IgnoreDiscoveryUseCase {
  private readonly clock: Clock;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(private readonly deps: IgnoreDiscoveryDeps) {
    this.clock = deps.clock ?? systemClock;
    this.sleep = deps.sleep ?? defaultSleep;
    this.logger = deps.logger ?? new Logger('IgnoreDiscovery');
  }

  /** 輪詢 durationMs（預設 10 秒），回傳看過的應用程式，最近看到的在前 */
  async discover(options: DiscoveryOptions = {}): Promise<SeenApplication[]> {
    const durationMs = options.durationMs ?? 10_000;
    const intervalMs = options.intervalMs ?? 500;
    const seen = new Map<string, SeenApplication>();
    const deadline = this.clock() + durationMs;

    while (this.clock() < deadline) {
      try {
        const window = await this.deps.source.poll();
        if (window.applicationId) {
          seen.set(window.applicationId, {
            applicationId: window.applicationId,
            windowTitle: window.windowTitle,
            lastSeen: this.clock(),
            alreadyIgnored: this.deps.tracker.isIgnored(window.applicationId),
          });
        }
      } catch (err) {
        if (!(err instanceof SourceUnavailableError)) throw err;
        this.logger.debug('Focus source unavailable during discovery', { error: err.message });
      }

      options.onProgress?.(Math.max(0, deadline - this.clock()), seen.size);
      await this.sleep(intervalMs);
    }

    return [...seen.values()].sort((a, b) => b.lastSeen - a.lastSeen
      || a.applicationId.localeCompare(b.applicationId));
  }

  /** 把挑中的應用程式加入忽略清單；已在清單中回傳 false */
  async choose(applicationId: string): Promise<boolean> {
    if (this.deps.tracker.isIgnored(applicationId)) return false;
    await this.deps.tracker.setIgnored(applicationId);
    return true;
  }
}
