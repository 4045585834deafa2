/** 忽略清單的持久化（一行一個 application identifier） */
export interface IgnoreListPort {
  load(): Promise<Set<string>>;
  save(applicationIds: ReadonlySet<string>): Promise<void>;
}
