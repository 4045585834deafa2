/** discover 期間看到的應用程式 */
export interface SeenApplication {
  applicationId: string;
  windowTitle: string;
  lastSeen: number;
  alreadyIgnored: boolean;
}
