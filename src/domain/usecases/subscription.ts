import { WORKSPACE_SETTING_KEYS, type Subscription, type WorkspaceSettingStore } from "../types.js";

/** Validates a license key against whatever authority issued it. */
export type LicenseVerifier = (licenseKey: string) => Promise<Subscription>;

export const FREE_SUBSCRIPTION: Subscription = { plan: "FREE" };

/**
 * Loads the workspace subscription from the stored license key.
 *
 * Without a stored key, or without a verifier to check it, the workspace runs
 * on the free plan. The last loaded value is cached for readers.
 */
export class SubscriptionService {
  private current: Subscription = FREE_SUBSCRIPTION;

  constructor(
    private readonly store: WorkspaceSettingStore,
    private readonly verifier?: LicenseVerifier,
  ) {}

  async loadSubscription(): Promise<Subscription> {
    const setting = await this.store.getWorkspaceSetting({ key: WORKSPACE_SETTING_KEYS.LICENSE_KEY });
    if (!setting?.licenseKey || !this.verifier) {
      this.current = FREE_SUBSCRIPTION;
      return this.current;
    }
    this.current = await this.verifier(setting.licenseKey);
    return this.current;
  }

  getSubscription(): Subscription {
    return this.current;
  }
}
