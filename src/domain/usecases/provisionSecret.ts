import { randomUUID } from "node:crypto";
import { DEV_SECRET } from "../constants.js";
import { SecretProvisioningError } from "../errors.js";
import { WORKSPACE_SETTING_KEYS, type Mode, type SecretSessionSetting, type WorkspaceSettingStore } from "../types.js";

/**
 * Get-or-create the secret used to sign session tokens.
 *
 * Dev mode returns a constant and never touches the store. Every other mode
 * reads the SECRET_SESSION workspace setting and only writes one when the
 * lookup misses, so an existing secret is never regenerated.
 */
export async function provisionSecret(mode: Mode, store: WorkspaceSettingStore): Promise<string> {
  if (mode === "dev") return DEV_SECRET;

  let setting: SecretSessionSetting | null;
  try {
    setting = await store.getWorkspaceSetting({ key: WORKSPACE_SETTING_KEYS.SECRET_SESSION });
    if (!setting) {
      setting = await store.upsertWorkspaceSetting({
        key: WORKSPACE_SETTING_KEYS.SECRET_SESSION,
        secretSession: randomUUID(),
      });
    }
  } catch (error) {
    throw new SecretProvisioningError("failed to provision session secret", { cause: error });
  }

  if (!setting.secretSession) {
    throw new SecretProvisioningError("stored session secret is empty");
  }
  return setting.secretSession;
}
