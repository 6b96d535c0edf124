import type * as grpc from "@grpc/grpc-js";
import type { SubscriptionService } from "../../domain/usecases/subscription.js";
import type { Profile } from "../../domain/types.js";

export const WORKSPACE_SERVICE = "linkhold.api.v2.WorkspaceService";

export interface WorkspaceProfileMessage {
  mode: string;
  version: string;
  plan: string;
}

export interface GetWorkspaceProfileResponse {
  profile: WorkspaceProfileMessage;
}

export interface WorkspaceServiceDeps {
  profile: Profile;
  subscriptionService: SubscriptionService;
}

export type WorkspaceServiceHandlers = {
  getWorkspaceProfile: grpc.handleUnaryCall<object, GetWorkspaceProfileResponse>;
};

export function createWorkspaceService({ profile, subscriptionService }: WorkspaceServiceDeps): WorkspaceServiceHandlers {
  const getWorkspaceProfile: WorkspaceServiceHandlers["getWorkspaceProfile"] = (_call, callback) => {
    callback(null, {
      profile: {
        mode: profile.mode,
        version: profile.version,
        plan: subscriptionService.getSubscription().plan,
      },
    });
  };

  return { getWorkspaceProfile };
}
