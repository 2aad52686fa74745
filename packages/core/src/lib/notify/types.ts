export type NotificationStatus = "SUCCESS" | "FAILED";

// "step" is the explicit report from a failed critical step; "trap" is the global failure handler.
export type NotificationSource = "pipeline" | "step" | "trap";

export const UNKNOWN = "unknown";

export type ResourceSnapshot = {
  instanceId: string;
  instanceType: string;
  publicIp: string;
  privateIp: string;
  availabilityZone: string;
};

export type NotificationEvent = {
  status: NotificationStatus;
  source: NotificationSource;
  snapshot: ResourceSnapshot;
  detail: string;
  timestamp: string;
  stepId?: string;
  // Step position, e.g. "step 5/21".
  location?: string;
  installed?: string[];
  absent?: string[];
};

export interface Notifier {
  publish(event: NotificationEvent): Promise<void>;
}

