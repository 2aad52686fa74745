import type { NotificationEvent } from "./types.js";

export const COCKPIT_PORT = 9090;

export type FormatOptions = {
  sshUser: string;
  logPath: string;
  keyFileHint?: string;
};

export type FormattedNotification = {
  subject: string;
  message: string;
};

export function notificationSubject(event: Pick<NotificationEvent, "status" | "snapshot">): string {
  return `Cockpit Installation ${event.status} - ${event.snapshot.instanceId}`;
}

export function cockpitUrl(publicIp: string): string {
  return `https://${publicIp}:${COCKPIT_PORT}`;
}

function sshCommand(opts: FormatOptions, publicIp: string): string {
  return `ssh -i ${opts.keyFileHint || "your-key.pem"} ${opts.sshUser}@${publicIp}`;
}

function listSection(title: string, items: string[] | undefined): string[] {
  if (!items || items.length === 0) return [];
  return ["", `${title}:`, ...items.map((item) => `- ${item}`)];
}

export function formatNotification(event: NotificationEvent, opts: FormatOptions): FormattedNotification {
  const { snapshot } = event;
  const failed = event.status === "FAILED";
  const lines: string[] = [
    `=== COCKPIT INSTALLATION ${event.status} ===`,
    "",
    "Instance Details:",
    `- Instance ID: ${snapshot.instanceId}`,
    `- Instance Type: ${snapshot.instanceType}`,
    `- Public IP: ${snapshot.publicIp}`,
    `- Private IP: ${snapshot.privateIp}`,
    `- Availability Zone: ${snapshot.availabilityZone}`,
    `- ${failed ? "Error Time" : "Completion Time"}: ${event.timestamp}`,
  ];

  if (failed) {
    if (event.stepId) lines.push(`- Failed Step: ${event.stepId}${event.location ? ` (${event.location})` : ""}`);
    else if (event.location) lines.push(`- Error Location: ${event.location}`);
    lines.push(`- Reported By: ${event.source}`);
    lines.push("", "Error Details:", event.detail);
    lines.push(...listSection("Unavailable Components", event.absent));
    lines.push(
      "",
      "Check installation logs:",
      `${sshCommand(opts, snapshot.publicIp)} 'sudo tail -50 ${opts.logPath}'`,
    );
  } else {
    lines.push("", `Installation Status: ${event.status}`, event.detail);
    lines.push(...listSection("Installed Components", event.installed));
    lines.push(...listSection("Unavailable Components", event.absent));
    lines.push(
      "",
      "Access Information:",
      `- Cockpit Web UI: ${cockpitUrl(snapshot.publicIp)}`,
      `- SSH Access: ${sshCommand(opts, snapshot.publicIp)}`,
      "- SSM Session Manager: available via the AWS console",
    );
  }

  lines.push("", "=== END NOTIFICATION ===");
  return { subject: notificationSubject(event), message: lines.join("\n") };
}
