import type { Logger } from "pino";
import { formatUnknown } from "@outpostctl/shared/lib/strings";
import { awsText, buildAwsCliContext } from "../fleet/aws/aws-cli.js";
import { formatNotification, type FormatOptions } from "./format.js";
import type { NotificationEvent, Notifier } from "./types.js";

export type SnsNotifierOptions = FormatOptions & {
  topicArn: string;
  region: string;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
};

export function buildPublishArgs(topicArn: string, subject: string, message: string): string[] {
  return ["sns", "publish", "--topic-arn", topicArn, "--subject", subject, "--message", message, "--output", "json"];
}

/** Publish failures are logged and swallowed; a lost notification never fails the caller. */
export function createSnsNotifier(opts: SnsNotifierOptions): Notifier {
  const ctx = buildAwsCliContext({ region: opts.region, baseEnv: opts.env, timeoutMs: opts.timeoutMs ?? 30_000 });
  return {
    async publish(event: NotificationEvent): Promise<void> {
      const { subject, message } = formatNotification(event, opts);
      try {
        await awsText(ctx, buildPublishArgs(opts.topicArn, subject, message));
        opts.logger.info({ status: event.status, source: event.source }, `notification sent: ${subject}`);
      } catch (err) {
        opts.logger.warn({ err, status: event.status, source: event.source }, `failed to send notification: ${formatUnknown(err)}`);
      }
    },
  };
}
