import { describe, it, expect } from "vitest";
import YAML from "yaml";
import { DEFAULT_BOOTSTRAP_CONFIG_PATH } from "../src/lib/bootstrap/config.js";
import { EC2_USER_DATA_MAX_BYTES, renderBootstrapPayload } from "../src/lib/bootstrap/payload.js";
import { PreconditionError } from "../src/lib/runtime/errors.js";

const TOPIC = "arn:aws:sns:eu-west-1:123456789012:cockpit-alerts";

function parseUserData(userData: string): unknown {
  expect(userData.startsWith("#cloud-config\n")).toBe(true);
  return YAML.parse(userData.slice("#cloud-config\n".length));
}

describe("bootstrap payload", () => {
  it("writes a typed config and runs the bootstrapper from npm", () => {
    const userData = renderBootstrapPayload({
      topicArn: ` ${TOPIC} `,
      bootstrapPackage: "@outpostctl/cli@0.1.0",
      adminPassword: "test-secret",
      keyFileHint: "lab.pem",
    });
    const doc = parseUserData(userData);

    expect(doc).toMatchObject({
      write_files: [{ path: DEFAULT_BOOTSTRAP_CONFIG_PATH, permissions: "0600", owner: "root:root" }],
      runcmd: [
        ["dnf", "module", "enable", "-y", "nodejs:20"],
        ["dnf", "install", "-y", "nodejs", "npm"],
        ["npx", "--yes", "@outpostctl/cli@0.1.0", "bootstrap", "run", "--config", DEFAULT_BOOTSTRAP_CONFIG_PATH],
      ],
    });
    const content = YAML.parse(userData.slice("#cloud-config\n".length)).write_files[0].content;
    expect(JSON.parse(content)).toEqual({
      schemaVersion: 1,
      topicArn: TOPIC,
      region: "eu-west-1",
      sshUser: "rocky",
      adminUser: "admin",
      adminPassword: "test-secret",
      keyFileHint: "lab.pem",
      loginTitle: "EC2 Cockpit Interface",
      logPath: "/var/log/outpostctl-bootstrap.log",
      statusPath: "/var/lib/outpostctl/status.json",
    });
  });

  it("rejects a malformed topic ARN before rendering", () => {
    expect(() => renderBootstrapPayload({ topicArn: "arn:aws:sns:us-east-1:123", bootstrapPackage: "outpostctl" })).toThrow(
      "invalid SNS topic ARN format: arn:aws:sns:us-east-1:123",
    );
  });

  it("rejects a package spec that is not an npm name", () => {
    expect(() => renderBootstrapPayload({ topicArn: TOPIC, bootstrapPackage: "rm -rf /" })).toThrow(PreconditionError);
  });

  it("enforces the EC2 user data limit", () => {
    expect(() =>
      renderBootstrapPayload({
        topicArn: TOPIC,
        bootstrapPackage: "outpostctl",
        adminPassword: "x".repeat(EC2_USER_DATA_MAX_BYTES),
      }),
    ).toThrow(/cloud-init user data too large/);
  });
});
