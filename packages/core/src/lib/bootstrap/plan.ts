import { fixedPolicy, NO_RETRY, type RetryPolicy } from "../runtime/retry.js";
import { cockpitUrl } from "../notify/format.js";
import type { BootstrapConfig } from "./config.js";
import type { HostSystem, PackageInstaller } from "./host.js";
import type { InstallBranch, InstallStep, PipelineEntry } from "./pipeline.js";

export const DNF_RETRY: RetryPolicy = fixedPolicy(3, 30_000);

export const SSM_AGENT_RPM_URL =
  "https://s3.amazonaws.com/ec2-downloads-windows/SSMAgent/latest/linux_amd64/amazon-ssm-agent.rpm";
export const AWS_CLI_BIN = "/usr/local/bin/aws";

type DirectPackage = { name: string; url: string; label: string };

export const THIRD_PARTY_PACKAGES: readonly DirectPackage[] = [
  {
    name: "cockpit-file-sharing",
    label: "NFS/Samba management",
    url: "https://github.com/45Drives/cockpit-file-sharing/releases/download/v3.3.4/cockpit-file-sharing-3.3.4-1.el9.noarch.rpm",
  },
  {
    name: "cockpit-navigator",
    label: "file browser",
    url: "https://github.com/45Drives/cockpit-navigator/releases/download/v0.5.10/cockpit-navigator-0.5.10-1.el9.noarch.rpm",
  },
];

export const COCKPIT_SENSORS_PACKAGE: DirectPackage = {
  name: "cockpit-sensors",
  label: "hardware sensors",
  url: "https://github.com/45Drives/cockpit-sensors/releases/download/v2.0.0/cockpit-sensors-2.0.0-1.el9.noarch.rpm",
};

export const OPTIONAL_COCKPIT_MODULES = [
  "cockpit-machines",
  "cockpit-podman",
  "cockpit-networkmanager",
  "cockpit-storaged",
  "cockpit-packagekit",
  "cockpit-sosreport",
  "cockpit-pcp",
] as const;

export const CRITICAL_SERVICE = "cockpit.socket";
export const OPTIONAL_SERVICES = ["libvirtd", "podman.socket", "amazon-ssm-agent", "NetworkManager", "pmcd", "pmlogger"] as const;

export const STARTUP_UNIT_PATH = "/etc/systemd/system/cockpit-startup.service";
export const COCKPIT_CONF_PATH = "/etc/cockpit/cockpit.conf";
export const MOTD_PATH = "/etc/motd.d/cockpit-info";

export function isBareMetalInstanceType(instanceType: string): boolean {
  return instanceType.trim().endsWith(".metal");
}

export function renderStartupUnit(): string {
  return [
    "[Unit]",
    "Description=Ensure Cockpit is running",
    "After=network.target",
    "",
    "[Service]",
    "Type=oneshot",
    `ExecStart=/usr/bin/systemctl start ${CRITICAL_SERVICE}`,
    "RemainAfterExit=yes",
    "",
    "[Install]",
    "WantedBy=multi-user.target",
    "",
  ].join("\n");
}

export function renderCockpitConf(loginTitle: string): string {
  return ["[WebService]", "AllowUnencrypted=false", `LoginTitle=${loginTitle}`, "", "[Session]", "IdleTimeout=15", ""].join("\n");
}

export function renderMotd(publicIp: string): string {
  return [
    "=========================================",
    "Cockpit is installed and running!",
    `Access: ${cockpitUrl(publicIp)}`,
    "=========================================",
    "",
  ].join("\n");
}

export type CockpitPlanContext = {
  config: BootstrapConfig;
  host: HostSystem;
  installer: PackageInstaller;
  instanceType: () => Promise<string>;
  publicIp: () => Promise<string>;
  cpuArch?: "x86_64" | "aarch64";
};

function packageStep(
  ctx: CockpitPlanContext,
  params: {
    id: string;
    title: string;
    criticality: InstallStep["criticality"];
    packages: string[];
    component?: string;
    probe?: string;
  },
): InstallStep {
  const { probe } = params;
  return {
    kind: "step",
    id: params.id,
    title: params.title,
    criticality: params.criticality,
    retry: DNF_RETRY,
    ...(params.component ? { component: params.component } : {}),
    ...(probe ? { alreadyDone: async () => await ctx.installer.isInstalled(probe) } : {}),
    run: async () => {
      await ctx.installer.install(params.packages);
    },
  };
}

function directPackageStep(ctx: CockpitPlanContext, pkg: DirectPackage): InstallStep {
  return packageStep(ctx, {
    id: pkg.name,
    title: `Installing ${pkg.name} (${pkg.label})`,
    criticality: "optional",
    packages: [pkg.url],
    component: pkg.name,
    probe: pkg.name,
  });
}

function awsCliStep(ctx: CockpitPlanContext): InstallStep {
  const arch = ctx.cpuArch ?? "x86_64";
  const zip = "/tmp/awscliv2.zip";
  return {
    kind: "step",
    id: "aws-cli",
    title: "Installing AWS CLI",
    criticality: "optional",
    retry: fixedPolicy(2, 10_000),
    component: "aws-cli",
    alreadyDone: async () => await ctx.host.pathExists(AWS_CLI_BIN),
    run: async () => {
      try {
        await ctx.host.exec("curl", ["-fsSL", `https://awscli.amazonaws.com/awscli-exe-linux-${arch}.zip`, "-o", zip]);
        await ctx.host.exec("unzip", ["-q", "-o", zip, "-d", "/tmp"]);
        await ctx.host.exec("/tmp/aws/install", ["--update"]);
      } finally {
        await ctx.host.exec("rm", ["-rf", zip, "/tmp/aws"]);
      }
      await ctx.host.exec(AWS_CLI_BIN, ["--version"]);
    },
  };
}

function bareMetalBranch(ctx: CockpitPlanContext): InstallBranch {
  return {
    kind: "branch",
    id: "bare-metal-sensors",
    title: "Setting up hardware sensor monitoring",
    predicate: async () => isBareMetalInstanceType(await ctx.instanceType()),
    steps: [
      packageStep(ctx, {
        id: "lm-sensors",
        title: "Installing lm_sensors",
        criticality: "optional",
        packages: ["lm_sensors"],
        component: "lm_sensors",
      }),
      directPackageStep(ctx, COCKPIT_SENSORS_PACKAGE),
      {
        kind: "step",
        id: "sensors-detect",
        title: "Configuring hardware sensors",
        criticality: "optional",
        retry: NO_RETRY,
        run: async ({ logger }) => {
          await ctx.host.exec("sensors-detect", ["--auto"]);
          const sensors = await ctx.host.exec("sensors", []);
          logger.info({ sensors }, "available sensors detected");
        },
      },
    ],
  };
}

function userAccountsStep(ctx: CockpitPlanContext): InstallStep {
  const { config, host } = ctx;
  const groups = "wheel,libvirt";
  return {
    kind: "step",
    id: "user-accounts",
    title: "Setting up Cockpit user accounts",
    criticality: "optional",
    retry: NO_RETRY,
    run: async ({ logger }) => {
      if (await host.userExists(config.adminUser)) {
        await host.exec("usermod", ["-aG", groups, config.adminUser]);
      } else {
        await host.exec("useradd", ["-m", "-G", groups, config.adminUser]);
      }
      await host.exec("usermod", ["-aG", groups, config.sshUser]);
      if (config.adminPassword) {
        const input = [config.adminUser, config.sshUser].map((user) => `${user}:${config.adminPassword}`).join("\n");
        await host.exec("chpasswd", [], { input: `${input}\n` });
        logger.info({ users: [config.adminUser, config.sshUser] }, "password set for console users");
      } else {
        logger.info("no admin password configured; console accounts stay password-locked");
      }
    },
  };
}

function serviceStep(ctx: CockpitPlanContext, unit: string, criticality: InstallStep["criticality"]): InstallStep {
  return {
    kind: "step",
    id: `enable-${unit}`,
    title: `Configuring service ${unit}`,
    criticality,
    retry: NO_RETRY,
    run: async () => {
      await ctx.host.exec("systemctl", ["enable", "--now", unit]);
    },
  };
}

function firewallStep(ctx: CockpitPlanContext): InstallStep {
  return {
    kind: "step",
    id: "firewall",
    title: "Configuring firewall",
    criticality: "optional",
    retry: NO_RETRY,
    run: async ({ logger }) => {
      if (!(await ctx.host.isActive("firewalld"))) {
        logger.info("firewalld not active; skipping firewall configuration (allow TCP 9090 in the security group)");
        return;
      }
      await ctx.host.exec("firewall-cmd", ["--permanent", "--add-service=cockpit"]);
      await ctx.host.exec("firewall-cmd", ["--reload"]);
    },
  };
}

function fileStep(params: { id: string; title: string; write: () => Promise<void> }): InstallStep {
  return {
    kind: "step",
    id: params.id,
    title: params.title,
    criticality: "optional",
    retry: NO_RETRY,
    run: async () => {
      await params.write();
    },
  };
}

/** The Cockpit installation, in execution order. */
export function buildCockpitPlan(ctx: CockpitPlanContext): PipelineEntry[] {
  const { host, config } = ctx;
  return [
    {
      kind: "step",
      id: "system-update",
      title: "Installing system package updates",
      criticality: "critical",
      retry: DNF_RETRY,
      run: async () => {
        await ctx.installer.update();
      },
    },
    packageStep(ctx, { id: "base-tools", title: "Installing curl and unzip", criticality: "critical", packages: ["curl", "unzip"] }),
    packageStep(ctx, { id: "epel", title: "Installing EPEL repository", criticality: "critical", packages: ["epel-release"] }),
    awsCliStep(ctx),
    packageStep(ctx, {
      id: "ssm-agent",
      title: "Installing AWS SSM Agent",
      criticality: "critical",
      packages: [SSM_AGENT_RPM_URL],
      component: "amazon-ssm-agent",
      probe: "amazon-ssm-agent",
    }),
    packageStep(ctx, {
      id: "cockpit-core",
      title: "Installing core Cockpit modules",
      criticality: "critical",
      packages: ["cockpit", "cockpit-system", "cockpit-ws", "cockpit-bridge"],
      component: "cockpit",
    }),
    ...OPTIONAL_COCKPIT_MODULES.map((name) =>
      packageStep(ctx, { id: name, title: `Installing ${name}`, criticality: "optional", packages: [name], component: name }),
    ),
    packageStep(ctx, {
      id: "virtualization",
      title: "Installing virtualization packages",
      criticality: "critical",
      packages: ["libvirt", "libvirt-client", "virt-install", "virt-manager", "qemu-kvm"],
      component: "libvirt/kvm",
    }),
    packageStep(ctx, { id: "podman", title: "Installing Podman", criticality: "critical", packages: ["podman"], component: "podman" }),
    packageStep(ctx, {
      id: "pcp",
      title: "Installing PCP tools",
      criticality: "critical",
      packages: ["pcp", "pcp-system-tools"],
      component: "pcp",
    }),
    ...THIRD_PARTY_PACKAGES.map((pkg) => directPackageStep(ctx, pkg)),
    bareMetalBranch(ctx),
    userAccountsStep(ctx),
    serviceStep(ctx, CRITICAL_SERVICE, "critical"),
    ...OPTIONAL_SERVICES.map((unit) => serviceStep(ctx, unit, "optional")),
    firewallStep(ctx),
    fileStep({
      id: "startup-unit",
      title: "Setting up Cockpit startup service",
      write: async () => {
        await host.writeFile(STARTUP_UNIT_PATH, renderStartupUnit());
        await host.exec("systemctl", ["daemon-reload"]);
        await host.exec("systemctl", ["enable", "cockpit-startup.service"]);
      },
    }),
    fileStep({
      id: "cockpit-conf",
      title: "Configuring Cockpit settings",
      write: async () => {
        await host.writeFile(COCKPIT_CONF_PATH, renderCockpitConf(config.loginTitle));
      },
    }),
    fileStep({
      id: "motd",
      title: "Setting up login banner",
      write: async () => {
        await host.writeFile(MOTD_PATH, renderMotd(await ctx.publicIp()));
      },
    }),
    {
      kind: "step",
      id: "ec2-user",
      title: "Configuring ec2-user for Cockpit access",
      criticality: "optional",
      retry: NO_RETRY,
      run: async ({ logger }) => {
        if (!(await host.userExists("ec2-user"))) {
          logger.info("ec2-user not present; nothing to do");
          return;
        }
        await host.exec("usermod", ["-aG", "libvirt,wheel", "ec2-user"]);
      },
    },
  ];
}
