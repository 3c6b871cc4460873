import { parseArgs } from "node:util";
import { type InspectionReport, inspectBackup, inspectImage, UsageError } from "../../core";
import type { ContainerCapture, MountCheck, SubtreeSummary } from "../../core/inspect/inspector";
import { CONFIG_OPTIONS, reportFailure, resolveCommandConfig } from "../context";
import { color, formatSummary, ui } from "../ui";

const INSPECT_USAGE = "Usage: homestash inspect <backup-dir> | --image <tag> | --auto";

function subtreeLine(summary: SubtreeSummary): string {
  if (!summary.present) {
    return color.red("missing");
  }
  return `${summary.entries.length} entr${summary.entries.length === 1 ? "y" : "ies"}`;
}

function checkLine(check: MountCheck): string {
  const mark = check.archived ? color.green("✔") : color.red("✘");
  return `    ${mark} ${check.source} -> ${check.destination} ${color.dim(check.expected)}`;
}

function renderContainer(container: ContainerCapture): void {
  ui.message(`  ${color.cyan(container.name)} ${color.dim(container.image)}`);
  if (container.volumes.length === 0 && container.binds.length === 0) {
    ui.message(color.dim("    (no volumes or bind mounts)"));
    return;
  }
  for (const check of [...container.volumes, ...container.binds]) {
    ui.message(checkLine(check));
  }
}

export function renderInspection(report: InspectionReport): void {
  ui.note(
    formatSummary([
      { label: "Backup", value: report.backupDir },
      { label: "volumes/", value: subtreeLine(report.volumes) },
      { label: "bind-mounts/", value: subtreeLine(report.bindMounts) },
      { label: "compose-files/", value: subtreeLine(report.composeFiles) },
      { label: "manifests/", value: subtreeLine(report.manifests) },
      { label: "certs/", value: subtreeLine(report.certs) },
      { label: "Root CA", value: report.rootCertificate ? "present" : "absent" },
      { label: "images.tar", value: report.imagesArchive ? "present" : "absent" },
      { label: "Running images", value: report.runningImages.length },
    ]),
    "Capture Summary",
  );

  if (report.bindMounts.entries.length > 0) {
    ui.step("Bind-mount archives:");
    ui.message(report.bindMounts.entries.map((name) => `  ${name}`).join("\n"));
  }

  if (report.containers) {
    ui.step("Containers:");
    for (const container of report.containers) {
      renderContainer(container);
    }
  }

  for (const warning of report.warnings) {
    ui.warn(warning);
  }
}

export async function inspectCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...CONFIG_OPTIONS,
      image: { type: "string" },
      auto: { type: "boolean", default: false },
      expect: { type: "string", multiple: true },
      format: { type: "string", default: "text" },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await resolveCommandConfig(values);
    const options = {
      expect: values.expect,
      certFileName: config.certs.fileName,
      workingDir: config.paths.workingDir,
    };

    let report: InspectionReport;
    let image: string | null = null;
    const backupDir = positionals[0];

    if (values.image || values.auto) {
      const result = await inspectImage(config, values.image ?? "auto", options);
      image = result.image;
      report = result.report;
    } else if (backupDir) {
      report = await inspectBackup(backupDir, options);
      if (!report.volumes.present && !report.manifests.present) {
        throw new UsageError(`Not a backup directory: ${report.backupDir}`, INSPECT_USAGE);
      }
    } else {
      throw new UsageError("Nothing to inspect", INSPECT_USAGE);
    }

    if (values.format === "json") {
      console.log(JSON.stringify(image ? { image, ...report } : report, null, 2));
      return 0;
    }

    ui.intro("homestash inspect");
    if (image) {
      ui.info(`Image: ${image}`);
    }
    renderInspection(report);
    ui.outro("Inspection complete");
    return 0;
  } catch (error) {
    return reportFailure("Inspect failed", error, values.verbose ?? false);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("homestash inspect")} - Report what a backup or bundle image captured

${color.dim("USAGE:")}
  homestash inspect <backup-dir> [OPTIONS]
  homestash inspect --image <tag> [OPTIONS]
  homestash inspect --auto [OPTIONS]

${color.dim("OPTIONS:")}
      --image <tag>       Inspect the backup inside a bundle image
      --auto              Inspect the newest local bundle image
      --expect <name>     Container to list first (can be repeated; default: pihole, caddy, homepage)
      --format <format>   Output format: text, json (default: text)
  -c, --config <path>     Config file
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  homestash inspect ~/homelab-backups/2025-08-12_224310
  homestash inspect --auto
  homestash inspect --image homelab-backup:2025-08-12_224310 --format json
`);
}
