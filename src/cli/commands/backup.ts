import { parseArgs } from "node:util";
import { runBackup } from "../../core";
import type { RunReport } from "../../types";
import { formatDuration } from "../../utils/format";
import { CONFIG_OPTIONS, INLINE_HELP, reportFailure, resolveCommandConfig } from "../context";
import { color, formatSummary, ui } from "../ui";

export function renderRunSummary(report: RunReport, title: string): void {
  ui.note(
    formatSummary([
      { label: "Backup ID", value: report.backupId },
      { label: "Directory", value: report.backupDir },
      { label: "Duration", value: formatDuration(report.durationMs) },
      { label: "Complete", value: report.complete ? "yes" : color.red("no (partial)") },
      { label: "LATEST updated", value: report.latestUpdated ? "yes" : "no" },
      { label: "Pruned", value: report.pruned.length > 0 ? report.pruned.join("\n") : null },
    ]),
    title,
  );
}

export async function backupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: CONFIG_OPTIONS,
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await resolveCommandConfig(values);

    ui.intro("homestash backup");
    const report = await runBackup(config);

    ui.stepResults(report.steps);
    renderRunSummary(report, "Backup Summary");

    if (!report.complete) {
      ui.warn("Backup is partial; LATEST was left unchanged and no rotation ran");
      ui.outro("Backup finished with failures");
      return 1;
    }

    ui.outro("Backup complete!");
    return 0;
  } catch (error) {
    return reportFailure("Backup failed", error, values.verbose ?? false);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("homestash backup")} - Snapshot volumes, bind mounts, compose files and images

${color.dim("USAGE:")}
  homestash backup [OPTIONS]

${color.dim("OPTIONS:")}
  -v, --verbose                Verbose output
  -h, --help                   Show this help message

${INLINE_HELP}

${color.dim("DESCRIPTION:")}
  Writes <root>/<YYYY-MM-DD_HHMMSS>/ with volumes/, bind-mounts/, compose-files/,
  manifests/, certs/, running-images.txt and images.tar. When every step succeeds,
  LATEST is pointed at the new backup and only the newest --keep backups remain.

${color.dim("EXAMPLES:")}
  homestash backup                            # Backup into ~/homelab-backups
  homestash backup --root /srv/backups        # Custom backup root
  homestash backup --keep 14 --fail-fast      # Keep two weeks, stop at first failure
  homestash backup --sudo                     # Read root-owned bind mounts through sudo tar
`);
}
