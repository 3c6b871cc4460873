import { parseArgs } from "node:util";
import { type BackupSummary, listBackups } from "../../core";
import { formatBytes } from "../../utils/format";
import { CONFIG_OPTIONS, reportFailure, resolveCommandConfig } from "../context";
import { color, csvField, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";

const WIDTHS = [
  TABLE_WIDTHS.backupId,
  TABLE_WIDTHS.modified,
  TABLE_WIDTHS.count,
  TABLE_WIDTHS.count,
  TABLE_WIDTHS.count,
  TABLE_WIDTHS.marker,
  TABLE_WIDTHS.size,
  TABLE_WIDTHS.marker,
];

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...CONFIG_OPTIONS,
      limit: { type: "string", short: "n" },
      format: { type: "string", default: "table" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await resolveCommandConfig(values);
    let backups = await listBackups(config.paths.root);

    const limit = values.limit ? Number.parseInt(values.limit, 10) : undefined;
    if (limit && limit > 0) {
      backups = backups.slice(0, limit);
    }

    // No intro for scripting formats
    switch (values.format) {
      case "json":
        console.log(JSON.stringify(backups, null, 2));
        return 0;
      case "csv":
        printCsv(backups);
        return 0;
      default:
        ui.intro("homestash list");

        if (backups.length === 0) {
          ui.info(`No backups found under ${config.paths.root}`);
          ui.outro("Done");
          return 0;
        }

        printTable(backups);
        ui.outro(`${backups.length} backup(s) under ${config.paths.root}`);
        return 0;
    }
  } catch (error) {
    return reportFailure("List failed", error, values.verbose ?? false);
  }
}

function formatTimestamp(date: Date): string {
  return date.toISOString().substring(0, 19).replace("T", " ");
}

function printTable(backups: BackupSummary[]): void {
  ui.step("Backups:");
  console.log(
    formatTableRow(["Backup", "Modified", "Volumes", "Binds", "Compose", "Images", "Size", ""], WIDTHS),
  );
  console.log(formatTableSeparator(WIDTHS));

  for (const backup of backups) {
    console.log(
      formatTableRow(
        [
          backup.backupId,
          formatTimestamp(backup.modifiedAt),
          String(backup.volumes),
          String(backup.bindMounts),
          String(backup.composeFiles),
          backup.hasImages ? "yes" : "no",
          formatBytes(backup.sizeBytes),
          backup.latest ? color.green("LATEST") : "",
        ],
        WIDTHS,
      ),
    );
  }

  console.log(formatTableSeparator(WIDTHS));
}

function printCsv(backups: BackupSummary[]): void {
  console.log("backup_id,dir,modified_at,volumes,bind_mounts,compose_files,has_images,size_bytes,latest");

  for (const backup of backups) {
    console.log(
      [
        backup.backupId,
        backup.dir,
        backup.modifiedAt.toISOString(),
        backup.volumes,
        backup.bindMounts,
        backup.composeFiles,
        backup.hasImages,
        backup.sizeBytes,
        backup.latest,
      ]
        .map(csvField)
        .join(","),
    );
  }
}

function printHelp(): void {
  console.log(`
${color.bold("homestash list")} - List backups under the backup root

${color.dim("USAGE:")}
  homestash list [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Config file
      --root <dir>        Backup root (default: ~/homelab-backups)
  -n, --limit <number>    Limit number of results
      --format <format>   Output format: table, json, csv (default: table)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  homestash list                          # Most recent first, LATEST marked
  homestash list -n 3                     # Three most recent
  homestash list --format json            # Output as JSON (for scripting)
`);
}
