import * as path from "node:path";
import { parseArgs } from "node:util";
import { readLatestPointer, rotateBackups } from "../../core";
import { CONFIG_OPTIONS, reportFailure, resolveCommandConfig } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function rotateCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...CONFIG_OPTIONS,
      "dry-run": { type: "boolean", default: false },
      force: { type: "boolean", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await resolveCommandConfig(values);
    const root = config.paths.root;
    const keep = config.retention.keep;

    ui.intro("homestash rotate");

    // LATEST always survives rotation
    const latest = await readLatestPointer(root);
    const protect = latest ? path.resolve(latest) : undefined;

    const preview = await rotateBackups(root, keep, { dryRun: true, protect });
    if (preview.pruned.length === 0) {
      ui.success(`At most ${keep} backup(s) under ${root}; nothing to delete`);
      ui.outro("Nothing to do");
      return 0;
    }

    ui.step(`Found ${preview.pruned.length} backup(s) beyond the newest ${keep}:`);
    for (const dir of preview.pruned) {
      ui.message(`  ${color.dim("•")} ${dir}`);
    }

    if (values["dry-run"]) {
      ui.warn("[DRY RUN] No changes were made.");
      ui.outro("Preview complete");
      return 0;
    }

    if (!values.force) {
      if (!(await ui.confirmDeletion(preview.pruned))) {
        ui.cancel("Rotation cancelled");
        return 1;
      }
    }

    const s = ui.spinner();
    s.start("Deleting old backups...");
    const result = await rotateBackups(root, keep, { protect });
    s.stop("Rotation complete");

    ui.note(
      formatSummary([
        { label: "Kept", value: result.kept.length },
        { label: "Deleted", value: result.pruned.length },
      ]),
      "Rotation Summary",
    );
    ui.outro("Rotation complete!");
    return 0;
  } catch (error) {
    return reportFailure("Rotation failed", error, values.verbose ?? false);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("homestash rotate")} - Apply the retention window to the backup root

${color.dim("USAGE:")}
  homestash rotate [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Config file
      --root <dir>        Backup root (default: ~/homelab-backups)
      --keep <n>          Number of backups to keep (default: 7)
      --dry-run           Show what would be deleted without doing it
      --force             Skip the confirmation prompt
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Keeps the newest --keep backup directories (by modification time) and
  deletes the rest. The directory named by LATEST is never deleted.

${color.dim("EXAMPLES:")}
  homestash rotate --dry-run              # Preview
  homestash rotate --keep 3 --force       # Keep three, no prompt
`);
}
