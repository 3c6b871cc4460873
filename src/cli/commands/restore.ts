import { parseArgs } from "node:util";
import { runRestore } from "../../core";
import { RESTORE_USAGE } from "../../core/restore/orchestrator";
import { CONFIG_OPTIONS, INLINE_HELP, reportFailure, resolveCommandConfig } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function restoreCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...CONFIG_OPTIONS,
      "no-start": { type: "boolean", default: false },
      "no-load-images": { type: "boolean", default: false },
      "absolute-binds": { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await resolveCommandConfig(values);

    ui.intro("homestash restore");
    const report = await runRestore(config, positionals[0], {
      start: !values["no-start"],
      loadImages: !values["no-load-images"],
      absoluteBinds: values["absolute-binds"],
    });

    if (report.composeProjects.length > 0) {
      ui.step("Compose projects:");
      for (const project of report.composeProjects) {
        const state = project.started ? color.green("started") : color.dim("not started");
        ui.message(`  ${project.dir} ${color.dim(`(${project.files.join(", ")})`)} ${state}`);
      }
    }

    ui.note(
      formatSummary([
        { label: "Backup", value: report.backupDir },
        { label: "Volumes restored", value: report.volumesRestored.length },
        { label: "Network", value: report.networkCreated ? `${config.docker.network} (created)` : config.docker.network },
        {
          label: "Working dir files",
          value: report.conventionalRestored.length > 0 ? report.conventionalRestored.join(", ") : "none",
        },
        {
          label: "Host paths",
          value: values["absolute-binds"] ? report.absoluteBindsRestored.length : null,
        },
        { label: "Images loaded", value: report.imagesLoaded ? "yes" : "no" },
        { label: "Root CA", value: report.certificatePath },
      ]),
      "Restore Summary",
    );

    if (report.errors.length > 0) {
      for (const err of report.errors) {
        ui.error(err);
      }
      ui.outro("Restore finished with errors");
      return 1;
    }

    ui.outro("Restore complete!");
    return 0;
  } catch (error) {
    return reportFailure("Restore failed", error, values.verbose ?? false);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("homestash restore")} - Restore a backup onto this host

${color.dim("USAGE:")}
  ${RESTORE_USAGE.replace("Usage: ", "")} [OPTIONS]

${color.dim("OPTIONS:")}
      --no-start               Copy compose files but do not run docker compose up
      --no-load-images         Skip loading images.tar
      --absolute-binds         Also extract host-path bind archives back to /
  -v, --verbose                Verbose output
  -h, --help                   Show this help message

${INLINE_HELP}

${color.dim("DESCRIPTION:")}
  Recreates every archived volume, the shared proxy network and the working
  directory files (./public, ./config, ./Caddyfile), loads saved images and
  brings each captured compose project up from ./stack/<project>/.

${color.dim("EXAMPLES:")}
  homestash restore ~/homelab-backups/2025-08-12_224310
  homestash restore "$(cat ~/homelab-backups/LATEST)" --no-start
`);
}
