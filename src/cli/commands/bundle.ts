import { parseArgs } from "node:util";
import { runBundle } from "../../core";
import { extractionCommands } from "../../core/bundle/templates";
import { CONFIG_OPTIONS, INLINE_HELP, reportFailure, resolveCommandConfig } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function bundleCommand(args: string[]): Promise<number> {
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

    ui.intro("homestash bundle");
    const result = await runBundle(config);

    ui.stepResults(result.report.steps);
    ui.note(
      formatSummary([
        { label: "Image", value: result.imageTag },
        { label: "Backup", value: result.backupDir },
        { label: "Build context", value: result.buildRoot },
      ]),
      "Bundle Summary",
    );

    const extract = extractionCommands(result.imageTag).map((line) => `  ${line}`);
    ui.info(`To extract on another host:\n${extract.join("\n")}`);
    ui.outro("Bundle complete!");
    return 0;
  } catch (error) {
    return reportFailure("Bundle failed", error, values.verbose ?? false);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("homestash bundle")} - Take a fresh backup and package it as an image

${color.dim("USAGE:")}
  homestash bundle [OPTIONS]

${color.dim("OPTIONS:")}
  -v, --verbose                Verbose output
  -h, --help                   Show this help message

${INLINE_HELP}

${color.dim("DESCRIPTION:")}
  Runs a backup, then builds homelab-backup:<YYYY-MM-DD_HHMMSS> holding the
  backup, a restore script and README.txt under /bundle. The image is local
  only and likely contains secrets; keep it private.

${color.dim("EXAMPLES:")}
  sudo homestash bundle --target-user alice
`);
}
