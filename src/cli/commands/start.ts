import { parseArgs } from "node:util";
import { Scheduler } from "../../core";
import { CONFIG_OPTIONS, INLINE_HELP, reportFailure, resolveCommandConfig } from "../context";
import { color, ui } from "../ui";

export async function startCommand(args: string[]): Promise<number> {
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

    ui.intro("homestash scheduler");

    if (Object.keys(config.schedules).length === 0) {
      ui.error("No schedules configured");
      ui.info("Add schedules to your config file to use the scheduler");
      return 1;
    }

    const scheduler = new Scheduler(config);
    if (scheduler.size === 0) {
      ui.error("None of the configured schedules could be parsed");
      return 1;
    }

    ui.step("Configured schedules:");
    for (const s of scheduler.getStatus()) {
      const nextRun = s.nextRun ? s.nextRun.toLocaleString() : "unknown";
      ui.message(
        `  ${color.cyan(s.name.padEnd(12))} ${color.dim(s.action.padEnd(7))} ${color.dim(s.cron.padEnd(15))} ${color.dim("next:")} ${nextRun}`,
      );
    }

    const shutdown = () => {
      ui.cancel("Shutting down...");
      scheduler.stop();
      process.exit(0);
    };

    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);

    scheduler.start();

    ui.success("Scheduler is running");
    ui.info("Press Ctrl+C to stop");

    // Keep the process running
    await new Promise(() => {});

    return 0;
  } catch (error) {
    return reportFailure("Failed to start", error, values.verbose ?? false);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("homestash start")} - Start the scheduler daemon

${color.dim("USAGE:")}
  homestash start [OPTIONS]

${color.dim("OPTIONS:")}
  -v, --verbose                Verbose output
  -h, --help                   Show this help message

${INLINE_HELP}

${color.dim("DESCRIPTION:")}
  Runs backups (or bundles) on the schedules of the config file. Each
  schedule runs at most once per minute; a backup run rotates old backups
  when it completes.

${color.dim("SCHEDULE FORMAT:")}
  schedules:
    nightly:
      cron: "0 3 * * *"
      timezone: Europe/Berlin    # optional
      action: backup             # or bundle

${color.dim("EXAMPLES:")}
  homestash start                           # Start with ./homestash.config.yaml
  homestash start -c /etc/homestash.yaml    # Start with a specific config
`);
}
