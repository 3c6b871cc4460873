import { parseArgs } from "node:util";
import { patchBackup } from "../../core";
import { DEFAULT_PATCH_CONTAINERS, PATCH_USAGE } from "../../core/patch/patcher";
import { CONFIG_OPTIONS, reportFailure, resolveCommandConfig } from "../context";
import { color, formatSummary, ui } from "../ui";

function renderListing(title: string, names: string[], created: Set<string>): void {
  ui.step(title);
  if (names.length === 0) {
    ui.message(color.dim("  (none)"));
    return;
  }
  ui.message(
    names.map((name) => `  ${name}${created.has(name) ? color.green(" (new)") : ""}`).join("\n"),
  );
}

export async function patchCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...CONFIG_OPTIONS,
      backup: { type: "string", short: "b" },
      container: { type: "string", multiple: true },
      prefix: { type: "string", multiple: true },
      "dry-run": { type: "boolean", default: false },
      "rebuild-image": { type: "boolean", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await resolveCommandConfig(values);

    ui.intro("homestash patch");
    const result = await patchBackup(config, {
      backupDir: values.backup,
      containers: values.container && values.container.length > 0 ? values.container : undefined,
      extraPrefixes: values.prefix,
      dryRun: values["dry-run"],
      rebuildImage: values["rebuild-image"],
    });

    const created = new Set(result.created);
    renderListing("Bind-mount archives before:", result.before, new Set());
    renderListing(
      values["dry-run"] ? "Bind-mount archives after (planned):" : "Bind-mount archives after:",
      result.after,
      created,
    );

    ui.note(
      formatSummary([
        { label: "Backup", value: result.backupDir },
        { label: "Missing", value: result.missing.length },
        { label: values["dry-run"] ? "Would create" : "Created", value: result.created.length },
        { label: "Image", value: result.image?.imageTag },
      ]),
      "Patch Summary",
    );

    if (values["dry-run"]) {
      ui.warn("[DRY RUN] No changes were made.");
    }

    if (result.errors.length > 0) {
      for (const err of result.errors) {
        ui.error(err);
      }
      ui.outro("Patch finished with errors");
      return 1;
    }

    ui.outro("Patch complete!");
    return 0;
  } catch (error) {
    return reportFailure("Patch failed", error, values.verbose ?? false);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("homestash patch")} - Add missing bind-mount archives to an existing backup

${color.dim("USAGE:")}
  homestash patch [OPTIONS]

${color.dim("OPTIONS:")}
  -b, --backup <dir>      Backup to patch (default: LATEST, else the newest)
      --container <name>  Container whose binds to capture (can be repeated;
                          default: ${DEFAULT_PATCH_CONTAINERS.join(", ")})
      --prefix <dir>      Extra allowed path prefix (can be repeated)
      --dry-run           Show what would be archived without doing it
      --rebuild-image     Package the patched backup as a new bundle image
  -c, --config <path>     Config file
      --sudo              Run host tar through sudo
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Allowed prefixes are the home directory, /etc/pihole, /etc/dnsmasq.d,
  /etc/caddy and /etc/caddy_config plus any --prefix. /etc/pihole and
  /etc/dnsmasq.d are captured whenever they exist.

  ${PATCH_USAGE}

${color.dim("EXAMPLES:")}
  sudo homestash patch --dry-run
  sudo homestash patch --container pihole --prefix /srv/pihole --rebuild-image
`);
}
