import { Command } from "commander";
import { renameCommand, type RenameCommandOptions } from "./commands/rename.js";
import { scanCommand } from "./commands/scan.js";
import { configShow, configSet } from "./commands/config.js";

export const VERSION = "1.0.0";

/** Build the CLI. Actions report failure through process.exitCode, never by exiting. */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("pdf-title-renamer")
    .description("Rename PDF files after the visible \"Title\" on their first page")
    .version(VERSION);

  program
    .command("rename <input>")
    .description("Rename (in place) or copy every PDF in a folder, named after its title")
    .option("-o, --output <dir>", "Write renamed copies to this folder (created if missing)")
    .option("-i, --in-place", "Rename the original files inside the input folder")
    .option("-n, --dry-run", "Show what would happen without touching any file")
    .option("-r, --report <file>", "Save the run report (.json, .csv, .xlsx)")
    .option("-j, --json", "Print the run summary as JSON (for piping)")
    .option("-q, --quiet", "Only print the summary line")
    .option("-v, --verbose", "Echo log records to stderr")
    .action(async (input: string, options: RenameCommandOptions) => {
      process.exitCode = await renameCommand(input, options);
    });

  program
    .command("scan <input>")
    .description("List the PDFs in a folder and the title found in each")
    .option("-j, --json", "Output structured JSON")
    .action(async (input: string, options: { json?: boolean }) => {
      process.exitCode = await scanCommand(input, { json: options.json });
    });

  const configCmd = program
    .command("config")
    .description("View and modify configuration");

  configCmd
    .command("show")
    .description("Show current configuration")
    .action(async () => {
      process.exitCode = await configShow();
    });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value (log-level, log-to-file, max-filename-length)")
    .action(async (key: string, value: string) => {
      process.exitCode = await configSet(key, value);
    });

  // `config` with no subcommand → show
  configCmd.action(async () => {
    process.exitCode = await configShow();
  });

  return program;
}
