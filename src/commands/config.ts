import { loadConfig, saveConfig, applyConfigValue, configPath } from "../core/config.js";
import { errorMessage } from "../core/errors.js";

const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export async function configShow(): Promise<number> {
  const cfg = loadConfig();

  console.log(`${BOLD}pdf-title-renamer configuration${RESET}`);
  console.log(`${DIM}${configPath()}${RESET}\n`);

  console.log(`  log-level:           ${cfg.logLevel}`);
  console.log(`  log-to-file:         ${cfg.logToFile}`);
  console.log(`  max-filename-length: ${cfg.maxFilenameLength}`);
  return 0;
}

export async function configSet(key: string, value: string): Promise<number> {
  try {
    const cfg = applyConfigValue(loadConfig(), key, value);
    saveConfig(cfg);
  } catch (err) {
    console.error(errorMessage(err));
    return 1;
  }
  console.log(`${key} set to: ${value}`);
  return 0;
}
