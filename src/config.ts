import dotenv from "dotenv";

dotenv.config();

function colorEnabled(): boolean {
  if ((process.env.NO_COLOR ?? "") !== "") return false;
  const force = process.env.FORCE_COLOR;
  if (force !== undefined && force !== "0" && force !== "false") return true;
  return process.stdout.isTTY === true;
}

// Settings come from SETTINGS_FILE when set, otherwise straight from the environment.
export const config = {
  log: {
    level: process.env.LOG_LEVEL ?? "info",
  },
  settings: {
    file: process.env.SETTINGS_FILE ?? "",
  },
  output: {
    /** ANSI styling on stdout; NO_COLOR wins over FORCE_COLOR */
    color: colorEnabled(),
  },
};

export type AppConfig = typeof config;
