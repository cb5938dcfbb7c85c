import type { ConfigFile } from "./src/config.js";

export const defaultConfig: ConfigFile = {
  github: {
    org: "MyOrg", // Organization scanned when --org is not given
    perPage: 100, // Repositories per page when listing the organization (max 100)
    sshHost: "github.com", // Host used in git@<host>:owner/name.git clone URLs
    lowWaterMark: 100, // Warn when fewer API requests than this remain
  },
  update: {
    dryRun: false, // Report matches without committing or opening pull requests
  },
  logging: {
    level: "info", // Log level: "debug", "info", "warn", "error"
    format: "pretty", // Log format: "pretty" (human-readable) or "json"
    color: true, // Enable colored output in terminal logs (never in the log file)
    dir: "logs", // Directory for renovate-updater_<timestamp>.log files
  },
};
