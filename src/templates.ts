import dedent from "dedent";

export const CONFIG_FILE = "renovate.json";

/** Probed in order; the first one found wins. */
export const CONFIG_PATHS: readonly string[] = [CONFIG_FILE, `.github/${CONFIG_FILE}`];

export const PRESET_MARKER = "github>MyOrg/";
export const PRESET_REPLACEMENT = "github>MyOtherOrg/";

export const UPDATE_BRANCH = "update-renovate-config";
export const COMMIT_MESSAGE = "Update renovate.json to use MyOtherOrg";
export const PULL_REQUEST_TITLE = COMMIT_MESSAGE;

export function pullRequestBody(path: string) {
  return dedent`
    This PR updates the renovate.json configuration to use the MyOtherOrg organization instead of MyOrg.

    Changes \`github>MyOrg\` to \`github>MyOtherOrg\` in \`${path}\`.
  `;
}
