import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { CommitStepError, errorMessage, type PublishStep } from "./errors.js";
import type { CommandExecutor, CommandResult } from "./executor.js";
import type { ContextLogger } from "./logger.js";
import type { CommitRequest } from "./types.js";

export type PublishDeps = {
  executor: CommandExecutor;
  logger: ContextLogger;
  sshHost: string;
  /** Parent of the temporary workspace; defaults to the OS temp dir. */
  tmpRoot?: string;
  /** Defaults to a recursive `rm`. */
  removeWorkspace?: (path: string) => Promise<void>;
};

const removeDirectory = (path: string) => rm(path, { recursive: true, force: true });

export function sshRemote(host: string, owner: string, name: string) {
  return `git@${host}:${owner}/${name}.git`;
}

/**
 * Clones the repository into a private temporary workspace, commits the new
 * file content on `request.branch` and pushes it. The workspace is removed
 * on return whichever step failed; remote effects of completed steps stay.
 */
export async function publishCommit(request: CommitRequest, deps: PublishDeps) {
  const log = deps.logger;
  const repo = request.repository;

  let workspace: string;
  try {
    workspace = await mkdtemp(join(deps.tmpRoot ?? tmpdir(), "renovate-config-updater-"));
  } catch (error) {
    throw new CommitStepError("workspace", errorMessage(error), "", { cause: error });
  }
  log.debug("publish.workspace", { path: workspace });

  const git = async (step: PublishStep, args: string[], cwd?: string) => {
    log.debug("publish.git", { step, command: `git ${args.join(" ")}` });
    let result: CommandResult;
    try {
      result = await deps.executor("git", args, { cwd });
    } catch (error) {
      throw new CommitStepError(step, errorMessage(error), "", { cause: error });
    }
    if (result.exitCode !== 0) {
      throw new CommitStepError(step, `exit code ${result.exitCode}`, result.output);
    }
    log.info("publish.step.done", { step });
  };

  try {
    const remote = sshRemote(deps.sshHost, repo.owner, repo.name);
    log.info("publish.clone", { remote });
    await git("clone", ["clone", remote, workspace]);

    await git("branch", ["checkout", "-b", request.branch], workspace);

    const target = join(workspace, request.path);
    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, request.content);
    } catch (error) {
      throw new CommitStepError("write", errorMessage(error), "", { cause: error });
    }
    log.info("publish.step.done", { step: "write", path: request.path });

    await git("stage", ["add", request.path], workspace);

    if (request.signingKey) {
      await git("sign-config", ["config", "user.signingkey", request.signingKey], workspace);
    }

    const commitArgs = ["commit", "-m", request.message];
    if (request.signingKey) {
      commitArgs.push("-S");
    }
    await git("commit", commitArgs, workspace);

    await git("push", ["push", "origin", request.branch], workspace);
  } finally {
    try {
      await (deps.removeWorkspace ?? removeDirectory)(workspace);
    } catch (error) {
      log.warn("publish.cleanup_failed", { path: workspace, error: errorMessage(error) });
    }
  }
}
