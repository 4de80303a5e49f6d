import { simpleGit, type SimpleGit } from "simple-git";
import path from "node:path";
import type { Proposal } from "../types/proposal.js";

/**
 * Thin wrapper over simple-git so commits can be faked in tests.
 * Commits stay local; publishing the registry is left to the operator.
 */
/** The slice of simple-git the registry uses. */
export type GitClient = Pick<SimpleGit, "checkIsRepo" | "add" | "status" | "commit">;

export class GitOperations {
  private git: GitClient;

  constructor(private readonly repoPath: string, git?: GitClient) {
    this.git = git ?? simpleGit(repoPath);
  }

  /** Whether `repoPath` is inside a git work tree. */
  async isRepo(): Promise<boolean> {
    return this.git.checkIsRepo();
  }

  /** Stage `files` and commit them. Returns the new commit SHA, or null if nothing changed. */
  async commitFiles(files: string[], message: string): Promise<string | null> {
    const relative = files.map((f) => path.relative(this.repoPath, path.resolve(f)));
    await this.git.add(relative);

    const status = await this.git.status();
    if (status.staged.length === 0) return null;

    const result = await this.git.commit(message, relative);
    return result.commit || null;
  }
}

/** Commit message recording what an applied proposal changed. */
export function applyCommitMessage(proposal: Proposal): string {
  const s = proposal.summary;
  const lines = [
    "Update experiment registry from discovery proposal",
    "",
    `- Added: ${s.new_count} new experiments`,
    `- Updated: ${s.updated_count} experiments`,
    `- Removed: ${s.removed_count} experiments`,
    "",
    `Proposal: ${proposal.id}`,
    `Discovery: ${proposal.generated_at}`,
  ];
  if (proposal.job_id) lines.push(`Job: ${proposal.job_id}`);
  return lines.join("\n");
}
