import path from "node:path";
import { GitOperations, applyCommitMessage, type GitClient } from "../git/operations.js";
import { formatProposalReport } from "../proposal/report.js";
import type { ApplyOutcome, ProposalListing } from "../proposal/manager.js";
import type { Proposal } from "../types/proposal.js";
import type { CommandContext } from "./context.js";

export type ProposalSelector = { id?: string; latest?: boolean };

export type ProposalCommandFailure = { ok: false; code: "NOT_FOUND" | "STATE" | "INVALID_ARGS"; error: string };

/** An explicit id wins; otherwise the newest stored proposal. */
export function resolveProposalId(
  ctx: CommandContext,
  sel: ProposalSelector,
): { ok: true; id: string } | ProposalCommandFailure {
  if (sel.id && sel.latest) {
    return { ok: false, code: "INVALID_ARGS", error: "Pass either a proposal id or --latest, not both" };
  }
  if (sel.id) return { ok: true, id: sel.id };
  const latest = ctx.proposals.latestId();
  if (!latest) return { ok: false, code: "NOT_FOUND", error: `No proposals found in ${ctx.config.proposals_dir}` };
  return { ok: true, id: latest };
}

export function listProposalsCommand(ctx: CommandContext): ProposalListing[] {
  return ctx.proposals.list();
}

export function reviewCommand(
  ctx: CommandContext,
  sel: ProposalSelector,
): { ok: true; proposal: Proposal; report: string } | ProposalCommandFailure {
  const resolved = resolveProposalId(ctx, sel);
  if (!resolved.ok) return resolved;
  const proposal = ctx.proposals.load(resolved.id);
  if (!proposal) return { ok: false, code: "NOT_FOUND", error: `Proposal not found: ${resolved.id}` };
  return { ok: true, proposal, report: formatProposalReport(proposal) };
}

export type TransitionCommandResult = { ok: true; proposal: Proposal } | ProposalCommandFailure;

export async function approveCommand(
  ctx: CommandContext,
  sel: ProposalSelector & { actor: string },
): Promise<TransitionCommandResult> {
  const resolved = resolveProposalId(ctx, sel);
  if (!resolved.ok) return resolved;
  return ctx.proposals.approve(resolved.id, sel.actor);
}

export async function rejectCommand(
  ctx: CommandContext,
  sel: ProposalSelector & { actor: string; reason?: string },
): Promise<TransitionCommandResult> {
  const resolved = resolveProposalId(ctx, sel);
  if (!resolved.ok) return resolved;
  return ctx.proposals.reject(resolved.id, sel.actor, sel.reason);
}

export type ApplyCommandOptions = ProposalSelector & {
  actor: string;
  /** Commit the registry and audit documents after a successful apply. */
  commit?: boolean;
  git?: GitClient;
};

export type CommitOutcome = { sha: string | null; skipped?: string };

export type ApplyCommandResult =
  | { ok: true; proposal: Proposal; alreadyApplied: boolean; outcome: ApplyOutcome | null; commit: CommitOutcome | null }
  | ProposalCommandFailure;

export async function applyCommand(ctx: CommandContext, opts: ApplyCommandOptions): Promise<ApplyCommandResult> {
  const resolved = resolveProposalId(ctx, opts);
  if (!resolved.ok) return resolved;

  const res = await ctx.proposals.apply(resolved.id, { store: ctx.store, audit: ctx.audit, actor: opts.actor });
  if (!res.ok) return res;

  let commit: CommitOutcome | null = null;
  if (opts.commit && !res.alreadyApplied) {
    const repo = ctx.config.git_repo ?? path.dirname(ctx.config.registry_path);
    const git = new GitOperations(repo, opts.git);
    if (await git.isRepo()) {
      const sha = await git.commitFiles([ctx.config.registry_path, ctx.config.audit_path], applyCommitMessage(res.proposal));
      commit = { sha };
    } else {
      commit = { sha: null, skipped: `Not a git repository: ${repo}` };
    }
  }

  return { ok: true, proposal: res.proposal, alreadyApplied: res.alreadyApplied, outcome: res.outcome, commit };
}
