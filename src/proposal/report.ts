import type { Proposal } from "../types/proposal.js";

const RULE = "=".repeat(70);
const SUBRULE = "-".repeat(40);

/** Plain-text review report for a proposal. */
export function formatProposalReport(proposal: Proposal): string {
  const lines: string[] = [];
  lines.push(RULE);
  lines.push("EXPERIMENT DISCOVERY PROPOSAL");
  lines.push(RULE);
  lines.push(`Proposal: ${proposal.id}`);
  lines.push(`Generated: ${proposal.generated_at}`);
  if (proposal.job_id) lines.push(`Job: ${proposal.job_id}${proposal.job_node ? ` on ${proposal.job_node}` : ""}`);
  if (proposal.scan_duration_seconds) lines.push(`Scan Duration: ${proposal.scan_duration_seconds.toFixed(1)}s`);
  lines.push("");

  const s = proposal.summary;
  lines.push("SUMMARY");
  lines.push(SUBRULE);
  lines.push(`  Total discovered:    ${s.total_discovered}`);
  lines.push(`  Currently in DB:     ${s.current_in_registry}`);
  lines.push(`  New experiments:     ${s.new_count}`);
  lines.push(`  Updated:             ${s.updated_count}`);
  lines.push(`  Removed:             ${s.removed_count}`);
  lines.push(`  Unchanged:           ${s.unchanged_count}`);
  if (s.unverified_count) lines.push(`  Unverified:          ${s.unverified_count}`);
  lines.push("");

  if (proposal.new.length > 0) {
    lines.push("NEW EXPERIMENTS");
    lines.push(SUBRULE);
    for (const exp of proposal.new) {
      lines.push(`  + ${exp.sample_id || "unknown"} [${exp.metadata_source}]`);
      lines.push(`    Path: ${exp.path}`);
      lines.push(`    Flow Cell: ${exp.flow_cell_id}`);
      lines.push(`    Files: POD5=${exp.pod5_files}, Fast5=${exp.fast5_files}, FASTQ=${exp.fastq_files}, BAM=${exp.bam_files}`);
      lines.push("");
    }
  }

  if (proposal.updated.length > 0) {
    lines.push("UPDATED EXPERIMENTS");
    lines.push(SUBRULE);
    for (const exp of proposal.updated) {
      lines.push(`  ~ ${exp.sample_id || "unknown"}`);
      lines.push(`    Path: ${exp.path}`);
      for (const change of exp.changes ?? []) {
        lines.push(`    ${change.field}: ${change.old_value} -> ${change.new_value}`);
      }
      lines.push("");
    }
  }

  if (proposal.removed.length > 0) {
    lines.push("REMOVED EXPERIMENTS");
    lines.push(SUBRULE);
    for (const exp of proposal.removed) {
      lines.push(`  - ${exp.sample_id || "unknown"}`);
      lines.push(`    Path: ${exp.path}`);
      lines.push(`    Reason: ${exp.removal_reason ?? ""}`);
      lines.push("");
    }
  }

  lines.push("STATUS");
  lines.push(SUBRULE);
  lines.push(`  Approval: ${proposal.approval_status}`);
  if (proposal.approved_at) lines.push(`  Approved: ${proposal.approved_at} by ${proposal.approved_by ?? "unknown"}`);
  if (proposal.rejected_at) {
    const reason = proposal.rejection_reason ? ` (${proposal.rejection_reason})` : "";
    lines.push(`  Rejected: ${proposal.rejected_at} by ${proposal.rejected_by ?? "unknown"}${reason}`);
  }
  if (proposal.applied_at) lines.push(`  Applied: ${proposal.applied_at}`);

  return lines.join("\n");
}
