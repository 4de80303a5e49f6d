import type { ApprovalStatus } from "../types/proposal.js";

/**
 * Events that drive proposal transitions.
 */
export type ProposalEvent = "approve" | "reject" | "apply";

/**
 * Legal transitions. `rejected` and `applied` are terminal.
 */
const TRANSITIONS: Record<ApprovalStatus, Partial<Record<ProposalEvent, ApprovalStatus>>> = {
  pending: { approve: "approved", reject: "rejected" },
  approved: { apply: "applied" },
  rejected: {},
  applied: {},
};

/**
 * Pure function: given current status + event, return the next status, or null
 * when the event is not allowed from `current`.
 */
export function nextStatus(current: ApprovalStatus, event: ProposalEvent): ApprovalStatus | null {
  return TRANSITIONS[current][event] ?? null;
}

/** Events accepted from `current`, in a stable order. */
export function allowedEvents(current: ApprovalStatus): ProposalEvent[] {
  return (["approve", "reject", "apply"] as const).filter((e) => nextStatus(current, e) !== null);
}
