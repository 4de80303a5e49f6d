import fs from "node:fs";

const PROPOSAL_ID = /^proposal_\d{8}_\d{6}(?:_\d{2,})?$/;

/**
 * Proposal ID for a generation time.
 * Format: proposal_{YYYYMMDD}_{HHMMSS} (UTC)
 */
export function proposalIdFor(generatedAt: Date): string {
  const iso = generatedAt.toISOString();
  const date = iso.slice(0, 10).replace(/-/g, "");
  const time = iso.slice(11, 19).replace(/:/g, "");
  return `proposal_${date}_${time}`;
}

/**
 * `baseId`, or `baseId_NN` with the next free sequence number when a proposal
 * with that ID already exists in `proposalsDir`.
 */
export function uniqueProposalId(baseId: string, proposalsDir: string): string {
  if (!fs.existsSync(proposalsDir)) return baseId;

  const taken = new Set(
    fs
      .readdirSync(proposalsDir, { withFileTypes: true })
      .filter((e) => e.isFile() && e.name.endsWith(".yaml"))
      .map((e) => e.name.replace(/\.yaml$/, "")),
  );
  if (!taken.has(baseId)) return baseId;

  let seq = 2;
  while (taken.has(`${baseId}_${String(seq).padStart(2, "0")}`)) seq++;
  return `${baseId}_${String(seq).padStart(2, "0")}`;
}

export function isProposalId(id: string): boolean {
  return PROPOSAL_ID.test(id);
}
