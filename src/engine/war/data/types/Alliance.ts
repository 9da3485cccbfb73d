// ─────────────────────────────────────────────
//  Alliance Types: membership, betrayal marks,
//  forgiveness proposals and treaties
// ─────────────────────────────────────────────

export interface AllianceState {
  id: string;
  name: string;
  leaderColony: string;
  members: string[];                    // Colony ids
  memberWallets: string[];              // One entry per member, same order
  ownerIndex: Record<string, string>;   // wallet → colonyId (uniqueness set)
  invitations: Record<string, number>;  // colonyId → invited at; membership starts on acceptance
  treasury: number;
  stability: number;                    // 0-100
  active: boolean;                      // false while forming, and once dissolved
  betrayalCount: number;
  lastBetrayalAt: number;
  betrayers: Record<string, number>;    // colonyId → marked at
  createdAt: number;
}

export interface ForgivenessProposal {
  id: number;
  allianceId: string;
  betrayerColony: string;
  proposer: string;
  createdAt: number;
  expiresAt: number;
  votesFor: number;
  votesAgainst: number;
  voters: Record<string, boolean>;      // colonyId → support
  executed: boolean;
}

export type TreatyKind = 'non_aggression' | 'trade' | 'military';

export type TreatyStatus = 'proposed' | 'active' | 'expired' | 'broken';

export interface DiplomaticTreaty {
  id: number;
  fromAlliance: string;
  toAlliance: string;
  kind: TreatyKind;
  proposedAt: number;
  proposalExpiresAt: number;
  duration: number;
  acceptedAt: number | null;
  expiresAt: number | null;
  broken: boolean;
  brokenAt: number | null;
  brokenBy: string | null;              // Alliance id
}

export const MAX_STABILITY = 100;
