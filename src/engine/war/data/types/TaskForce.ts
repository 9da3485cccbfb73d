// ─────────────────────────────────────────────
//  Task Force Types
//  A token belongs to at most one task force per season.
// ─────────────────────────────────────────────

export type TaskForceKind = 'colony' | 'alliance';

export interface TaskForceParticipant {
  colonyId: string;
  owner: string;
  tokenIds: string[];
  stake: number;
}

export interface TaskForce {
  id: string;
  seasonId: number;
  name: string;
  kind: TaskForceKind;
  allianceId: string | null;
  participants: TaskForceParticipant[];
  createdAt: number;
  disbanded: boolean;
  committedSiegeId: number | null;
}

export function tokenAssignmentKey(seasonId: number, tokenId: string): string {
  return `${seasonId}:${tokenId}`;
}
