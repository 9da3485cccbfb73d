// ─────────────────────────────────────────────
//  WarSaveManager: file persistence for WarState
//  One JSON file per slot: { storageVersion, savedAt, state }.
//  Writes go to a temp file and are renamed into place.
//  Older slots are migrated up on load; downgrade() runs the
//  down scripts for a host rolling back.
// ─────────────────────────────────────────────

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { WarState } from '../state/WarState';
import { CURRENT_STORAGE_VERSION } from '../state/WarState';
import { parseWarConfig, validateWarConfig } from '@/engine/loader/WarConfigLoader';
import { ConfigurationError, NotInitializedError, WarError } from '../WarErrors';

type RawState = Record<string, unknown>;

export interface WarSaveSlot {
  storageVersion: number;
  savedAt: string;
  state: WarState;
}

/** Moves a raw state from `version - 1` to `version` and back. */
export interface WarMigration {
  version: number;
  description: string;
  up(state: RawState): RawState;
  down(state: RawState): RawState;
}

export const WAR_MIGRATIONS: readonly WarMigration[] = [
  {
    version: 2,
    description: 'fee receipts for idempotent fee collection',
    up: state => ({ ...state, feeReceipts: isObject(state.feeReceipts) ? state.feeReceipts : {} }),
    down: state => {
      const { feeReceipts: _dropped, ...rest } = state;
      return rest;
    },
  },
  {
    version: 3,
    description: 'alliance invitations awaiting acceptance',
    up: state => ({ ...state, alliances: mapAlliances(state.alliances, a => ({ invitations: {}, ...a })) }),
    down: state => ({
      ...state,
      alliances: mapAlliances(state.alliances, a => {
        const { invitations: _dropped, ...rest } = a;
        return rest;
      }),
    }),
  },
];

const RECORD_FIELDS = [
  'paused', 'seasons', 'preRegistrations', 'preRegistrationQueue', 'preRegistrationCursor',
  'colonies', 'wallets', 'userSeasonColonies', 'territories', 'sieges', 'activeSiegeByTerritory',
  'snapshots', 'alliances', 'allianceOfColony', 'forgivenessProposals', 'treaties', 'taskForces',
  'tokenAssignments', 'allianceDailyAttacks', 'cooldowns', 'fees', 'feeReceipts',
] as const;

const COUNTER_FIELDS = [
  'storageVersion', 'currentSeasonId', 'nextSiegeId', 'nextAllianceId', 'nextProposalId',
  'nextTreatyId', 'nextTaskForceId',
] as const;

function isObject(value: unknown): value is RawState {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mapAlliances(alliances: unknown, fn: (alliance: RawState) => RawState): unknown {
  if (!isObject(alliances)) return alliances;
  return Object.fromEntries(
    Object.entries(alliances).map(([id, a]) => [id, isObject(a) ? fn(a) : a]),
  );
}

/** Top-level shape check for a state at CURRENT_STORAGE_VERSION. */
function isWarState(value: RawState): value is RawState & WarState {
  if (typeof value.admin !== 'string' || !isObject(value.config)) return false;
  if (!Array.isArray(value.stateHistory)) return false;
  for (const key of COUNTER_FIELDS) {
    const n = value[key];
    if (typeof n !== 'number' || !Number.isInteger(n) || n < 0) return false;
  }
  return RECORD_FIELDS.every(key => isObject(value[key]));
}

/** Strip history; it is never persisted. */
export function createSnapshot(state: WarState): WarState {
  return { ...state, stateHistory: [] };
}

/** Run up or down migrations until the raw state sits at `targetVersion`. */
export function migrateState(raw: RawState, targetVersion: number): RawState {
  const from = raw.storageVersion;
  if (typeof from !== 'number' || !Number.isInteger(from) || from < 1) {
    throw new ConfigurationError('save slot carries no storageVersion', { storageVersion: from });
  }
  if (targetVersion > CURRENT_STORAGE_VERSION || targetVersion < 1) {
    throw new ConfigurationError(`cannot migrate to storage version ${targetVersion}`);
  }
  if (from > CURRENT_STORAGE_VERSION) {
    throw new ConfigurationError(`save slot version ${from} is newer than ${CURRENT_STORAGE_VERSION}`);
  }

  let state = raw;
  let version = from;
  while (version < targetVersion) {
    const migration = WAR_MIGRATIONS.find(m => m.version === version + 1);
    if (!migration) throw new ConfigurationError(`no migration to storage version ${version + 1}`);
    state = { ...migration.up(state), storageVersion: migration.version };
    version = migration.version;
  }
  while (version > targetVersion) {
    const migration = WAR_MIGRATIONS.find(m => m.version === version);
    if (!migration) throw new ConfigurationError(`no migration from storage version ${version}`);
    state = { ...migration.down(state), storageVersion: version - 1 };
    version -= 1;
  }
  return state;
}

/** Migrate and validate a parsed slot payload into a WarState. */
export function restoreState(payload: unknown): WarState {
  if (!isObject(payload) || !isObject(payload.state)) {
    throw new ConfigurationError('save slot has no state');
  }
  const migrated = migrateState(payload.state, CURRENT_STORAGE_VERSION);
  const config = parseWarConfig(migrated.config);
  validateWarConfig(config);
  const candidate: RawState = { ...migrated, config, stateHistory: [] };
  if (!isWarState(candidate)) {
    throw new ConfigurationError('save slot state is malformed');
  }
  return candidate;
}

function slotPath(dir: string, slotId: string): string {
  if (!/^[A-Za-z0-9_-]+$/.test(slotId)) {
    throw new ConfigurationError(`invalid save slot id '${slotId}'`);
  }
  return join(dir, `${slotId}.json`);
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export async function save(dir: string, slotId: string, state: WarState): Promise<WarSaveSlot> {
  if (state.storageVersion === 0) throw new NotInitializedError('refusing to save an uninitialized war state');
  const filePath = slotPath(dir, slotId);
  const slot: WarSaveSlot = {
    storageVersion: state.storageVersion,
    savedAt: new Date().toISOString(),
    state: createSnapshot(state),
  };

  await mkdir(dir, { recursive: true });
  const tempPath = `${filePath}.tmp`;
  await writeFile(tempPath, JSON.stringify(slot, null, 2), 'utf8');
  await rename(tempPath, filePath);
  return slot;
}

/** Load and migrate a slot. Returns null if the slot does not exist. */
export async function load(dir: string, slotId: string): Promise<WarState | null> {
  let raw: string;
  try {
    raw = await readFile(slotPath(dir, slotId), 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new WarError('CORRUPT_SAVE', `save slot '${slotId}' is not valid JSON`, { cause: error });
  }
  return restoreState(payload);
}

/** Rewrite a slot at an older storage version. */
export async function downgrade(dir: string, slotId: string, targetVersion: number): Promise<void> {
  const filePath = slotPath(dir, slotId);
  const raw = await readFile(filePath, 'utf8');
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new WarError('CORRUPT_SAVE', `save slot '${slotId}' is not valid JSON`, { cause: error });
  }
  if (!isObject(payload) || !isObject(payload.state)) {
    throw new ConfigurationError('save slot has no state');
  }
  const state = migrateState(payload.state, targetVersion);
  const tempPath = `${filePath}.tmp`;
  await writeFile(tempPath, JSON.stringify({ ...payload, storageVersion: targetVersion, state }, null, 2), 'utf8');
  await rename(tempPath, filePath);
}

export async function hasSave(dir: string, slotId: string): Promise<boolean> {
  try {
    await readFile(slotPath(dir, slotId), 'utf8');
    return true;
  } catch (error) {
    if (isMissingFile(error)) return false;
    throw error;
  }
}

export async function deleteSave(dir: string, slotId: string): Promise<void> {
  await rm(slotPath(dir, slotId), { force: true });
}

/** Convenience namespace export */
export const WarSaveManager = {
  save,
  load,
  downgrade,
  hasSave,
  deleteSave,
  createSnapshot,
  restoreState,
  migrateState,
};
