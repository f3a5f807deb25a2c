/**
 * @module log-archive
 * Packs a trade action log into a ZIP-based Uint8Array and back.
 * In-memory only: writing the bytes anywhere is the caller's business.
 *
 * Layout:
 * - manifest.json: {@link AuditTrailManifest}
 * - actions.json:  {@link AuditTrailActions}
 *
 * Dependencies:
 * - fflate: ZIP compression/decompression (sync API)
 */

import { strFromU8, strToU8, unzipSync, zipSync } from 'fflate';
import type {
  AuditTrailActions,
  AuditTrailManifest,
  Ledger,
  TradeAction,
} from '@trade-ledger/types';
import { ActionLog } from './action-log';
import type { ActionLogOptions } from './action-log';
import { ArchiveFormatError } from './errors';
import { parseTradeAction, tradeDispatcher } from './trade-actions';

/** Current archive format version. */
export const ARCHIVE_VERSION = 1;

const FORMAT = 'trade-ledger/audit-trail';

/**
 * Serializes both sequences of a trade log.
 *
 * @param log - The log to export. It is not modified.
 * @param now - Clock used for `exportedAt`.
 */
export function exportLog(
  log: ActionLog<TradeAction, Ledger>,
  now: () => Date = () => new Date(),
): Uint8Array {
  const actions: AuditTrailActions = { done: [...log.done], undone: [...log.undone] };
  const manifest: AuditTrailManifest = {
    version: ARCHIVE_VERSION,
    format: FORMAT,
    done: actions.done.length,
    undone: actions.undone.length,
    exportedAt: now().toISOString(),
  };

  return zipSync({
    'manifest.json': strToU8(JSON.stringify(manifest, null, 2)),
    'actions.json': strToU8(JSON.stringify(actions)),
  });
}

/**
 * Rebuilds a trade log from {@link exportLog} output. The receiver is not
 * touched; call `replay` on the result to rebuild state.
 *
 * @throws ArchiveFormatError if the ZIP, manifest or any action is invalid.
 */
export function importLog(
  data: Uint8Array,
  options: ActionLogOptions = {},
): ActionLog<TradeAction, Ledger> {
  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(data);
  } catch (error) {
    throw new ArchiveFormatError(`Not a ZIP archive: ${error instanceof Error ? error.message : String(error)}`);
  }

  const manifest = readJson(entries, 'manifest.json');
  const body = readJson(entries, 'actions.json');

  if (manifest.format !== FORMAT) {
    throw new ArchiveFormatError(`Unexpected archive format: ${String(manifest.format)}`);
  }
  if (manifest.version !== ARCHIVE_VERSION) {
    throw new ArchiveFormatError(`Unsupported archive version: ${String(manifest.version)}`);
  }

  const done = readActions(body, 'done');
  const undone = readActions(body, 'undone');

  if (manifest.done !== done.length || manifest.undone !== undone.length) {
    throw new ArchiveFormatError(
      `Manifest counts (${String(manifest.done)}/${String(manifest.undone)}) do not match actions (${done.length}/${undone.length})`,
    );
  }

  return ActionLog.from(tradeDispatcher, done, undone, options);
}

// ── helpers ──────────────────────────────────────────────────────────

function readJson(entries: Record<string, Uint8Array>, path: string): Record<string, unknown> {
  const bytes = entries[path];
  if (!bytes) {
    throw new ArchiveFormatError(`Invalid archive: missing ${path}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(strFromU8(bytes));
  } catch {
    throw new ArchiveFormatError(`Invalid archive: ${path} is not valid JSON`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ArchiveFormatError(`Invalid archive: ${path} must hold an object`);
  }
  return { ...parsed };
}

function readActions(body: Record<string, unknown>, key: 'done' | 'undone'): TradeAction[] {
  const list = body[key];
  if (!Array.isArray(list)) {
    throw new ArchiveFormatError(`Invalid archive: "${key}" must be an array`);
  }
  return list.map((item: unknown) => parseTradeAction(item));
}
