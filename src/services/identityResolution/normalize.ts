/**
 * Identity Normalization
 *
 * Canonicalizes a raw (name, email) pair into comparable tokens.
 * Total over any input: missing parts become empty tokens, never errors.
 */

import nicknameTable from '../../data/nicknames.json';
import type { NormalizedIdentity, RawIdentity } from './types';

const NICKNAMES: Readonly<Record<string, string>> = nicknameTable;

// ========== Patterns ==========

const COMBINING_MARKS = /\p{M}/gu;

// Hyphens and apostrophes survive as internal separators ("jean-luc", "o'neil")
const NAME_NOISE = /[^\p{L}\p{N}\s'-]/gu;
const EDGE_SEPARATORS = /^['-]+|['-]+$/g;

// GitHub noreply addresses: 1234567+username@users.noreply.github.com
const NOREPLY_ID_PREFIX = /^\d+\+/;
const NUMERIC_SUFFIX = /[._+-]?\d+$/;

const LOCAL_SEPARATORS = /[._+\-\d]/g;

// ========== Names ==========

function foldAccents(value: string): string {
  return value.normalize('NFKD').replace(COMBINING_MARKS, '');
}

/**
 * Split a name into lowercase tokens, initials included.
 */
export function tokenizeName(name: string | null | undefined): string[] {
  if (!name) return [];

  return foldAccents(name)
    .toLowerCase()
    .replace(NAME_NOISE, ' ')
    .split(/\s+/)
    .map((token) => token.replace(EDGE_SEPARATORS, ''))
    .filter((token) => token.length > 0);
}

/**
 * Drop single-letter tokens unless nothing else is left.
 */
function dropInitials(tokens: string[]): string[] {
  const full = tokens.filter((token) => token.length > 1);
  return full.length > 0 ? full : tokens;
}

export function canonicalizeFirstName(token: string): string {
  return NICKNAMES[token] ?? token;
}

// ========== Emails ==========

export interface EmailParts {
  local: string;
  domain: string;
}

export function splitEmail(email: string | null | undefined): EmailParts {
  if (!email) return { local: '', domain: '' };

  const trimmed = email.trim().replace(/^<|>$/g, '').toLowerCase();
  const at = trimmed.lastIndexOf('@');

  if (at === -1) {
    return { local: normalizeEmailLocal(trimmed), domain: '' };
  }

  return {
    local: normalizeEmailLocal(trimmed.slice(0, at)),
    domain: trimmed.slice(at + 1),
  };
}

/**
 * Strip hosting-platform numeric ids from a local part.
 * "12345+jdoe" -> "jdoe", "jdoe.42" -> "jdoe". An all-digit local part is kept.
 */
export function normalizeEmailLocal(local: string): string {
  let normalized = local.toLowerCase().replace(NOREPLY_ID_PREFIX, '');

  const withoutSuffix = normalized.replace(NUMERIC_SUFFIX, '');
  if (withoutSuffix.length > 0) {
    normalized = withoutSuffix;
  }

  return normalized;
}

/**
 * Local part with separators and digits removed ("jane.doe" -> "janedoe").
 */
export function compactEmailLocal(local: string): string {
  return local.replace(LOCAL_SEPARATORS, '');
}

// ========== Identity ==========

export function normalizeIdentity(identity: RawIdentity): NormalizedIdentity {
  const rawTokens = tokenizeName(identity.name);
  const nameTokens = dropInitials(rawTokens);
  const { local, domain } = splitEmail(identity.email);

  const first = rawTokens[0] ?? '';

  return {
    nameTokens,
    emailLocal: local,
    emailDomain: domain,
    initials: new Set(rawTokens.map((token) => token[0])),
    firstInitial: first.slice(0, 1),
    canonicalFirstName: first.length > 1 ? canonicalizeFirstName(first) : '',
  };
}
