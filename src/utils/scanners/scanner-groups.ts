import { UsageError } from '../../core/errors';
import { splitList } from '../helpers/common-helpers';

/**
 * Named groups of ZAP active scan rule IDs
 */
export const SCANNER_GROUPS = {
  sqli: ['40018'],
  xss: ['40012', '40014', '40016', '40017'],
  xss_reflected: ['40012'],
  xss_persistent: ['40014', '40016', '40017'],
  path_traversal: ['6'],
  rfi: ['7'],
  crlf: ['40003'],
  code_injection: ['90019'],
  command_injection: ['90020'],
  xxe: ['90023'],
} as const satisfies Record<string, readonly string[]>;

export type ScannerGroup = keyof typeof SCANNER_GROUPS;

export const ALL_SCANNERS = 'all';

/**
 * Union of every grouped scanner ID, in table order
 */
export const ALL_SCANNER_IDS: readonly string[] = Array.from(
  new Set(Object.values(SCANNER_GROUPS).flatMap((ids): readonly string[] => ids))
);

const LITERAL_ID = /^\d+$/;

export function isScannerGroup(token: string): token is ScannerGroup {
  return Object.prototype.hasOwnProperty.call(SCANNER_GROUPS, token);
}

/**
 * Names accepted in place of scanner IDs
 */
export function scannerGroupNames(): string[] {
  return [ALL_SCANNERS, ...Object.keys(SCANNER_GROUPS)];
}

/**
 * Expand one token to scanner IDs; literal IDs pass through, unknown names expand to nothing
 */
export function expandScannerToken(token: string): readonly string[] {
  const normalized = token.trim().toLowerCase();
  if (normalized === ALL_SCANNERS) return ALL_SCANNER_IDS;
  if (isScannerGroup(normalized)) return SCANNER_GROUPS[normalized];
  if (LITERAL_ID.test(normalized)) return [normalized];
  return [];
}

/**
 * Resolve a comma-separated scanner selection to a non-empty set of IDs.
 *
 * @throws UsageError when any token resolves to nothing
 */
export function resolveScannerSelection(selection: string): ReadonlySet<string> {
  const tokens = splitList(selection);
  if (tokens.length === 0) {
    throw new UsageError('No scanners given');
  }

  const ids = new Set<string>();
  for (const token of tokens) {
    const expanded = expandScannerToken(token);
    if (expanded.length === 0) {
      throw new UsageError(
        `Invalid scanner "${token}". Use scanner IDs or one of these groups: ${scannerGroupNames().join(', ')}`
      );
    }
    expanded.forEach((id) => ids.add(id));
  }
  return ids;
}
