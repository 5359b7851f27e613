/**
 * Storage Error Utilities
 *
 * Error codes, user-facing messages, the StorageError class and the
 * ReviewItem record used for issues that are collected rather than thrown.
 */

// ============================================
// ERROR CODES
// ============================================

export const STORAGE_ERROR_CODES = {
  // Catalog
  AMBIGUOUS_IDENTITY: 'STORAGE_AMBIGUOUS_IDENTITY',
  MALFORMED_RECORD: 'STORAGE_MALFORMED_RECORD',
  MERGED_DUPLICATE: 'STORAGE_MERGED_DUPLICATE',
  POSSIBLE_DUPLICATE: 'STORAGE_POSSIBLE_DUPLICATE',

  // Allocation
  CAPACITY_EXCEEDED: 'STORAGE_CAPACITY_EXCEEDED',
  INVALID_TOPOLOGY: 'STORAGE_INVALID_TOPOLOGY',
  SLOT_CONFLICT: 'STORAGE_SLOT_CONFLICT',

  // Picking
  UNMATCHED_COMPONENT: 'STORAGE_UNMATCHED_COMPONENT',
  UNRESOLVED_LOCATION: 'STORAGE_UNRESOLVED_LOCATION',

  // Persistence
  LOCATION_MAP_LOCKED: 'STORAGE_LOCATION_MAP_LOCKED',
  VERSION_CONFLICT: 'STORAGE_VERSION_CONFLICT',

  // Remote
  REMOTE_UNAVAILABLE: 'STORAGE_REMOTE_UNAVAILABLE',
} as const;

export type StorageErrorCode = (typeof STORAGE_ERROR_CODES)[keyof typeof STORAGE_ERROR_CODES];

// ============================================
// USER-FACING MESSAGES
// ============================================

export const STORAGE_ERROR_MESSAGES: Record<StorageErrorCode, string> = {
  [STORAGE_ERROR_CODES.AMBIGUOUS_IDENTITY]: 'Two records claim the same component with different categories or types',
  [STORAGE_ERROR_CODES.MALFORMED_RECORD]: 'A source record is missing a required field',
  [STORAGE_ERROR_CODES.MERGED_DUPLICATE]: 'Duplicate inventory records were combined',
  [STORAGE_ERROR_CODES.POSSIBLE_DUPLICATE]: 'A reference entry may be stocked under another name',

  [STORAGE_ERROR_CODES.CAPACITY_EXCEEDED]: 'Not enough free drawers left for this category',
  [STORAGE_ERROR_CODES.INVALID_TOPOLOGY]: 'The storage topology configuration is invalid',
  [STORAGE_ERROR_CODES.SLOT_CONFLICT]: 'Two components are mapped to the same compartment',

  [STORAGE_ERROR_CODES.UNMATCHED_COMPONENT]: 'Component could not be matched - needs ordering',
  [STORAGE_ERROR_CODES.UNRESOLVED_LOCATION]: 'Component has no storage location - location not set',

  [STORAGE_ERROR_CODES.LOCATION_MAP_LOCKED]: 'The location map is being updated by another run',
  [STORAGE_ERROR_CODES.VERSION_CONFLICT]: 'The location map changed while this run was in progress',

  [STORAGE_ERROR_CODES.REMOTE_UNAVAILABLE]: 'The inventory system could not be reached',
};

// ============================================
// HELPER FUNCTIONS
// ============================================

export function getStorageErrorMessage(code: string, fallback?: string): string {
  return isStorageErrorCode(code) ? STORAGE_ERROR_MESSAGES[code] : fallback || 'An error occurred';
}

const ALL_CODES: readonly string[] = Object.values(STORAGE_ERROR_CODES);

export function isStorageErrorCode(code: unknown): code is StorageErrorCode {
  return typeof code === 'string' && ALL_CODES.includes(code);
}

// ============================================
// STORAGE ERROR CLASS
// ============================================

/**
 * Structured error for the storage domain.
 * Carries a technical message (for logs) and a user-facing message (for the CLI).
 */
export class StorageError extends Error {
  readonly code: StorageErrorCode;
  readonly userMessage: string;
  readonly context?: Record<string, unknown>;

  constructor(
    code: StorageErrorCode,
    options?: {
      technicalMessage?: string;
      context?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    const userMessage = getStorageErrorMessage(code);
    super(options?.technicalMessage || userMessage, { cause: options?.cause });
    this.name = 'StorageError';
    this.code = code;
    this.userMessage = userMessage;
    this.context = options?.context;
    Object.setPrototypeOf(this, StorageError.prototype);
  }

  toReviewItem(): ReviewItem {
    return {
      code: this.code,
      message: this.message,
      context: this.context ?? {},
    };
  }
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

/**
 * CapacityExceeded(category, needed, available)
 *
 * @param stranded - empty compartments in drawers the category already consumed
 */
export function capacityExceeded(category: string, needed: number, available: number, stranded = 0): StorageError {
  const strandedNote = stranded > 0 ? ` (${stranded} compartment(s) left empty in consumed drawers)` : '';
  return new StorageError(STORAGE_ERROR_CODES.CAPACITY_EXCEEDED, {
    technicalMessage: `Category ${category} needs ${needed} free drawer(s) but only ${available} remain${strandedNote}`,
    context: { category, needed, available, stranded },
  });
}

// ============================================
// REVIEW ITEMS
// ============================================

/**
 * An issue collected during a run. The run continues but is flagged
 * "needs review" whenever the list is non-empty (informational codes excepted).
 */
export interface ReviewItem {
  code: StorageErrorCode;
  message: string;
  context: Record<string, unknown>;
}

export function reviewItem(
  code: StorageErrorCode,
  message: string,
  context: Record<string, unknown> = {}
): ReviewItem {
  return { code, message, context };
}

/** Informational codes that do not by themselves require review */
const INFORMATIONAL_CODES: ReadonlySet<StorageErrorCode> = new Set([
  STORAGE_ERROR_CODES.MERGED_DUPLICATE,
  STORAGE_ERROR_CODES.POSSIBLE_DUPLICATE,
]);

export function needsReview(items: readonly ReviewItem[]): boolean {
  return items.some((item) => !INFORMATIONAL_CODES.has(item.code));
}
