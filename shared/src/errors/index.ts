/**
 * Shared Error Utilities
 *
 * Export barrel for the storage error taxonomy.
 */

export {
  // Error codes
  STORAGE_ERROR_CODES,
  type StorageErrorCode,
  // Messages
  STORAGE_ERROR_MESSAGES,
  getStorageErrorMessage,
  isStorageErrorCode,
  // Error class
  StorageError,
  isStorageError,
  capacityExceeded,
  // Collected issues
  type ReviewItem,
  reviewItem,
  needsReview,
} from './storage.js';
