// DOMException helpers

export function indexSizeError(message: string): DOMException {
  return new DOMException(message, 'IndexSizeError');
}

/**
 * Error thrown when an index falls outside `[0, max]`.
 * Message format follows the one browsers use for DOM collections.
 */
export function indexOutOfRange(method: string, index: number, max: number): DOMException {
  return indexSizeError(
    `Failed to execute '${method}' on 'StringList': The index provided (${index}) is outside the range [0, ${max}].`
  );
}
