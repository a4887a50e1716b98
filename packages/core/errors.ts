/**
 * Error classes for BK-tree operations
 * @module
 */

/**
 * Thrown when a search radius is not a non-negative integer
 */
export class InvalidRadiusError extends Error {
  constructor(readonly radius: number) {
    super(`radius must be a non-negative integer, got ${radius}`)
    this.name = "InvalidRadiusError"
  }
}
