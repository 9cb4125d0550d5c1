import { BaseError } from "@stowage/errors"

export class InvalidCapacityError extends BaseError<"invalid_capacity"> {
  constructor(capacity: number) {
    super(`Cache capacity must be a positive integer, got ${capacity}`, {
      code: "invalid_capacity",
      context: { capacity },
    })
  }
}

export class KeyNotFoundError extends BaseError<"key_not_found"> {
  constructor(key: unknown) {
    super("Key not found in cache", {
      code: "key_not_found",
      context: { key },
    })
  }
}

/**
 * A policy was asked for a replacement candidate while tracking nothing.
 * A cache only asks when it is full, so this signals a bug.
 */
export class EmptyPolicyError extends BaseError<"empty_policy"> {
  constructor(policy: string) {
    super(`No keys available for eviction (${policy})`, {
      code: "empty_policy",
      context: { policy },
      isOperational: false,
    })
  }
}

/**
 * The cache's store and policy disagree, or were handed over already in use.
 */
export class CacheInvariantError extends BaseError<"cache_invariant"> {
  constructor(message: string, context: Readonly<Record<string, unknown>> = {}) {
    super(message, {
      code: "cache_invariant",
      context,
      isOperational: false,
    })
  }
}
