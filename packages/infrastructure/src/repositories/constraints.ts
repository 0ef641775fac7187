/**
 * Named uniqueness constraints shared by every ratings adapter
 *
 * The migrations give PostgreSQL constraints and MySQL keys the same names,
 * so a violation maps to one ConflictError whichever backend raised it.
 */

import { ConflictError } from '@rateboard/core';

export const UNIQUE_CONSTRAINTS = {
  unique_user_service: {
    recordType: 'Rating',
    message: 'Rating already exists for this user and service',
  },
  unique_rating: {
    recordType: 'Review',
    message: 'Review already exists for this rating',
  },
  unique_username: {
    recordType: 'User',
    message: 'Username is already taken',
  },
  unique_email: {
    recordType: 'User',
    message: 'Email is already registered',
  },
} as const;

export type UniqueConstraint = keyof typeof UNIQUE_CONSTRAINTS;

function isKnownConstraint(name: string): name is UniqueConstraint {
  return Object.prototype.hasOwnProperty.call(UNIQUE_CONSTRAINTS, name);
}

/**
 * Build the ConflictError for a violated constraint; unknown names keep a
 * generic record type
 */
export function conflictFor(constraint: string): ConflictError {
  if (isKnownConstraint(constraint)) {
    const { recordType, message } = UNIQUE_CONSTRAINTS[constraint];
    return new ConflictError(recordType, constraint, message);
  }
  return new ConflictError('Record', constraint);
}
