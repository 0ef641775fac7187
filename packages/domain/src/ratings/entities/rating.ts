/**
 * Rating entity
 *
 * A user's 1..5 score for a service. One rating per (user, service); a
 * second rating for the same pair overwrites the score.
 *
 * @module domain/ratings/entities/rating
 */

import { v4 as uuidv4 } from 'uuid';

import { CreateRatingSchema, parseOrThrow, ScoreSchema } from '../schemas.js';

export interface RatingProps {
  id: string;
  userId: string;
  serviceId: string;
  score: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateRatingInput {
  userId: string;
  serviceId: string;
  score: number;
}

export class Rating {
  private constructor(private props: RatingProps) {}

  /**
   * Validate input and stamp a fresh id and timestamps
   *
   * @throws ValidationError
   */
  static create(input: CreateRatingInput, now: Date = new Date()): Rating {
    const data = parseOrThrow(CreateRatingSchema, input);
    return new Rating({
      id: uuidv4(),
      userId: data.userId,
      serviceId: data.serviceId,
      score: data.score,
      createdAt: now,
      updatedAt: now,
    });
  }

  /**
   * Rebuild from storage without validation or re-stamping
   */
  static reconstitute(props: RatingProps): Rating {
    return new Rating({ ...props });
  }

  get id(): string {
    return this.props.id;
  }

  get userId(): string {
    return this.props.userId;
  }

  get serviceId(): string {
    return this.props.serviceId;
  }

  get score(): number {
    return this.props.score;
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }

  get updatedAt(): Date {
    return this.props.updatedAt;
  }

  /**
   * @throws ValidationError when the score is outside [1, 5]
   */
  updateScore(score: number, now: Date = new Date()): void {
    this.props.score = parseOrThrow(ScoreSchema, score);
    this.props.updatedAt = now;
  }

  isOwnedBy(userId: string, serviceId: string): boolean {
    return this.props.userId === userId && this.props.serviceId === serviceId;
  }

  toJSON(): RatingProps {
    return { ...this.props };
  }
}

/**
 * Derived aggregate over a service's ratings
 */
export interface AverageRating {
  serviceId: string;
  /** 0 when there are no ratings, never null or NaN */
  averageScore: number;
  totalRatings: number;
}

/**
 * Normalise a raw aggregate row; a null or non-finite average becomes 0
 */
export function toAverageRating(
  serviceId: string,
  averageScore: number | null,
  totalRatings: number
): AverageRating {
  const count = Number.isFinite(totalRatings) ? totalRatings : 0;
  const average =
    count > 0 && averageScore !== null && Number.isFinite(averageScore) ? averageScore : 0;
  return { serviceId, averageScore: average, totalRatings: count };
}
