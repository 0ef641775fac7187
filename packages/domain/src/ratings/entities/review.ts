/**
 * Review entity
 *
 * Written against a rating the same user gave the same service; exactly one
 * review per rating.
 *
 * @module domain/ratings/entities/review
 */

import { v4 as uuidv4 } from 'uuid';

import { CreateReviewSchema, parseOrThrow, ReviewContentSchema } from '../schemas.js';

export interface ReviewProps {
  id: string;
  userId: string;
  serviceId: string;
  ratingId: string;
  title: string;
  content: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateReviewInput {
  userId: string;
  serviceId: string;
  ratingId: string;
  title: string;
  content: string;
}

export class Review {
  private constructor(private props: ReviewProps) {}

  /**
   * @throws ValidationError
   */
  static create(input: CreateReviewInput, now: Date = new Date()): Review {
    const data = parseOrThrow(CreateReviewSchema, input);
    return new Review({
      id: uuidv4(),
      userId: data.userId,
      serviceId: data.serviceId,
      ratingId: data.ratingId,
      title: data.title,
      content: data.content,
      createdAt: now,
      updatedAt: now,
    });
  }

  static reconstitute(props: ReviewProps): Review {
    return new Review({ ...props });
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

  get ratingId(): string {
    return this.props.ratingId;
  }

  get title(): string {
    return this.props.title;
  }

  get content(): string {
    return this.props.content;
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }

  get updatedAt(): Date {
    return this.props.updatedAt;
  }

  /**
   * Replace title and content together
   *
   * @throws ValidationError; nothing changes when either field is invalid
   */
  updateContent(title: string, content: string, now: Date = new Date()): void {
    const data = parseOrThrow(ReviewContentSchema, { title, content });
    this.props.title = data.title;
    this.props.content = data.content;
    this.props.updatedAt = now;
  }

  toJSON(): ReviewProps {
    return { ...this.props };
  }
}

export interface ReviewWithRatingProps extends ReviewProps {
  score: number;
}

/**
 * Read-only join of a review and its rating's score
 */
export class ReviewWithRating {
  private constructor(
    readonly review: Review,
    readonly score: number
  ) {}

  static of(review: Review, score: number): ReviewWithRating {
    return new ReviewWithRating(review, score);
  }

  static reconstitute(props: ReviewWithRatingProps): ReviewWithRating {
    const { score, ...reviewProps } = props;
    return new ReviewWithRating(Review.reconstitute(reviewProps), score);
  }

  get id(): string {
    return this.review.id;
  }

  get userId(): string {
    return this.review.userId;
  }

  get serviceId(): string {
    return this.review.serviceId;
  }

  get ratingId(): string {
    return this.review.ratingId;
  }

  get title(): string {
    return this.review.title;
  }

  get content(): string {
    return this.review.content;
  }

  get createdAt(): Date {
    return this.review.createdAt;
  }

  get updatedAt(): Date {
    return this.review.updatedAt;
  }

  toJSON(): ReviewWithRatingProps {
    return { ...this.review.toJSON(), score: this.score };
  }
}
