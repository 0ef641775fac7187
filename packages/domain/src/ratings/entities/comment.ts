/**
 * Comment entity
 *
 * @module domain/ratings/entities/comment
 */

import { v4 as uuidv4 } from 'uuid';

import { ContentSchema, CreateCommentSchema, parseOrThrow } from '../schemas.js';

export interface CommentProps {
  id: string;
  userId: string;
  reviewId: string;
  content: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateCommentInput {
  userId: string;
  reviewId: string;
  content: string;
}

export class Comment {
  private constructor(private props: CommentProps) {}

  static create(input: CreateCommentInput, now: Date = new Date()): Comment {
    const data = parseOrThrow(CreateCommentSchema, input);
    return new Comment({
      id: uuidv4(),
      userId: data.userId,
      reviewId: data.reviewId,
      content: data.content,
      createdAt: now,
      updatedAt: now,
    });
  }

  static reconstitute(props: CommentProps): Comment {
    return new Comment({ ...props });
  }

  get id(): string {
    return this.props.id;
  }

  get userId(): string {
    return this.props.userId;
  }

  get reviewId(): string {
    return this.props.reviewId;
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

  updateContent(content: string, now: Date = new Date()): void {
    this.props.content = parseOrThrow(ContentSchema, content);
    this.props.updatedAt = now;
  }

  toJSON(): CommentProps {
    return { ...this.props };
  }
}
