/**
 * User entity
 *
 * Holds an already-hashed password; hashing and verification belong to the
 * authentication collaborator.
 *
 * @module domain/ratings/entities/user
 */

import { v4 as uuidv4 } from 'uuid';

import { CreateUserSchema, parseOrThrow, requiredTextSchema } from '../schemas.js';

export interface UserProps {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateUserInput {
  username: string;
  email: string;
  passwordHash: string;
}

/**
 * Projection safe to hand to any caller
 */
export interface PublicUser {
  id: string;
  username: string;
  email: string;
  createdAt: Date;
}

const PasswordHashSchema = requiredTextSchema('password_hash');

export class User {
  private constructor(private props: UserProps) {}

  static create(input: CreateUserInput, now: Date = new Date()): User {
    const data = parseOrThrow(CreateUserSchema, input);
    return new User({
      id: uuidv4(),
      username: data.username,
      email: data.email,
      passwordHash: data.passwordHash,
      createdAt: now,
      updatedAt: now,
    });
  }

  static reconstitute(props: UserProps): User {
    return new User({ ...props });
  }

  get id(): string {
    return this.props.id;
  }

  get username(): string {
    return this.props.username;
  }

  get email(): string {
    return this.props.email;
  }

  get passwordHash(): string {
    return this.props.passwordHash;
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }

  get updatedAt(): Date {
    return this.props.updatedAt;
  }

  changePasswordHash(passwordHash: string, now: Date = new Date()): void {
    this.props.passwordHash = parseOrThrow(PasswordHashSchema, passwordHash);
    this.props.updatedAt = now;
  }

  toPublic(): PublicUser {
    return {
      id: this.props.id,
      username: this.props.username,
      email: this.props.email,
      createdAt: this.props.createdAt,
    };
  }

  /** Serialises the public projection; the hash never leaves through JSON */
  toJSON(): PublicUser {
    return this.toPublic();
  }

  /** Full state for persistence adapters */
  toProps(): UserProps {
    return { ...this.props };
  }
}
