/**
 * Shared types used across layers.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  maxLength?: number;
  /** Reject strings that are empty after trimming. */
  nonEmpty?: boolean;
  min?: number;
  max?: number;
  enum?: string[];
  /** Element type for arrays. */
  items?: Exclude<FieldType, 'array'>;
  maxItems?: number;
}

export type BodySchema = Record<string, FieldSchema>;

export interface PaginationOptions {
  limit: number;
  offset: number;
}

export const DEFAULT_PAGE: PaginationOptions = { limit: 20, offset: 0 };
export const MAX_PAGE_SIZE = 100;
